/**
 * Target Entity Model
 *
 * The Tutor-style course graph produced by the transformer. Every record is a
 * plain, JSON-serializable object owned by the graph; nothing here aliases a
 * source entity.
 */

import { EntityOrigin } from './source-entity.model';

export const COURSE_GRAPH_SCHEMA_VERSION = '1.0.0';

/**
 * Tutor question kinds
 */
export type TargetQuestionKind =
  | 'multiple_choice'
  | 'true_false'
  | 'fill_in_the_blank'
  | 'open_ended'
  | 'short_answer'
  | 'matching'
  | 'image_matching'
  | 'image_answering'
  | 'ordering';

/**
 * Whether a question-kind conversion is exact or needs a human look
 */
export type MappingConfidence = 'direct' | 'fallback-requires-review';

export type TargetKind = 'course' | 'topic' | 'lesson' | 'quiz' | 'question' | 'assignment';

interface TargetEntityBase {
  /** Globally unique, stable across runs */
  id: string;
  kind: TargetKind;

  /** Owning entity id, null for the course */
  parentId: string | null;
  title: string;

  /** 0-based ordering key within the parent */
  position: number;

  /** Cleaned HTML */
  content: string;

  /** Source identifier this entity was built from */
  sourceId: string;
}

export interface TargetAnswer {
  title: string;
  isCorrect: boolean;
  position: number;
}

export interface TargetQuestion extends TargetEntityBase {
  kind: 'question';
  questionKind: TargetQuestionKind;
  sourceKind: string;
  confidence: MappingConfidence;
  mark: number;
  answers: TargetAnswer[];
  explanation: string | null;
}

export interface TargetQuizSettings {
  timeLimit: { timeValue: number; timeType: 'minutes' | 'hours' | 'days' | 'weeks' };
  attemptsAllowed: number;
  passingGrade: number;
  maxQuestionsForAnswer: number;
  questionLayoutView: 'single_question' | 'question_pagination' | 'question_below_each_other';
  questionsOrder: 'rand' | 'sorting' | 'asc' | 'desc';
  feedbackMode: 'default' | 'reveal' | 'retry';
}

export interface TargetQuiz extends TargetEntityBase {
  kind: 'quiz';
  settings: TargetQuizSettings;
  questions: TargetQuestion[];
}

export interface TargetAssignmentSettings {
  totalMark: number;
  passMark: number;

  /** ISO date as found in the source, null when absent */
  dueAt: string | null;
  uploadFilesLimit: number;
  uploadFileSizeLimitMb: number;
}

export interface TargetAssignment extends TargetEntityBase {
  kind: 'assignment';
  settings: TargetAssignmentSettings;
}

export interface TargetLesson extends TargetEntityBase {
  kind: 'lesson';
  origin: EntityOrigin;
  sourcePath: string | null;
}

export type TopicItem = TargetLesson | TargetQuiz | TargetAssignment;

export interface TargetTopic extends TargetEntityBase {
  kind: 'topic';
  origin: EntityOrigin;

  /** Lessons, quizzes and assignments in document order */
  items: TopicItem[];
}

export interface TargetCourse extends TargetEntityBase {
  kind: 'course';
  topics: TargetTopic[];
}

export type TargetEntity =
  | TargetCourse
  | TargetTopic
  | TargetLesson
  | TargetQuiz
  | TargetQuestion
  | TargetAssignment;

/**
 * Serialized output consumed by the uploader
 */
export interface TargetCourseGraph {
  schemaVersion: string;
  course: TargetCourse;
}

/**
 * Visit every entity of the graph in document order (course first)
 */
export function flattenGraph(graph: TargetCourseGraph): TargetEntity[] {
  const entities: TargetEntity[] = [graph.course];
  for (const topic of graph.course.topics) {
    entities.push(topic);
    for (const item of topic.items) {
      entities.push(item);
      if (item.kind === 'quiz') {
        entities.push(...item.questions);
      }
    }
  }
  return entities;
}

/**
 * Count entities by kind
 */
export function countByKind(graph: TargetCourseGraph): Record<TargetKind, number> {
  const counts: Record<TargetKind, number> = {
    course: 0,
    topic: 0,
    lesson: 0,
    quiz: 0,
    question: 0,
    assignment: 0,
  };
  for (const entity of flattenGraph(graph)) {
    counts[entity.kind]++;
  }
  return counts;
}
