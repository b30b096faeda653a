/**
 * Course Transformer
 *
 * Converts the resolved source course into the Tutor course graph. Top-level
 * modules become topics; everything below them is flattened depth-first into
 * the topic's items, keeping document order.
 */

import {
  DEFAULT_ASSIGNMENT_SETTINGS,
  DEFAULT_QUIZ_SETTINGS,
  RECOVERED_MODULE_ID,
} from '../config/tutor-schema';
import {
  AssignmentEntity,
  ContentEntity,
  OrganizationNode,
  QuizEntity,
  SourceCourse,
} from '../models/source-entity.model';
import {
  COURSE_GRAPH_SCHEMA_VERSION,
  TargetAssignment,
  TargetCourse,
  TargetCourseGraph,
  TargetLesson,
  TargetQuestion,
  TargetQuiz,
  TargetTopic,
  TopicItem,
} from '../models/target-entity.model';
import { MigrationReport } from '../services/report-aggregator.service';
import { Logger, createSilentLogger } from '../utils/console-logger';
import { IdRegistry } from '../utils/id-generator';
import { humanizeFileName } from '../utils/text-formatters';

import { mapQuestionKind } from './question-mapping';

export interface TransformOptions {
  /** Assignment pass mark as a share of total points */
  passMarkRatio?: number;
  logger?: Logger;
}

const DEFAULT_PASS_MARK_RATIO = 0.6;

/**
 * Transform a source course into a target course graph
 */
export function transformCourse(
  input: SourceCourse,
  report: MigrationReport,
  options: TransformOptions = {}
): TargetCourseGraph {
  return new CourseTransformer(input, report, options).transform();
}

class CourseTransformer {
  private readonly ids = new IdRegistry();
  private readonly logger: Logger;
  private readonly passMarkRatio: number;

  constructor(
    private readonly input: SourceCourse,
    private readonly report: MigrationReport,
    options: TransformOptions
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.passMarkRatio = options.passMarkRatio ?? DEFAULT_PASS_MARK_RATIO;
  }

  transform(): TargetCourseGraph {
    const { manifest, tree } = this.input;
    const course: TargetCourse = {
      id: this.ids.claim(`course:${manifest.identifier}`),
      kind: 'course',
      parentId: null,
      title: manifest.courseTitle,
      position: 0,
      content: '',
      sourceId: manifest.identifier,
      topics: [],
    };

    for (const module of tree.children) {
      const topic = this.buildTopic(module, course.id, course.topics.length);
      if (topic) {
        course.topics.push(topic);
        this.report.increment('topics');
      }
    }

    this.logger.debug(`Built ${course.topics.length} topics`);
    return { schemaVersion: COURSE_GRAPH_SCHEMA_VERSION, course };
  }

  private buildTopic(
    module: OrganizationNode,
    courseId: string,
    position: number
  ): TargetTopic | undefined {
    const ownContent = this.contentOf(module);

    // A leaf without content has nothing to hold
    if (module.children.length === 0 && !ownContent) {
      return undefined;
    }

    const recovered =
      module.identifier === RECOVERED_MODULE_ID &&
      module.children.some(child => child.recoveredEntityId !== undefined);
    const topic: TargetTopic = {
      id: this.ids.claim(`topic:${module.identifier}`),
      kind: 'topic',
      parentId: courseId,
      title: module.title || (ownContent ? this.titleOf(ownContent, module) : module.identifier),
      position,
      content: '',
      sourceId: module.identifier,
      origin: recovered ? 'recovered' : 'manifest',
      items: [],
    };

    const visit = (node: OrganizationNode): void => {
      const entity = this.contentOf(node);
      if (entity) {
        topic.items.push(this.buildItem(node, entity, topic.id, topic.items.length));
      }
      node.children.forEach(visit);
    };
    visit(module);

    return topic;
  }

  private contentOf(node: OrganizationNode): ContentEntity | undefined {
    const key = node.recoveredEntityId ?? node.resourceRef;
    return key ? this.input.entities.get(key) : undefined;
  }

  private titleOf(entity: ContentEntity, node: OrganizationNode): string {
    return entity.title || node.title || humanizeFileName(entity.sourcePath) || node.identifier;
  }

  private buildItem(
    node: OrganizationNode,
    entity: ContentEntity,
    topicId: string,
    position: number
  ): TopicItem {
    switch (entity.kind) {
      case 'quiz':
        return this.buildQuiz(node, entity, topicId, position);
      case 'assignment':
        return this.buildAssignment(node, entity, topicId, position);
      case 'page':
      case 'recovered':
        return this.buildLesson(node, entity, topicId, position);
    }
  }

  private buildLesson(
    node: OrganizationNode,
    entity: Extract<ContentEntity, { kind: 'page' | 'recovered' }>,
    topicId: string,
    position: number
  ): TargetLesson {
    const lesson: TargetLesson = {
      id: this.ids.claim(`lesson:${node.identifier}`),
      kind: 'lesson',
      parentId: topicId,
      title: this.titleOf(entity, node),
      position,
      content: entity.notes
        ? `${entity.body}<div class="lesson-notes">${entity.notes}</div>`
        : entity.body,
      sourceId: entity.id,
      origin: entity.origin,
      sourcePath: entity.sourcePath || null,
    };

    if (entity.kind === 'page' && entity.resourceType === 'unknown') {
      this.report.append(
        'transformation',
        'warning',
        'UNKNOWN_RESOURCE_TYPE',
        `Resource ${entity.id} has an unsupported type and was converted to a lesson`,
        lesson.id
      );
    }

    this.report.increment('lessons');
    return lesson;
  }

  private buildQuiz(
    node: OrganizationNode,
    entity: QuizEntity,
    topicId: string,
    position: number
  ): TargetQuiz {
    const quiz: TargetQuiz = {
      id: this.ids.claim(`quiz:${node.identifier}`),
      kind: 'quiz',
      parentId: topicId,
      title: this.titleOf(entity, node),
      position,
      content: entity.description,
      sourceId: entity.id,
      settings: {
        ...DEFAULT_QUIZ_SETTINGS,
        timeLimit:
          entity.settings.timeLimitMinutes !== undefined
            ? { timeValue: entity.settings.timeLimitMinutes, timeType: 'minutes' }
            : { ...DEFAULT_QUIZ_SETTINGS.timeLimit },
        attemptsAllowed: entity.settings.allowedAttempts ?? DEFAULT_QUIZ_SETTINGS.attemptsAllowed,
      },
      questions: [],
    };

    entity.questions.forEach((question, index) => {
      const rule = mapQuestionKind(question.sourceKind);
      const target: TargetQuestion = {
        id: this.ids.claim(`question:${node.identifier}:${question.id}`),
        kind: 'question',
        parentId: quiz.id,
        title: question.title || `Question ${index + 1}`,
        position: index,
        content: question.text,
        sourceId: question.id,
        questionKind: rule.targetKind,
        sourceKind: question.sourceKind,
        confidence: rule.confidence,
        mark: question.points,
        answers: question.answers.map((answer, answerIndex) => ({
          title: answer.text,
          isCorrect: answer.correct,
          position: answerIndex,
        })),
        explanation: question.feedback ?? null,
      };

      this.report.recordQuestionKind(question.sourceKind);
      if (rule.confidence === 'fallback-requires-review') {
        this.report.increment('fallbackMappings');
        this.report.append(
          'transformation',
          'warning',
          'FALLBACK_MAPPING',
          `Question kind ${question.sourceKind} converted to ${rule.targetKind}; review required`,
          target.id
        );
        this.report.addReviewItem({
          entityId: target.id,
          title: target.title,
          sourceKind: question.sourceKind,
          targetKind: rule.targetKind,
          confidence: rule.confidence,
        });
      }

      quiz.questions.push(target);
      this.report.increment('targetQuestions');
    });

    this.report.increment('targetQuizzes');
    return quiz;
  }

  private buildAssignment(
    node: OrganizationNode,
    entity: AssignmentEntity,
    topicId: string,
    position: number
  ): TargetAssignment {
    const id = this.ids.claim(`assignment:${node.identifier}`);
    const { pointsPossible, dueAt } = entity.metadata;

    if (pointsPossible === undefined) {
      this.report.append(
        'transformation',
        'warning',
        'MISSING_ASSIGNMENT_METADATA',
        `Assignment ${entity.id} has no points; total mark set to 0`,
        id
      );
    }
    if (dueAt === undefined) {
      this.report.append(
        'transformation',
        'warning',
        'MISSING_ASSIGNMENT_METADATA',
        `Assignment ${entity.id} has no due date`,
        id
      );
    }

    const totalMark = pointsPossible ?? DEFAULT_ASSIGNMENT_SETTINGS.totalMark;
    this.report.increment('targetAssignments');

    return {
      id,
      kind: 'assignment',
      parentId: topicId,
      title: this.titleOf(entity, node),
      position,
      content: entity.body,
      sourceId: entity.id,
      settings: {
        ...DEFAULT_ASSIGNMENT_SETTINGS,
        totalMark,
        passMark: Math.round(totalMark * this.passMarkRatio * 100) / 100,
        dueAt: dueAt ?? null,
      },
    };
  }
}
