/**
 * Course Transformer Tests
 *
 * Source courses are assembled by hand so every branch is reachable without
 * touching the filesystem.
 */

import { ContentEntity, OrganizationNode, SourceCourse } from '../models/source-entity.model';
import { countByKind } from '../models/target-entity.model';
import { MigrationReport } from '../services/report-aggregator.service';

import { transformCourse } from './course-transformer';

const node = (
  identifier: string,
  title: string,
  children: OrganizationNode[] = [],
  resourceRef?: string
): OrganizationNode => ({ identifier, title, children, ...(resourceRef ? { resourceRef } : {}) });

const ENTITIES: ContentEntity[] = [
  {
    id: 'p1',
    kind: 'page',
    origin: 'manifest',
    title: 'Cells',
    rawContent: '',
    body: '<p>Cells</p>',
    notes: 'Say hi',
    resourceType: 'page',
    sourcePath: 'wiki_content/cells.html',
  },
  {
    id: 'p2',
    kind: 'page',
    origin: 'manifest',
    rawContent: '',
    body: '',
    resourceType: 'unknown',
    sourcePath: '',
  },
  {
    id: 'q1',
    kind: 'quiz',
    origin: 'manifest',
    title: 'Quiz',
    rawContent: '',
    description: '<p>D</p>',
    settings: { timeLimitMinutes: 10 },
    sourcePath: 'quiz/qti.xml',
    questions: [
      {
        id: 'x1',
        kind: 'question',
        origin: 'manifest',
        rawContent: '',
        sourcePath: 'quiz/qti.xml',
        sourceKind: 'true_false_question',
        text: '<p>Cells are alive.</p>',
        points: 1,
        answers: [
          { id: 't', text: 'True', correct: true },
          { id: 'f', text: 'False', correct: false },
        ],
      },
      {
        id: 'x2',
        kind: 'question',
        origin: 'manifest',
        title: 'Hot',
        rawContent: '',
        sourcePath: 'quiz/qti.xml',
        sourceKind: 'hotspot_question',
        text: '<p>Click the nucleus.</p>',
        points: 3,
        answers: [],
        feedback: 'fb',
      },
    ],
  },
  {
    id: 'a1',
    kind: 'assignment',
    origin: 'manifest',
    rawContent: '',
    body: '<p>Do</p>',
    sourcePath: 'assignment/report.html',
    metadata: { pointsPossible: 15, submissionTypes: [] },
  },
  {
    id: 'recovered-x',
    kind: 'recovered',
    origin: 'recovered',
    rawContent: '',
    body: 'B',
    sourcePath: 'extra/x_notes.xml',
  },
];

function buildSource(modules: OrganizationNode[]): SourceCourse {
  const tree = node('bio', 'Bio', modules);
  return {
    manifest: { identifier: 'bio', courseTitle: 'Bio', resources: new Map(), tree },
    tree,
    entities: new Map<string, ContentEntity>(ENTITIES.map(entity => [entity.id, entity])),
    recoveredPaths: ['extra/x_notes.xml'],
    orphanCandidates: ['extra/x_notes.xml'],
  };
}

const MODULES: OrganizationNode[] = [
  node('mod1', 'Week 1', [
    node('n_page', 'Cells node', [], 'p1'),
    node('n_sub', 'Sub', [node('n_quiz', 'Quiz node', [], 'q1')]),
  ]),
  node('mod_empty', 'Empty'),
  node('mod2', 'Week 2', [
    node('n_assign', 'Report', [], 'a1'),
    node('n_page', 'Link', [], 'p2'),
  ]),
  {
    identifier: 'recovered-content',
    title: 'Recovered Content',
    children: [
      {
        identifier: 'recovered-x',
        title: 'X Notes',
        children: [],
        recoveredEntityId: 'recovered-x',
      },
    ],
  },
];

describe('Course Transformer', () => {
  let report: MigrationReport;

  beforeEach(() => {
    report = new MigrationReport('/courses/bio');
  });

  it('should build the course root', () => {
    const { course, schemaVersion } = transformCourse(buildSource(MODULES), report);

    expect(schemaVersion).toBe('1.0.0');
    expect(course).toMatchObject({
      id: 'course:bio',
      kind: 'course',
      parentId: null,
      title: 'Bio',
      position: 0,
      sourceId: 'bio',
    });
  });

  it('should turn modules with content into ordered topics', () => {
    const { course } = transformCourse(buildSource(MODULES), report);

    expect(course.topics.map(t => [t.id, t.title, t.position, t.origin])).toEqual([
      ['topic:mod1', 'Week 1', 0, 'manifest'],
      ['topic:mod2', 'Week 2', 1, 'manifest'],
      ['topic:recovered-content', 'Recovered Content', 2, 'recovered'],
    ]);
    expect(course.topics.every(t => t.parentId === 'course:bio')).toBe(true);
  });

  it('should flatten nested items depth-first', () => {
    const { course } = transformCourse(buildSource(MODULES), report);

    expect(course.topics[0].items.map(i => [i.id, i.position])).toEqual([
      ['lesson:n_page', 0],
      ['quiz:n_quiz', 1],
    ]);
  });

  it('should build lessons with notes appended', () => {
    const [lesson] = transformCourse(buildSource(MODULES), report).course.topics[0].items;

    expect(lesson).toEqual({
      id: 'lesson:n_page',
      kind: 'lesson',
      parentId: 'topic:mod1',
      title: 'Cells',
      position: 0,
      content: '<p>Cells</p><div class="lesson-notes">Say hi</div>',
      sourceId: 'p1',
      origin: 'manifest',
      sourcePath: 'wiki_content/cells.html',
    });
  });

  it('should suffix colliding identifiers', () => {
    const { course } = transformCourse(buildSource(MODULES), report);
    const link = course.topics[1].items[1];

    expect(link.id).toBe('lesson:n_page~2');
    expect(link.title).toBe('Link');
    expect(link.kind === 'lesson' && link.sourcePath).toBeNull();
  });

  it('should build quizzes with settings and questions', () => {
    const quiz = transformCourse(buildSource(MODULES), report).course.topics[0].items[1];
    if (quiz.kind !== 'quiz') {
      throw new Error('expected a quiz');
    }

    expect(quiz.content).toBe('<p>D</p>');
    expect(quiz.settings.timeLimit).toEqual({ timeValue: 10, timeType: 'minutes' });
    expect(quiz.settings.attemptsAllowed).toBe(10);
    expect(quiz.questions[0]).toEqual({
      id: 'question:n_quiz:x1',
      kind: 'question',
      parentId: 'quiz:n_quiz',
      title: 'Question 1',
      position: 0,
      content: '<p>Cells are alive.</p>',
      sourceId: 'x1',
      questionKind: 'true_false',
      sourceKind: 'true_false_question',
      confidence: 'direct',
      mark: 1,
      answers: [
        { title: 'True', isCorrect: true, position: 0 },
        { title: 'False', isCorrect: false, position: 1 },
      ],
      explanation: null,
    });
    expect(quiz.questions[1]).toMatchObject({
      id: 'question:n_quiz:x2',
      title: 'Hot',
      questionKind: 'open_ended',
      confidence: 'fallback-requires-review',
      mark: 3,
      explanation: 'fb',
    });
  });

  it('should flag fallback mappings for review', () => {
    transformCourse(buildSource(MODULES), report);
    const snapshot = report.freeze();

    expect(snapshot.reviewItems).toEqual([
      {
        entityId: 'question:n_quiz:x2',
        title: 'Hot',
        sourceKind: 'hotspot_question',
        targetKind: 'open_ended',
        confidence: 'fallback-requires-review',
      },
    ]);
    expect(snapshot.questionKinds).toEqual({ hotspot_question: 1, true_false_question: 1 });
  });

  it('should build assignments with a derived pass mark', () => {
    const assignment = transformCourse(buildSource(MODULES), report).course.topics[1].items[0];

    expect(assignment).toMatchObject({
      id: 'assignment:n_assign',
      title: 'Report',
      content: '<p>Do</p>',
      settings: {
        totalMark: 15,
        passMark: 9,
        dueAt: null,
        uploadFilesLimit: 1,
        uploadFileSizeLimitMb: 2,
      },
    });
  });

  it('should honor the pass mark ratio', () => {
    const graph = transformCourse(buildSource(MODULES), report, { passMarkRatio: 0.5 });
    const assignment = graph.course.topics[1].items[0];

    expect(assignment.kind === 'assignment' && assignment.settings.passMark).toBe(7.5);
  });

  it('should record warnings in visiting order', () => {
    transformCourse(buildSource(MODULES), report);

    expect(report.getEvents().map(e => [e.stage, e.code, e.entityId])).toEqual([
      ['transformation', 'FALLBACK_MAPPING', 'question:n_quiz:x2'],
      ['transformation', 'MISSING_ASSIGNMENT_METADATA', 'assignment:n_assign'],
      ['transformation', 'UNKNOWN_RESOURCE_TYPE', 'lesson:n_page~2'],
    ]);
  });

  it('should place recovered content under the recovered topic', () => {
    const recovered = transformCourse(buildSource(MODULES), report).course.topics[2].items[0];

    expect(recovered).toMatchObject({
      id: 'lesson:recovered-x',
      title: 'X Notes',
      content: 'B',
      origin: 'recovered',
      sourcePath: 'extra/x_notes.xml',
    });
  });

  it('should turn a top-level content node into a topic holding itself', () => {
    const source = buildSource([node('solo', 'Standalone', [], 'p1')]);
    const { course } = transformCourse(source, report);

    expect(course.topics).toHaveLength(1);
    expect(course.topics[0].title).toBe('Standalone');
    expect(course.topics[0].items.map(i => i.id)).toEqual(['lesson:solo']);
  });

  it('should update counters', () => {
    const graph = transformCourse(buildSource(MODULES), report);

    expect(countByKind(graph)).toEqual({
      course: 1,
      topic: 3,
      lesson: 3,
      quiz: 1,
      question: 2,
      assignment: 1,
    });
    expect(report.getCounter('topics')).toBe(3);
    expect(report.getCounter('lessons')).toBe(3);
    expect(report.getCounter('targetQuestions')).toBe(2);
    expect(report.getCounter('fallbackMappings')).toBe(1);
  });

  it('should produce the same graph on every run', () => {
    const first = transformCourse(buildSource(MODULES), new MigrationReport('/a'));
    const second = transformCourse(buildSource(MODULES), new MigrationReport('/a'));
    expect(JSON.stringify(first)).toBe(JSON.stringify(second));
  });
});
