/**
 * Migration Pipeline Tests
 *
 * End-to-end runs over the fixture courses under src/__fixtures__.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { ConfigError } from '../config/migration-config';
import { TargetLesson, countByKind } from '../models/target-entity.model';
import { createSilentLogger } from '../utils/console-logger';
import { recoveredEntityId } from '../utils/id-generator';

import { serializeCourseGraph } from './export.service';
import { MigrationResult, runMigration } from './migration-pipeline.service';

const FIXTURES = path.join(__dirname, '..', '__fixtures__');
const WELCOME_COURSE = path.join(FIXTURES, 'welcome-course');
const SAMPLE_COURSE = path.join(FIXTURES, 'sample-course');
const CANVAS_COURSE = path.join(FIXTURES, 'canvas-course');

const logger = createSilentLogger();

describe('Migration Pipeline', () => {
  describe('welcome course', () => {
    let result: MigrationResult;

    beforeAll(async () => {
      result = await runMigration(WELCOME_COURSE, { logger });
    });

    it('should succeed without errors', () => {
      expect(result.report.status).toBe('SUCCESS');
      expect(result.report.totals.errors).toBe(0);
      expect(result.report.totals.warnings).toBe(0);
    });

    it('should migrate the page and recover the orphan', () => {
      const topics = result.graph?.course.topics ?? [];

      expect(topics.map(t => t.title)).toEqual(['Getting Started', 'Recovered Content']);
      expect(topics.map(t => t.items.map(i => [i.kind, i.title]))).toEqual([
        [['lesson', 'Welcome']],
        [['lesson', 'Notes']],
      ]);
    });

    it('should keep origins and cleaned content', () => {
      const topics = result.graph?.course.topics ?? [];
      const lessons = topics.flatMap(t => t.items).filter(
        (item): item is TargetLesson => item.kind === 'lesson'
      );

      expect(lessons.map(l => [l.origin, l.content])).toEqual([
        ['manifest', '<h1>Hi</h1><p>Text</p>'],
        ['recovered', '<p>Extra</p>'],
      ]);
      expect(lessons[1].id).toBe(`lesson:${recoveredEntityId('notes.xml')}`);
    });

    it('should record the recovery', () => {
      expect(result.report.courseTitle).toBe('Orientation');
      expect(result.report.events.map(e => e.code)).toEqual(['ORPHAN_RECOVERED']);
      expect(result.report.counters.recovered).toBe(1);
      expect(result.integrity?.completeness).toEqual({ expected: 2, actual: 2 });
    });
  });

  describe('sample course', () => {
    let result: MigrationResult;
    let graph: MigrationResult['graph'];

    beforeAll(async () => {
      result = await runMigration(SAMPLE_COURSE, { logger });
      graph = result.graph;
    });

    it('should finish with warnings', () => {
      expect(result.report.status).toBe('SUCCESS_WITH_WARNINGS');
      expect(result.report.totals).toEqual({ errors: 1, warnings: 4, info: 2 });
      expect(result.integrity?.valid).toBe(true);
    });

    it('should record events in stage order', () => {
      expect(result.report.events.map(e => [e.sequence, e.stage, e.code, e.entityId])).toEqual([
        [1, 'manifest', 'UNRESOLVED_REFERENCE', 'i_ghost'],
        [2, 'inventory', 'UNRECOGNIZED_ORPHAN', undefined],
        [3, 'inventory', 'ORPHAN_EXTRACTION_FAILED', recoveredEntityId('extra/broken.xml')],
        [4, 'inventory', 'ORPHAN_RECOVERED', recoveredEntityId('extra/review.html')],
        [5, 'transformation', 'FALLBACK_MAPPING', 'question:i_quiz:q_size'],
        [6, 'assets', 'MISSING_ASSET', 'lesson:i_intro'],
        [7, 'assets', 'UNRESOLVED_INTERNAL_LINK', 'lesson:i_intro'],
      ]);
    });

    it('should build topics in manifest order', () => {
      const topics = graph?.course.topics ?? [];

      expect(topics.map(t => [t.id, t.title])).toEqual([
        ['topic:mod_week1', 'Week 1: Cells'],
        ['topic:mod_week2', 'Week 2: Lab'],
        ['topic:recovered-content', 'Recovered Content'],
      ]);
      expect(topics.map(t => t.items.map(i => i.id))).toEqual([
        ['lesson:i_intro', 'lesson:i_safety', 'quiz:i_quiz'],
        ['assignment:i_report', 'lesson:i_guide'],
        [`lesson:${recoveredEntityId('extra/review.html')}`],
      ]);
    });

    it('should count every entity kind', () => {
      expect(graph && countByKind(graph)).toEqual({
        course: 1,
        topic: 3,
        lesson: 4,
        quiz: 1,
        question: 2,
        assignment: 1,
      });
    });

    it('should resolve assets and internal links', () => {
      const intro = graph?.course.topics[0].items[0];

      expect(intro?.content).toContain('<img src="../../assets/images/cell.png" alt="Cell">');
      expect(intro?.content).toContain('<a href="lesson://lesson:i_safety">safety rules</a>');
      expect(intro?.content).toContain('<a href="$WIKI_REFERENCE$/pages/old-notes">');
    });

    it('should carry quiz and assignment settings', () => {
      const [quiz] = graph?.course.topics[0].items.slice(2) ?? [];
      const [assignment] = graph?.course.topics[1].items ?? [];

      expect(quiz?.kind === 'quiz' && quiz.settings.timeLimit).toEqual({
        timeValue: 15,
        timeType: 'minutes',
      });
      expect(quiz?.kind === 'quiz' && quiz.settings.attemptsAllowed).toBe(3);
      expect(assignment?.kind === 'assignment' && assignment.settings).toMatchObject({
        totalMark: 20,
        passMark: 12,
        dueAt: '2026-02-14T23:59:00',
      });
    });

    it('should keep the counters', () => {
      expect(result.report.counters).toEqual({
        modules: 2,
        resources: 6,
        unplaced: 0,
        pages: 3,
        assignments: 1,
        quizzes: 1,
        questions: 2,
        inventoryFiles: 9,
        orphanedFiles: 3,
        recovered: 1,
        filesNotRecovered: 1,
        topics: 3,
        lessons: 4,
        targetQuizzes: 1,
        targetQuestions: 2,
        targetAssignments: 1,
        fallbackMappings: 1,
        assetsResolved: 2,
        assetsMissing: 1,
        linksResolved: 1,
        linksBroken: 1,
      });
    });

    it('should balance the completeness check', () => {
      expect(result.integrity?.completeness).toEqual({ expected: 7, actual: 7 });
    });

    it('should produce the same output on a second run', async () => {
      const second = await runMigration(SAMPLE_COURSE, { logger });

      expect(second.graph && serializeCourseGraph(second.graph)).toBe(
        graph && serializeCourseGraph(graph)
      );
      expect(second.report.events).toEqual(result.report.events);
    });

    it('should apply a custom asset path', async () => {
      const custom = await runMigration(SAMPLE_COURSE, { logger, assetBasePath: '/media/' });
      const intro = custom.graph?.course.topics[0].items[0];

      expect(intro?.content).toContain('<img src="/media/images/cell.png" alt="Cell">');
      expect(custom.report.counters.assetsResolved).toBe(2);
    });
  });

  describe('canvas course', () => {
    let result: MigrationResult;

    beforeAll(async () => {
      result = await runMigration(CANVAS_COURSE, { logger });
    });

    it('should place resources no module references under their own topic', () => {
      const topics = result.graph?.course.topics ?? [];

      expect(topics.map(t => [t.id, t.title])).toEqual([
        ['topic:mod_1', 'Unit 1'],
        ['topic:unplaced-content', 'Unplaced Content'],
      ]);
      expect(topics[1].items.map(i => [i.id, i.title])).toEqual([
        ['lesson:r_unplaced', 'Important page'],
        ['assignment:a1', 'Write an essay'],
      ]);
    });

    it('should warn about each unplaced resource', () => {
      expect(result.report.status).toBe('SUCCESS_WITH_WARNINGS');
      expect(result.report.events.map(e => [e.stage, e.severity, e.code, e.entityId])).toEqual([
        ['manifest', 'warning', 'UNPLACED_RESOURCE', 'r_unplaced'],
        ['manifest', 'warning', 'UNPLACED_RESOURCE', 'a1'],
      ]);
      expect(result.report.counters.unplaced).toBe(2);
    });

    it('should count unplaced resources in the completeness check', () => {
      expect(result.integrity?.completeness).toEqual({ expected: 4, actual: 4 });
    });

    it('should read quiz settings from the dependency resource', () => {
      const quiz = result.graph?.course.topics[0].items[1];
      if (quiz?.kind !== 'quiz') {
        throw new Error('expected a quiz');
      }

      expect(quiz.content).toBe('<p>Read chapter 2 first</p>');
      expect(quiz.settings.timeLimit).toEqual({ timeValue: 20, timeType: 'minutes' });
      expect(quiz.settings.attemptsAllowed).toBe(2);
      expect(quiz.questions.map(q => q.id)).toEqual(['question:i_quiz:q_year']);
    });
  });

  describe('failures', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'migration-pipeline-test-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should abort without a manifest', async () => {
      const result = await runMigration(tempDir, { logger });

      expect(result.graph).toBeNull();
      expect(result.integrity).toBeUndefined();
      expect(result.report.status).toBe('FAILED');
      expect(result.report.aborted).toBe(true);
      expect(result.report.events.map(e => [e.stage, e.severity, e.code])).toEqual([
        ['manifest', 'error', 'FATAL_ERROR'],
      ]);
    });

    it('should abort on a malformed manifest', async () => {
      fs.writeFileSync(path.join(tempDir, 'imsmanifest.xml'), '<manifest><organizations>');

      const result = await runMigration(tempDir, { logger });

      expect(result.graph).toBeNull();
      expect(result.report.status).toBe('FAILED');
    });

    it('should reject invalid options', async () => {
      await expect(runMigration(tempDir, { logger, passMarkRatio: 2 })).rejects.toThrow(
        ConfigError
      );
    });
  });
});
