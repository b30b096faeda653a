/**
 * Integrity Verifier
 *
 * Checks the target graph against itself and against the source it came
 * from. Broken structure (dangling parents, duplicate identifiers) fails the
 * run; count mismatches are reported as warnings.
 */

import { MigrationEvent } from '../models/migration-report.model';
import { OrganizationNode, SourceCourse } from '../models/source-entity.model';
import {
  TargetCourseGraph,
  TargetEntity,
  TargetKind,
  flattenGraph,
} from '../models/target-entity.model';

import { MigrationReport } from './report-aggregator.service';

export interface IntegrityIssue {
  code: string;
  severity: 'warning' | 'error';
  message: string;
  entityId?: string;
}

export interface IntegrityResult {
  /** True when no error-level issue was found */
  valid: boolean;
  issues: IntegrityIssue[];

  /** Both sides of the completeness equation */
  completeness: {
    expected: number;
    actual: number;
  };
}

/** Kinds each kind may hang under */
const ALLOWED_PARENTS: Record<TargetKind, readonly TargetKind[]> = {
  course: [],
  topic: ['course'],
  lesson: ['topic', 'course'],
  quiz: ['topic', 'course'],
  assignment: ['topic', 'course'],
  question: ['quiz'],
};

/** Stages whose error events mark an excluded entity */
const STRUCTURAL_STAGES: ReadonlySet<string> = new Set([
  'extraction',
  'inventory',
  'transformation',
]);

/**
 * Verify the graph and append every issue to the report
 */
export function verifyIntegrity(
  source: SourceCourse,
  graph: TargetCourseGraph,
  report: MigrationReport
): IntegrityResult {
  const entities = flattenGraph(graph);
  const issues: IntegrityIssue[] = [
    ...checkParents(entities),
    ...checkUniqueIds(entities),
    ...checkOrdering(graph),
  ];

  const manifestNodes = collectNodes(source.manifest.tree);
  const contentNodes = manifestNodes.filter(node => node.resourceRef !== undefined);

  const pageNodes = contentNodes.filter(
    node => node.resourceRef !== undefined && source.entities.get(node.resourceRef)?.kind === 'page'
  );
  const lessons = entities.filter(entity => entity.kind === 'lesson').length;
  const expectedLessons = pageNodes.length + source.recoveredPaths.length;
  if (lessons !== expectedLessons) {
    issues.push({
      code: 'LESSON_COUNT_MISMATCH',
      severity: 'warning',
      message:
        `Expected ${expectedLessons} lessons (${pageNodes.length} pages, ` +
        `${source.recoveredPaths.length} recovered), found ${lessons}`,
    });
  }

  const completeness = {
    expected: contentNodes.length + source.orphanCandidates.length,
    actual: countContentEntities(entities) + countExcluded(report.getEvents()),
  };
  if (completeness.expected !== completeness.actual) {
    issues.push({
      code: 'COMPLETENESS_MISMATCH',
      severity: 'warning',
      message:
        `${completeness.expected} content references and orphans, ` +
        `but ${completeness.actual} migrated or reported`,
    });
  }

  issues.push(...checkQuestionCounts(source, entities));

  for (const issue of issues) {
    report.append('integrity', issue.severity, issue.code, issue.message, issue.entityId);
  }

  return {
    valid: !issues.some(issue => issue.severity === 'error'),
    issues,
    completeness,
  };
}

function checkParents(entities: TargetEntity[]): IntegrityIssue[] {
  const kinds = new Map<string, TargetKind>();
  entities.forEach(entity => kinds.set(entity.id, entity.kind));

  const issues: IntegrityIssue[] = [];
  for (const entity of entities) {
    if (entity.parentId === null) {
      if (entity.kind !== 'course') {
        issues.push(dangling(entity, 'has no parent'));
      }
      continue;
    }
    const parentKind = kinds.get(entity.parentId);
    if (parentKind === undefined) {
      issues.push(dangling(entity, `points at missing parent ${entity.parentId}`));
    } else if (!ALLOWED_PARENTS[entity.kind].includes(parentKind)) {
      issues.push(dangling(entity, `cannot be placed under a ${parentKind}`));
    }
  }
  return issues;
}

function dangling(entity: TargetEntity, problem: string): IntegrityIssue {
  return {
    code: 'DANGLING_PARENT',
    severity: 'error',
    message: `${entity.kind} ${entity.id} ${problem}`,
    entityId: entity.id,
  };
}

function checkUniqueIds(entities: TargetEntity[]): IntegrityIssue[] {
  const seen = new Set<string>();
  const reported = new Set<string>();
  const issues: IntegrityIssue[] = [];
  for (const entity of entities) {
    if (seen.has(entity.id) && !reported.has(entity.id)) {
      reported.add(entity.id);
      issues.push({
        code: 'DUPLICATE_IDENTIFIER',
        severity: 'error',
        message: `Identifier ${entity.id} is used more than once`,
        entityId: entity.id,
      });
    }
    seen.add(entity.id);
  }
  return issues;
}

function checkOrdering(graph: TargetCourseGraph): IntegrityIssue[] {
  const issues: IntegrityIssue[] = [];
  const check = (parentId: string, children: readonly TargetEntity[]): void => {
    const positions = new Set<number>();
    for (const child of children) {
      if (positions.has(child.position)) {
        issues.push({
          code: 'DUPLICATE_ORDERING_KEY',
          severity: 'warning',
          message: `Position ${child.position} is used twice under ${parentId}`,
          entityId: child.id,
        });
      }
      positions.add(child.position);
    }
  };

  check(graph.course.id, graph.course.topics);
  for (const topic of graph.course.topics) {
    check(topic.id, topic.items);
    for (const item of topic.items) {
      if (item.kind === 'quiz') {
        check(item.id, item.questions);
      }
    }
  }
  return issues;
}

function checkQuestionCounts(source: SourceCourse, entities: TargetEntity[]): IntegrityIssue[] {
  const issues: IntegrityIssue[] = [];
  for (const entity of entities) {
    if (entity.kind !== 'quiz') {
      continue;
    }
    const sourceQuiz = source.entities.get(entity.sourceId);
    const expected = sourceQuiz?.kind === 'quiz' ? sourceQuiz.questions.length : 0;
    if (entity.questions.length !== expected) {
      issues.push({
        code: 'QUESTION_COUNT_MISMATCH',
        severity: 'warning',
        message: `Quiz ${entity.id} has ${entity.questions.length} questions, expected ${expected}`,
        entityId: entity.id,
      });
    }
  }
  return issues;
}

function collectNodes(root: OrganizationNode): OrganizationNode[] {
  const nodes: OrganizationNode[] = [];
  const visit = (node: OrganizationNode): void => {
    nodes.push(node);
    node.children.forEach(visit);
  };
  root.children.forEach(visit);
  return nodes;
}

function countContentEntities(entities: TargetEntity[]): number {
  return entities.filter(
    entity => entity.kind === 'lesson' || entity.kind === 'quiz' || entity.kind === 'assignment'
  ).length;
}

/**
 * Distinct entities an error event reports as excluded
 */
function countExcluded(events: readonly MigrationEvent[]): number {
  const ids = new Set<string>();
  for (const event of events) {
    const structural = event.severity === 'error' && STRUCTURAL_STAGES.has(event.stage);
    if (structural && event.entityId !== undefined) {
      ids.add(event.entityId);
    }
  }
  return ids.size;
}
