/**
 * Report Aggregator
 *
 * Append-only record of a migration run. Stages append events and bump
 * counters; nothing is ever updated or removed. `freeze` closes the report and
 * returns an immutable snapshot carrying the terminal status.
 */

import {
  CounterName,
  EventSeverity,
  MigrationCounters,
  MigrationEvent,
  MigrationReportSnapshot,
  MigrationStage,
  MigrationStatus,
  ReviewItem,
} from '../models/migration-report.model';

/** Stages whose errors fail the whole run */
const FATAL_STAGES: ReadonlySet<MigrationStage> = new Set(['manifest', 'integrity']);

export type Clock = () => Date;

/**
 * Compute the terminal status from events and counters
 */
export function computeStatus(
  events: readonly MigrationEvent[],
  counters: Readonly<MigrationCounters>,
  aborted: boolean
): MigrationStatus {
  if (aborted || events.some(e => e.severity === 'error' && FATAL_STAGES.has(e.stage))) {
    return 'FAILED';
  }
  if (events.some(e => e.severity !== 'info') || counters.filesNotRecovered > 0) {
    return 'SUCCESS_WITH_WARNINGS';
  }
  return 'SUCCESS';
}

function emptyCounters(): MigrationCounters {
  return {
    modules: 0,
    resources: 0,
    unplaced: 0,
    pages: 0,
    assignments: 0,
    quizzes: 0,
    questions: 0,
    inventoryFiles: 0,
    orphanedFiles: 0,
    recovered: 0,
    filesNotRecovered: 0,
    topics: 0,
    lessons: 0,
    targetQuizzes: 0,
    targetQuestions: 0,
    targetAssignments: 0,
    fallbackMappings: 0,
    assetsResolved: 0,
    assetsMissing: 0,
    linksResolved: 0,
    linksBroken: 0,
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export class MigrationReport {
  private readonly events: MigrationEvent[] = [];
  private readonly counters = emptyCounters();
  private readonly questionKinds = new Map<string, number>();
  private readonly reviewItems: ReviewItem[] = [];
  private readonly startedAt: Date;
  private courseTitle: string | null = null;
  private aborted = false;
  private snapshot: MigrationReportSnapshot | null = null;

  constructor(
    private readonly sourceDirectory: string,
    private readonly clock: Clock = () => new Date()
  ) {
    this.startedAt = clock();
  }

  /**
   * Append an event and return it
   */
  append(
    stage: MigrationStage,
    severity: EventSeverity,
    code: string,
    message: string,
    entityId?: string
  ): MigrationEvent {
    this.assertOpen();
    const event: MigrationEvent = Object.freeze({
      sequence: this.events.length + 1,
      stage,
      severity,
      code,
      message,
      ...(entityId !== undefined ? { entityId } : {}),
    });
    this.events.push(event);
    return event;
  }

  increment(counter: CounterName, by = 1): void {
    this.assertOpen();
    this.counters[counter] += by;
  }

  recordQuestionKind(kind: string): void {
    this.assertOpen();
    this.questionKinds.set(kind, (this.questionKinds.get(kind) ?? 0) + 1);
  }

  addReviewItem(item: ReviewItem): void {
    this.assertOpen();
    this.reviewItems.push(Object.freeze({ ...item }));
  }

  setCourseTitle(title: string): void {
    this.assertOpen();
    this.courseTitle = title;
  }

  /** Record that a fatal error stopped the run */
  markAborted(): void {
    this.assertOpen();
    this.aborted = true;
  }

  /** Events recorded so far, oldest first */
  getEvents(): readonly MigrationEvent[] {
    return [...this.events];
  }

  getCounter(counter: CounterName): number {
    return this.counters[counter];
  }

  get isFrozen(): boolean {
    return this.snapshot !== null;
  }

  /**
   * Close the report. Later calls return the same snapshot.
   */
  freeze(): MigrationReportSnapshot {
    if (this.snapshot) {
      return this.snapshot;
    }

    const questionKinds: Record<string, number> = {};
    for (const kind of [...this.questionKinds.keys()].sort()) {
      questionKinds[kind] = this.questionKinds.get(kind) ?? 0;
    }

    const count = (severity: EventSeverity): number =>
      this.events.filter(e => e.severity === severity).length;

    this.snapshot = deepFreeze<MigrationReportSnapshot>({
      status: computeStatus(this.events, this.counters, this.aborted),
      sourceDirectory: this.sourceDirectory,
      courseTitle: this.courseTitle,
      startedAt: this.startedAt.toISOString(),
      completedAt: this.clock().toISOString(),
      aborted: this.aborted,
      counters: { ...this.counters },
      questionKinds,
      reviewItems: [...this.reviewItems],
      events: [...this.events],
      totals: {
        errors: count('error'),
        warnings: count('warning'),
        info: count('info'),
      },
    });
    return this.snapshot;
  }

  private assertOpen(): void {
    if (this.snapshot) {
      throw new Error('Migration report is frozen');
    }
  }
}
