/**
 * Migration Report Model
 *
 * Shapes of the report that every pipeline stage writes to and that the
 * renderer reads once the run is over.
 */

import { MappingConfidence, TargetQuestionKind } from './target-entity.model';

/**
 * Pipeline stage that recorded an event
 */
export type MigrationStage =
  | 'manifest'
  | 'inventory'
  | 'extraction'
  | 'transformation'
  | 'assets'
  | 'integrity'
  | 'pipeline';

export type EventSeverity = 'info' | 'warning' | 'error';

export type MigrationStatus = 'SUCCESS' | 'SUCCESS_WITH_WARNINGS' | 'FAILED';

/**
 * One entry of the event log
 */
export interface MigrationEvent {
  /** 1-based append order */
  readonly sequence: number;
  readonly stage: MigrationStage;
  readonly severity: EventSeverity;

  /** Machine-readable event type, e.g. `MISSING_ASSET` */
  readonly code: string;
  readonly message: string;

  /** Identifier of the entity the event traces back to */
  readonly entityId?: string;
}

/**
 * Running counters kept by the aggregator
 */
export const COUNTER_NAMES = [
  'modules',
  'resources',
  'unplaced',
  'pages',
  'assignments',
  'quizzes',
  'questions',
  'inventoryFiles',
  'orphanedFiles',
  'recovered',
  'filesNotRecovered',
  'topics',
  'lessons',
  'targetQuizzes',
  'targetQuestions',
  'targetAssignments',
  'fallbackMappings',
  'assetsResolved',
  'assetsMissing',
  'linksResolved',
  'linksBroken',
] as const;

export type CounterName = (typeof COUNTER_NAMES)[number];

export type MigrationCounters = Record<CounterName, number>;

/**
 * Question that was converted with a fallback mapping
 */
export interface ReviewItem {
  readonly entityId: string;
  readonly title: string;
  readonly sourceKind: string;
  readonly targetKind: TargetQuestionKind;
  readonly confidence: MappingConfidence;
}

/**
 * Immutable view handed to the renderer
 */
export interface MigrationReportSnapshot {
  readonly status: MigrationStatus;
  readonly sourceDirectory: string;
  readonly courseTitle: string | null;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly aborted: boolean;
  readonly counters: Readonly<MigrationCounters>;

  /** Usage count per source question kind */
  readonly questionKinds: Readonly<Record<string, number>>;
  readonly reviewItems: readonly ReviewItem[];
  readonly events: readonly MigrationEvent[];
  readonly totals: {
    readonly errors: number;
    readonly warnings: number;
    readonly info: number;
  };
}
