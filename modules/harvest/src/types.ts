import type { SortOrder } from '../../config/src/index.js';
import type { FailureKind } from './errors.js';

export interface TargetRecord {
  readonly id: string;
  readonly name: string;
  readonly address: string;
  readonly rating?: number;
  readonly knownReviewCount?: number;
  /** Search grid cell the target came from; only used for output layout. */
  readonly group?: string;
}

export interface ReviewRecord {
  readonly fingerprint: string;
  readonly rating: number;
  readonly dateText: string;
  readonly body: string;
  readonly language: string | null;
  readonly author: string | null;
  /** The page's own review id. Informational; never used for deduplication. */
  readonly sourceId: string | null;
}

/** Review node as read from the page, before validation. */
export interface RawReview {
  sourceId: string | null;
  author: string | null;
  ratingLabel: string | null;
  dateText: string | null;
  body: string | null;
  language: string | null;
  truncated: boolean;
}

export type DriverState =
  | 'init'
  | 'navigated'
  | 'reviews-panel-open'
  | 'sort-applied'
  | 'scrolling'
  | 'extracted'
  | 'done'
  | 'failed';

export type ScrollStopReason = 'target-reached' | 'stagnation' | 'attempt-cap';

export type TargetStopReason = ScrollStopReason | 'no-reviews';

export type TargetStatus = 'complete' | 'partial-timeout' | 'failed';

export interface PassRecord {
  order: SortOrder;
  applied: boolean;
  attempts: number;
  stopReason: TargetStopReason;
  /** Distinct reviews held after the pass. */
  collected: number;
}

export interface TargetFailure {
  kind: FailureKind;
  message: string;
  state: DriverState;
}

export interface TargetResult {
  targetId: string;
  status: TargetStatus;
  reviews: ReviewRecord[];
  requested: number;
  stopReason: TargetStopReason | null;
  passes: PassRecord[];
  sortApplied: boolean;
  duplicatesSkipped: number;
  invalidSkipped: number;
  startedAt: string;
  durationMs: number;
  error?: TargetFailure;
}

export type CollectionResult = Map<string, TargetResult>;

export interface FailedTargetEntry {
  targetId: string;
  kind: FailureKind;
  message: string;
  state: DriverState;
}

export interface WorkerCounters {
  workerId: string;
  assigned: number;
  attempted: number;
  succeeded: number;
  partialTimeouts: number;
  failed: number;
  reviews: number;
  sessionsOpened: number;
  elapsedMs: number;
}

export type RunOutcome = 'clean' | 'partial-failures' | 'aborted';

export interface CollectionLog {
  runId: string;
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
  targetsTotal: number;
  attempted: number;
  succeeded: number;
  partialTimeouts: number;
  failed: number;
  skipped: number;
  reviewsCollected: number;
  reviewsPerSecond: number;
  stopRequested: boolean;
  outcome: RunOutcome;
  failures: FailedTargetEntry[];
  duplicateKeys: string[];
  workers: WorkerCounters[];
}
