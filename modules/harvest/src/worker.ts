import type { HarvestConfig } from '../../config/src/index.js';
import { createLogger, type Logger } from '../../logging/src/index.js';
import { SessionManager, type BackendFactory, type SessionHandle } from '../../session-manager/src/index.js';
import { classifyError, type FailureKind } from './errors.js';
import type { OutputStore } from './outputStore.js';
import { PageDriver } from './pageDriver.js';
import { domReviewPageFactory, type ReviewPageFactory } from './reviewPage.js';
import { defaultSleep } from './retry.js';
import type { CollectionResult, FailedTargetEntry, TargetRecord, TargetResult, WorkerCounters } from './types.js';

export interface WorkerOptions {
  workerId: string;
  config: HarvestConfig;
  store: OutputStore;
  shouldStop: () => boolean;
  backendFactory?: BackendFactory;
  pageFactory?: ReviewPageFactory;
  onTargetDone?: (result: TargetResult, target: TargetRecord) => void;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface WorkerReport {
  workerId: string;
  results: CollectionResult;
  failures: FailedTargetEntry[];
  counters: WorkerCounters;
}

/**
 * Processes one shard strictly one target at a time with its own session
 * manager. Results are persisted as soon as each target finishes.
 */
export class HarvestWorker {
  private readonly sessions: SessionManager;
  private readonly pageFactory: ReviewPageFactory;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private handle: SessionHandle | null = null;

  constructor(private options: WorkerOptions) {
    this.logger = options.logger ?? createLogger(options.workerId);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.pageFactory = options.pageFactory ?? domReviewPageFactory(options.config.labels);
    this.sessions = new SessionManager(
      {
        workerId: options.workerId,
        browser: options.config.browser,
        navigationTimeoutMs: options.config.pacing.navigationTimeoutMs,
        logger: this.logger.child('session'),
      },
      options.backendFactory,
    );
  }

  async run(shard: readonly TargetRecord[]): Promise<WorkerReport> {
    const startedMs = this.now();
    const results: CollectionResult = new Map();
    const failures: FailedTargetEntry[] = [];
    const counters: WorkerCounters = {
      workerId: this.options.workerId,
      assigned: shard.length,
      attempted: 0,
      succeeded: 0,
      partialTimeouts: 0,
      failed: 0,
      reviews: 0,
      sessionsOpened: 0,
      elapsedMs: 0,
    };

    this.logger.info(`starting shard of ${shard.length} targets`);
    try {
      for (const target of shard) {
        if (this.options.shouldStop()) {
          this.logger.info(`stop requested, ${shard.length - counters.attempted} targets left undispatched`);
          break;
        }
        counters.attempted += 1;
        const result = await this.processTarget(target, counters);
        results.set(target.id, result);

        if (result.status === 'failed' && result.error) {
          counters.failed += 1;
          failures.push({ targetId: target.id, ...result.error });
        } else {
          counters.succeeded += 1;
          if (result.status === 'partial-timeout') counters.partialTimeouts += 1;
        }
        counters.reviews += result.reviews.length;
        this.logger.info(
          `[${counters.attempted}/${shard.length}] ${target.name} (${target.id}): ${result.status}, ${result.reviews.length} reviews`,
        );
        this.options.onTargetDone?.(result, target);
      }
    } finally {
      this.handle = null;
      await this.sessions.shutdown();
    }

    counters.elapsedMs = Math.max(0, this.now() - startedMs);
    return { workerId: this.options.workerId, results, failures, counters };
  }

  private async processTarget(target: TargetRecord, counters: WorkerCounters): Promise<TargetResult> {
    const startedMs = this.now();
    let result: TargetResult;
    try {
      const handle = await this.ensureSession(counters);
      const driver = new PageDriver(this.pageFactory(this.sessions, handle), {
        config: this.options.config,
        shouldStop: this.options.shouldStop,
        sleep: this.sleep,
        logger: this.logger.child(target.id),
        now: this.now,
      });
      result = await driver.harvest(target);
    } catch (err) {
      // Only session start can get here; the driver reports its own failures.
      const classified = classifyError(err);
      result = this.failedResult(target, startedMs, classified.kind, classified.message);
    }

    if (result.error?.kind === 'session-crash') {
      await this.dropSession();
    }

    try {
      await this.options.store.writeTargetResult(target, result);
    } catch (err) {
      const classified = classifyError(err);
      this.logger.error(`could not persist ${target.id}: ${classified.message}`);
      result = { ...result, status: 'failed', error: { kind: classified.kind, message: classified.message, state: 'done' } };
    }
    return result;
  }

  private async ensureSession(counters: WorkerCounters): Promise<SessionHandle> {
    if (this.handle && this.sessions.isAlive(this.handle)) {
      return this.handle;
    }
    if (this.handle) {
      this.logger.warn(`session ${this.handle.id} is dead, replacing it`);
      await this.dropSession();
    }
    const handle = await this.sessions.open();
    counters.sessionsOpened += 1;
    this.handle = handle;
    return handle;
  }

  private async dropSession(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) await this.sessions.release(handle);
  }

  private failedResult(
    target: TargetRecord,
    startedMs: number,
    kind: FailureKind,
    message: string,
  ): TargetResult {
    return {
      targetId: target.id,
      status: 'failed',
      reviews: [],
      requested: this.options.config.maxReviews,
      stopReason: null,
      passes: [],
      sortApplied: false,
      duplicatesSkipped: 0,
      invalidSkipped: 0,
      startedAt: new Date(startedMs).toISOString(),
      durationMs: Math.max(0, this.now() - startedMs),
      error: { kind, message, state: 'init' },
    };
  }
}
