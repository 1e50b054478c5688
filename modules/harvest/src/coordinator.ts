import { EventEmitter } from 'node:events';
import { v4 as uuidv4 } from 'uuid';
import type { HarvestConfig } from '../../config/src/index.js';
import { createLogger, type Logger } from '../../logging/src/index.js';
import type { BackendFactory } from '../../session-manager/src/index.js';
import { OutputStore } from './outputStore.js';
import type { ReviewPageFactory } from './reviewPage.js';
import { planShards } from './sharding.js';
import { applyWindow } from './targets.js';
import type {
  CollectionLog,
  CollectionResult,
  FailedTargetEntry,
  RunOutcome,
  TargetRecord,
  TargetResult,
  WorkerCounters,
} from './types.js';
import { HarvestWorker, type WorkerReport } from './worker.js';

export interface CoordinatorOptions {
  config: HarvestConfig;
  outputDir: string;
  backendFactory?: BackendFactory;
  pageFactory?: ReviewPageFactory;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface RunOptions {
  /** Explicit shard sizes, one per worker; overrides the configured strategy. */
  shardSizes?: number[];
}

export interface RunReport {
  result: CollectionResult;
  log: CollectionLog;
  reports: WorkerReport[];
}

export interface TargetDoneEvent {
  workerId: string;
  target: TargetRecord;
  result: TargetResult;
}

export interface HarvestCoordinator {
  on(event: 'target:done', listener: (event: TargetDoneEvent) => void): this;
  on(event: 'worker:done', listener: (report: WorkerReport) => void): this;
  on(event: 'run:done', listener: (log: CollectionLog) => void): this;
  emit(event: 'target:done', payload: TargetDoneEvent): boolean;
  emit(event: 'worker:done', payload: WorkerReport): boolean;
  emit(event: 'run:done', payload: CollectionLog): boolean;
}

export function resolveOutcome(stopRequested: boolean, failed: number): RunOutcome {
  if (stopRequested) return 'aborted';
  return failed > 0 ? 'partial-failures' : 'clean';
}

/**
 * Merges per-worker partials over the resumed entries. A key already present
 * keeps its first value and is listed in `duplicateKeys`.
 */
export function mergePartials(
  resumed: CollectionResult,
  partials: readonly CollectionResult[],
): { result: CollectionResult; duplicateKeys: string[] } {
  const result: CollectionResult = new Map(resumed);
  const duplicateKeys: string[] = [];
  for (const partial of partials) {
    for (const [targetId, targetResult] of partial) {
      if (result.has(targetId)) {
        duplicateKeys.push(targetId);
        continue;
      }
      result.set(targetId, targetResult);
    }
  }
  return { result, duplicateKeys };
}

/**
 * Fans a target list out over concurrent workers and merges what they return.
 *
 * Targets whose artifact already holds a complete or partial-timeout result
 * are not dispatched; their stored result goes into the merged result as is.
 */
export class HarvestCoordinator extends EventEmitter {
  private stopRequested = false;
  private readonly store: OutputStore;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private options: CoordinatorOptions) {
    super();
    this.logger = options.logger ?? createLogger('coordinator');
    this.store = new OutputStore(options.outputDir, this.logger.child('store'));
    this.now = options.now ?? Date.now;
  }

  get outputStore(): OutputStore {
    return this.store;
  }

  get isStopping(): boolean {
    return this.stopRequested;
  }

  /** Blocks further dispatch; in-flight targets finish their current step. */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.logger.warn('stop requested, waiting for in-flight targets');
  }

  async run(targets: readonly TargetRecord[], runOptions: RunOptions = {}): Promise<RunReport> {
    const { config } = this.options;
    const runId = uuidv4();
    const startedMs = this.now();

    const windowed = applyWindow(targets, config.window);
    const seen = new Set<string>();
    for (const target of windowed) {
      if (seen.has(target.id)) throw new Error(`duplicate target id ${target.id}`);
      seen.add(target.id);
    }

    const resumed: CollectionResult = new Map();
    const pending: TargetRecord[] = [];
    for (const target of windowed) {
      const artifact = await this.store.readResumable(target);
      if (artifact) resumed.set(target.id, artifact.result);
      else pending.push(target);
    }
    this.logger.info(
      `run ${runId}: ${windowed.length} targets, ${resumed.size} already stored, ${pending.length} to harvest`,
    );

    const shards = planShards(pending, {
      workers: Math.min(config.workers, Math.max(1, pending.length)),
      strategy: config.shardStrategy,
      sizes: runOptions.shardSizes,
    });

    const reports = await Promise.all(
      shards
        .filter((shard) => shard.length > 0)
        .map((shard, index) => this.runWorker(`worker-${index + 1}`, shard)),
    );

    const { result, duplicateKeys } = mergePartials(
      resumed,
      reports.map((report) => report.results),
    );
    for (const targetId of duplicateKeys) {
      this.logger.error(`target ${targetId} reported by more than one source; keeping the first`);
    }

    const log = this.buildLog({
      runId,
      startedMs,
      targetsTotal: windowed.length,
      skipped: resumed.size,
      reports,
      duplicateKeys,
    });

    await this.store.writeMergedResult(runId, result);
    await this.store.writeRunLog(log);
    this.logger.info(
      `run ${runId} ${log.outcome}: ${log.succeeded}/${log.attempted} targets, ${log.reviewsCollected} reviews, ` +
        `${log.failed} failed, ${log.skipped} skipped, ${(log.elapsedMs / 1000).toFixed(1)}s (${log.reviewsPerSecond} reviews/s)`,
    );
    this.emit('run:done', log);
    return { result, log, reports };
  }

  private async runWorker(workerId: string, shard: TargetRecord[]): Promise<WorkerReport> {
    const worker = new HarvestWorker({
      workerId,
      config: this.options.config,
      store: this.store,
      shouldStop: () => this.stopRequested,
      backendFactory: this.options.backendFactory,
      pageFactory: this.options.pageFactory,
      logger: this.logger.child(workerId),
      sleep: this.options.sleep,
      now: this.now,
      onTargetDone: (result, target) => {
        this.emit('target:done', { workerId, target, result });
      },
    });
    const report = await worker.run(shard);
    this.emit('worker:done', report);
    return report;
  }

  private buildLog(input: {
    runId: string;
    startedMs: number;
    targetsTotal: number;
    skipped: number;
    reports: WorkerReport[];
    duplicateKeys: string[];
  }): CollectionLog {
    const finishedMs = this.now();
    const elapsedMs = Math.max(0, finishedMs - input.startedMs);
    const workers: WorkerCounters[] = input.reports.map((report) => report.counters);
    const failures: FailedTargetEntry[] = input.reports.flatMap((report) => report.failures);
    const sum = (pick: (counters: WorkerCounters) => number) => workers.reduce((total, c) => total + pick(c), 0);

    const reviewsCollected = sum((c) => c.reviews);
    const failed = sum((c) => c.failed);
    const seconds = elapsedMs / 1000;
    return {
      runId: input.runId,
      startedAt: new Date(input.startedMs).toISOString(),
      finishedAt: new Date(finishedMs).toISOString(),
      elapsedMs,
      targetsTotal: input.targetsTotal,
      attempted: sum((c) => c.attempted),
      succeeded: sum((c) => c.succeeded),
      partialTimeouts: sum((c) => c.partialTimeouts),
      failed,
      skipped: input.skipped,
      reviewsCollected,
      reviewsPerSecond: seconds > 0 ? Math.round((reviewsCollected / seconds) * 100) / 100 : 0,
      stopRequested: this.stopRequested,
      outcome: resolveOutcome(this.stopRequested, failed),
      failures,
      duplicateKeys: input.duplicateKeys,
      workers,
    };
  }
}
