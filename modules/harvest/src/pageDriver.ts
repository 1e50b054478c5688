import type { HarvestConfig, SortOrder } from '../../config/src/index.js';
import { createLogger, type Logger } from '../../logging/src/index.js';
import {
  ElementNotFoundError,
  NavigationError,
  StopRequestedError,
  classifyError,
} from './errors.js';
import { ReviewAccumulator } from './reviewExtractor.js';
import { buildPlaceUrl } from './reviewDom.js';
import type { ReviewPage } from './reviewPage.js';
import { defaultSleep, retryWithBackoff } from './retry.js';
import { runScrollLoop } from './scrollController.js';
import type {
  DriverState,
  PassRecord,
  TargetFailure,
  TargetRecord,
  TargetResult,
  TargetStatus,
  TargetStopReason,
} from './types.js';

export type DriverConfig = Pick<HarvestConfig, 'maxReviews' | 'sortOrders' | 'scroll' | 'retry' | 'pacing' | 'browser'>;

export interface PageDriverOptions {
  config: DriverConfig;
  shouldStop?: () => boolean;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  now?: () => number;
}

type PanelOutcome = 'ready' | 'zero-reviews';

function pollCount(timeoutMs: number, intervalMs: number): number {
  return Math.max(1, Math.ceil(timeoutMs / Math.max(1, intervalMs)));
}

/**
 * Drives one target through
 * `init → navigated → reviews-panel-open → sort-applied → scrolling → extracted → done`,
 * once per configured sort order, and never throws: every failure ends in a
 * `failed` result that keeps the reviews extracted so far.
 */
export class PageDriver {
  private state: DriverState = 'init';
  private readonly config: DriverConfig;
  private readonly shouldStop: () => boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private page: ReviewPage,
    options: PageDriverOptions,
  ) {
    this.config = options.config;
    this.shouldStop = options.shouldStop ?? (() => false);
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger('driver');
    this.now = options.now ?? Date.now;
  }

  get currentState(): DriverState {
    return this.state;
  }

  async harvest(target: TargetRecord): Promise<TargetResult> {
    const startedMs = this.now();
    const requested = this.config.maxReviews;
    const accumulator = new ReviewAccumulator();
    const passes: PassRecord[] = [];
    let stopReason: TargetStopReason | null = null;
    this.state = 'init';

    const finish = (status: TargetStatus, error?: TargetFailure): TargetResult => ({
      targetId: target.id,
      status,
      reviews: accumulator.toArray(requested),
      requested,
      stopReason,
      passes,
      sortApplied: passes.length > 0 && passes.every((pass) => pass.applied),
      duplicatesSkipped: accumulator.duplicatesSkipped,
      invalidSkipped: accumulator.invalidSkipped,
      startedAt: new Date(startedMs).toISOString(),
      durationMs: Math.max(0, this.now() - startedMs),
      ...(error ? { error } : {}),
    });

    try {
      for (const order of this.config.sortOrders) {
        if (passes.length > 0 && accumulator.size >= requested) break;
        const pass = await this.runPass(target, order, accumulator, passes.length > 0);
        passes.push(pass);
        stopReason = pass.stopReason;
        if (pass.stopReason === 'no-reviews') break;
      }
      this.state = 'done';
      const timedOut = stopReason === 'stagnation' || stopReason === 'attempt-cap';
      return finish(timedOut && accumulator.size < requested ? 'partial-timeout' : 'complete');
    } catch (err) {
      const classified = classifyError(err);
      const failedIn = this.state;
      this.state = 'failed';
      this.logger.warn(`${target.id} failed in ${failedIn} (${classified.kind}): ${classified.message}`);
      return finish('failed', { kind: classified.kind, message: classified.message, state: failedIn });
    }
  }

  private async runPass(
    target: TargetRecord,
    order: SortOrder,
    accumulator: ReviewAccumulator,
    repeat: boolean,
  ): Promise<PassRecord> {
    if (repeat) this.advance('init');

    await this.step(target, 'navigate', () => this.loadPlace(target));
    this.advance('navigated');

    const panel = await this.step(target, 'open reviews', () => this.openReviews());
    if (panel === 'zero-reviews') {
      this.logger.debug('zero-reviews', { targetId: target.id });
      return { order, applied: false, attempts: 0, stopReason: 'no-reviews', collected: accumulator.size };
    }
    this.advance('reviews-panel-open');

    const applied = await this.applySort(target, order);
    this.advance('sort-applied');

    this.advance('scrolling');
    const { scroll } = this.config;
    const outcome = await runScrollLoop(
      {
        scroll: () => this.step(target, 'scroll', () => this.page.scrollReviews(scroll.batchPages)),
        countLoaded: () => this.step(target, 'extract', () => this.extractCycle(accumulator)),
      },
      { requested: this.config.maxReviews, ...scroll },
      {
        sleep: this.sleep,
        onAttempt: (info) => this.logger.debug('scroll', { targetId: target.id, order, ...info }),
      },
    );

    await this.step(target, 'extract', () => this.extractCycle(accumulator));
    this.advance('extracted');

    this.logger.debug('pass', { targetId: target.id, order, applied, ...outcome, collected: accumulator.size });
    return {
      order,
      applied,
      attempts: outcome.attempts,
      stopReason: outcome.stopReason,
      collected: accumulator.size,
    };
  }

  private advance(next: DriverState): void {
    this.state = next;
    if (this.shouldStop()) {
      throw new StopRequestedError();
    }
  }

  private step<T>(target: TargetRecord, label: string, fn: () => Promise<T>): Promise<T> {
    return retryWithBackoff(fn, {
      ...this.config.retry,
      label: `${target.id} ${label}`,
      logger: this.logger,
      sleep: this.sleep,
    });
  }

  private async loadPlace(target: TargetRecord): Promise<void> {
    const { pacing, browser } = this.config;
    const url = buildPlaceUrl(target.id, browser.language);
    await this.page.navigate(url);

    let consentTried = false;
    const polls = pollCount(pacing.navigationTimeoutMs, pacing.pollIntervalMs);
    for (let poll = 0; poll < polls; poll += 1) {
      const state = await this.page.readPageState();
      if (state.blocked) {
        throw new NavigationError('blocked', `blocked or captcha page at ${state.url || url}`);
      }
      if (state.loaded) return;
      if (state.consent && !consentTried) {
        consentTried = true;
        const dismissed = await this.page.dismissConsent();
        this.logger.debug('consent', { targetId: target.id, dismissed });
      }
      await this.sleep(pacing.pollIntervalMs);
    }
    throw new NavigationError('timeout', `place page for ${target.id} did not finish loading`);
  }

  private async openReviews(): Promise<PanelOutcome> {
    const { pacing } = this.config;
    const clicked = await this.page.openReviewsTab();
    if (!clicked) {
      const panel = await this.page.readPanelState();
      if (panel.zeroReviews) return 'zero-reviews';
      throw new ElementNotFoundError('reviews tab');
    }
    const polls = pollCount(pacing.panelTimeoutMs, pacing.pollIntervalMs);
    for (let poll = 0; poll < polls; poll += 1) {
      const panel = await this.page.readPanelState();
      if (panel.ready) return 'ready';
      if (panel.zeroReviews) return 'zero-reviews';
      await this.sleep(pacing.pollIntervalMs);
    }
    throw new ElementNotFoundError('reviews panel', 'reviews panel did not render');
  }

  /** Best effort: only a crash or a stop request escapes. */
  private async applySort(target: TargetRecord, order: SortOrder): Promise<boolean> {
    const { actionDelayMs } = this.config.pacing;
    try {
      const applied = await this.step(target, `sort ${order}`, async () => {
        if (!(await this.page.openSortMenu())) return false;
        await this.sleep(actionDelayMs);
        const chosen = await this.page.chooseSortOrder(order);
        if (chosen) await this.sleep(actionDelayMs);
        return chosen;
      });
      if (!applied) this.logger.warn(`${target.id}: sort "${order}" unavailable, keeping page order`);
      return applied;
    } catch (err) {
      const classified = classifyError(err);
      if (classified.kind === 'session-crash' || classified.kind === 'aborted') throw classified;
      this.logger.warn(`${target.id}: sort "${order}" failed (${classified.message}), keeping page order`);
      return false;
    }
  }

  private async extractCycle(accumulator: ReviewAccumulator): Promise<number> {
    await this.page.expandLoadedReviews();
    const batch = await this.page.readLoadedReviews();
    accumulator.addBatch(batch);
    return accumulator.size;
  }
}
