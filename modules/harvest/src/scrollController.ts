import type { ScrollStopReason } from './types.js';

export interface ScrollProbe {
  /** One load-more action. */
  scroll(): Promise<void>;
  /** Number of distinct usable items loaded so far. */
  countLoaded(): Promise<number>;
}

export interface ScrollPolicy {
  requested: number;
  overfetchRatio: number;
  stagnationLimit: number;
  maxAttempts: number;
  initialWaitMs: number;
  waitGrowthMs: number;
  maxWaitMs: number;
}

export interface ScrollOutcome {
  stopReason: ScrollStopReason;
  attempts: number;
  loaded: number;
  threshold: number;
}

export interface ScrollHooks {
  sleep: (ms: number) => Promise<void>;
  onAttempt?: (info: { attempt: number; loaded: number; waitMs: number; stagnant: number }) => void;
}

export function scrollThreshold(requested: number, overfetchRatio: number): number {
  return Math.max(1, Math.ceil(requested * Math.max(1, overfetchRatio)));
}

/**
 * Scrolls until enough items are loaded, the count stops moving for
 * `stagnationLimit` consecutive attempts, or `maxAttempts` is reached.
 * The wait between a scroll and the next count grows while stagnant and
 * resets on progress.
 */
export async function runScrollLoop(probe: ScrollProbe, policy: ScrollPolicy, hooks: ScrollHooks): Promise<ScrollOutcome> {
  const threshold = scrollThreshold(policy.requested, policy.overfetchRatio);
  let loaded = await probe.countLoaded();
  if (loaded >= threshold) {
    return { stopReason: 'target-reached', attempts: 0, loaded, threshold };
  }

  let waitMs = policy.initialWaitMs;
  let stagnant = 0;
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt += 1) {
    await probe.scroll();
    await hooks.sleep(waitMs);
    const count = await probe.countLoaded();
    hooks.onAttempt?.({ attempt, loaded: count, waitMs, stagnant });

    if (count > loaded) {
      loaded = count;
      stagnant = 0;
      waitMs = policy.initialWaitMs;
    } else {
      stagnant += 1;
      waitMs = Math.min(policy.maxWaitMs, waitMs + policy.waitGrowthMs);
    }

    if (loaded >= threshold) {
      return { stopReason: 'target-reached', attempts: attempt, loaded, threshold };
    }
    if (stagnant >= policy.stagnationLimit) {
      return { stopReason: 'stagnation', attempts: attempt, loaded, threshold };
    }
  }
  return { stopReason: 'attempt-cap', attempts: policy.maxAttempts, loaded, threshold };
}
