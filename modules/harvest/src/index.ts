export * from './types.js';
export * from './errors.js';
export { retryWithBackoff, backoffDelay, type RetryOptions } from './retry.js';
export { reviewFingerprint, normalizeText } from './fingerprint.js';
export { ReviewAccumulator, parseRating, toReviewRecord } from './reviewExtractor.js';
export { buildPlaceUrl } from './reviewDom.js';
export { DomReviewPage, domReviewPageFactory, type ReviewPage, type ReviewPageFactory } from './reviewPage.js';
export { runScrollLoop, scrollThreshold, type ScrollOutcome, type ScrollPolicy, type ScrollProbe } from './scrollController.js';
export { PageDriver, type PageDriverOptions } from './pageDriver.js';
export { HarvestWorker, type WorkerOptions, type WorkerReport } from './worker.js';
export { planShards, fnv1a32, type ShardPlanOptions } from './sharding.js';
export { OutputStore, type TargetArtifact } from './outputStore.js';
export { HarvestCoordinator, mergePartials, type CoordinatorOptions, type RunReport, type TargetDoneEvent } from './coordinator.js';
export { loadTargets, normalizeTargets, applyWindow, groupFromFileName, type NormalizeOptions } from './targets.js';
export { run as runCli, EXIT_CODES } from './cli.js';
