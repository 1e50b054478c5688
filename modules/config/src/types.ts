// Configuration types

export type SortOrder = 'newest' | 'relevance';

export type BackoffMode = 'fixed' | 'linear';

export type ShardStrategy = 'contiguous' | 'index-mod' | 'id-hash';

export interface BrowserConfig {
  headless: boolean;
  /** UI language requested from the site (`hl` query parameter and `--lang`). */
  language: string;
  userAgent: string;
  viewport: {
    width: number;
    height: number;
  };
  /** Abort image, font and media requests. */
  blockResources: boolean;
}

export interface PacingConfig {
  /** Pause after a click that opens a menu or panel. */
  actionDelayMs: number;
  navigationTimeoutMs: number;
  panelTimeoutMs: number;
  pollIntervalMs: number;
}

export interface ScrollConfig {
  stagnationLimit: number;
  maxAttempts: number;
  initialWaitMs: number;
  waitGrowthMs: number;
  maxWaitMs: number;
  /** Viewport heights scrolled per action. */
  batchPages: number;
  /** Multiplier applied to the review cap before comparing it with the loaded count. */
  overfetchRatio: number;
}

export interface RetryConfig {
  attempts: number;
  baseDelayMs: number;
  backoff: BackoffMode;
}

export interface WindowConfig {
  startFrom: number;
  limit: number | null;
}

export interface LabelConfig {
  reviewsTab: string[];
  sortButton: string[];
  sortNewest: string[];
  sortRelevance: string[];
  expandMore: string[];
  showOriginal: string[];
  noReviews: string[];
  consentAccept: string[];
}

export interface HarvestConfig {
  maxReviews: number;
  workers: number;
  shardStrategy: ShardStrategy;
  outputDir: string;
  sortOrders: SortOrder[];
  window: WindowConfig;
  browser: BrowserConfig;
  pacing: PacingConfig;
  scroll: ScrollConfig;
  retry: RetryConfig;
  labels: LabelConfig;
}

export type DeepPartial<T> = T extends Array<infer U>
  ? Array<U>
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> }
    : T;

export interface ConfigLoaderOptions {
  configPath?: string;
  /** Cache the loaded configuration (default true). */
  cache?: boolean;
  /** Source of HARVEST_* overrides; defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

export interface ValidationResult {
  valid: boolean;
  errors?: Array<{
    path: string;
    message: string;
  }>;
}
