import type { HarvestConfig } from './types.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

// Labels are matched against aria-label and visible text, English and Korean UI.
export const DEFAULT_HARVEST_CONFIG: HarvestConfig = {
  maxReviews: 100,
  workers: 1,
  shardStrategy: 'contiguous',
  outputDir: 'reviews',
  sortOrders: ['newest'],
  window: {
    startFrom: 0,
    limit: null,
  },
  browser: {
    headless: true,
    language: 'en',
    userAgent: DEFAULT_USER_AGENT,
    viewport: { width: 1366, height: 900 },
    blockResources: true,
  },
  pacing: {
    actionDelayMs: 800,
    navigationTimeoutMs: 30000,
    panelTimeoutMs: 7000,
    pollIntervalMs: 250,
  },
  scroll: {
    stagnationLimit: 3,
    maxAttempts: 200,
    initialWaitMs: 400,
    waitGrowthMs: 400,
    maxWaitMs: 2400,
    batchPages: 3,
    overfetchRatio: 1,
  },
  retry: {
    attempts: 3,
    baseDelayMs: 500,
    backoff: 'linear',
  },
  labels: {
    reviewsTab: ['Reviews', '리뷰'],
    sortButton: ['Sort reviews', 'Sort', '리뷰 정렬', '정렬'],
    sortNewest: ['Newest', '최신순'],
    sortRelevance: ['Most relevant', '관련성순'],
    expandMore: ['More', 'See more', '자세히'],
    showOriginal: ['See original', '원문보기', '원본 보기'],
    noReviews: ['No reviews', '리뷰 없음'],
    consentAccept: ['Accept all', 'I agree', 'Agree', '모두 수락', '동의'],
  },
};

export function getDefaultConfig(): HarvestConfig {
  return structuredClone(DEFAULT_HARVEST_CONFIG);
}
