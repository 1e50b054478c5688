// JSON Schema for the harvest configuration file

const stringList = {
  type: 'array',
  items: { type: 'string', minLength: 1 },
  minItems: 1,
} as const;

export const harvestConfigSchema = {
  $id: 'https://review-harvest.local/schemas/harvest.json',
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  description: 'review harvester configuration',
  properties: {
    maxReviews: { type: 'integer', minimum: 1, description: 'review cap per target' },
    workers: { type: 'integer', minimum: 1, maximum: 32, description: 'concurrent browser sessions' },
    shardStrategy: { type: 'string', enum: ['contiguous', 'index-mod', 'id-hash'] },
    outputDir: { type: 'string', minLength: 1 },
    sortOrders: {
      type: 'array',
      items: { type: 'string', enum: ['newest', 'relevance'] },
      minItems: 1,
      uniqueItems: true,
    },
    window: {
      type: 'object',
      properties: {
        startFrom: { type: 'integer', minimum: 0 },
        limit: { type: ['integer', 'null'], minimum: 1 },
      },
      required: ['startFrom', 'limit'],
      additionalProperties: false,
    },
    browser: {
      type: 'object',
      properties: {
        headless: { type: 'boolean' },
        language: { type: 'string', minLength: 2 },
        userAgent: { type: 'string', minLength: 1 },
        viewport: {
          type: 'object',
          properties: {
            width: { type: 'integer', minimum: 320 },
            height: { type: 'integer', minimum: 240 },
          },
          required: ['width', 'height'],
          additionalProperties: false,
        },
        blockResources: { type: 'boolean' },
      },
      required: ['headless', 'language', 'userAgent', 'viewport', 'blockResources'],
      additionalProperties: false,
    },
    pacing: {
      type: 'object',
      properties: {
        actionDelayMs: { type: 'integer', minimum: 0 },
        navigationTimeoutMs: { type: 'integer', minimum: 1000 },
        panelTimeoutMs: { type: 'integer', minimum: 0 },
        pollIntervalMs: { type: 'integer', minimum: 10 },
      },
      required: ['actionDelayMs', 'navigationTimeoutMs', 'panelTimeoutMs', 'pollIntervalMs'],
      additionalProperties: false,
    },
    scroll: {
      type: 'object',
      properties: {
        stagnationLimit: { type: 'integer', minimum: 1 },
        maxAttempts: { type: 'integer', minimum: 1 },
        initialWaitMs: { type: 'integer', minimum: 0 },
        waitGrowthMs: { type: 'integer', minimum: 0 },
        maxWaitMs: { type: 'integer', minimum: 0 },
        batchPages: { type: 'number', exclusiveMinimum: 0, maximum: 20 },
        overfetchRatio: { type: 'number', minimum: 1, maximum: 5 },
      },
      required: [
        'stagnationLimit',
        'maxAttempts',
        'initialWaitMs',
        'waitGrowthMs',
        'maxWaitMs',
        'batchPages',
        'overfetchRatio',
      ],
      additionalProperties: false,
    },
    retry: {
      type: 'object',
      properties: {
        attempts: { type: 'integer', minimum: 1, maximum: 10 },
        baseDelayMs: { type: 'integer', minimum: 0 },
        backoff: { type: 'string', enum: ['fixed', 'linear'] },
      },
      required: ['attempts', 'baseDelayMs', 'backoff'],
      additionalProperties: false,
    },
    labels: {
      type: 'object',
      properties: {
        reviewsTab: stringList,
        sortButton: stringList,
        sortNewest: stringList,
        sortRelevance: stringList,
        expandMore: stringList,
        showOriginal: stringList,
        noReviews: stringList,
        consentAccept: stringList,
      },
      required: [
        'reviewsTab',
        'sortButton',
        'sortNewest',
        'sortRelevance',
        'expandMore',
        'showOriginal',
        'noReviews',
        'consentAccept',
      ],
      additionalProperties: false,
    },
  },
  required: [
    'maxReviews',
    'workers',
    'shardStrategy',
    'outputDir',
    'sortOrders',
    'window',
    'browser',
    'pacing',
    'scroll',
    'retry',
    'labels',
  ],
  additionalProperties: false,
} as const;

export type HarvestConfigSchema = typeof harvestConfigSchema;
