// JSON Schemas for harvester input and stored artifacts

export const targetListSchema = {
  $id: 'https://review-harvest.local/schemas/targets.json',
  type: 'array',
  items: {
    type: 'object',
    properties: {
      id: { type: 'string', minLength: 1 },
      place_id: { type: 'string', minLength: 1 },
      name: { type: 'string' },
      address: { type: ['string', 'null'] },
      formatted_address: { type: ['string', 'null'] },
      rating: { type: ['number', 'null'], minimum: 0, maximum: 5 },
      user_ratings_total: { type: ['integer', 'null'], minimum: 0 },
      knownReviewCount: { type: ['integer', 'null'], minimum: 0 },
      grid: { type: ['string', 'number', 'null'] },
      group: { type: ['string', 'null'] },
    },
    anyOf: [{ required: ['id'] }, { required: ['place_id'] }],
  },
} as const;

const reviewSchema = {
  type: 'object',
  properties: {
    fingerprint: { type: 'string', minLength: 1 },
    rating: { type: 'integer', minimum: 1, maximum: 5 },
    dateText: { type: 'string' },
    body: { type: 'string', minLength: 1 },
    language: { type: ['string', 'null'] },
    author: { type: ['string', 'null'] },
    sourceId: { type: ['string', 'null'] },
  },
  required: ['fingerprint', 'rating', 'dateText', 'body', 'language', 'author', 'sourceId'],
} as const;

const passSchema = {
  type: 'object',
  properties: {
    order: { type: 'string', enum: ['newest', 'relevance'] },
    applied: { type: 'boolean' },
    attempts: { type: 'integer', minimum: 0 },
    stopReason: { type: 'string', enum: ['target-reached', 'stagnation', 'attempt-cap', 'no-reviews'] },
    collected: { type: 'integer', minimum: 0 },
  },
  required: ['order', 'applied', 'attempts', 'stopReason', 'collected'],
} as const;

export const targetArtifactSchema = {
  $id: 'https://review-harvest.local/schemas/target-artifact.json',
  type: 'object',
  properties: {
    savedAt: { type: 'string' },
    target: {
      type: 'object',
      properties: {
        id: { type: 'string', minLength: 1 },
        name: { type: 'string' },
        address: { type: 'string' },
      },
      required: ['id', 'name', 'address'],
    },
    result: {
      type: 'object',
      properties: {
        targetId: { type: 'string', minLength: 1 },
        status: { type: 'string', enum: ['complete', 'partial-timeout', 'failed'] },
        reviews: { type: 'array', items: reviewSchema },
        requested: { type: 'integer', minimum: 1 },
        stopReason: {
          type: ['string', 'null'],
          enum: ['target-reached', 'stagnation', 'attempt-cap', 'no-reviews', null],
        },
        passes: { type: 'array', items: passSchema },
        sortApplied: { type: 'boolean' },
        duplicatesSkipped: { type: 'integer', minimum: 0 },
        invalidSkipped: { type: 'integer', minimum: 0 },
        startedAt: { type: 'string' },
        durationMs: { type: 'number', minimum: 0 },
        error: {
          type: 'object',
          properties: {
            kind: {
              type: 'string',
              enum: ['navigation', 'blocked', 'element-not-found', 'execution', 'session-crash', 'aborted', 'storage', 'unknown'],
            },
            message: { type: 'string' },
            state: {
              type: 'string',
              enum: ['init', 'navigated', 'reviews-panel-open', 'sort-applied', 'scrolling', 'extracted', 'done', 'failed'],
            },
          },
          required: ['kind', 'message', 'state'],
        },
      },
      required: [
        'targetId',
        'status',
        'reviews',
        'requested',
        'stopReason',
        'passes',
        'sortApplied',
        'duplicatesSkipped',
        'invalidSkipped',
        'startedAt',
        'durationMs',
      ],
    },
  },
  required: ['savedAt', 'target', 'result'],
} as const;
