import test from 'node:test';
import assert from 'node:assert/strict';
import { reviewFingerprint } from '../src/fingerprint.js';
import { ReviewAccumulator, parseRating, toReviewRecord } from '../src/reviewExtractor.js';
import type { RawReview } from '../src/types.js';

function raw(i: number, overrides: Partial<RawReview> = {}): RawReview {
  return {
    sourceId: `node-${i}`,
    author: `Author ${i}`,
    ratingLabel: `${(i % 5) + 1} stars`,
    dateText: 'a week ago',
    body: `Body of review ${i}`,
    language: 'en',
    truncated: false,
    ...overrides,
  };
}

test('parseRating understands English and Korean labels', () => {
  assert.equal(parseRating('4 stars'), 4);
  assert.equal(parseRating('1 star'), 1);
  assert.equal(parseRating('Rated 5.0 out of 5,'), 5);
  assert.equal(parseRating('별표 3개'), 3);
  assert.equal(parseRating('별표 5개 중 2개'), 2);
  assert.equal(parseRating('7 stars'), null);
  assert.equal(parseRating(null), null);
  assert.equal(parseRating('no rating here'), null);
});

test('fingerprints ignore whitespace differences and the node id', () => {
  const a = toReviewRecord(raw(1, { body: 'Great  coffee,\n friendly staff ' }));
  const b = toReviewRecord(raw(1, { body: 'Great coffee, friendly staff', sourceId: 'other-node' }));
  assert.ok(a && b);
  assert.equal(a.fingerprint, b.fingerprint);
  assert.equal(a.body, 'Great coffee, friendly staff');
  assert.equal(
    a.fingerprint,
    reviewFingerprint({ author: 'Author 1', dateText: 'a week ago', body: 'Great coffee, friendly staff' }),
  );
});

test('fingerprints differ when the author or date differs', () => {
  const base = toReviewRecord(raw(1));
  const otherAuthor = toReviewRecord(raw(1, { author: 'Someone Else' }));
  const otherDate = toReviewRecord(raw(1, { dateText: 'a month ago' }));
  assert.ok(base && otherAuthor && otherDate);
  assert.notEqual(base.fingerprint, otherAuthor.fingerprint);
  assert.notEqual(base.fingerprint, otherDate.fingerprint);
});

test('nodes without a body or a valid rating are rejected', () => {
  assert.equal(toReviewRecord(raw(1, { body: '   ' })), null);
  assert.equal(toReviewRecord(raw(1, { body: null })), null);
  assert.equal(toReviewRecord(raw(1, { ratingLabel: null })), null);
});

test('records are frozen', () => {
  const record = toReviewRecord(raw(2));
  assert.ok(record);
  assert.equal(Object.isFrozen(record), true);
});

test('the accumulated size equals the number of distinct fingerprints across overlapping batches', () => {
  const accumulator = new ReviewAccumulator();
  const batches: RawReview[][] = [
    [raw(0), raw(1), raw(2), raw(3)],
    [raw(2), raw(3), raw(4), raw(5)],
    [raw(4, { sourceId: 'rerendered-4' }), raw(5), raw(6)],
    [],
  ];
  const distinct = new Set<string>();
  for (const batch of batches) {
    accumulator.addBatch(batch);
    for (const item of batch) {
      const record = toReviewRecord(item);
      if (record) distinct.add(record.fingerprint);
    }
  }

  assert.equal(accumulator.size, distinct.size);
  assert.equal(accumulator.size, 7);
  assert.equal(accumulator.duplicatesSkipped, 1);
});

test('re-reading the same nodes adds nothing and counts nothing', () => {
  const accumulator = new ReviewAccumulator();
  const batch = [raw(0), raw(1)];
  assert.deepEqual(accumulator.addBatch(batch), { added: 2, duplicates: 0, invalid: 0, truncated: 0 });
  assert.deepEqual(accumulator.addBatch(batch), { added: 0, duplicates: 0, invalid: 0, truncated: 0 });
  assert.equal(accumulator.duplicatesSkipped, 0);
});

test('collapsed and invalid nodes are skipped', () => {
  const accumulator = new ReviewAccumulator();
  const result = accumulator.addBatch([raw(0, { truncated: true }), raw(1, { ratingLabel: 'n/a' }), raw(2)]);

  assert.deepEqual(result, { added: 1, duplicates: 0, invalid: 1, truncated: 1 });
  accumulator.addBatch([raw(1, { ratingLabel: 'n/a' })]);
  assert.equal(accumulator.invalidSkipped, 1);
});

test('output is capped to the earliest extracted records', () => {
  const accumulator = new ReviewAccumulator();
  accumulator.addBatch([raw(5), raw(3), raw(9), raw(1)]);

  assert.deepEqual(
    accumulator.toArray(2).map((r) => r.sourceId),
    ['node-5', 'node-3'],
  );
  assert.equal(accumulator.toArray().length, 4);
});
