import { normalizeText, reviewFingerprint } from './fingerprint.js';
import type { RawReview, ReviewRecord } from './types.js';

// "별표 5개 중 4개", "Rated 4.0 out of 5", "4 stars"
const RATING_PATTERNS = [/별표\s*5개\s*중\s*(\d+)개/, /별표\s*(\d+)개/, /(\d+)(?:\.0)?\s*(?:out of|of)\s*5/i, /(\d+)\s*stars?/i];

export function parseRating(label: string | null): number | null {
  const text = normalizeText(label);
  if (!text) return null;
  for (const pattern of RATING_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;
    const value = Number(match[1]);
    return Number.isInteger(value) && value >= 1 && value <= 5 ? value : null;
  }
  return null;
}

/** Maps a raw node to a frozen record, or null when it has no body or no usable rating. */
export function toReviewRecord(raw: RawReview): ReviewRecord | null {
  const body = normalizeText(raw.body);
  const rating = parseRating(raw.ratingLabel);
  if (!body || rating === null) return null;
  const author = normalizeText(raw.author) || null;
  const dateText = normalizeText(raw.dateText);
  return Object.freeze({
    fingerprint: reviewFingerprint({ author, dateText, body }),
    rating,
    dateText,
    body,
    language: normalizeText(raw.language) || null,
    author,
    sourceId: normalizeText(raw.sourceId) || null,
  });
}

export interface AddBatchResult {
  added: number;
  duplicates: number;
  invalid: number;
  /** Nodes still showing a collapsed body; read again on the next cycle. */
  truncated: number;
}

/**
 * Per-target set of extracted reviews, ordered by first extraction.
 *
 * Reading the same loaded node again is expected on every scroll cycle and is
 * not counted; `duplicatesSkipped` counts distinct nodes whose content matched
 * an already-held review.
 */
export class ReviewAccumulator {
  private records = new Map<string, ReviewRecord>();
  private seenNodes = new Set<string>();
  private duplicateNodes = new Set<string>();
  private invalidNodes = new Set<string>();

  get size(): number {
    return this.records.size;
  }

  get duplicatesSkipped(): number {
    return this.duplicateNodes.size;
  }

  get invalidSkipped(): number {
    return this.invalidNodes.size;
  }

  has(fingerprint: string): boolean {
    return this.records.has(fingerprint);
  }

  addBatch(batch: RawReview[]): AddBatchResult {
    const result: AddBatchResult = { added: 0, duplicates: 0, invalid: 0, truncated: 0 };
    for (const raw of batch) {
      if (raw.truncated) {
        result.truncated += 1;
        continue;
      }
      const record = toReviewRecord(raw);
      if (!record) {
        const key = raw.sourceId ?? `${raw.author ?? ''}\u0000${raw.dateText ?? ''}`;
        if (!this.invalidNodes.has(key)) {
          this.invalidNodes.add(key);
          result.invalid += 1;
        }
        continue;
      }
      const nodeKey = `${record.sourceId ?? ''}\u0000${record.fingerprint}`;
      if (!this.records.has(record.fingerprint)) {
        this.records.set(record.fingerprint, record);
        this.seenNodes.add(nodeKey);
        result.added += 1;
        continue;
      }
      if (this.seenNodes.has(nodeKey) || this.duplicateNodes.has(nodeKey)) continue;
      this.duplicateNodes.add(nodeKey);
      result.duplicates += 1;
    }
    return result;
  }

  /** Earliest-extracted records first, at most `cap` of them. */
  toArray(cap = Number.POSITIVE_INFINITY): ReviewRecord[] {
    const out: ReviewRecord[] = [];
    for (const record of this.records.values()) {
      if (out.length >= cap) break;
      out.push(record);
    }
    return out;
  }
}
