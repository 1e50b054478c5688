import { createHash } from 'node:crypto';

export function normalizeText(value: string | null | undefined): string {
  return String(value ?? '')
    .normalize('NFC')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Stable identity of a review: author, date text and normalized body.
 * DOM position and the page's review id are deliberately left out.
 */
export function reviewFingerprint(input: { author: string | null; dateText: string; body: string }): string {
  const key = [normalizeText(input.author), normalizeText(input.dateText), normalizeText(input.body)].join('\u0000');
  return createHash('sha1').update(key, 'utf8').digest('hex');
}
