import { promises as fs } from 'node:fs';
import path from 'node:path';
import { Ajv } from 'ajv';
import { targetListSchema } from './schemas.js';
import type { TargetRecord } from './types.js';

/** One entry of the input list: a search-step place object or an already-normalized record. */
export interface TargetEntry {
  id?: string;
  place_id?: string;
  name?: string;
  address?: string | null;
  formatted_address?: string | null;
  rating?: number | null;
  user_ratings_total?: number | null;
  knownReviewCount?: number | null;
  grid?: string | number | null;
  group?: string | null;
}

const ajv = new Ajv({ allErrors: true, strict: false, allowUnionTypes: true });
const validateTargetList = ajv.compile<TargetEntry[]>(targetListSchema);

export interface NormalizeOptions {
  /** Group for entries that carry neither `group` nor `grid`. */
  defaultGroup?: string;
}

export function normalizeTargets(input: unknown, options: NormalizeOptions = {}): TargetRecord[] {
  if (!validateTargetList(input)) {
    const details = (validateTargetList.errors ?? [])
      .map((e) => `  - ${e.instancePath || '/root'}: ${e.message || 'invalid'}`)
      .join('\n');
    throw new Error(`Invalid target list:\n${details}`);
  }

  const seen = new Set<string>();
  const out: TargetRecord[] = [];
  for (const entry of input) {
    const id = String(entry.id ?? entry.place_id ?? '').trim();
    if (!id) throw new Error('Invalid target list: empty target id');
    if (seen.has(id)) throw new Error(`Invalid target list: duplicate target id ${id}`);
    seen.add(id);

    const knownReviewCount = entry.knownReviewCount ?? entry.user_ratings_total;
    const group =
      entry.group ?? (entry.grid === null || entry.grid === undefined ? options.defaultGroup : String(entry.grid));
    out.push(
      Object.freeze({
        id,
        name: String(entry.name ?? '').trim() || id,
        address: String(entry.address ?? entry.formatted_address ?? '').trim(),
        ...(typeof entry.rating === 'number' ? { rating: entry.rating } : {}),
        ...(typeof knownReviewCount === 'number' ? { knownReviewCount } : {}),
        ...(group ? { group } : {}),
      }),
    );
  }
  return out;
}

const GROUP_FILE_PATTERN = /restaurants_(.+?)\.json$/;

/** Grid cell encoded in a search-step file name, e.g. `restaurants_3_4.json` → `3_4`. */
export function groupFromFileName(filePath: string): string | undefined {
  return GROUP_FILE_PATTERN.exec(path.basename(filePath))?.[1];
}

export async function loadTargets(filePath: string): Promise<TargetRecord[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new Error(`Target file is not valid JSON (${filePath}): ${err instanceof Error ? err.message : String(err)}`);
  }
  return normalizeTargets(parsed, { defaultGroup: groupFromFileName(filePath) });
}

export function applyWindow<T>(items: readonly T[], window: { startFrom: number; limit: number | null }): T[] {
  const start = Math.max(0, Math.floor(window.startFrom));
  const end = window.limit === null ? undefined : start + Math.max(0, Math.floor(window.limit));
  return items.slice(start, end);
}
