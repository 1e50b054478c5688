import type { ShardStrategy } from '../../config/src/index.js';

export interface ShardPlanOptions {
  workers: number;
  strategy?: ShardStrategy;
  /** Explicit shard sizes; must add up to the number of items. Overrides `strategy`. */
  sizes?: number[];
}

export function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  const str = String(input || '');
  for (let i = 0; i < str.length; i += 1) {
    hash ^= str.charCodeAt(i);
    // hash *= 16777619 (with 32-bit overflow)
    hash = (hash + ((hash << 1) + (hash << 4) + (hash << 7) + (hash << 8) + (hash << 24))) >>> 0;
  }
  return hash >>> 0;
}

function splitBySizes<T>(items: readonly T[], sizes: number[]): T[][] {
  if (sizes.some((size) => !Number.isInteger(size) || size < 0)) {
    throw new Error(`shard sizes must be non-negative integers: ${sizes.join(',')}`);
  }
  const total = sizes.reduce((sum, size) => sum + size, 0);
  if (total !== items.length) {
    throw new Error(`shard sizes add up to ${total}, expected ${items.length}`);
  }
  const shards: T[][] = [];
  let offset = 0;
  for (const size of sizes) {
    shards.push(items.slice(offset, offset + size));
    offset += size;
  }
  return shards;
}

/**
 * Partitions items into disjoint shards, one per worker. Every item lands in
 * exactly one shard; shards may be empty when there are fewer items than workers.
 */
export function planShards<T extends { id: string }>(items: readonly T[], options: ShardPlanOptions): T[][] {
  if (options.sizes) {
    return splitBySizes(items, options.sizes);
  }
  const count = Math.max(1, Math.floor(options.workers));
  const shards: T[][] = Array.from({ length: count }, () => []);
  const strategy = options.strategy ?? 'contiguous';

  if (strategy === 'contiguous') {
    const perShard = Math.ceil(items.length / count);
    for (let i = 0; i < count; i += 1) {
      shards[i] = items.slice(i * perShard, (i + 1) * perShard);
    }
    return shards;
  }

  items.forEach((item, idx) => {
    const slot = strategy === 'index-mod' ? idx % count : fnv1a32(item.id) % count;
    shards[slot]?.push(item);
  });
  return shards;
}
