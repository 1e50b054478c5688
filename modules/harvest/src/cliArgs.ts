import minimist from 'minimist';
import type { DeepPartial, HarvestConfig, SortOrder } from '../../config/src/index.js';

export type HarvestCommand = 'run' | 'status' | 'log' | 'init';

const COMMANDS: readonly HarvestCommand[] = ['run', 'status', 'log', 'init'];

export interface ParsedHarvestArgs {
  args: minimist.ParsedArgs;
  command: HarvestCommand | null;
  showHelp: boolean;
  input: string | null;
  configPath: string | null;
  overrides: DeepPartial<HarvestConfig>;
  lines: number;
  logSource: string | null;
  logFile: string | null;
  flush: boolean;
  errors: string[];
}

export const USAGE = `Usage:
  harvest run --input <targets.json> [--output-dir <dir>] [--max-reviews N] [--workers N]
              [--headless|--headful] [--start-from N] [--limit N] [--sort newest,relevance]
              [--config <file>]
  harvest status [--output-dir <dir>] [--config <file>]
  harvest log [--lines N] [--source debug|run] [--file <path>] [--flush]
  harvest init [--config <file>]`;

function readString(value: unknown): string | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const text = String(value).trim();
  return text || null;
}

function readInteger(value: unknown, flag: string, min: number, errors: string[]): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    errors.push(`--${flag} expects an integer >= ${min}, got ${String(value)}`);
    return undefined;
  }
  return n;
}

function readSortOrders(value: unknown, errors: string[]): SortOrder[] | undefined {
  const text = readString(value);
  if (!text) return undefined;
  const orders: SortOrder[] = [];
  for (const part of text.split(',').map((p) => p.trim().toLowerCase()).filter(Boolean)) {
    if (part !== 'newest' && part !== 'relevance') {
      errors.push(`--sort accepts newest and relevance, got ${part}`);
      continue;
    }
    if (!orders.includes(part)) orders.push(part);
  }
  return orders.length ? orders : undefined;
}

export function parseHarvestCliArgs(rawArgs: string[]): ParsedHarvestArgs {
  const args = minimist(rawArgs, {
    alias: {
      i: 'input',
      o: 'output-dir',
      n: 'max-reviews',
      w: 'workers',
      c: 'config',
      h: 'help',
    },
    string: ['input', 'output-dir', 'config', 'sort', 'source', 'file'],
    boolean: ['headless', 'headful', 'help', 'flush'],
  });

  const errors: string[] = [];
  const first = readString(args._[0]);
  let command: HarvestCommand | null = null;
  if (first) {
    const match = COMMANDS.find((c) => c === first);
    if (match) command = match;
    else errors.push(`unknown command: ${first}`);
  }

  const overrides: DeepPartial<HarvestConfig> = {};
  const outputDir = readString(args['output-dir']);
  if (outputDir) overrides.outputDir = outputDir;
  const maxReviews = readInteger(args['max-reviews'], 'max-reviews', 1, errors);
  if (maxReviews !== undefined) overrides.maxReviews = maxReviews;
  const workers = readInteger(args.workers, 'workers', 1, errors);
  if (workers !== undefined) overrides.workers = workers;
  if (args.headful === true) overrides.browser = { headless: false };
  else if (args.headless === true) overrides.browser = { headless: true };
  const startFrom = readInteger(args['start-from'], 'start-from', 0, errors);
  const limit = readInteger(args.limit, 'limit', 1, errors);
  if (startFrom !== undefined || limit !== undefined) {
    overrides.window = {
      ...(startFrom !== undefined ? { startFrom } : {}),
      ...(limit !== undefined ? { limit } : {}),
    };
  }
  const sortOrders = readSortOrders(args.sort, errors);
  if (sortOrders) overrides.sortOrders = sortOrders;

  return {
    args,
    command,
    showHelp: args.help === true,
    input: readString(args.input),
    configPath: readString(args.config),
    overrides,
    lines: readInteger(args.lines, 'lines', 1, errors) ?? 200,
    logSource: readString(args.source),
    logFile: readString(args.file),
    flush: args.flush === true,
    errors,
  };
}
