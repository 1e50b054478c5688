import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

export interface LogSourceOptions {
  file?: string;
  source?: string;
}

export interface StreamOptions extends LogSourceOptions {
  maxLines?: number;
}

export interface StreamResult {
  file: string;
  lines: string[];
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogSink {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface Logger {
  readonly module: string;
  debug(event: string, data?: Record<string, unknown>): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export interface CreateLoggerOptions {
  sink?: LogSink;
}

export function resolveLogRoot(): string {
  const custom = String(process.env.HARVEST_LOG_ROOT || '').trim();
  if (custom) return path.resolve(custom);
  return path.join(os.homedir(), '.review-harvest', 'logs');
}

export function resolveDebugLogFile(): string {
  return path.join(resolveLogRoot(), 'debug.jsonl');
}

function defaultSources(): Record<string, string> {
  const root = resolveLogRoot();
  return {
    debug: path.join(root, 'debug.jsonl'),
    run: path.join(root, 'run.log'),
  };
}

export function isDebugEnabled(): boolean {
  return process.env.DEBUG === '1' || process.env.HARVEST_DEBUG === '1';
}

const readyDirs = new Set<string>();

function ensureLogDir(file: string): boolean {
  const dir = path.dirname(file);
  if (readyDirs.has(dir)) return true;
  try {
    fs.mkdirSync(dir, { recursive: true });
    readyDirs.add(dir);
    return true;
  } catch {
    return false;
  }
}

export function logDebug(module: string, event: string, data: Record<string, unknown> = {}): void {
  if (!isDebugEnabled()) return;
  const file = resolveDebugLogFile();
  if (!ensureLogDir(file)) return;
  const entry = {
    ts: Date.now(),
    level: 'debug',
    module,
    event,
    data,
  };
  try {
    fs.appendFileSync(file, `${JSON.stringify(entry)}\n`);
  } catch {
    // debug log is best-effort
  }
}

export const consoleSink: LogSink = {
  log: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

function appendLine(file: string, level: LogLevel, message: string): void {
  if (!ensureLogDir(file)) return;
  try {
    fs.appendFileSync(file, `${new Date().toISOString()} ${level} ${message}\n`);
  } catch {
    // the run log mirrors the console; losing a line must not stop a run
  }
}

/** Appends every line to `file` (the `run` log source by default) and forwards it to `inner`. */
export function createFileSink(file = resolveLogFile({ source: 'run' }), inner: LogSink = consoleSink): LogSink {
  return {
    log: (message) => {
      appendLine(file, 'info', message);
      inner.log(message);
    },
    warn: (message) => {
      appendLine(file, 'warn', message);
      inner.warn(message);
    },
    error: (message) => {
      appendLine(file, 'error', message);
      inner.error(message);
    },
  };
}

export function createLogger(module: string, options: CreateLoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;
  const prefix = `[${module}]`;
  return {
    module,
    debug(event, data = {}) {
      logDebug(module, event, data);
    },
    info(message) {
      sink.log(`${prefix} ${message}`);
    },
    warn(message) {
      sink.warn(`${prefix} ${message}`);
    },
    error(message) {
      sink.error(`${prefix} ${message}`);
      logDebug(module, 'error', { message });
    },
    child(scope) {
      return createLogger(`${module}:${scope}`, { sink });
    },
  };
}

/** Captures everything a logger writes; meant for tests and the CLI's quiet mode. */
export function createMemorySink(): LogSink & { lines: Array<{ level: LogLevel; message: string }> } {
  const lines: Array<{ level: LogLevel; message: string }> = [];
  return {
    lines,
    log: (message) => lines.push({ level: 'info', message }),
    warn: (message) => lines.push({ level: 'warn', message }),
    error: (message) => lines.push({ level: 'error', message }),
  };
}

export function resolveLogFile(options: LogSourceOptions): string {
  if (options.file) {
    return path.resolve(options.file);
  }
  const sources = defaultSources();
  if (options.source && sources[options.source]) {
    return sources[options.source];
  }
  return sources.debug;
}

export async function streamLog(options: StreamOptions = {}): Promise<StreamResult> {
  const file = resolveLogFile(options);
  const maxLines = options.maxLines ?? 200;
  const lines = await readTailLines(file, maxLines);
  return { file, lines };
}

export async function flushLog(options: LogSourceOptions = {}, truncate = false): Promise<StreamResult> {
  const file = resolveLogFile(options);
  const lines = await readTailLines(file, Number.MAX_SAFE_INTEGER);
  if (truncate && lines.length > 0) {
    await fs.promises.truncate(file, 0);
  }
  return { file, lines };
}

function errorCode(err: unknown): string {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return '';
}

async function readTailLines(file: string, maxLines: number): Promise<string[]> {
  try {
    const content = await fs.promises.readFile(file, 'utf-8');
    const lines = content.split(/\r?\n/).filter((line) => line.length > 0);
    if (lines.length <= maxLines) {
      return lines;
    }
    return lines.slice(-maxLines);
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return [];
    }
    throw err;
  }
}
