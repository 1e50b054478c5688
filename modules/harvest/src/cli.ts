#!/usr/bin/env node
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigLoader } from '../../config/src/index.js';
import { createFileSink, createLogger, flushLog, resolveLogFile, streamLog, type LogSink, type Logger } from '../../logging/src/index.js';
import type { BackendFactory } from '../../session-manager/src/index.js';
import { parseHarvestCliArgs, USAGE, type ParsedHarvestArgs } from './cliArgs.js';
import { HarvestCoordinator } from './coordinator.js';
import { errorMessage } from './errors.js';
import { OutputStore } from './outputStore.js';
import type { ReviewPageFactory } from './reviewPage.js';
import { loadTargets } from './targets.js';
import type { RunOutcome } from './types.js';

export interface CliResult {
  exitCode: number;
  data?: unknown;
  error?: string;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  backendFactory?: BackendFactory;
  pageFactory?: ReviewPageFactory;
  /** Replaces the default logger, which appends to the `run` log source. */
  logger?: Logger;
  /** Where the default logger forwards lines besides the run log; the console when unset. */
  sink?: LogSink;
  sleep?: (ms: number) => Promise<void>;
  /** Called with the coordinator before the run starts. */
  onCoordinator?: (coordinator: HarvestCoordinator) => void;
}

export const EXIT_CODES: Record<RunOutcome, number> = {
  clean: 0,
  'partial-failures': 2,
  aborted: 3,
};

async function loadConfig(parsed: ParsedHarvestArgs, deps: CliDeps) {
  const loader = new ConfigLoader({ configPath: parsed.configPath ?? undefined, env: deps.env });
  return { loader, config: await loader.load({ overrides: parsed.overrides }) };
}

async function handleRun(parsed: ParsedHarvestArgs, deps: CliDeps): Promise<CliResult> {
  if (!parsed.input) {
    return { exitCode: 1, error: `--input is required\n${USAGE}` };
  }
  const { config } = await loadConfig(parsed, deps);
  const targets = await loadTargets(path.resolve(parsed.input));
  const logger =
    deps.logger ?? createLogger('harvest', { sink: createFileSink(resolveLogFile({ source: 'run' }), deps.sink) });
  const coordinator = new HarvestCoordinator({
    config,
    outputDir: path.resolve(config.outputDir),
    backendFactory: deps.backendFactory,
    pageFactory: deps.pageFactory,
    logger,
    sleep: deps.sleep,
  });
  deps.onCoordinator?.(coordinator);

  const onSignal = () => coordinator.stop();
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  try {
    const { log } = await coordinator.run(targets);
    return {
      exitCode: EXIT_CODES[log.outcome],
      data: {
        runId: log.runId,
        outcome: log.outcome,
        outputDir: coordinator.outputStore.rootDir,
        attempted: log.attempted,
        succeeded: log.succeeded,
        partialTimeouts: log.partialTimeouts,
        failed: log.failed,
        skipped: log.skipped,
        reviewsCollected: log.reviewsCollected,
        elapsedMs: log.elapsedMs,
        reviewsPerSecond: log.reviewsPerSecond,
        failures: log.failures,
      },
    };
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  }
}

async function handleStatus(parsed: ParsedHarvestArgs, deps: CliDeps): Promise<CliResult> {
  const { config } = await loadConfig(parsed, deps);
  const store = new OutputStore(path.resolve(config.outputDir), deps.logger);
  const artifacts = await store.listArtifacts();
  const byStatus = { complete: 0, 'partial-timeout': 0, failed: 0 };
  let reviews = 0;
  for (const artifact of artifacts) {
    byStatus[artifact.result.status] += 1;
    reviews += artifact.result.reviews.length;
  }
  return {
    exitCode: 0,
    data: {
      outputDir: store.rootDir,
      targets: artifacts.length,
      ...byStatus,
      reviews,
      lastRun: await store.readRunLog(),
    },
  };
}

async function handleLog(parsed: ParsedHarvestArgs): Promise<CliResult> {
  const source = { source: parsed.logSource ?? undefined, file: parsed.logFile ?? undefined };
  if (parsed.flush) {
    return { exitCode: 0, data: await flushLog(source, true) };
  }
  return { exitCode: 0, data: await streamLog({ ...source, maxLines: parsed.lines }) };
}

async function handleInit(parsed: ParsedHarvestArgs, deps: CliDeps): Promise<CliResult> {
  const loader = new ConfigLoader({ configPath: parsed.configPath ?? undefined, env: deps.env });
  const created = await loader.ensureExists();
  return { exitCode: 0, data: { configPath: loader.getConfigPath(), created } };
}

export async function run(argv = process.argv.slice(2), deps: CliDeps = {}): Promise<CliResult> {
  const parsed = parseHarvestCliArgs(argv);
  if (parsed.showHelp) {
    return { exitCode: 0, data: USAGE };
  }
  if (parsed.errors.length > 0) {
    return { exitCode: 1, error: `${parsed.errors.join('\n')}\n${USAGE}` };
  }
  switch (parsed.command) {
    case 'run':
      return handleRun(parsed, deps);
    case 'status':
      return handleStatus(parsed, deps);
    case 'log':
      return handleLog(parsed);
    case 'init':
      return handleInit(parsed, deps);
    default:
      return { exitCode: 1, error: USAGE };
  }
}

async function main() {
  const result = await run(process.argv.slice(2));
  if (result.error) {
    console.error(result.error);
  } else if (typeof result.data === 'string') {
    console.log(result.data);
  } else {
    console.log(JSON.stringify(result.data, null, 2));
  }
  process.exit(result.exitCode);
}

const currentFile = fileURLToPath(import.meta.url);
if (path.resolve(process.argv[1] || '') === currentFile) {
  main().catch((err: unknown) => {
    console.error(errorMessage(err));
    process.exit(1);
  });
}
