import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'node:os';
import path from 'node:path';
import { existsSync, promises as fs } from 'node:fs';
import { createMemorySink } from '../../logging/src/index.js';
import { run, type CliDeps } from '../src/cli.js';
import { parseHarvestCliArgs, USAGE } from '../src/cliArgs.js';
import { SimulatedSite, makeReviews, noSleep, quietLogger, type SimTarget } from './helpers/simulatedSite.js';

function field(data: unknown, key: string): unknown {
  assert.ok(typeof data === 'object' && data !== null, 'expected an object');
  return Reflect.get(data, key);
}

async function withWorkspace(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'harvest-cli-'));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

async function writeTargets(dir: string, ids: string[]): Promise<string> {
  const file = path.join(dir, 'targets.json');
  await fs.writeFile(file, JSON.stringify(ids.map((id) => ({ place_id: id, name: `Place ${id}` }))));
  return file;
}

function depsFor(site: SimulatedSite): CliDeps {
  return {
    env: {},
    backendFactory: site.backendFactory,
    pageFactory: site.pageFactory,
    logger: quietLogger('harvest'),
    sleep: noSleep,
  };
}

const healthy: SimTarget = { batches: [makeReviews(0, 3)] };

test('run harvests every target and status summarizes the output', async () => {
  await withWorkspace(async (dir) => {
    const input = await writeTargets(dir, ['p1', 'p2']);
    const out = path.join(dir, 'out');
    const configPath = path.join(dir, 'harvest.config.json');
    const site = new SimulatedSite({ p1: healthy, p2: healthy });

    const result = await run(
      ['run', '--input', input, '--output-dir', out, '--max-reviews', '3', '--config', configPath],
      depsFor(site),
    );

    assert.equal(result.error, undefined);
    assert.equal(result.exitCode, 0);
    assert.equal(field(result.data, 'outcome'), 'clean');
    assert.equal(field(result.data, 'reviewsCollected'), 6);
    assert.equal(field(result.data, 'outputDir'), out);
    assert.equal(existsSync(path.join(out, 'targets', 'p1.json')), true);
    assert.equal(existsSync(path.join(out, 'collection-log.json')), true);

    const status = await run(['status', '--output-dir', out, '--config', configPath], depsFor(site));
    assert.equal(status.exitCode, 0);
    assert.equal(field(status.data, 'targets'), 2);
    assert.equal(field(status.data, 'complete'), 2);
    assert.equal(field(status.data, 'failed'), 0);
    assert.equal(field(status.data, 'reviews'), 6);
    assert.equal(field(field(status.data, 'lastRun'), 'outcome'), 'clean');
  });
});

test('a run with failed targets exits with the partial-failures code', async () => {
  await withWorkspace(async (dir) => {
    const input = await writeTargets(dir, ['p1', 'p2']);
    const out = path.join(dir, 'out');
    const site = new SimulatedSite({ p1: healthy, p2: { batches: [], blocked: true } });

    const result = await run(
      ['run', '-i', input, '-o', out, '-n', '3', '-c', path.join(dir, 'harvest.config.json')],
      depsFor(site),
    );

    assert.equal(result.exitCode, 2);
    assert.equal(field(result.data, 'outcome'), 'partial-failures');
    assert.equal(field(result.data, 'failed'), 1);
    assert.deepEqual(
      field(result.data, 'failures'),
      [{ targetId: 'p2', kind: 'blocked', message: 'blocked or captcha page at https://www.google.com/sorry/index', state: 'init' }],
    );
  });
});

test('the default run logger feeds the run log source', async () => {
  await withWorkspace(async (dir) => {
    const previousRoot = process.env.HARVEST_LOG_ROOT;
    process.env.HARVEST_LOG_ROOT = path.join(dir, 'logs');
    try {
      const input = await writeTargets(dir, ['p1']);
      const site = new SimulatedSite({ p1: healthy });
      const forwarded = createMemorySink();
      const result = await run(
        ['run', '-i', input, '-o', path.join(dir, 'out'), '-n', '3', '-c', path.join(dir, 'harvest.config.json')],
        { env: {}, backendFactory: site.backendFactory, pageFactory: site.pageFactory, sink: forwarded, sleep: noSleep },
      );
      assert.equal(result.exitCode, 0);
      assert.ok(forwarded.lines.length > 0);

      const tail = await run(['log', '--source', 'run', '--lines', '1']);
      assert.equal(field(tail.data, 'file'), path.join(dir, 'logs', 'run.log'));
      const lines = field(tail.data, 'lines');
      assert.ok(Array.isArray(lines));
      assert.equal(lines.length, 1);
      assert.match(
        String(lines[0]),
        /^\S+ info \[harvest\] run [0-9a-f-]{36} clean: 1\/1 targets, 3 reviews, 0 failed, 0 skipped, /,
      );
    } finally {
      if (previousRoot === undefined) delete process.env.HARVEST_LOG_ROOT;
      else process.env.HARVEST_LOG_ROOT = previousRoot;
    }
  });
});

test('run without an input file is a usage error', async () => {
  const result = await run(['run'], { env: {} });
  assert.equal(result.exitCode, 1);
  assert.equal(result.error, `--input is required\n${USAGE}`);
});

test('invalid flags and unknown commands are reported', async () => {
  const badWorkers = await run(['run', '--workers', 'zero']);
  assert.equal(badWorkers.exitCode, 1);
  assert.equal(badWorkers.error, `--workers expects an integer >= 1, got zero\n${USAGE}`);

  const unknown = await run(['fly']);
  assert.equal(unknown.exitCode, 1);
  assert.equal(unknown.error, `unknown command: fly\n${USAGE}`);

  const none = await run([]);
  assert.equal(none.exitCode, 1);
  assert.equal(none.error, USAGE);
});

test('help prints usage', async () => {
  assert.deepEqual(await run(['--help']), { exitCode: 0, data: USAGE });
  assert.deepEqual(await run(['run', '-h']), { exitCode: 0, data: USAGE });
});

test('init writes the default configuration once', async () => {
  await withWorkspace(async (dir) => {
    const configPath = path.join(dir, 'harvest.config.json');
    const first = await run(['init', '--config', configPath], { env: {} });
    assert.deepEqual(first.data, { configPath, created: true });
    assert.equal(field(JSON.parse(await fs.readFile(configPath, 'utf-8')), 'maxReviews'), 100);

    const second = await run(['init', '--config', configPath], { env: {} });
    assert.deepEqual(second.data, { configPath, created: false });
  });
});

test('log tails the requested file', async () => {
  await withWorkspace(async (dir) => {
    const file = path.join(dir, 'run.log');
    await fs.writeFile(file, 'first\nsecond\nthird\n');
    const result = await run(['log', '--file', file, '--lines', '2']);
    assert.deepEqual(result.data, { file, lines: ['second', 'third'] });
  });
});

test('parseHarvestCliArgs turns flags into configuration overrides', () => {
  const parsed = parseHarvestCliArgs([
    'run',
    '-i',
    'targets.json',
    '-n',
    '50',
    '-w',
    '4',
    '--headful',
    '--start-from',
    '2',
    '--limit',
    '5',
    '--sort',
    'relevance,newest,newest',
  ]);

  assert.equal(parsed.command, 'run');
  assert.equal(parsed.input, 'targets.json');
  assert.deepEqual(parsed.errors, []);
  assert.deepEqual(parsed.overrides, {
    maxReviews: 50,
    workers: 4,
    browser: { headless: false },
    window: { startFrom: 2, limit: 5 },
    sortOrders: ['relevance', 'newest'],
  });
});

test('parseHarvestCliArgs rejects unknown sort orders', () => {
  const parsed = parseHarvestCliArgs(['run', '--sort', 'oldest']);
  assert.deepEqual(parsed.errors, ['--sort accepts newest and relevance, got oldest']);
  assert.equal(parsed.overrides.sortOrders, undefined);
});
