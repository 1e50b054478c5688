import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'node:os';
import path from 'node:path';
import { existsSync, promises as fs } from 'node:fs';
import type { HarvestConfig } from '../../config/src/index.js';
import { HarvestCoordinator, mergePartials, resolveOutcome } from '../src/coordinator.js';
import type { CollectionResult, TargetRecord, TargetResult } from '../src/types.js';
import { SimulatedSite, makeReviews, makeTarget, noSleep, quietLogger, testConfig, type SimTarget } from './helpers/simulatedSite.js';

function plainTargets(count: number): { targets: TargetRecord[]; fixtures: Record<string, SimTarget> } {
  const targets = Array.from({ length: count }, (_, i) => makeTarget(`t${i + 1}`));
  const fixtures: Record<string, SimTarget> = {};
  for (const target of targets) fixtures[target.id] = { batches: [makeReviews(0, 3)] };
  return { targets, fixtures };
}

function coordinatorFor(site: SimulatedSite, config: HarvestConfig, outputDir: string): HarvestCoordinator {
  return new HarvestCoordinator({
    config,
    outputDir,
    backendFactory: site.backendFactory,
    pageFactory: site.pageFactory,
    logger: quietLogger('coordinator'),
    sleep: noSleep,
  });
}

async function withOutputDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'coordinator-test-'));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test('explicit shard sizes split ten targets over two workers without overlap', async () => {
  await withOutputDir(async (dir) => {
    const { targets, fixtures } = plainTargets(10);
    const site = new SimulatedSite(fixtures);
    const config = testConfig((c) => {
      c.maxReviews = 3;
      c.workers = 2;
    });
    const coordinator = coordinatorFor(site, config, dir);
    const persistedOnDone: boolean[] = [];
    coordinator.on('target:done', ({ target }) => {
      persistedOnDone.push(existsSync(coordinator.outputStore.targetPath(target)));
    });

    const { result, log, reports } = await coordinator.run(targets, { shardSizes: [6, 4] });

    assert.equal(result.size, 10);
    assert.deepEqual(
      reports.map((r) => [...r.results.keys()]),
      [
        ['t1', 't2', 't3', 't4', 't5', 't6'],
        ['t7', 't8', 't9', 't10'],
      ],
    );
    assert.deepEqual(persistedOnDone, Array.from({ length: 10 }, () => true));
    assert.equal(log.outcome, 'clean');
    assert.equal(log.attempted, 10);
    assert.equal(log.succeeded, 10);
    assert.equal(log.reviewsCollected, 30);
    assert.deepEqual(log.duplicateKeys, []);
    assert.deepEqual(
      log.workers.map((w) => [w.workerId, w.assigned, w.sessionsOpened]),
      [
        ['worker-1', 6, 1],
        ['worker-2', 4, 1],
      ],
    );
    for (const targetResult of result.values()) {
      assert.equal(targetResult.status, 'complete');
      assert.equal(targetResult.reviews.length, 3);
    }

    const stored = await coordinator.outputStore.readRunLog();
    assert.ok(typeof stored === 'object' && stored !== null && 'runId' in stored);
    assert.equal(stored.runId, log.runId);
    assert.equal(existsSync(coordinator.outputStore.mergedResultPath), true);
  });
});

test('a resumed run skips stored targets and leaves their artifacts untouched', async () => {
  await withOutputDir(async (dir) => {
    const { targets, fixtures } = plainTargets(4);
    const site = new SimulatedSite(fixtures);
    const config = testConfig((c) => {
      c.maxReviews = 3;
    });

    const first = coordinatorFor(site, config, dir);
    first.on('target:done', () => first.stop());
    const interrupted = await first.run(targets);

    assert.equal(interrupted.log.outcome, 'aborted');
    assert.equal(interrupted.log.stopRequested, true);
    assert.equal(interrupted.log.attempted, 1);
    assert.deepEqual([...interrupted.result.keys()], ['t1']);

    const t1File = first.outputStore.targetPath(makeTarget('t1'));
    const before = await fs.readFile(t1File, 'utf-8');

    const second = coordinatorFor(site, config, dir);
    const resumed = await second.run(targets);

    assert.equal(resumed.log.outcome, 'clean');
    assert.equal(resumed.log.skipped, 1);
    assert.equal(resumed.log.attempted, 3);
    assert.equal(resumed.result.size, 4);
    assert.equal(site.navigationsTo('t1'), 1);
    assert.equal(site.navigationsTo('t4'), 1);
    assert.equal(await fs.readFile(t1File, 'utf-8'), before);
    assert.deepEqual(resumed.result.get('t1'), interrupted.result.get('t1'));
  });
});

test('a crashed session fails its target and the next target gets a fresh session', async () => {
  await withOutputDir(async (dir) => {
    const site = new SimulatedSite({
      t1: { batches: [makeReviews(0, 3)], crashOn: 'readLoadedReviews' },
      t2: { batches: [makeReviews(0, 3)] },
    });
    const config = testConfig((c) => {
      c.maxReviews = 3;
    });
    const coordinator = coordinatorFor(site, config, dir);

    const { result, log } = await coordinator.run([makeTarget('t1'), makeTarget('t2')]);

    const failed = result.get('t1');
    assert.equal(failed?.status, 'failed');
    assert.equal(failed?.error?.kind, 'session-crash');
    assert.equal(failed?.error?.state, 'scrolling');
    assert.equal(result.get('t2')?.status, 'complete');

    assert.equal(log.outcome, 'partial-failures');
    assert.equal(log.failed, 1);
    assert.equal(log.succeeded, 1);
    assert.deepEqual(
      log.failures.map((f) => [f.targetId, f.kind]),
      [['t1', 'session-crash']],
    );
    assert.equal(log.workers[0]?.sessionsOpened, 2);
    assert.equal(site.backends.length, 2);
    assert.equal(site.backends[0]?.closed, true);

    const artifact = await coordinator.outputStore.readTargetArtifact(makeTarget('t1'));
    assert.equal(artifact?.result.status, 'failed');
  });
});

test('failed targets are dispatched again on the next run', async () => {
  await withOutputDir(async (dir) => {
    const site = new SimulatedSite({
      t1: { batches: [makeReviews(0, 3)], failures: { navigate: 3 } },
    });
    const config = testConfig((c) => {
      c.maxReviews = 3;
    });

    const first = await coordinatorFor(site, config, dir).run([makeTarget('t1')]);
    assert.equal(first.result.get('t1')?.error?.kind, 'execution');
    assert.equal(first.result.get('t1')?.error?.state, 'init');

    const second = await coordinatorFor(site, config, dir).run([makeTarget('t1')]);
    assert.equal(second.log.skipped, 0);
    assert.equal(second.result.get('t1')?.status, 'complete');
  });
});

test('the configured window selects a slice of the targets', async () => {
  await withOutputDir(async (dir) => {
    const { targets, fixtures } = plainTargets(5);
    const site = new SimulatedSite(fixtures);
    const config = testConfig((c) => {
      c.maxReviews = 3;
      c.window = { startFrom: 1, limit: 2 };
    });

    const { result, log } = await coordinatorFor(site, config, dir).run(targets);

    assert.deepEqual([...result.keys()], ['t2', 't3']);
    assert.equal(log.targetsTotal, 2);
    assert.equal(site.navigationsTo('t1'), 0);
  });
});

test('duplicate target ids are rejected before anything runs', async () => {
  await withOutputDir(async (dir) => {
    const site = new SimulatedSite({ t1: { batches: [] } });
    const coordinator = coordinatorFor(site, testConfig(), dir);
    await assert.rejects(coordinator.run([makeTarget('t1'), makeTarget('t1')]), /duplicate target id t1/);
    assert.equal(site.backends.length, 0);
  });
});

test('ids that differ only in path-unsafe characters keep separate artifacts and resume', async () => {
  await withOutputDir(async (dir) => {
    const targets = [makeTarget('a/b'), makeTarget('a_b')];
    const site = new SimulatedSite({ 'a/b': { batches: [makeReviews(0, 3)] }, a_b: { batches: [makeReviews(10, 3)] } });
    const config = testConfig((c) => {
      c.maxReviews = 3;
    });

    const first = await coordinatorFor(site, config, dir).run(targets);
    assert.equal(first.log.succeeded, 2);
    assert.deepEqual((await fs.readdir(path.join(dir, 'targets'))).sort(), ['a%2Fb.json', 'a_b.json']);

    const second = await coordinatorFor(site, config, dir).run(targets);
    assert.equal(second.log.skipped, 2);
    assert.equal(second.log.attempted, 0);
    assert.equal(site.navigationsTo('a/b'), 1);
    assert.equal(site.navigationsTo('a_b'), 1);
    assert.deepEqual(second.result.get('a/b'), first.result.get('a/b'));
  });
});

function stubResult(targetId: string, durationMs: number): TargetResult {
  return {
    targetId,
    status: 'complete',
    reviews: [],
    requested: 3,
    stopReason: 'target-reached',
    passes: [],
    sortApplied: false,
    duplicatesSkipped: 0,
    invalidSkipped: 0,
    startedAt: '2026-01-01T00:00:00.000Z',
    durationMs,
  };
}

test('mergePartials keeps the first entry for a key reported twice and lists it', () => {
  const resumed: CollectionResult = new Map([['t1', stubResult('t1', 1)]]);
  const partialA: CollectionResult = new Map([
    ['t2', stubResult('t2', 2)],
    ['t3', stubResult('t3', 3)],
  ]);
  const partialB: CollectionResult = new Map([
    ['t3', stubResult('t3', 30)],
    ['t1', stubResult('t1', 10)],
    ['t4', stubResult('t4', 4)],
  ]);

  const { result, duplicateKeys } = mergePartials(resumed, [partialA, partialB]);

  assert.deepEqual([...result.keys()], ['t1', 't2', 't3', 't4']);
  assert.equal(result.get('t1')?.durationMs, 1);
  assert.equal(result.get('t3')?.durationMs, 3);
  assert.deepEqual(duplicateKeys, ['t3', 't1']);
  assert.equal(resumed.size, 1);
});

test('mergePartials without overlap reports no duplicates', () => {
  const { result, duplicateKeys } = mergePartials(new Map(), [
    new Map([['t1', stubResult('t1', 1)]]),
    new Map([['t2', stubResult('t2', 2)]]),
  ]);
  assert.equal(result.size, 2);
  assert.deepEqual(duplicateKeys, []);
});

test('resolveOutcome', () => {
  assert.equal(resolveOutcome(false, 0), 'clean');
  assert.equal(resolveOutcome(false, 2), 'partial-failures');
  assert.equal(resolveOutcome(true, 0), 'aborted');
});
