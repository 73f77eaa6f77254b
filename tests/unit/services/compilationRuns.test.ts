import { describe, it, expect } from 'vitest';
import { CompilationRunner } from '../../../src/services/seasonStats/compilationRuns';
import { InProcessCompilationLock } from '../../../src/services/seasonStats/compilationLock';
import { COMPILATION_LOCK_KEY } from '../../../src/services/seasonStats/seasonCompiler';
import { CompilationInProgressError, ValidationError } from '../../../src/errors';
import { FakeSourceFeed, type FakeSourceFeedOptions } from '../../helpers/fakeSourceFeed';
import { InMemoryStatsStore } from '../../helpers/inMemoryStatsStore';
import { athlete, gameSummary, rushingLine } from '../../fixtures/factories';

const PARAMS = { season: 2024, endWeek: 2, seasonType: 2 };

function setup(feedOptions: FakeSourceFeedOptions = {}, historySize?: number) {
  const feed = new FakeSourceFeed(feedOptions);
  const store = new InMemoryStatsStore();
  const lock = new InProcessCompilationLock();
  const runner = new CompilationRunner({ feed, store, lock, historySize });
  return { feed, store, lock, runner };
}

const oneRusher = gameSummary({
  id: '1',
  name: 'Test Team',
  groups: { rushing: [athlete('10', rushingLine('8', '41', '1', '17'))] },
});

describe('CompilationRunner', () => {
  it('accepts a run and reports it as completed once finished', async () => {
    const { runner, store } = setup({ weeks: { 1: ['g1'], 2: ['g2'] }, payloads: { g1: oneRusher, g2: oneRusher } });

    const accepted = runner.start(PARAMS, 'req-1');

    expect(accepted).toMatchObject({
      status: 'running',
      params: { season: 2024, endWeek: 2, seasonType: 2 },
      finishedAt: null,
      summary: null,
      error: null,
    });

    const finished = await runner.waitFor(accepted.runId);

    expect(finished).toMatchObject({
      runId: accepted.runId,
      status: 'completed',
      currentWeek: 2,
      gamesProcessed: 2,
      error: null,
      summary: { status: 'completed', gamesProcessed: 2 },
    });
    expect(finished?.finishedAt).not.toBeNull();
    expect(store.rows('rushing')[0]).toMatchObject({ rushing_attempts: 16, rushing_yards: 82 });
  });

  it('rejects invalid parameters without registering a run', () => {
    const { runner, feed } = setup();

    expect(() => runner.start({ season: 2024, endWeek: 19, seasonType: 2 }, 'req-1')).toThrow(ValidationError);
    expect(feed.totalCalls).toBe(0);
  });

  it('refuses a second run while one is in progress', async () => {
    const { runner, feed } = setup({ weeks: { 1: ['g1'] } });
    feed.hold('g1');

    const first = runner.start(PARAMS, 'req-1');

    expect(() => runner.start(PARAMS, 'req-2')).toThrow(CompilationInProgressError);

    feed.release('g1');
    await runner.waitFor(first.runId);
    const second = runner.start(PARAMS, 'req-3');
    await expect(runner.waitFor(second.runId)).resolves.toMatchObject({ status: 'completed' });
  });

  it('marks the run aborted when another process holds the lock', async () => {
    const { runner, lock } = setup();
    await lock.acquire(COMPILATION_LOCK_KEY);

    const accepted = runner.start(PARAMS, 'req-1');
    const finished = await runner.waitFor(accepted.runId);

    expect(finished).toMatchObject({
      status: 'aborted',
      summary: null,
      error: { message: 'A season compilation is already running', code: 'COMPILATION_IN_PROGRESS' },
    });
  });

  it('keeps the partial summary of a run aborted by storage', async () => {
    const { runner, store } = setup({ weeks: { 1: ['g1', 'g2'] }, payloads: { g1: oneRusher, g2: oneRusher } });
    store.failOn({ operation: 'upsertAggregates', category: 'rushing', after: 1 });

    const accepted = runner.start({ ...PARAMS, endWeek: 1 }, 'req-1');
    const finished = await runner.waitFor(accepted.runId);

    expect(finished).toMatchObject({
      status: 'aborted',
      gamesProcessed: 1,
      error: { message: 'Simulated upsertAggregates failure', code: 'PERSISTENCE_ERROR' },
      summary: { status: 'aborted', gamesProcessed: 1, gamesDiscovered: 2 },
    });
  });

  it('returns null for an unknown run', async () => {
    const { runner } = setup();

    expect(runner.get('missing')).toBeNull();
    await expect(runner.waitFor('missing')).resolves.toBeNull();
  });

  it('forgets the oldest finished runs beyond the history size', async () => {
    const { runner } = setup({}, 2);

    const ids: string[] = [];
    for (let i = 0; i < 3; i++) {
      const run = runner.start({ ...PARAMS, endWeek: 1 }, `req-${i}`);
      ids.push(run.runId);
      await runner.waitFor(run.runId);
    }

    expect(runner.get(ids[0] ?? '')).toBeNull();
    expect(runner.get(ids[1] ?? '')).not.toBeNull();
    expect(runner.get(ids[2] ?? '')).not.toBeNull();
  });

  it('hands out copies of the run record', async () => {
    const { runner } = setup();
    const accepted = runner.start(PARAMS, 'req-1');
    await runner.waitFor(accepted.runId);

    expect(accepted.status).toBe('running');
  });
});
