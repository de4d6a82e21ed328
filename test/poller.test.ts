/**
 * Run Poller Tests
 *
 * Uses a fake clock that only advances inside sleep, so timeout boundaries
 * are exact and no real time passes.
 */

import { describe, it, expect, vi } from 'vitest';
import { awaitCompletion, defaultClock } from '../src/poller';
import type { PollerDeps } from '../src/poller';
import type { PollObservation, RunSnapshot } from '../src/types';
import { TransportError } from '../src/errors';
import { makeFakeClock, makeRun } from './helpers';

function makeDeps(runs: RunSnapshot[] | (() => RunSnapshot)) {
  const clock = makeFakeClock();
  const observations: PollObservation[] = [];
  const fetchRun = vi.fn(async (): Promise<RunSnapshot> => {
    if (typeof runs === 'function') return runs();
    const next = runs.shift();
    if (!next) throw new Error('no more snapshots');
    return next;
  });
  const deps: PollerDeps = {
    fetchRun,
    observe: (o) => observations.push(o),
    now: clock.now,
    sleep: clock.sleep,
  };
  return { deps, fetchRun, observations, sleep: clock.sleep };
}

const inProgress = (): RunSnapshot => makeRun({ status: 'in_progress', conclusion: null });

describe('awaitCompletion', () => {
  it('returns immediately when the first snapshot is completed', async () => {
    const { deps, fetchRun, observations, sleep } = makeDeps([makeRun()]);

    const result = await awaitCompletion(7001, { timeout_seconds: 60, poll_interval_seconds: 20 }, deps);

    expect(result).toEqual({ kind: 'completed', run: makeRun(), elapsed_seconds: 0 });
    expect(fetchRun).toHaveBeenCalledTimes(1);
    expect(fetchRun).toHaveBeenCalledWith(7001);
    expect(observations).toEqual([]);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('does not judge the conclusion of a completed run', async () => {
    const failed = makeRun({ conclusion: 'failure' });
    const { deps } = makeDeps([failed]);

    const result = await awaitCompletion(7001, { timeout_seconds: 60, poll_interval_seconds: 20 }, deps);

    expect(result.kind).toBe('completed');
  });

  it('observes each non-terminal poll and sleeps the fixed interval', async () => {
    const { deps, fetchRun, observations, sleep } = makeDeps([
      makeRun({ status: 'queued', conclusion: null }),
      inProgress(),
      makeRun(),
    ]);

    const result = await awaitCompletion(7001, { timeout_seconds: 600, poll_interval_seconds: 20 }, deps);

    expect(result).toEqual({ kind: 'completed', run: makeRun(), elapsed_seconds: 40 });
    expect(fetchRun).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[20000], [20000]]);
    expect(observations).toEqual([
      { run_id: 7001, status: 'queued', conclusion: null, elapsed_seconds: 0 },
      { run_id: 7001, status: 'in_progress', conclusion: null, elapsed_seconds: 20 },
    ]);
  });

  it('times out after floor(t/p) + 1 fetches when t is a multiple of p', async () => {
    const { deps, fetchRun } = makeDeps(inProgress);

    const result = await awaitCompletion(7001, { timeout_seconds: 60, poll_interval_seconds: 20 }, deps);

    // fetches at 0s, 20s, 40s, 60s; 80s > 60s stops before a fifth
    expect(fetchRun).toHaveBeenCalledTimes(4);
    expect(result).toEqual({ kind: 'timed_out', elapsed_seconds: 80, last: inProgress() });
  });

  it('times out after ceil(t/p) fetches when t is not a multiple of p', async () => {
    const { deps, fetchRun, sleep } = makeDeps(inProgress);

    const result = await awaitCompletion(7001, { timeout_seconds: 50, poll_interval_seconds: 20 }, deps);

    expect(fetchRun).toHaveBeenCalledTimes(Math.ceil(50 / 20));
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(result.kind).toBe('timed_out');
    expect(result.elapsed_seconds).toBe(60);
  });

  it('reports strictly increasing elapsed time until the loop halts', async () => {
    const { deps, observations } = makeDeps(inProgress);

    await awaitCompletion(7001, { timeout_seconds: 95, poll_interval_seconds: 30 }, deps);

    const elapsed = observations.map((o) => o.elapsed_seconds);
    expect(elapsed).toEqual([0, 30, 60, 90]);
  });

  it('does not fetch again once the deadline has passed at the top of an iteration', async () => {
    const clock = makeFakeClock();
    const fetchRun = vi.fn(async (): Promise<RunSnapshot> => inProgress());
    const deps: PollerDeps = {
      fetchRun,
      observe: () => undefined,
      now: clock.now,
      // One sleep overshoots the deadline
      sleep: () => clock.sleep(500_000),
    };

    const result = await awaitCompletion(7001, { timeout_seconds: 100, poll_interval_seconds: 20 }, deps);

    expect(fetchRun).toHaveBeenCalledTimes(1);
    expect(result).toEqual({ kind: 'timed_out', elapsed_seconds: 500, last: inProgress() });
  });

  it('propagates transport errors without retrying', async () => {
    const error = new TransportError('HTTP 502: Bad Gateway', {
      url: 'https://api.github.com/repos/o/r/actions/runs/7001',
      status: 502,
      rate_limit_remaining: null,
      rate_limit_reset: null,
    });
    const { deps, fetchRun, sleep } = makeDeps([inProgress()]);
    fetchRun.mockResolvedValueOnce(inProgress()).mockRejectedValueOnce(error);

    await expect(
      awaitCompletion(7001, { timeout_seconds: 600, poll_interval_seconds: 20 }, deps),
    ).rejects.toBe(error);
    expect(fetchRun).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});

describe('defaultClock', () => {
  it('uses wall-clock time', () => {
    const before = Date.now();
    const { now } = defaultClock();
    expect(now()).toBeGreaterThanOrEqual(before);
  });
});
