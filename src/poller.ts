/**
 * Run Poller
 * Layer: core
 *
 * Provided ports:
 *   - poller.awaitCompletion
 *
 * Fetches a run at a fixed interval until it reports `completed` or the
 * deadline passes. Clock, sleep and fetch are injected so the timeout
 * boundary can be exercised without real delays.
 */

import type { PollObservation, RunId, RunSnapshot, VerifyConfig } from './types';
import { sleep } from './utils';

export type PollConfig = Pick<VerifyConfig, 'timeout_seconds' | 'poll_interval_seconds'>;

/**
 * Dependency injection interface for awaitCompletion.
 */
export interface PollerDeps {
  fetchRun: (runId: RunId) => Promise<RunSnapshot>;
  observe: (observation: PollObservation) => void;
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

export type PollResult =
  | { kind: 'completed'; run: RunSnapshot; elapsed_seconds: number }
  | { kind: 'timed_out'; elapsed_seconds: number; last: RunSnapshot | null };

export const TERMINAL_STATUS = 'completed';

export function defaultClock(): Pick<PollerDeps, 'now' | 'sleep'> {
  return { now: () => Date.now(), sleep };
}

/**
 * Polls until the run completes or `timeout_seconds` is exceeded.
 *
 * The deadline is checked only at the top of each iteration, so an
 * in-flight fetch or sleep is never cut short. Transport errors from
 * `fetchRun` propagate unchanged.
 */
export async function awaitCompletion(
  runId: RunId,
  config: PollConfig,
  deps: PollerDeps,
): Promise<PollResult> {
  const startMs = deps.now();
  const elapsed = (): number => (deps.now() - startMs) / 1000;
  let last: RunSnapshot | null = null;

  while (true) {
    if (elapsed() > config.timeout_seconds) {
      return { kind: 'timed_out', elapsed_seconds: Math.floor(elapsed()), last };
    }

    const run = await deps.fetchRun(runId);
    last = run;

    if (run.status === TERMINAL_STATUS) {
      return { kind: 'completed', run, elapsed_seconds: Math.floor(elapsed()) };
    }

    deps.observe({
      run_id: runId,
      status: run.status,
      conclusion: run.conclusion,
      elapsed_seconds: Math.floor(elapsed()),
    });

    await deps.sleep(config.poll_interval_seconds * 1000);
  }
}
