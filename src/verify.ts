/**
 * Verification State Machine
 * Layer: core
 *
 * Provided ports:
 *   - verify.step
 *   - verify.verify
 *
 * RESOLVING → POLLING → EVALUATING → DONE, with POLLING → DONE taken when
 * the deadline passes. The run id chosen in RESOLVING is carried through
 * unchanged; jobs are read only once the run is completed.
 */

import type { Outcome, PollObservation, RunId, RunSnapshot, VerifyConfig } from './types';
import type { ActionsClient } from './github';
import { resolveRunId } from './resolver';
import { awaitCompletion } from './poller';
import type { PollerDeps } from './poller';
import { evaluate } from './evaluator';
import type { Logger } from './logger';

export type Phase =
  | { phase: 'RESOLVING' }
  | { phase: 'POLLING'; run_id: RunId }
  | { phase: 'EVALUATING'; run_id: RunId; run: RunSnapshot }
  | { phase: 'DONE'; outcome: Outcome };

export interface VerifyDeps extends Pick<PollerDeps, 'now' | 'sleep'> {
  client: ActionsClient;
  observe: (observation: PollObservation) => void;
  logger: Logger;
}

/**
 * Performs one transition. DONE is absorbing.
 */
export async function step(phase: Phase, config: VerifyConfig, deps: VerifyDeps): Promise<Phase> {
  switch (phase.phase) {
    case 'RESOLVING': {
      const runId = await resolveRunId(deps.client, config.selector, config.workflow, deps.logger);
      return { phase: 'POLLING', run_id: runId };
    }

    case 'POLLING': {
      const result = await awaitCompletion(phase.run_id, config, {
        fetchRun: (id) => deps.client.getRun(id),
        observe: deps.observe,
        now: deps.now,
        sleep: deps.sleep,
      });
      if (result.kind === 'timed_out') {
        return {
          phase: 'DONE',
          outcome: {
            kind: 'verdict',
            run_id: phase.run_id,
            verdict: { kind: 'timed_out', elapsed_seconds: result.elapsed_seconds },
            run: result.last,
            jobs: [],
          },
        };
      }
      return { phase: 'EVALUATING', run_id: phase.run_id, run: result.run };
    }

    case 'EVALUATING': {
      const jobs = await deps.client.listJobs(phase.run_id);
      const verdict = evaluate(jobs, config.required_jobs, phase.run.conclusion, {
        ignore_run_conclusion: config.ignore_run_conclusion,
      });
      return {
        phase: 'DONE',
        outcome: { kind: 'verdict', run_id: phase.run_id, verdict, run: phase.run, jobs },
      };
    }

    case 'DONE':
      return phase;
  }
}

/**
 * Drives the state machine to DONE. Errors thrown by any phase end the
 * run as a failure outcome; nothing is retried.
 */
export async function verify(config: VerifyConfig, deps: VerifyDeps): Promise<Outcome> {
  let phase: Phase = { phase: 'RESOLVING' };

  try {
    for (;;) {
      if (phase.phase === 'DONE') {
        return phase.outcome;
      }
      const next: Phase = await step(phase, config, deps);
      deps.logger.debug(`phase ${phase.phase} -> ${next.phase}`);
      phase = next;
    }
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    deps.logger.debug(`phase ${phase.phase} failed: ${error.name}: ${error.message}`);
    return { kind: 'failure', error };
  }
}
