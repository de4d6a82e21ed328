/**
 * Job Evaluator
 * Layer: core
 *
 * Provided ports:
 *   - evaluator.evaluate
 *
 * Pure classification of a completed run against the required job names.
 */

import type { FailedJob, Job, Verdict } from './types';

export const SUCCESS_CONCLUSION = 'success';

export interface EvaluateOptions {
  /** Pass once every required job succeeded, whatever the run-level conclusion */
  ignore_run_conclusion?: boolean;
}

/**
 * Builds a name → job lookup. A later duplicate replaces an earlier one.
 */
export function indexJobs(jobs: readonly Job[]): Map<string, Job> {
  const byName = new Map<string, Job>();
  for (const job of jobs) {
    byName.set(job.name, job);
  }
  return byName;
}

/**
 * Required names with no job of that name, in required order.
 */
export function findMissing(required: readonly string[], jobs: readonly Job[]): string[] {
  const byName = indexJobs(jobs);
  return required.filter((name) => !byName.has(name));
}

/**
 * Required jobs that are present but did not conclude success, in required order.
 */
export function findFailed(required: readonly string[], jobs: readonly Job[]): FailedJob[] {
  const byName = indexJobs(jobs);
  const failed: FailedJob[] = [];
  for (const name of required) {
    const job = byName.get(name);
    if (job && job.conclusion !== SUCCESS_CONCLUSION) {
      failed.push([name, job.conclusion]);
    }
  }
  return failed;
}

/**
 * Classifies a completed run.
 *
 * Precedence: missing_jobs > failed_jobs > run_not_successful > success.
 */
export function evaluate(
  jobs: readonly Job[],
  required: readonly string[],
  runConclusion: string | null,
  options: EvaluateOptions = {},
): Verdict {
  const missing = findMissing(required, jobs);
  if (missing.length > 0) {
    return { kind: 'missing_jobs', names: missing };
  }

  const failed = findFailed(required, jobs);
  if (failed.length > 0) {
    return { kind: 'failed_jobs', conclusions: failed };
  }

  if (!options.ignore_run_conclusion && runConclusion !== SUCCESS_CONCLUSION) {
    return { kind: 'run_not_successful', conclusion: runConclusion };
  }

  return { kind: 'success' };
}
