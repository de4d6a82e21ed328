/**
 * Run Resolver
 * Layer: core
 *
 * Provided ports:
 *   - resolver.resolveRunId
 */

import type { RunId, RunSelector } from './types';
import type { ActionsClient } from './github';
import { NotFoundError } from './errors';
import type { Logger } from './logger';

/**
 * Returns the run to monitor.
 *
 * An explicit run id is returned as-is without touching the API. A branch
 * resolves to its newest run (optionally restricted to one workflow).
 *
 * @throws NotFoundError when the branch has no runs
 */
export async function resolveRunId(
  client: Pick<ActionsClient, 'findLatestRun'>,
  selector: RunSelector,
  workflow: string | null = null,
  logger?: Pick<Logger, 'debug'>,
): Promise<RunId> {
  if (selector.kind === 'run_id') {
    return selector.runId;
  }

  const run = await client.findLatestRun(selector.branch, workflow);
  if (!run) {
    const scope = workflow ? ` in workflow '${workflow}'` : '';
    throw new NotFoundError(`No workflow runs found for branch '${selector.branch}'${scope}.`);
  }

  logger?.debug(`Resolved branch '${selector.branch}' to run ${run.id} (${run.html_url})`);
  return run.id;
}
