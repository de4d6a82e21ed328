/**
 * Run handler
 * Layer: action
 *
 * Shared verification flow used by the CLI and the Action entry points:
 * build the client, drive the state machine, print the report.
 */

import type { VerifyConfig } from './types';
import { createActionsClient } from './github';
import { verify } from './verify';
import type { VerifyDeps } from './verify';
import { defaultClock } from './poller';
import { formatProgress, report, writeStepSummary } from './output';
import type { Report } from './output';
import type { Logger } from './logger';

export function describeTarget(config: VerifyConfig): string {
  const target =
    config.selector.kind === 'run_id'
      ? `run ${config.selector.runId}`
      : `latest run on '${config.selector.branch}'${config.workflow ? ` (${config.workflow})` : ''}`;
  return `${config.owner}/${config.repo} ${target}`;
}

export function createDeps(config: VerifyConfig, logger: Logger): VerifyDeps {
  return {
    client: createActionsClient({
      owner: config.owner,
      repo: config.repo,
      token: config.token,
      api_url: config.api_url,
      logger,
    }),
    observe: (observation) => logger.info(formatProgress(observation)),
    logger,
    ...defaultClock(),
  };
}

export async function runVerification(
  config: VerifyConfig,
  deps: VerifyDeps,
): Promise<Report> {
  const { logger } = deps;
  logger.info(`Verifying ${describeTarget(config)}`);
  logger.info(`Required jobs: ${config.required_jobs.join(', ') || '(none)'}`);
  if (!config.token) {
    logger.warning('No GITHUB_TOKEN or GH_TOKEN set; using anonymous API rate limits.');
  }

  const outcome = await verify(config, deps);
  const result = report(outcome);

  for (const line of result.lines) {
    logger.info(line);
  }
  writeStepSummary(result.markdown);

  return result;
}
