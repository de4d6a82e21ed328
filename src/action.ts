/**
 * Action handler
 * Layer: action
 *
 * GitHub Action flow. Inputs come from action.yml; the exit code
 * carries the verdict, so core.setFailed (which forces exit code 1) is used
 * only for invalid inputs and unexpected errors.
 *
 * Required ports:
 *   - config.readActionConfig
 *   - run.runVerification
 */

import * as core from '@actions/core';
import { readActionConfig } from './config';
import { createDeps, runVerification } from './run';
import { actionsLogger } from './logger';
import { EXIT_CODES } from './types';

// -----------------------------------------------------------------------------
// Action entry point
// -----------------------------------------------------------------------------

export async function run(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  try {
    const config = readActionConfig(env);

    if (config.token) {
      // Mask token to prevent accidental exposure
      core.setSecret(config.token);
    }

    const result = await runVerification(config, createDeps(config, actionsLogger));
    const firstLine = result.lines.find((line) => line.startsWith('ERROR: '));

    core.setOutput('verdict', result.verdict);
    core.setOutput('exit-code', String(result.exit_code));
    core.setOutput('run-id', result.run_id === null ? '' : String(result.run_id));
    core.setOutput('run-url', result.run_url ?? '');

    if (result.exit_code !== EXIT_CODES.success) {
      core.error(firstLine ? firstLine.slice('ERROR: '.length) : 'CI verification failed');
      process.exitCode = result.exit_code;
    }
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    core.setFailed(err.message);
  }
}
