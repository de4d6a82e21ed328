/**
 * Logger
 * Layer: infra
 *
 * Provided ports:
 *   - logger.actionsLogger
 *   - logger.createConsoleLogger
 *
 * Inside Actions, messages go through @actions/core so they become workflow
 * commands and annotations. A plain terminal gets console output instead:
 * info on stdout, everything else on stderr.
 */

import * as core from '@actions/core';
import { parseBooleanFlag } from './utils';

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warning: (message: string) => void;
  error: (message: string) => void;
}

/** Env var enabling debug lines on the console logger */
export const DEBUG_ENV_VAR = 'CI_RUN_VERIFY_DEBUG';

export const actionsLogger: Logger = {
  debug: (message) => core.debug(message),
  info: (message) => core.info(message),
  warning: (message) => core.warning(message),
  error: (message) => core.error(message),
};

export function createConsoleLogger(verbose: boolean): Logger {
  return {
    debug: (message) => {
      if (verbose) console.error(`debug: ${message}`);
    },
    info: (message) => console.log(message),
    warning: (message) => console.error(`warning: ${message}`),
    error: (message) => console.error(`error: ${message}`),
  };
}

/**
 * Picks the logger for the environment the process runs in.
 */
export function selectLogger(env: Record<string, string | undefined>): Logger {
  if (env['GITHUB_ACTIONS'] === 'true') {
    return actionsLogger;
  }
  return createConsoleLogger(parseBooleanFlag(env[DEBUG_ENV_VAR]));
}
