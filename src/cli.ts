/**
 * CLI Entry
 * Layer: action
 *
 * Command-line flow. The returned number is the process exit code;
 * cli-entry.ts applies it.
 */

import * as core from '@actions/core';
import { parseCliArgs, USAGE } from './config';
import type { CliParseResult } from './config';
import { ConfigError } from './errors';
import { EXIT_CODES } from './types';
import { createDeps, runVerification } from './run';
import { selectLogger } from './logger';
import type { Logger } from './logger';

function parseOrUsage(
  argv: string[],
  env: NodeJS.ProcessEnv,
  logger: Logger,
): CliParseResult | null {
  try {
    return parseCliArgs(argv, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      logger.info(USAGE);
      return null;
    }
    throw error;
  }
}

export async function main(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const logger = selectLogger(env);
  const parsed = parseOrUsage(argv, env, logger);
  if (parsed === null) {
    return EXIT_CODES.usage;
  }

  if (parsed.kind === 'help') {
    logger.info(USAGE);
    return EXIT_CODES.success;
  }

  // Mask only under Actions; elsewhere the mask command would echo the token
  if (parsed.config.token && env['GITHUB_ACTIONS'] === 'true') {
    core.setSecret(parsed.config.token);
  }

  const result = await runVerification(parsed.config, createDeps(parsed.config, logger));
  return result.exit_code;
}
