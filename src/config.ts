/**
 * Configuration
 * Layer: boundary
 *
 * Provided ports:
 *   - config.parseCliArgs
 *   - config.readActionConfig
 *
 * Turns command-line arguments or GitHub Action inputs plus the process
 * environment into one immutable VerifyConfig. This is the only module that
 * reads ambient state; the token is read once here and handed on as a value.
 */

import * as core from '@actions/core';
import { parseArgs } from 'util';
import type { RunSelector, VerifyConfig } from './types';
import {
  DEFAULT_API_URL,
  DEFAULT_POLL_INTERVAL_SECONDS,
  DEFAULT_REQUIRED_JOBS,
  DEFAULT_TIMEOUT_SECONDS,
  TOKEN_ENV_VARS,
} from './types';
import { ConfigError } from './errors';
import { parseBooleanFlag, parsePositiveInt } from './utils';

export const USAGE = `Usage: ci-run-verify --owner <owner> --repo <repo> (--branch <name> | --run-id <id>) [options]

Verifies that a GitHub Actions run completed and its required jobs succeeded.

Options:
  --owner <owner>            Repository owner (optional when --repo is owner/name)
  --repo <repo>              Repository name, or owner/name
  --branch <name>            Check the newest run on this branch
  --run-id <id>              Check this run
  --required-job <name>      Job that must conclude success (repeatable)
  --workflow <file|id>       Only consider runs of this workflow when using --branch
  --timeout-secs <n>         Max seconds to wait for completion (default: ${DEFAULT_TIMEOUT_SECONDS})
  --poll-secs <n>            Polling interval in seconds (default: ${DEFAULT_POLL_INTERVAL_SECONDS})
  --ignore-run-conclusion    Pass when all required jobs succeeded even if the run did not
  --api-url <url>            REST API base URL (default: $GITHUB_API_URL or ${DEFAULT_API_URL})
  -h, --help                 Show this help

Environment:
  GITHUB_TOKEN, GH_TOKEN     Token for authenticated requests (first non-empty wins)
  CI_RUN_VERIFY_DEBUG        Print request and phase debug lines to stderr

Exit codes:
  0 green, 1 not green, 2 required job missing, 3 timed out,
  4 no run found, 5 API failure, 64 usage error`;

type Env = Record<string, string | undefined>;

/**
 * Loosely typed options as they arrive from either entry point.
 */
export interface RawOptions {
  owner?: string;
  repo?: string;
  branch?: string;
  run_id?: string;
  required_jobs?: readonly string[];
  workflow?: string;
  timeout_secs?: string;
  poll_secs?: string;
  ignore_run_conclusion?: boolean;
  api_url?: string;
  token?: string;
}

// -----------------------------------------------------------------------------
// Ambient reads
// -----------------------------------------------------------------------------

/**
 * Returns the first non-empty token among GITHUB_TOKEN and GH_TOKEN.
 */
export function readToken(env: Env): string | null {
  for (const name of TOKEN_ENV_VARS) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return null;
}

export function resolveApiUrl(explicit: string | undefined, env: Env): string {
  const url = explicit?.trim() || env['GITHUB_API_URL']?.trim() || DEFAULT_API_URL;
  return url.replace(/\/+$/, '');
}

// -----------------------------------------------------------------------------
// Validation
// -----------------------------------------------------------------------------

/**
 * Trims, drops blanks and duplicates (first occurrence kept), and falls back
 * to the built-in list when nothing remains.
 */
export function normalizeRequiredJobs(names: readonly string[] | undefined): readonly string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of names ?? []) {
    const name = raw.trim();
    if (name && !seen.has(name)) {
      seen.add(name);
      result.push(name);
    }
  }
  return result.length > 0 ? result : DEFAULT_REQUIRED_JOBS;
}

function parseSelector(branch: string | undefined, runId: string | undefined): RunSelector {
  const hasBranch = Boolean(branch?.trim());
  const hasRunId = Boolean(runId?.trim());

  if (hasBranch === hasRunId) {
    throw new ConfigError('Exactly one of --branch or --run-id is required.');
  }
  if (hasRunId) {
    const parsed = parsePositiveInt(runId);
    if (parsed === null) {
      throw new ConfigError(`Invalid run id: '${runId}'. Must be a positive integer.`);
    }
    return { kind: 'run_id', runId: parsed };
  }
  return { kind: 'branch', branch: (branch ?? '').trim() };
}

function parseSeconds(raw: string | undefined, flag: string, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parsePositiveInt(raw);
  if (parsed === null) {
    throw new ConfigError(`Invalid ${flag}: '${raw}'. Must be a positive integer.`);
  }
  return parsed;
}

function splitRepo(owner: string | undefined, repo: string | undefined): [string, string] {
  let o = owner?.trim() ?? '';
  let r = repo?.trim() ?? '';
  const slash = r.indexOf('/');
  if (slash !== -1) {
    if (o) {
      throw new ConfigError(`--repo '${r}' already names an owner; drop --owner.`);
    }
    o = r.slice(0, slash);
    r = r.slice(slash + 1);
  }
  if (!o || !r || r.includes('/')) {
    throw new ConfigError('Both an owner and a repository are required.');
  }
  return [o, r];
}

/**
 * Validates raw options into a VerifyConfig.
 *
 * @throws ConfigError on any invalid or conflicting value
 */
export function buildConfig(raw: RawOptions, env: Env): VerifyConfig {
  const [owner, repo] = splitRepo(raw.owner, raw.repo);
  return {
    owner,
    repo,
    token: raw.token?.trim() || readToken(env),
    api_url: resolveApiUrl(raw.api_url, env),
    selector: parseSelector(raw.branch, raw.run_id),
    workflow: raw.workflow?.trim() || null,
    required_jobs: normalizeRequiredJobs(raw.required_jobs),
    timeout_seconds: parseSeconds(raw.timeout_secs, '--timeout-secs', DEFAULT_TIMEOUT_SECONDS),
    poll_interval_seconds: parseSeconds(raw.poll_secs, '--poll-secs', DEFAULT_POLL_INTERVAL_SECONDS),
    ignore_run_conclusion: raw.ignore_run_conclusion ?? false,
  };
}

// -----------------------------------------------------------------------------
// Port: config.parseCliArgs
// -----------------------------------------------------------------------------

export type CliParseResult = { kind: 'help' } | { kind: 'config'; config: VerifyConfig };

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        owner: { type: 'string' },
        repo: { type: 'string' },
        branch: { type: 'string' },
        'run-id': { type: 'string' },
        'required-job': { type: 'string', multiple: true },
        workflow: { type: 'string' },
        'timeout-secs': { type: 'string' },
        'poll-secs': { type: 'string' },
        'ignore-run-conclusion': { type: 'boolean' },
        'api-url': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * @throws ConfigError on unknown flags, missing values or invalid combinations
 */
export function parseCliArgs(argv: string[], env: Env): CliParseResult {
  const parsed = readArgv(argv);
  const { values } = parsed;
  if (values.help) {
    return { kind: 'help' };
  }

  return {
    kind: 'config',
    config: buildConfig(
      {
        owner: values.owner,
        repo: values.repo,
        branch: values.branch,
        run_id: values['run-id'],
        required_jobs: values['required-job'],
        workflow: values.workflow,
        timeout_secs: values['timeout-secs'],
        poll_secs: values['poll-secs'],
        ignore_run_conclusion: values['ignore-run-conclusion'],
        api_url: values['api-url'],
      },
      env,
    ),
  };
}

// -----------------------------------------------------------------------------
// Port: config.readActionConfig
// -----------------------------------------------------------------------------

/**
 * Reads action inputs. owner/repo fall back to GITHUB_REPOSITORY.
 */
export function readActionConfig(env: Env): VerifyConfig {
  const [envOwner = '', envRepo = ''] = (env['GITHUB_REPOSITORY'] ?? '').split('/');
  const owner = core.getInput('owner');
  const repo = core.getInput('repo');

  return buildConfig(
    {
      owner: owner || (repo.includes('/') ? undefined : envOwner),
      repo: repo || envRepo,
      branch: core.getInput('branch'),
      run_id: core.getInput('run-id'),
      required_jobs: core.getMultilineInput('required-jobs'),
      workflow: core.getInput('workflow'),
      timeout_secs: core.getInput('timeout-secs'),
      poll_secs: core.getInput('poll-secs'),
      ignore_run_conclusion: parseBooleanFlag(core.getInput('ignore-run-conclusion')),
      api_url: core.getInput('api-url'),
      token: core.getInput('token'),
    },
    env,
  );
}
