/**
 * Boundary types for ci-run-verify
 *
 * These types define the contracts between the resolver, poller,
 * evaluator and reporter.
 */

// -----------------------------------------------------------------------------
// RunSnapshot
// One observation of GET /repos/{owner}/{repo}/actions/runs/{run_id}
// -----------------------------------------------------------------------------

export type RunId = number;

export interface RunSnapshot {
  /** Numeric workflow run id */
  id: RunId;
  /** Workflow name as shown in the Actions UI */
  name: string | null;
  /** queued | in_progress | completed | waiting | requested | pending */
  status: string;
  /** success | failure | cancelled | skipped | timed_out | ... (null until completed) */
  conclusion: string | null;
  /** Full commit SHA the run was triggered for */
  head_sha: string;
  /** First 7 characters of head_sha */
  head_revision: string;
  /** Branch the run was triggered on */
  head_branch: string | null;
  /** Web URL of the run (empty when the API omitted it) */
  html_url: string;
}

// -----------------------------------------------------------------------------
// Job
// One entry from GET /repos/{owner}/{repo}/actions/runs/{run_id}/jobs
// -----------------------------------------------------------------------------

export interface Job {
  name: string;
  status: string;
  conclusion: string | null;
  html_url: string | null;
}

// -----------------------------------------------------------------------------
// Run selection
// -----------------------------------------------------------------------------

export type RunSelector = { kind: 'run_id'; runId: RunId } | { kind: 'branch'; branch: string };

// -----------------------------------------------------------------------------
// Verdict
// Single classified result of a verification; computed once, never revised
// -----------------------------------------------------------------------------

export type Verdict =
  | { kind: 'success' }
  | { kind: 'missing_jobs'; names: string[] }
  | { kind: 'failed_jobs'; conclusions: FailedJob[] }
  | { kind: 'run_not_successful'; conclusion: string | null }
  | { kind: 'timed_out'; elapsed_seconds: number };

export type VerdictKind = Verdict['kind'];

/** A required job that did not conclude success, in required order */
export type FailedJob = [name: string, conclusion: string | null];

// -----------------------------------------------------------------------------
// Outcome
// What the reporter receives: a verdict with its context, or a fatal failure
// -----------------------------------------------------------------------------

export interface VerdictOutcome {
  kind: 'verdict';
  run_id: RunId;
  verdict: Verdict;
  /** Last observed snapshot (terminal unless the verdict is timed_out) */
  run: RunSnapshot | null;
  /** Jobs of the completed run (empty when timed out) */
  jobs: Job[];
}

export interface FailureOutcome {
  kind: 'failure';
  error: Error;
}

export type Outcome = VerdictOutcome | FailureOutcome;

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export interface RepoRef {
  owner: string;
  repo: string;
}

export interface VerifyConfig extends RepoRef {
  /** GitHub token (null for anonymous requests) */
  token: string | null;
  /** REST API base URL without trailing slash */
  api_url: string;
  selector: RunSelector;
  /** Restrict branch lookup to one workflow (file name or numeric id) */
  workflow: string | null;
  required_jobs: readonly string[];
  timeout_seconds: number;
  poll_interval_seconds: number;
  /** Skip the run-level conclusion check once every required job passed */
  ignore_run_conclusion: boolean;
}

// -----------------------------------------------------------------------------
// Progress observation
// -----------------------------------------------------------------------------

export interface PollObservation {
  run_id: RunId;
  status: string;
  conclusion: string | null;
  elapsed_seconds: number;
}

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const DEFAULT_REQUIRED_JOBS: readonly string[] = [
  'Gates (ubuntu-latest)',
  'Gates (windows-latest)',
  'Security Audit',
  'Clippy (annotated)',
];

export const DEFAULT_TIMEOUT_SECONDS = 1800;
export const DEFAULT_POLL_INTERVAL_SECONDS = 20;
export const DEFAULT_API_URL = 'https://api.github.com';

/** Environment variables checked for a token, first non-empty wins */
export const TOKEN_ENV_VARS = ['GITHUB_TOKEN', 'GH_TOKEN'] as const;

/** Timeout for fetch requests to GitHub API (milliseconds) */
export const FETCH_TIMEOUT_MS = 10000;

/** Jobs requested per page when listing a run's jobs (API maximum) */
export const JOBS_PER_PAGE = 100;

export const EXIT_CODES = {
  success: 0,
  not_green: 1,
  missing_jobs: 2,
  timed_out: 3,
  not_found: 4,
  transport: 5,
  usage: 64,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
