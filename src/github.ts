/**
 * GitHub API Client
 * Layer: infra
 *
 * Provided ports:
 *   - github.findLatestRun
 *   - github.getRun
 *   - github.listJobs
 *
 * Reads workflow runs and jobs from the GitHub Actions REST API.
 * Every failure to reach the API or to parse its answer is thrown as a
 * TransportError; nothing here retries.
 */

import type { Job, RepoRef, RunId, RunSnapshot } from './types';
import { FETCH_TIMEOUT_MS, JOBS_PER_PAGE } from './types';
import { TransportError } from './errors';
import type { Logger } from './logger';
import type { TransportErrorDetails } from './errors';
import { isARealObject, isStringOrNull } from './utils';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

const USER_AGENT = 'ci-run-verify';
const API_VERSION = '2022-11-28';
const SHORT_SHA_LENGTH = 7;

// -----------------------------------------------------------------------------
// Client
// -----------------------------------------------------------------------------

export interface ClientOptions extends RepoRef {
  /** Bearer token, or null for anonymous access */
  token: string | null;
  /** REST API base URL, e.g. https://api.github.com */
  api_url: string;
  /** Receives one debug line per request */
  logger?: Pick<Logger, 'debug'>;
}

export interface ActionsClient {
  /** Newest run for a branch (optionally of one workflow), or null when there is none. */
  findLatestRun(branch: string, workflow: string | null): Promise<RunSnapshot | null>;
  getRun(runId: RunId): Promise<RunSnapshot>;
  /** All jobs of the run's latest attempt, following pagination. */
  listJobs(runId: RunId): Promise<Job[]>;
}

export function createActionsClient(options: ClientOptions): ActionsClient {
  const base = `${options.api_url.replace(/\/+$/, '')}/repos/${encodeURIComponent(
    options.owner,
  )}/${encodeURIComponent(options.repo)}/actions`;
  const get = (url: string): Promise<unknown> => getJson(url, options.token, options.logger);

  return {
    async findLatestRun(branch, workflow) {
      const query = new URLSearchParams({ branch, per_page: '1' });
      const path = workflow ? `/workflows/${encodeURIComponent(workflow)}/runs` : '/runs';
      const url = `${base}${path}?${query.toString()}`;
      const runs = parseRunList(await get(url));
      if (!runs) {
        throw new TransportError(`Failed to parse workflow run list from ${url}`, noStatus(url));
      }
      return runs[0] ?? null;
    },

    async getRun(runId) {
      const url = `${base}/runs/${runId}`;
      const run = parseRunSnapshot(await get(url));
      if (!run) {
        throw new TransportError(`Failed to parse workflow run from ${url}`, noStatus(url));
      }
      return run;
    },

    async listJobs(runId) {
      const jobs: Job[] = [];
      let seen = 0;
      for (let page = 1; ; page++) {
        const query = new URLSearchParams({ per_page: String(JOBS_PER_PAGE), page: String(page) });
        const url = `${base}/runs/${runId}/jobs?${query.toString()}`;
        const parsed = parseJobsPage(await get(url));
        if (!parsed) {
          throw new TransportError(`Failed to parse job list from ${url}`, noStatus(url));
        }
        jobs.push(...parsed.jobs);
        // Count raw entries so skipped malformed jobs do not end paging early
        seen += parsed.entry_count;
        const reachedTotal = parsed.total_count !== null && seen >= parsed.total_count;
        if (parsed.entry_count < JOBS_PER_PAGE || reachedTotal) {
          return jobs;
        }
      }
    },
  };
}

// -----------------------------------------------------------------------------
// Transport
// -----------------------------------------------------------------------------

export function buildHeaders(token: string | null): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'User-Agent': USER_AGENT,
    'X-GitHub-Api-Version': API_VERSION,
  };
  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }
  return headers;
}

/**
 * GETs a URL and returns its decoded JSON body.
 * Throws TransportError on network failure, timeout, non-2xx or invalid JSON.
 */
export async function getJson(
  url: string,
  token: string | null,
  logger?: Pick<Logger, 'debug'>,
): Promise<unknown> {
  logger?.debug(`GET ${url}`);

  // Abort hung requests
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      method: 'GET',
      headers: buildHeaders(token),
    });

    if (!response.ok) {
      const message = await readErrorMessage(response);
      const statusText = response.statusText || 'Unknown error';
      const error = message
        ? `HTTP ${response.status}: ${statusText} - ${message}`
        : `HTTP ${response.status}: ${statusText}`;
      throw new TransportError(error, buildErrorDetails(url, response));
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch {
      throw new TransportError(`Failed to parse JSON response from ${url}`, {
        ...noStatus(url),
        status: response.status,
      });
    }
  } catch (err) {
    if (err instanceof TransportError) {
      throw err;
    }
    if (err instanceof Error && err.name === 'AbortError') {
      throw new TransportError(
        `Request timeout: GitHub API did not respond within ${FETCH_TIMEOUT_MS}ms`,
        noStatus(url),
      );
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new TransportError(`Network error: ${message}`, noStatus(url));
  } finally {
    clearTimeout(timeoutId);
  }
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function noStatus(url: string): TransportErrorDetails {
  return { url, status: null, rate_limit_remaining: null, rate_limit_reset: null };
}

function parseHeaderNumber(headers: Headers, name: string): number | null {
  const value = headers.get(name);
  if (!value) return null;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

async function readErrorMessage(response: Response): Promise<string | null> {
  try {
    const text = (await response.text()).trim();
    if (!text) return null;
    return extractMessage(text);
  } catch {
    return null;
  }
}

function extractMessage(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isARealObject(parsed) && typeof parsed['message'] === 'string') {
      return parsed['message'];
    }
    return text;
  } catch {
    return text;
  }
}

function buildErrorDetails(url: string, response: Response): TransportErrorDetails {
  return {
    url,
    status: response.status,
    rate_limit_remaining: parseHeaderNumber(response.headers, 'x-ratelimit-remaining'),
    rate_limit_reset: parseHeaderNumber(response.headers, 'x-ratelimit-reset'),
  };
}

// -----------------------------------------------------------------------------
// Parsing
// -----------------------------------------------------------------------------

/**
 * Parses a workflow run object into a RunSnapshot.
 * Returns null if `id` or `status` is missing or mistyped.
 */
export function parseRunSnapshot(raw: unknown): RunSnapshot | null {
  if (!isARealObject(raw)) return null;

  const id = raw['id'];
  const status = raw['status'];
  if (typeof id !== 'number' || !Number.isSafeInteger(id) || id <= 0) return null;
  if (typeof status !== 'string') return null;

  const headSha = typeof raw['head_sha'] === 'string' ? raw['head_sha'] : '';

  return {
    id,
    name: optionalString(raw['name']),
    status,
    conclusion: optionalString(raw['conclusion']),
    head_sha: headSha,
    head_revision: headSha.slice(0, SHORT_SHA_LENGTH),
    head_branch: optionalString(raw['head_branch']),
    html_url: typeof raw['html_url'] === 'string' ? raw['html_url'] : '',
  };
}

/**
 * Parses a `{ workflow_runs: [...] }` list, newest first as the API returns it.
 * Invalid entries are skipped; returns null when the envelope itself is wrong.
 */
export function parseRunList(raw: unknown): RunSnapshot[] | null {
  if (!isARealObject(raw) || !Array.isArray(raw['workflow_runs'])) {
    return null;
  }
  const runs: RunSnapshot[] = [];
  for (const entry of raw['workflow_runs']) {
    const run = parseRunSnapshot(entry);
    if (run) runs.push(run);
  }
  return runs;
}

export function parseJob(raw: unknown): Job | null {
  if (!isARealObject(raw)) return null;
  const name = raw['name'];
  const status = raw['status'];
  if (typeof name !== 'string' || typeof status !== 'string') return null;
  return {
    name,
    status,
    conclusion: optionalString(raw['conclusion']),
    html_url: optionalString(raw['html_url']),
  };
}

export interface JobsPage {
  /** null when the API omitted it */
  total_count: number | null;
  /** Entries on the page, including ones that failed to parse */
  entry_count: number;
  jobs: Job[];
}

/**
 * Parses one page of `{ total_count, jobs: [...] }`.
 * Malformed job entries are skipped but still counted in entry_count.
 */
export function parseJobsPage(raw: unknown): JobsPage | null {
  if (!isARealObject(raw) || !Array.isArray(raw['jobs'])) {
    return null;
  }
  const jobs: Job[] = [];
  for (const entry of raw['jobs']) {
    const job = parseJob(entry);
    if (job) jobs.push(job);
  }
  const totalCount = raw['total_count'];
  return {
    total_count: typeof totalCount === 'number' ? totalCount : null,
    entry_count: raw['jobs'].length,
    jobs,
  };
}

function optionalString(value: unknown): string | null {
  return isStringOrNull(value) ? value : null;
}
