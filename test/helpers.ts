/**
 * Shared test helpers.
 */

import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { Job, RunSnapshot, VerifyConfig } from '../src/types';
import type { ActionsClient } from '../src/github';
import type { Logger } from '../src/logger';

export function makeRun(overrides: Partial<RunSnapshot> = {}): RunSnapshot {
  return {
    id: 7001,
    name: 'CI',
    status: 'completed',
    conclusion: 'success',
    head_sha: '3f9c2a71d0b84e6f5a1c2d3e4f5a6b7c8d9e0f12',
    head_revision: '3f9c2a7',
    head_branch: 'main',
    html_url: 'https://github.com/example-org/example-repo/actions/runs/7001',
    ...overrides,
  };
}

export function makeJob(
  name: string,
  conclusion: string | null = 'success',
  status = 'completed',
): Job {
  return { name, status, conclusion, html_url: null };
}

export function makeConfig(overrides: Partial<VerifyConfig> = {}): VerifyConfig {
  return {
    owner: 'example-org',
    repo: 'example-repo',
    token: null,
    api_url: 'https://api.github.com',
    selector: { kind: 'run_id', runId: 7001 },
    workflow: null,
    required_jobs: ['build'],
    timeout_seconds: 60,
    poll_interval_seconds: 20,
    ignore_run_conclusion: false,
    ...overrides,
  };
}

export interface FakeClient extends ActionsClient {
  findLatestRun: Mock<ActionsClient['findLatestRun']>;
  getRun: Mock<ActionsClient['getRun']>;
  listJobs: Mock<ActionsClient['listJobs']>;
}

export function makeClient(): FakeClient {
  return {
    findLatestRun: vi.fn<ActionsClient['findLatestRun']>(),
    getRun: vi.fn<ActionsClient['getRun']>(),
    listJobs: vi.fn<ActionsClient['listJobs']>(),
  };
}

export interface FakeLogger extends Logger {
  debug: Mock<(message: string) => void>;
  info: Mock<(message: string) => void>;
  warning: Mock<(message: string) => void>;
  error: Mock<(message: string) => void>;
}

export function makeLogger(): FakeLogger {
  return {
    debug: vi.fn<(message: string) => void>(),
    info: vi.fn<(message: string) => void>(),
    warning: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
  };
}

/**
 * Clock whose time advances only when sleep is called.
 */
export function makeFakeClock(startMs = 1_700_000_000_000): {
  now: () => number;
  sleep: Mock<(ms: number) => Promise<void>>;
} {
  let current = startMs;
  return {
    now: () => current,
    sleep: vi.fn(async (ms: number): Promise<void> => {
      current += ms;
    }),
  };
}
