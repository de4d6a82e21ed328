/**
 * Result Reporter
 * Layer: infra
 *
 * Provided ports:
 *   - output.report
 *
 * Maps an outcome to console lines, step-summary markdown and the process
 * exit code. Pure apart from writeStepSummary.
 */

import * as fs from 'fs';
import type {
  ExitCode,
  FailureOutcome,
  Job,
  Outcome,
  PollObservation,
  RunId,
  Verdict,
  VerdictKind,
  VerdictOutcome,
} from './types';
import { EXIT_CODES } from './types';
import { NotFoundError, TransportError } from './errors';

// -----------------------------------------------------------------------------
// Port: output.report
// -----------------------------------------------------------------------------

export type ReportedVerdict = VerdictKind | 'not_found' | 'error';

export interface Report {
  /** Machine-readable outcome name */
  verdict: ReportedVerdict;
  exit_code: ExitCode;
  /** Resolved run (null when resolution failed) */
  run_id: RunId | null;
  run_url: string | null;
  /** Console lines, in print order */
  lines: string[];
  /** Markdown for step summary */
  markdown: string;
}

export function report(outcome: Outcome): Report {
  return {
    verdict: reportedVerdict(outcome),
    exit_code: exitCodeFor(outcome),
    run_id: outcome.kind === 'verdict' ? outcome.run_id : null,
    run_url: outcome.kind === 'verdict' && outcome.run?.html_url ? outcome.run.html_url : null,
    lines: renderConsole(outcome),
    markdown: renderMarkdown(outcome),
  };
}

export function reportedVerdict(outcome: Outcome): ReportedVerdict {
  if (outcome.kind === 'verdict') {
    return outcome.verdict.kind;
  }
  return outcome.error instanceof NotFoundError ? 'not_found' : 'error';
}

// -----------------------------------------------------------------------------
// Exit codes
// -----------------------------------------------------------------------------

const VERDICT_EXIT_CODES: Record<VerdictKind, ExitCode> = {
  success: EXIT_CODES.success,
  failed_jobs: EXIT_CODES.not_green,
  run_not_successful: EXIT_CODES.not_green,
  missing_jobs: EXIT_CODES.missing_jobs,
  timed_out: EXIT_CODES.timed_out,
};

export function exitCodeFor(outcome: Outcome): ExitCode {
  if (outcome.kind === 'verdict') {
    return VERDICT_EXIT_CODES[outcome.verdict.kind];
  }
  return outcome.error instanceof NotFoundError ? EXIT_CODES.not_found : EXIT_CODES.transport;
}

// -----------------------------------------------------------------------------
// Console rendering
// -----------------------------------------------------------------------------

/**
 * One line per non-terminal poll.
 */
export function formatProgress(observation: PollObservation): string {
  return (
    `waiting: run_id=${observation.run_id} status=${observation.status} ` +
    `conclusion=${observation.conclusion} elapsed=${observation.elapsed_seconds}s`
  );
}

export function formatJobListing(jobs: readonly Job[]): string[] {
  return jobs.map((job) => `- ${job.name} | ${job.status} | ${job.conclusion}`);
}

export function renderConsole(outcome: Outcome): string[] {
  if (outcome.kind === 'failure') {
    return renderFailure(outcome);
  }

  const { verdict, run, jobs, run_id } = outcome;

  if (verdict.kind === 'timed_out') {
    return [
      `ERROR: timed out waiting for run ${run_id} to complete (waited ${verdict.elapsed_seconds}s).`,
    ];
  }

  const lines: string[] = [];
  if (run) {
    lines.push(
      `run_id=${run.id} sha=${run.head_revision} status=${run.status} conclusion=${run.conclusion}`,
    );
    if (run.html_url) {
      lines.push(`url=${run.html_url}`);
    }
  }

  switch (verdict.kind) {
    case 'success':
      lines.push('OK: CI is green and all required jobs succeeded.');
      break;
    case 'missing_jobs':
      lines.push('ERROR: missing required jobs:');
      for (const name of verdict.names) {
        lines.push(`  - ${name}`);
      }
      lines.push('', 'Jobs seen:', ...formatJobListing(jobs));
      break;
    case 'failed_jobs':
      lines.push('ERROR: CI not green.', 'Required jobs not successful:');
      for (const [name, conclusion] of verdict.conclusions) {
        lines.push(`  - ${name}: ${conclusion}`);
      }
      lines.push('', 'Jobs:', ...formatJobListing(jobs));
      break;
    case 'run_not_successful':
      lines.push('ERROR: CI not green.', '', 'Jobs:', ...formatJobListing(jobs));
      break;
  }

  return lines;
}

function renderFailure(outcome: FailureOutcome): string[] {
  const { error } = outcome;
  if (error instanceof NotFoundError) {
    return [`ERROR: ${error.message}`];
  }
  if (error instanceof TransportError) {
    const lines = [`ERROR: GitHub API request failed: ${error.message}`];
    if (error.details.rate_limit_remaining === 0) {
      lines.push(
        `hint: API rate limit exhausted${formatReset(error.details.rate_limit_reset)}; ` +
          'set GITHUB_TOKEN or GH_TOKEN for a higher limit.',
      );
    }
    return lines;
  }
  return [`ERROR: unexpected failure: ${error.message}`];
}

function formatReset(epoch: number | null): string {
  if (epoch === null) return '';
  return ` until ${new Date(epoch * 1000).toISOString().replace('T', ' ').replace('.000Z', ' UTC')}`;
}

// -----------------------------------------------------------------------------
// Markdown rendering
// -----------------------------------------------------------------------------

const VERDICT_HEADLINES: Record<VerdictKind, string> = {
  success: '✅ CI is green and all required jobs succeeded',
  missing_jobs: '❌ Required jobs missing from the run',
  failed_jobs: '❌ Required jobs did not succeed',
  run_not_successful: '❌ Run did not conclude success',
  timed_out: '⏱️ Timed out waiting for the run to complete',
};

/**
 * Renders markdown summary for $GITHUB_STEP_SUMMARY.
 */
export function renderMarkdown(outcome: Outcome): string {
  const lines: string[] = ['## CI Run Verification', ''];

  if (outcome.kind === 'failure') {
    lines.push(`**Error:** ${escapeCell(outcome.error.message)}`, '');
    return lines.join('\n');
  }

  lines.push(`**Verdict:** ${headline(outcome.verdict)}`, '');
  lines.push(...renderRunTable(outcome));

  if (outcome.jobs.length > 0) {
    lines.push(...renderJobTable(outcome));
  }

  return lines.join('\n');
}

function headline(verdict: Verdict): string {
  const base = VERDICT_HEADLINES[verdict.kind];
  switch (verdict.kind) {
    case 'missing_jobs':
      return `${base}: ${verdict.names.map((n) => `\`${n}\``).join(', ')}`;
    case 'failed_jobs':
      return `${base}: ${verdict.conclusions.map(([n]) => `\`${n}\``).join(', ')}`;
    case 'run_not_successful':
      return `${base} (\`${verdict.conclusion}\`)`;
    case 'timed_out':
      return `${base} (waited ${formatDuration(verdict.elapsed_seconds)})`;
    case 'success':
      return base;
  }
}

function renderRunTable(outcome: VerdictOutcome): string[] {
  const { run, run_id } = outcome;
  const link = run?.html_url ? `[#${run_id}](${run.html_url})` : `#${run_id}`;
  const cells = [
    link,
    run?.name ? escapeCell(run.name) : '—',
    run?.head_branch ? `\`${escapeCell(run.head_branch)}\`` : '—',
    run ? `\`${run.head_revision}\`` : '—',
    run?.status ?? '—',
    run?.conclusion ?? '—',
  ];
  return [
    '| Run | Workflow | Branch | Commit | Status | Conclusion |',
    '|-----|----------|--------|--------|--------|------------|',
    `| ${cells.join(' | ')} |`,
    '',
  ];
}

function renderJobTable(outcome: VerdictOutcome): string[] {
  const lines = ['| Job | Status | Conclusion |', '|-----|--------|------------|'];
  for (const job of outcome.jobs) {
    const name = escapeCell(job.name);
    const cell = job.html_url ? `[${name}](${job.html_url})` : name;
    lines.push(`| ${cell} | ${job.status} | ${job.conclusion ?? '—'} |`);
  }
  lines.push('');
  return lines;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/**
 * Formats duration in human-readable form.
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const secs = seconds % 60;
  if (minutes < 60) {
    return secs > 0 ? `${minutes}m ${secs}s` : `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return mins > 0 ? `${hours}h ${mins}m` : `${hours}h`;
}

// -----------------------------------------------------------------------------
// GitHub Step Summary
// -----------------------------------------------------------------------------

/**
 * Writes markdown to GitHub step summary.
 */
export function writeStepSummary(markdown: string): void {
  const summaryPath = process.env['GITHUB_STEP_SUMMARY'];
  if (summaryPath) {
    fs.appendFileSync(summaryPath, markdown + '\n');
  }
}
