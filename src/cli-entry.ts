#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Separate entry file so importing cli.ts never starts a verification.
 *
 * Built as: dist/cli-entry.js (package bin)
 */

import { main } from './cli';
import { EXIT_CODES } from './types';

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('ci-run-verify error:', err);
    process.exitCode = EXIT_CODES.transport;
  },
);
