/**
 * Main Entry
 * Layer: action
 *
 * GitHub Action entry point (action.yml `runs.main`).
 *
 * Built as: dist/main.js
 */

import { run } from './action';

void run();
