#!/usr/bin/env tsx

/**
 * CLI entry point
 */

import { start } from './start.js';

start(process.argv).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error('signalcheck failed:', error);
    process.exitCode = 1;
  }
);
