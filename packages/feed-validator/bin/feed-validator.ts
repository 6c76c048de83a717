#!/usr/bin/env tsx
/**
 * Feed Validator CLI Entry Point
 *
 * @module feed-validator-cli
 */

import { EXIT_CODES, runCli } from '../src/cli/program.js';

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(EXIT_CODES.ERRORS);
  });
