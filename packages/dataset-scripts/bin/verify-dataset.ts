#!/usr/bin/env node

/**
 * verify-dataset - Check assets/ekadashi_data.json against the dataset invariants
 *
 * Read-only. Logs one line per issue and a summary.
 *
 * EXIT CODES:
 *   0 - No errors (warnings allowed)
 *   1 - Errors found, or the dataset could not be read
 */

import { runScript } from '../src/cli.js';
import { runVerification } from '../src/verify.js';

runScript('verifier', ({ config, logger }) => {
  const report = runVerification(config.verification, logger);
  return report.ok ? 0 : 1;
}).catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(2);
});
