#!/usr/bin/env node

/**
 * fix-dataset - Reduce the multi-year dataset to 2026 and apply IST corrections
 *
 * Reads assets/ekadashi_data_v2.json, keeps only entries whose IST date is in
 * 2026, collapses the IST city list to ["India"], replaces IST timing for the
 * events listed in config/ist-corrections-2026.json, renumbers ids and writes
 * assets/ekadashi_data.json.
 *
 * EXIT CODES:
 *   0 - Document written
 *   1 - Source missing or malformed, or output could not be written
 */

import { runScript } from '../src/cli.js';
import { runCorrection } from '../src/corrector.js';

runScript('corrector', ({ config, logger }) => {
  runCorrection(config.correction, logger);
  return 0;
}).catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(2);
});
