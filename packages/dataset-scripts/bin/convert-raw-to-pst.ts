#!/usr/bin/env node

/**
 * convert-raw-to-pst - Build the PST dataset from scraped Parana times
 *
 * Reads ekadashi_data_pst_2026_raw.json, resolves each Parana time's UTC
 * offset (PST/PDT) and writes assets/ekadashi_data_pst_2026.json.
 *
 * ENVIRONMENT:
 *   LOG_LEVEL   error | warn | info | debug (default: info)
 *   LOG_FORMAT  json | pretty (default: pretty)
 *   LOG_FILE    optional log file path
 *
 * EXIT CODES:
 *   0 - Document written
 *   1 - Input missing or malformed, or output could not be written
 */

import { runScript } from '../src/cli.js';
import { runRawConversion } from '../src/raw-converter.js';

runScript('raw-converter', ({ config, logger }) => {
  runRawConversion(config.rawConversion, logger);
  return 0;
}).catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(2);
});
