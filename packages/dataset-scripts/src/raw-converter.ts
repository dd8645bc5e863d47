/**
 * Raw-to-regional dataset converter
 *
 * Maps scraped rows (fasting date plus a 12-hour Parana window) to Ekadashi
 * entries whose Parana instants carry the region's UTC offset, and wraps
 * them in a dataset document.
 *
 * No `fasting_start` is emitted: the scraped source has no timing for it.
 */

import moment from 'moment-timezone';
import { rawDatasetSchema, type DatasetDocument, type EkadashiEntry, type RawEntry } from '@ekadashi/contracts';
import type { Logger } from '@ekadashi/logger';
import { DEFAULT_DST_RULES, toIsoTimestamp, type DstRules } from '@ekadashi/timing';
import type { Config } from './config/index.js';
import { readJsonFile, validateDocument, writeJsonFile } from './io.js';

export type RawConversionConfig = Config['rawConversion'];

/** Fields of a raw row converted to instants */
type ParanaField = 'parana_start' | 'parana_end';

/**
 * Converts raw rows to entries, in input order, with ids 1..N.
 * A time that cannot be converted becomes `null` and is logged; the
 * remaining fields and rows are unaffected.
 */
export function convertRawEntries(
  entries: RawEntry[],
  region: string,
  logger: Logger,
  rules: DstRules = DEFAULT_DST_RULES
): EkadashiEntry[] {
  return entries.map((item, index) => {
    const convert = (field: ParanaField): string | null => {
      const iso = toIsoTimestamp(item.parana_date, item[field], region, rules);
      if (iso === null) {
        logger.warn(`Could not convert ${field} for ${item.name}`, {
          entry: item.name,
          field,
          date: item.parana_date,
          time: item[field],
        });
      }
      return iso;
    };

    return {
      id: index + 1,
      name: { en: item.name },
      timing: {
        [region]: {
          date: item.fasting_date,
          parana_start: convert('parana_start'),
          parana_end: convert('parana_end'),
        },
      },
    };
  });
}

/**
 * Builds the full document for a run. `now` supplies the generation date.
 */
export function buildRawDocument(
  entries: RawEntry[],
  config: RawConversionConfig,
  logger: Logger,
  now: Date = new Date(),
  rules: DstRules = DEFAULT_DST_RULES
): DatasetDocument {
  return {
    version: config.version,
    generated: moment(now).format('YYYY-MM-DD'),
    source: config.source,
    year: config.year,
    notes: config.notes,
    ekadashis: convertRawEntries(entries, config.region, logger, rules),
  };
}

/**
 * Reads the raw rows, converts them and writes the document.
 *
 * @throws DatasetReadError, DatasetValidationError or DatasetWriteError;
 * nothing is written unless the whole document was built
 */
export function runRawConversion(config: RawConversionConfig, logger: Logger, now: Date = new Date()): DatasetDocument {
  const entries = validateDocument(rawDatasetSchema, readJsonFile(config.inputPath), config.inputPath);
  logger.debug(`Loaded ${entries.length} raw entries`, { path: config.inputPath, count: entries.length });

  const document = buildRawDocument(entries, config, logger, now);
  writeJsonFile(config.outputPath, document);

  logger.info(`Created ${config.outputPath}`, { count: document.ekadashis.length });
  return document;
}
