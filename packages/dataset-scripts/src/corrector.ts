/**
 * Dataset corrector and year filter
 *
 * Turns a multi-year, multi-region dataset into a single-year document:
 * 1. date_range set to the target year, one region's city list collapsed
 *    to a single label
 * 2. entries whose region date is outside the target year are dropped
 * 3. named entries get that region's timing replaced by a literal record
 * 4. ids renumbered 1..N in surviving order
 *
 * The year test reads the date as it is in the source document, before any
 * correction is applied.
 */

import { DatasetValidationError, datasetDocumentSchema, type DatasetDocument, type EkadashiEntry } from '@ekadashi/contracts';
import type { Logger } from '@ekadashi/logger';
import { DEFAULT_CORRECTIONS_PATH, type Config } from './config/index.js';
import { loadCorrectionTable, type CorrectionTable } from './corrections.js';
import { orderKeysLike, readJsonFile, validateDocument, writeJsonFile } from './io.js';

export type CorrectionConfig = Config['correction'];

export interface CorrectionOptions {
  /** Year every kept entry must fall in */
  targetYear: number;
  /** Region whose date is filtered on and whose timing is corrected */
  region: string;
  /** Region whose city list is replaced */
  cityRegion: string;
  /** The single city label written for cityRegion */
  cityLabel: string;
  /** English event name to replacement timing for `region` */
  corrections: CorrectionTable;
}

export type EntryAction = 'kept' | 'corrected' | 'removed';

/**
 * What happened to one source entry
 */
export interface EntryOutcome {
  name: string;
  /** Region date in the source document */
  date: string;
  action: EntryAction;
  /** Region date after correction, for corrected entries */
  correctedDate?: string;
}

export interface CorrectionResult {
  document: DatasetDocument;
  outcomes: EntryOutcome[];
  retained: number;
}

/**
 * Applies metadata rewrite, year filter, corrections and renumbering.
 * The source document is not modified.
 *
 * @throws DatasetValidationError if the document has no metadata for cityRegion
 */
export function correctDataset(source: DatasetDocument, options: CorrectionOptions, logger: Logger): CorrectionResult {
  const { targetYear, region, cityRegion, cityLabel, corrections } = options;
  const yearPrefix = String(targetYear);

  const cityMetadata = source.timezones?.[cityRegion];
  if (!cityMetadata) {
    throw new DatasetValidationError(`Dataset has no timezone metadata for ${cityRegion}`, {
      issues: [`timezones.${cityRegion}: Required`],
    });
  }

  const outcomes: EntryOutcome[] = [];
  const kept: EkadashiEntry[] = [];

  for (const entry of source.ekadashis) {
    const name = entry.name['en'] ?? '';
    const date = entry.timing[region]?.date ?? '';

    if (!date.startsWith(yearPrefix)) {
      logger.info(`Removed (not ${yearPrefix}): ${name} (${date})`, { entry: name, reason: 'year mismatch' });
      outcomes.push({ name, date, action: 'removed' });
      continue;
    }

    const correction = corrections[name];
    if (correction) {
      kept.push({ ...entry, timing: { ...entry.timing, [region]: { ...correction } } });
      logger.info(`Corrected: ${name} -> ${correction.date}`, { entry: name, was: date });
      outcomes.push({ name, date, action: 'corrected', correctedDate: correction.date });
    } else {
      kept.push(entry);
      logger.info(`Kept ${yearPrefix}: ${name} (${date})`, { entry: name });
      outcomes.push({ name, date, action: 'kept' });
    }
  }

  const ekadashis = kept.map((entry, index) => ({ ...entry, id: index + 1 }));
  logger.info(`Total Ekadashis retained: ${ekadashis.length}`, { count: ekadashis.length });

  const document: DatasetDocument = {
    ...source,
    date_range: { start: `${yearPrefix}-01-01`, end: `${yearPrefix}-12-31` },
    timezones: { ...source.timezones, [cityRegion]: { ...cityMetadata, cities: [cityLabel] } },
    ekadashis,
  };

  return { document, outcomes, retained: ekadashis.length };
}

/**
 * Reads the source dataset and correction table, corrects the dataset in
 * memory and writes it with a single write, keys in source order.
 *
 * @throws DatasetReadError, DatasetValidationError or DatasetWriteError;
 * the output file is untouched on failure
 */
export function runCorrection(config: CorrectionConfig, logger: Logger): CorrectionResult {
  const input = readJsonFile(config.inputPath);
  const source = validateDocument(datasetDocumentSchema, input, config.inputPath);
  const correctionsPath = config.correctionsPath ?? DEFAULT_CORRECTIONS_PATH;
  const corrections = loadCorrectionTable(correctionsPath);
  logger.debug(`Loaded ${Object.keys(corrections).length} corrections`, { path: correctionsPath });

  const result = correctDataset(
    source,
    {
      targetYear: config.targetYear,
      region: config.region,
      cityRegion: config.cityRegion,
      cityLabel: config.cityLabel,
      corrections,
    },
    logger
  );

  writeJsonFile(config.outputPath, orderKeysLike(result.document, input));
  logger.info(`Created ${config.outputPath}`, { count: result.retained });

  return result;
}
