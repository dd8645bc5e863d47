/**
 * Correction tables: event name to a literal replacement timing record
 * for one region.
 */

import { z } from 'zod';
import { CALENDAR_DATE_PATTERN, ISO_INSTANT_PATTERN } from '@ekadashi/contracts';
import { readJsonFile, validateDocument } from './io.js';

export const correctionRecordSchema = z.object({
  date: z.string().regex(CALENDAR_DATE_PATTERN),
  fasting_start: z.string().regex(ISO_INSTANT_PATTERN),
  parana_start: z.string().regex(ISO_INSTANT_PATTERN),
  parana_end: z.string().regex(ISO_INSTANT_PATTERN),
});

export const correctionTableSchema = z.record(z.string(), correctionRecordSchema);

export type CorrectionRecord = z.infer<typeof correctionRecordSchema>;
export type CorrectionTable = z.infer<typeof correctionTableSchema>;

/**
 * Reads and validates a correction table.
 *
 * @throws DatasetReadError when the file cannot be read
 * @throws DatasetValidationError when an entry is malformed
 */
export function loadCorrectionTable(path: string): CorrectionTable {
  return validateDocument(correctionTableSchema, readJsonFile(path), path);
}
