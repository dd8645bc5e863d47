/**
 * @fileoverview Ekadashi dataset document shapes.
 *
 * Schemas only cover the fields the scripts read or write. Every object is
 * `passthrough`, so descriptions, stories and other fields of a document
 * survive a transform untouched.
 *
 * @module @ekadashi/contracts/dataset
 */

import { z, type ZodError } from 'zod';

/** `YYYY-MM-DD` calendar date. */
export const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** `YYYY-MM-DDTHH:MM:SS±HH:MM` instant with a fixed-width offset. */
export const ISO_INSTANT_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}[+-]\d{2}:\d{2}$/;

/**
 * One row of the scraped raw dataset. The Parana date and times may be null
 * or left out; the converter turns those into "no value" instants.
 *
 * @example
 * ```json
 * { "name": "Kamada Ekadashi", "fasting_date": "2026-03-29",
 *   "parana_date": "2026-03-30", "parana_start": "06:52 AM", "parana_end": "09:14 AM" }
 * ```
 */
export const rawEntrySchema = z.object({
  name: z.string(),
  fasting_date: z.string(),
  parana_date: z.string().nullable().optional(),
  parana_start: z.string().nullable().optional(),
  parana_end: z.string().nullable().optional(),
});

export const rawDatasetSchema = z.array(rawEntrySchema);

export type RawEntry = z.infer<typeof rawEntrySchema>;

/**
 * Timing for one region. Instants are `null` where the raw converter could
 * not build one; `fasting_start` is absent from raw converter output.
 */
export const timingRecordSchema = z
  .object({
    date: z.string(),
    fasting_start: z.string().nullable().optional(),
    parana_start: z.string().nullable().optional(),
    parana_end: z.string().nullable().optional(),
  })
  .passthrough();

export type TimingRecord = z.infer<typeof timingRecordSchema>;

/** Region label (PST, IST, ...) to timing. */
export const timingBlockSchema = z.record(z.string(), timingRecordSchema);

export type TimingBlock = z.infer<typeof timingBlockSchema>;

export const ekadashiEntrySchema = z
  .object({
    id: z.number().int(),
    name: z.record(z.string(), z.string()),
    timing: timingBlockSchema,
  })
  .passthrough();

export type EkadashiEntry = z.infer<typeof ekadashiEntrySchema>;

export const dateRangeSchema = z.object({
  start: z.string(),
  end: z.string(),
});

export type DateRange = z.infer<typeof dateRangeSchema>;

export const timezoneMetadataSchema = z
  .object({
    cities: z.array(z.string()),
  })
  .passthrough();

export type TimezoneMetadata = z.infer<typeof timezoneMetadataSchema>;

/**
 * Wrapper document shared by the raw converter output and the multi-region
 * dataset the corrector reads.
 */
export const datasetDocumentSchema = z
  .object({
    version: z.string().optional(),
    generated: z.string().optional(),
    source: z.string().optional(),
    year: z.number().int().optional(),
    notes: z.string().optional(),
    date_range: dateRangeSchema.optional(),
    timezones: z.record(z.string(), timezoneMetadataSchema).optional(),
    ekadashis: z.array(ekadashiEntrySchema),
  })
  .passthrough();

export type DatasetDocument = z.infer<typeof datasetDocumentSchema>;

/**
 * Flattens zod issues into `path: message` lines.
 */
export function formatIssues(error: ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
