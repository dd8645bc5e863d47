/**
 * DST boundary table
 *
 * Offset rules are data, not code: each region has a standard offset, a
 * summer offset and, per supported year, the two local wall-clock instants
 * at which summer time starts and ends. The packaged table lives in
 * data/dst-rules.json and is validated once at module initialization.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DatasetValidationError, formatIssues } from '@ekadashi/contracts';

const OFFSET_PATTERN = /^[+-]\d{2}:\d{2}$/;
const LOCAL_INSTANT_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}$/;

export const transitionSchema = z.object({
  /** Local wall-clock instant summer time begins (inclusive) */
  start: z.string().regex(LOCAL_INSTANT_PATTERN),
  /** Local wall-clock instant summer time ends (exclusive) */
  end: z.string().regex(LOCAL_INSTANT_PATTERN),
});

export const regionRulesSchema = z.object({
  label: z.string().optional(),
  standardOffset: z.string().regex(OFFSET_PATTERN),
  summerOffset: z.string().regex(OFFSET_PATTERN),
  transitions: z.record(z.string().regex(/^\d{4}$/), transitionSchema).default({}),
});

export const dstRulesSchema = z.record(z.string(), regionRulesSchema);

export type Transition = z.infer<typeof transitionSchema>;
export type RegionRules = z.infer<typeof regionRulesSchema>;
export type DstRules = z.infer<typeof dstRulesSchema>;

/**
 * Validates an unknown value as a DST rules table.
 *
 * @throws DatasetValidationError when the table is malformed
 */
export function parseDstRules(input: unknown, source = 'dst-rules'): DstRules {
  const result = dstRulesSchema.safeParse(input);

  if (!result.success) {
    throw new DatasetValidationError(`Invalid DST rules in ${source}`, {
      issues: formatIssues(result.error),
      path: source,
    });
  }

  return result.data;
}

/**
 * Reads and validates a DST rules table from a JSON file.
 */
export function loadDstRules(path: string | URL): DstRules {
  return parseDstRules(JSON.parse(readFileSync(path, 'utf-8')), String(path));
}

// Packaged table, loaded once
export const DEFAULT_DST_RULES: DstRules = loadDstRules(new URL('./data/dst-rules.json', import.meta.url));
