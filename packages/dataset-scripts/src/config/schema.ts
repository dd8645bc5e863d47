/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

/**
 * Script configuration schema. File paths are relative to the working
 * directory the scripts are run from.
 */
export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  rawConversion: z
    .object({
      inputPath: z.string().default('ekadashi_data_pst_2026_raw.json'),
      outputPath: z.string().default('assets/ekadashi_data_pst_2026.json'),
      region: z.string().default('PST'),
      version: z.string().default('1.5'),
      source: z.string().default('Drik Panchang (San Jose)'),
      year: z.number().int().default(2026),
      notes: z.string().default('Parana times for San Jose, CA. Includes DST adjustments.'),
    })
    .default({}),

  correction: z
    .object({
      inputPath: z.string().default('assets/ekadashi_data_v2.json'),
      outputPath: z.string().default('assets/ekadashi_data.json'),
      correctionsPath: z.string().optional(),
      targetYear: z.number().int().default(2026),
      region: z.string().default('IST'),
      cityRegion: z.string().default('IST'),
      cityLabel: z.string().default('India'),
    })
    .default({}),

  verification: z
    .object({
      inputPath: z.string().default('assets/ekadashi_data.json'),
      regions: z.array(z.string()).default(['IST', 'PST']),
      targetYear: z.number().int().optional(),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
};
