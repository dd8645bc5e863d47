/**
 * Configuration loading
 */

import { fileURLToPath } from 'node:url';
import { formatIssues } from '@ekadashi/contracts';
import type { Logger } from '@ekadashi/logger';
import { configSchema, envMapping, type Config } from './schema.js';

/**
 * Correction table shipped with the package
 */
export const DEFAULT_CORRECTIONS_PATH = fileURLToPath(
  new URL('../../config/ist-corrections-2026.json', import.meta.url)
);

/**
 * Load configuration from environment and defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: Record<string, unknown> = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = formatIssues(result.error);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  if (logger) {
    logger.debug('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  let current = obj;

  for (let i = 0; i < keys.length - 1; i++) {
    const key = keys[i];
    if (!key) continue;
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  const lastKey = keys[keys.length - 1];
  if (lastKey) {
    current[lastKey] = value;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    logging: {
      level: config.logging.level,
      format: config.logging.format,
    },
    rawConversion: `${config.rawConversion.inputPath} -> ${config.rawConversion.outputPath}`,
    correction: `${config.correction.inputPath} -> ${config.correction.outputPath}`,
    targetYear: config.correction.targetYear,
  };
}

// Re-export types
export type { Config } from './schema.js';
export { configSchema, envMapping } from './schema.js';
