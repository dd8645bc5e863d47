/**
 * @fileoverview Type definitions for the dataset tools logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity of messages that will be logged.
 * - 'error': fatal problems that abort a run
 * - 'warn': recoverable problems (a field that could not be converted)
 * - 'info': progress of a run (kept, corrected, removed entries)
 * - 'debug': detailed tracing
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['LOG_FORMAT'] === 'json',
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs as JSON lines instead of colorized text.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for a file transport, written in addition to the console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Suppress all output. Used by tests that only spy on log calls.
   * @default false
   */
  silent?: boolean;
}

/**
 * Child logger context fields, included in every entry the child logs.
 *
 * @example
 * ```typescript
 * const log = logger.child({ component: 'corrector', region: 'IST' });
 * log.info('Kept 2026'); // includes component and region
 * ```
 */
export interface ChildLoggerContext {
  /** Component identifier (e.g. 'raw-converter', 'corrector') */
  component?: string;

  /** Timezone region label the component works on */
  region?: string;

  /** Allow any additional context fields */
  [key: string]: unknown;
}

/**
 * Re-export of Winston's Logger type.
 */
export type Logger = WinstonLogger;
