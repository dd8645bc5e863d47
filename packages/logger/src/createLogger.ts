/**
 * @fileoverview Logger factory for the Ekadashi dataset tools.
 * Creates configured Winston logger instances with structured fields and
 * console/file transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * - Structured entries with timestamp, level and message
 * - Console and optional file transports
 * - JSON lines when `json` is set, colorized single lines otherwise
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * logger.info('Created assets/ekadashi_data_pst_2026.json', { count: 24 });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', json: true, filePath: './logs/fix.log' });
 * const log = logger.child({ component: 'corrector' });
 * log.debug('Loaded correction table', { entries: 6 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    silent = false,
  } = config;

  // Standard fields first, then the output format
  const logFormat = format.combine(standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        // Progress lines go to stderr so stdout stays free for piped output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    // File output is never colorized
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: format.combine(standardFields, format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    silent,
    // Fatal errors are handled in errorHandler.ts
    exitOnError: false,
  });
}

/**
 * Creates a child logger whose entries always carry the given context.
 *
 * @example
 * ```typescript
 * const log = createChildLogger(logger, { component: 'raw-converter', region: 'PST' });
 * log.warn('Could not convert parana_end', { entry: 'Kamada Ekadashi' });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
