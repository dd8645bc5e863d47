/**
 * @fileoverview Public API exports for @ekadashi/logger
 * Structured logging and fatal error handling for the dataset scripts.
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers, describeError, exitAfterFlush } from './errorHandler.js';

export { standardFields, prettyPrint, renderLine } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
