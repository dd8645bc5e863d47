/**
 * Shared entry-point harness for the bin/ scripts
 *
 * - Builds config and logger from the environment
 * - Logs structural failures and exits with code 1
 * - Exit codes: 0 = success, 1 = failure or issues found
 */

import { attachGlobalHandlers, createChildLogger, createLogger, describeError, exitAfterFlush } from '@ekadashi/logger';
import type { Logger } from '@ekadashi/logger';
import { loadConfig, type Config } from './config/index.js';

export interface ScriptContext {
  config: Config;
  logger: Logger;
}

export interface ScriptLoggers {
  /** Owns the transports; flushed before exit */
  root: Logger;
  /** Tags every entry with the script name */
  logger: Logger;
}

export function createScriptLoggers(name: string, logging: Config['logging']): ScriptLoggers {
  const root = createLogger({
    level: logging.level,
    json: logging.format === 'json',
    filePath: logging.filePath,
  });

  return { root, logger: createChildLogger(root, { component: name }) };
}

/**
 * Runs one script body. The body returns the exit code; a thrown error is
 * logged with its code and data and ends the process with code 1.
 */
export async function runScript(
  name: string,
  body: (context: ScriptContext) => number | Promise<number>
): Promise<void> {
  const config = loadConfig(process.env);
  const { root: rootLogger, logger } = createScriptLoggers(name, config.logging);
  attachGlobalHandlers(rootLogger);

  let exitCode: number;
  try {
    exitCode = await body({ config, logger });
  } catch (error) {
    logger.error(`${name} failed`, { error: describeError(error) });
    exitCode = 1;
  }

  if (exitCode !== 0) {
    exitAfterFlush(rootLogger, exitCode);
  }
}
