/**
 * @fileoverview Custom Winston formats for the dataset tools logger.
 */

import { format } from 'winston';

/**
 * Fields printed first, in this order, by the pretty format.
 */
const CONTEXT_FIELDS = ['component', 'region', 'entry'] as const;

/**
 * Fields Winston manages itself; never echoed as key=value pairs.
 */
const INTERNAL_FIELDS = ['level', 'message', 'timestamp', 'stack', 'splat'];

/**
 * Winston format that adds an ISO 8601 timestamp and expands Error objects
 * into message and stack.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Renders one log entry as a single human-readable line.
 *
 * @example
 * ```typescript
 * renderLine({ level: 'info', message: 'Kept 2026', timestamp: 'T', component: 'corrector', count: 3 });
 * // '[T] info: Kept 2026 component=corrector count=3'
 * ```
 */
export function renderLine(info: Record<string, unknown>): string {
  const context: string[] = [];

  for (const field of CONTEXT_FIELDS) {
    const value = info[field];
    if (value !== undefined && value !== null && value !== '') {
      context.push(`${field}=${String(value)}`);
    }
  }

  for (const [key, value] of Object.entries(info)) {
    if (INTERNAL_FIELDS.includes(key) || (CONTEXT_FIELDS as readonly string[]).includes(key)) {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const baseMsg = `[${String(info['timestamp'])}] ${String(info['level'])}: ${String(info['message'])}${contextStr}`;

  // Stack trace on its own lines for errors
  const stack = info['stack'];
  if (typeof stack === 'string') {
    return `${baseMsg}\n${stack}`;
  }

  return baseMsg;
}

/**
 * Winston format for human-readable colorized output.
 *
 * @example
 * ```typescript
 * // [2026-10-19T12:34:56.789Z] info: Corrected: Mohini Ekadashi -> 2026-04-27 component=corrector
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => renderLine(info))
);
