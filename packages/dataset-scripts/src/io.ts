/**
 * JSON document I/O
 *
 * One blocking read and one blocking write per run. Writes go to a sibling
 * temp file that is renamed over the target, so a failed run never leaves a
 * partial document behind and an existing output stays untouched.
 */

import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { z } from 'zod';
import { DatasetReadError, DatasetValidationError, DatasetWriteError, formatIssues } from '@ekadashi/contracts';

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads and parses a JSON file.
 *
 * @throws DatasetReadError when the file is missing, unreadable or not JSON
 */
export function readJsonFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new DatasetReadError(`Cannot read ${path}`, { path, reason: reasonOf(error) });
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DatasetReadError(`Malformed JSON in ${path}`, { path, reason: reasonOf(error) });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copies `value` with object keys in the order they appear in `template`,
 * at every depth. Keys the template lacks follow in their own order. Array
 * items are matched by position, falling back to the template's first item.
 *
 * Schema parsing lists declared keys first; this puts a transformed document
 * back in the layout of the file it was read from.
 */
export function orderKeysLike(value: unknown, template: unknown): unknown {
  if (Array.isArray(value)) {
    const templates: unknown[] = Array.isArray(template) ? template : [];
    return value.map((item, index) => orderKeysLike(item, templates[index] ?? templates[0]));
  }

  if (!isRecord(value)) {
    return value;
  }

  const shape: Record<string, unknown> = isRecord(template) ? template : {};
  const ordered: Record<string, unknown> = {};
  for (const key of Object.keys(shape)) {
    if (Object.hasOwn(value, key)) {
      ordered[key] = orderKeysLike(value[key], shape[key]);
    }
  }
  for (const [key, item] of Object.entries(value)) {
    if (!Object.hasOwn(ordered, key)) {
      ordered[key] = orderKeysLike(item, undefined);
    }
  }

  return ordered;
}

/**
 * Serializes a document with 2-space indentation. Non-ASCII characters are
 * written literally.
 */
export function serializeDocument(document: unknown): string {
  return JSON.stringify(document, null, 2);
}

/**
 * Writes a document as pretty-printed JSON, creating parent directories.
 *
 * @throws DatasetWriteError when the file cannot be written
 */
export function writeJsonFile(path: string, document: unknown): void {
  const tempPath = `${path}.${process.pid}.tmp`;

  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(tempPath, serializeDocument(document), 'utf-8');
    renameSync(tempPath, path);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw new DatasetWriteError(`Cannot write ${path}`, { path, reason: reasonOf(error) });
  }
}

/**
 * Validates a parsed document against a schema.
 *
 * @throws DatasetValidationError listing every issue
 */
export function validateDocument<S extends z.ZodTypeAny>(schema: S, input: unknown, path: string): z.output<S> {
  const result = schema.safeParse(input);

  if (!result.success) {
    throw new DatasetValidationError(`Invalid dataset ${path}`, {
      issues: formatIssues(result.error),
      path,
    });
  }

  return result.data;
}
