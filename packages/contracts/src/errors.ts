/**
 * @fileoverview Error taxonomy for the Ekadashi dataset tools.
 *
 * Every structural failure a script can hit is a subclass of
 * EkadashiDataError carrying a machine-readable code, a structured data
 * payload and an ISO timestamp. Per-field conversion failures are not errors:
 * they resolve to `null` and are only logged.
 *
 * @module @ekadashi/contracts/errors
 */

/**
 * Base error class for all dataset tool errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new EkadashiDataError('CUSTOM_ERROR', 'Something went wrong', { path: 'in.json' });
 * ```
 */
export class EkadashiDataError extends Error {
  /** Machine-readable error code (e.g. 'DATASET_READ_FAILED'). */
  readonly code: string;

  /** Structured context for debugging. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created. */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'EkadashiDataError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Thrown when an input dataset cannot be read or is not valid JSON.
 *
 * @example
 * ```typescript
 * throw new DatasetReadError('Cannot read assets/ekadashi_data_v2.json', {
 *   path: 'assets/ekadashi_data_v2.json',
 *   reason: 'ENOENT',
 * });
 * ```
 */
export class DatasetReadError extends EkadashiDataError {
  constructor(message: string, data: { path: string; reason?: string; [key: string]: unknown }) {
    super('DATASET_READ_FAILED', message, data);
    this.name = 'DatasetReadError';
  }
}

/**
 * Thrown when a parsed document lacks the fields a script needs.
 * `issues` lists one `path: message` line per problem.
 */
export class DatasetValidationError extends EkadashiDataError {
  readonly issues: string[];

  constructor(message: string, data: { issues: string[]; path?: string; [key: string]: unknown }) {
    super('DATASET_INVALID', message, data);
    this.name = 'DatasetValidationError';
    this.issues = data.issues;
  }
}

/**
 * Thrown when the output document cannot be written.
 */
export class DatasetWriteError extends EkadashiDataError {
  constructor(message: string, data: { path: string; reason?: string; [key: string]: unknown }) {
    super('DATASET_WRITE_FAILED', message, data);
    this.name = 'DatasetWriteError';
  }
}

/**
 * Thrown when a region label has no offset rules.
 */
export class UnknownRegionError extends EkadashiDataError {
  constructor(message: string, data: { region: string; known: string[]; [key: string]: unknown }) {
    super('UNKNOWN_REGION', message, data);
    this.name = 'UnknownRegionError';
  }
}

export function isEkadashiDataError(error: unknown): error is EkadashiDataError {
  return error instanceof EkadashiDataError;
}

export function isDatasetReadError(error: unknown): error is DatasetReadError {
  return error instanceof DatasetReadError;
}

export function isDatasetValidationError(error: unknown): error is DatasetValidationError {
  return error instanceof DatasetValidationError;
}

export function isDatasetWriteError(error: unknown): error is DatasetWriteError {
  return error instanceof DatasetWriteError;
}

export function isUnknownRegionError(error: unknown): error is UnknownRegionError {
  return error instanceof UnknownRegionError;
}
