/**
 * @fileoverview Main entry point for @ekadashi/contracts.
 *
 * Dataset document schemas, inferred types and the error taxonomy shared by
 * the timing and dataset-scripts packages.
 *
 * @module @ekadashi/contracts
 */

// Dataset documents
export {
  CALENDAR_DATE_PATTERN,
  ISO_INSTANT_PATTERN,
  rawEntrySchema,
  rawDatasetSchema,
  timingRecordSchema,
  timingBlockSchema,
  ekadashiEntrySchema,
  dateRangeSchema,
  timezoneMetadataSchema,
  datasetDocumentSchema,
  formatIssues,
} from './dataset.js';

export type {
  RawEntry,
  TimingRecord,
  TimingBlock,
  EkadashiEntry,
  DateRange,
  TimezoneMetadata,
  DatasetDocument,
} from './dataset.js';

// Error classes and guards
export {
  EkadashiDataError,
  DatasetReadError,
  DatasetValidationError,
  DatasetWriteError,
  UnknownRegionError,
  isEkadashiDataError,
  isDatasetReadError,
  isDatasetValidationError,
  isDatasetWriteError,
  isUnknownRegionError,
} from './errors.js';
