/**
 * Dataset verifier
 *
 * Read-only checks of a finished dataset against the document invariants:
 * contiguous 1-based ids, per-region timing present with a calendar date,
 * offset-qualified instants, Parana start before end and, optionally, every
 * date inside one year.
 */

import {
  CALENDAR_DATE_PATTERN,
  ISO_INSTANT_PATTERN,
  datasetDocumentSchema,
  type DatasetDocument,
  type TimingRecord,
} from '@ekadashi/contracts';
import type { Logger } from '@ekadashi/logger';
import type { Config } from './config/index.js';
import { readJsonFile, validateDocument } from './io.js';

export type VerificationConfig = Config['verification'];

export interface VerifyOptions {
  /** Regions every entry must carry timing for */
  regions: string[];
  /** When set, every region date must start with this year */
  targetYear?: number;
}

export type IssueSeverity = 'error' | 'warning';

export interface VerificationIssue {
  severity: IssueSeverity;
  id: number;
  name: string;
  region?: string;
  message: string;
}

export interface VerificationReport {
  checked: number;
  errors: number;
  warnings: number;
  issues: VerificationIssue[];
  ok: boolean;
}

const INSTANT_FIELDS = ['fasting_start', 'parana_start', 'parana_end'] as const;

function checkTiming(timing: TimingRecord, options: VerifyOptions): Array<[IssueSeverity, string]> {
  const found: Array<[IssueSeverity, string]> = [];

  if (!CALENDAR_DATE_PATTERN.test(timing.date)) {
    found.push(['error', `date "${timing.date}" is not YYYY-MM-DD`]);
  } else if (options.targetYear !== undefined && !timing.date.startsWith(String(options.targetYear))) {
    found.push(['error', `date ${timing.date} is outside ${options.targetYear}`]);
  }

  for (const field of INSTANT_FIELDS) {
    const value = timing[field];
    if (value === null) {
      found.push(['warning', `${field} has no value`]);
    } else if (value !== undefined && !ISO_INSTANT_PATTERN.test(value)) {
      found.push(['error', `${field} "${value}" is not an ISO instant with offset`]);
    }
  }

  const { parana_start: start, parana_end: end } = timing;
  if (start && end && ISO_INSTANT_PATTERN.test(start) && ISO_INSTANT_PATTERN.test(end)) {
    if (Date.parse(start) >= Date.parse(end)) {
      found.push(['error', `parana_start ${start} is not before parana_end ${end}`]);
    }
  }

  return found;
}

/**
 * Checks every entry and returns all issues found. `ok` is false when any
 * issue is an error; warnings alone (unconverted times) keep it true.
 */
export function verifyDataset(document: DatasetDocument, options: VerifyOptions): VerificationReport {
  const issues: VerificationIssue[] = [];

  document.ekadashis.forEach((entry, index) => {
    const name = entry.name['en'] ?? '';
    const expectedId = index + 1;

    if (entry.id !== expectedId) {
      issues.push({ severity: 'error', id: entry.id, name, message: `expected id ${expectedId}, found ${entry.id}` });
    }

    for (const region of options.regions) {
      const timing = entry.timing[region];
      if (!timing) {
        issues.push({ severity: 'error', id: entry.id, name, region, message: `missing ${region} timing` });
        continue;
      }

      for (const [severity, message] of checkTiming(timing, options)) {
        issues.push({ severity, id: entry.id, name, region, message });
      }
    }
  });

  const errors = issues.filter((issue) => issue.severity === 'error').length;

  return {
    checked: document.ekadashis.length,
    errors,
    warnings: issues.length - errors,
    issues,
    ok: errors === 0,
  };
}

/**
 * Reads a dataset, verifies it and logs each issue.
 */
export function runVerification(config: VerificationConfig, logger: Logger): VerificationReport {
  const document = validateDocument(datasetDocumentSchema, readJsonFile(config.inputPath), config.inputPath);
  const report = verifyDataset(document, { regions: config.regions, targetYear: config.targetYear });

  for (const issue of report.issues) {
    const line = `ID ${issue.id} (${issue.name})${issue.region ? ` [${issue.region}]` : ''}: ${issue.message}`;
    if (issue.severity === 'error') {
      logger.error(line, { entry: issue.name });
    } else {
      logger.warn(line, { entry: issue.name });
    }
  }

  logger.info(`Verified ${report.checked} Ekadashis in ${config.inputPath}`, {
    errors: report.errors,
    warnings: report.warnings,
  });

  return report;
}
