/**
 * Local date + 12-hour clock time to ISO 8601 with offset
 */

import moment from 'moment-timezone';
import type { DstRules } from './rules.js';
import { DEFAULT_DST_RULES } from './rules.js';
import { DEFAULT_REGION, resolveUtcOffset } from './offset.js';

/**
 * Strict input formats: 4-digit year, 2-digit month and day, 1-2 digit hour
 * (1-12, with or without a leading zero), 2-digit minute and an AM/PM marker.
 */
export const LOCAL_DATE_TIME_FORMATS = ['YYYY-MM-DD hh:mm A', 'YYYY-MM-DD h:mm A'];

/** moment's `A` token also takes `a`, `P` or `p.m.`; only AM and PM are times here */
const TIME_PATTERN = /^\d{1,2}:\d{2} (AM|PM)$/i;

/** Output format before the offset is appended; seconds are always 00 */
const ISO_WITHOUT_OFFSET = 'YYYY-MM-DDTHH:mm:ss';

/**
 * Combines a calendar date and a 12-hour time into an ISO 8601 timestamp
 * carrying the region's UTC offset at that instant.
 *
 * Returns null, never throws, when either input is empty or the pair does
 * not parse. Callers treat null as "no value" for that one field.
 *
 * @example
 * ```typescript
 * toIsoTimestamp('2026-06-15', '05:35 AM'); // '2026-06-15T05:35:00-07:00'
 * toIsoTimestamp('2026-12-01', '06:45 AM'); // '2026-12-01T06:45:00-08:00'
 * toIsoTimestamp('2026-12-01', '');         // null
 * ```
 */
export function toIsoTimestamp(
  date: string | null | undefined,
  time: string | null | undefined,
  region: string = DEFAULT_REGION,
  rules: DstRules = DEFAULT_DST_RULES
): string | null {
  if (!date || !time || !TIME_PATTERN.test(time)) {
    return null;
  }

  const local = moment.utc(`${date} ${time}`, LOCAL_DATE_TIME_FORMATS, true);
  if (!local.isValid()) {
    return null;
  }

  const offset = resolveUtcOffset(local, region, rules);
  return `${local.format(ISO_WITHOUT_OFFSET)}${offset}`;
}
