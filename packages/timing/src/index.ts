/**
 * @ekadashi/timing
 *
 * Pure functions for turning scraped local times into offset-qualified
 * ISO 8601 instants.
 *
 * - Table-driven DST offsets per region and year (data/dst-rules.json)
 * - Half-open summer time windows: start inside, end outside
 * - Strict 12-hour time parsing that yields null instead of throwing
 *
 * @example
 * ```typescript
 * import { resolveUtcOffset, toIsoTimestamp } from '@ekadashi/timing';
 *
 * resolveUtcOffset('2026-11-01T01:59'); // '-07:00'
 * toIsoTimestamp('2026-06-15', '05:35 AM'); // '2026-06-15T05:35:00-07:00'
 * ```
 */

export {
  LOCAL_INSTANT_FORMAT,
  DEFAULT_REGION,
  parseLocalInstant,
  getRegionRules,
  isSummerTime,
  resolveUtcOffset,
} from './offset.js';

export { LOCAL_DATE_TIME_FORMATS, toIsoTimestamp } from './convert.js';

export {
  DEFAULT_DST_RULES,
  parseDstRules,
  loadDstRules,
  transitionSchema,
  regionRulesSchema,
  dstRulesSchema,
} from './rules.js';

export type { DstRules, RegionRules, Transition } from './rules.js';
