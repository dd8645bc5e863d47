/**
 * DST-aware UTC offset resolution
 *
 * Pure functions over naive local wall-clock instants. Instants are held as
 * moments in UTC mode so that comparisons are plain wall-clock comparisons,
 * never shifted by the host machine's timezone.
 */

import moment from 'moment-timezone';
import { UnknownRegionError } from '@ekadashi/contracts';
import { DEFAULT_DST_RULES, type DstRules, type RegionRules } from './rules.js';

/** Format of a local instant without seconds or offset */
export const LOCAL_INSTANT_FORMAT = 'YYYY-MM-DDTHH:mm';

/** Region used when none is given */
export const DEFAULT_REGION = 'PST';

/**
 * Parses a `YYYY-MM-DDTHH:mm` wall-clock string as a zone-less instant.
 * Returns null if the string does not strictly match.
 */
export function parseLocalInstant(value: string): moment.Moment | null {
  const parsed = moment.utc(value, LOCAL_INSTANT_FORMAT, true);
  return parsed.isValid() ? parsed : null;
}

/**
 * Looks up the rules for a region.
 *
 * @throws UnknownRegionError if the region is not in the table
 */
export function getRegionRules(region: string, rules: DstRules = DEFAULT_DST_RULES): RegionRules {
  const regionRules = rules[region];
  if (!regionRules) {
    throw new UnknownRegionError(`No offset rules for region ${region}`, {
      region,
      known: Object.keys(rules),
    });
  }
  return regionRules;
}

/**
 * Whether a local instant falls inside the region's summer time window for
 * its year. The window is half-open: the start instant is inside, the end
 * instant is outside. Years without a configured transition have no summer
 * time.
 */
export function isSummerTime(local: moment.Moment, regionRules: RegionRules): boolean {
  const transition = regionRules.transitions[String(local.year())];
  if (!transition) {
    return false;
  }

  const start = moment.utc(transition.start, LOCAL_INSTANT_FORMAT, true);
  const end = moment.utc(transition.end, LOCAL_INSTANT_FORMAT, true);

  return local.isSameOrAfter(start) && local.isBefore(end);
}

/**
 * Resolves the signed UTC offset (`+HH:MM` / `-HH:MM`) in effect at a local
 * instant in the given region.
 *
 * @example
 * ```typescript
 * resolveUtcOffset('2026-03-08T02:00'); // '-07:00'
 * resolveUtcOffset('2026-03-08T01:59'); // '-08:00'
 * resolveUtcOffset('2026-04-27T05:36', 'IST'); // '+05:30'
 * ```
 *
 * @throws UnknownRegionError if the region is not in the table
 * @throws RangeError if a string instant is not `YYYY-MM-DDTHH:mm`
 */
export function resolveUtcOffset(
  local: moment.Moment | string,
  region: string = DEFAULT_REGION,
  rules: DstRules = DEFAULT_DST_RULES
): string {
  const regionRules = getRegionRules(region, rules);

  const instant = typeof local === 'string' ? parseLocalInstant(local) : local;
  if (!instant) {
    throw new RangeError(`Invalid local instant: ${String(local)} (expected ${LOCAL_INSTANT_FORMAT})`);
  }

  return isSummerTime(instant, regionRules) ? regionRules.summerOffset : regionRules.standardOffset;
}
