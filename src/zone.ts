// Timezone capability and localization of wall-clock candidates.

import { Temporal } from "@js-temporal/polyfill";
import { CronError } from "./error.js";

/**
 * Timezone rules the schedule runs against. `possibleTimes` returns every
 * real instant a wall-clock time maps to, in ascending order: one normally,
 * two inside a backward transition (fold), none inside a forward one (gap).
 */
export interface ZoneRules {
  readonly id: string;
  toPlainDateTime(instant: Temporal.Instant): Temporal.PlainDateTime;
  possibleTimes(local: Temporal.PlainDateTime): Temporal.ZonedDateTime[];
}

class IanaZone implements ZoneRules {
  readonly id: string;

  constructor(id: string) {
    // Throws RangeError for unknown zones
    this.id = Temporal.Now.zonedDateTimeISO(id).timeZoneId;
  }

  toPlainDateTime(instant: Temporal.Instant): Temporal.PlainDateTime {
    return instant.toZonedDateTimeISO(this.id).toPlainDateTime();
  }

  possibleTimes(local: Temporal.PlainDateTime): Temporal.ZonedDateTime[] {
    const earlier = local.toZonedDateTime(this.id, { disambiguation: "earlier" });
    const later = local.toZonedDateTime(this.id, { disambiguation: "later" });
    if (Temporal.ZonedDateTime.compare(earlier, later) === 0) {
      return [earlier];
    }
    // In a fold both keep the requested wall-clock time; in a gap neither does.
    if (Temporal.PlainDateTime.compare(earlier.toPlainDateTime(), local) === 0) {
      return [earlier, later];
    }
    return [];
  }
}

/** Zone rules for an IANA identifier such as "Europe/Madrid" or "UTC". */
export function ianaZone(id: string): ZoneRules {
  return new IanaZone(id);
}

/**
 * Attach the zone's offset to a wall-clock time. Throws CronError
 * (`ambiguousLocalTime` or `nonExistentLocalTime`) rather than picking an
 * offset when the time does not map to exactly one instant.
 */
export function localize(
  local: Temporal.PlainDateTime,
  zone: ZoneRules,
): Temporal.ZonedDateTime {
  const times = zone.possibleTimes(local);
  if (times.length === 0) {
    throw CronError.nonExistent(local, zone.id);
  }
  if (times.length > 1) {
    throw CronError.ambiguous(local, zone.id);
  }
  return times[0];
}
