// Finds the next wall-clock time matching a cron expression.

import { Temporal } from "@js-temporal/polyfill";
import type { CronExpression } from "./cron.js";
import { CronError } from "./error.js";

type PDT = Temporal.PlainDateTime;

// =============================================================================
// Carry-based search
// =============================================================================
// Fields are resolved coarsest first: year, month, day, hour, minute. At each
// level the current value snaps forward to the next member of the field's set.
// When no member remains, the next coarser field is incremented (a carry) and
// every finer field resets to the bottom of its domain; the loop then starts
// over from the year. Days are scanned within the current month only.
//
// Each carry counts as one rollover. An expression that can never match
// (e.g. day 31 in February only) carries twice per year forever, so the
// count is capped at MAX_ROLLOVERS. Jumps to a later year in the year set
// are not carries; once the set is exhausted the search ends with null.
// =============================================================================

export const MAX_ROLLOVERS = 2000;

/**
 * Smallest wall-clock minute strictly after `local` that satisfies every
 * field of `expr`, or null when the year field has no later value.
 */
export function nextAfter(expr: CronExpression, local: PDT): PDT | null {
  const start = local
    .with({ second: 0, millisecond: 0, microsecond: 0, nanosecond: 0 })
    .add({ minutes: 1 });

  let { year, month, day, hour, minute } = start;
  let rollovers = 0;

  const carry = (): void => {
    rollovers++;
    if (rollovers > MAX_ROLLOVERS) {
      throw CronError.unmatchable(expr.source);
    }
  };

  for (;;) {
    const y = expr.year.nextAtOrAfter(year);
    if (y === null) return null;
    if (y !== year) {
      year = y;
      month = 1;
      day = 1;
      hour = 0;
      minute = 0;
    }

    const m = expr.month.nextAtOrAfter(month);
    if (m === null) {
      carry();
      year += 1;
      month = 1;
      day = 1;
      hour = 0;
      minute = 0;
      continue;
    }
    if (m !== month) {
      month = m;
      day = 1;
      hour = 0;
      minute = 0;
    }

    const d = nextDayInMonth(expr, year, month, day);
    if (d === null) {
      carry();
      month += 1;
      day = 1;
      hour = 0;
      minute = 0;
      continue;
    }
    if (d !== day) {
      day = d;
      hour = 0;
      minute = 0;
    }

    const h = expr.hour.nextAtOrAfter(hour);
    if (h === null) {
      carry();
      day += 1;
      hour = 0;
      minute = 0;
      continue;
    }
    if (h !== hour) {
      hour = h;
      minute = 0;
    }

    const mi = expr.minute.nextAtOrAfter(minute);
    if (mi === null) {
      carry();
      hour += 1;
      minute = 0;
      continue;
    }

    return Temporal.PlainDateTime.from({ year, month, day, hour, minute: mi });
  }
}

/** First day >= `from` in the month that passes the day-of-month/day-of-week rule. */
function nextDayInMonth(
  expr: CronExpression,
  year: number,
  month: number,
  from: number,
): number | null {
  const first = Temporal.PlainDate.from({ year, month, day: 1 });
  for (let day = from; day <= first.daysInMonth; day++) {
    const dayOfWeek = ((first.dayOfWeek - 1 + day - 1) % 7) + 1;
    if (expr.matchesDay(day, dayOfWeek)) return day;
  }
  return null;
}
