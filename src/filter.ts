// Filter chain applied to each candidate occurrence.

import { Temporal } from "@js-temporal/polyfill";

/**
 * - `accept`: keep the occurrence and ask the next filter
 * - `reject`: drop it and search for the next candidate
 * - `stop`: end the sequence
 */
export type FilterResult = "accept" | "reject" | "stop";

export type OccurrenceFilter = (occurrence: Temporal.ZonedDateTime) => FilterResult;

/** Run filters in order; the first non-accept result wins. */
export function runFilters(
  filters: readonly OccurrenceFilter[],
  occurrence: Temporal.ZonedDateTime,
): FilterResult {
  for (const filter of filters) {
    const result = filter(occurrence);
    if (result !== "accept") return result;
  }
  return "accept";
}

/** Reject occurrences whose local date is one of `dates`, e.g. holidays. */
export function exceptDates(
  dates: Iterable<Temporal.PlainDate | string>,
): OccurrenceFilter {
  const excluded = new Set<string>();
  for (const date of dates) {
    excluded.add(Temporal.PlainDate.from(date).toString());
  }
  return (occurrence) =>
    excluded.has(occurrence.toPlainDate().toString()) ? "reject" : "accept";
}

/** Reject Saturdays and Sundays. */
export function weekdaysOnly(): OccurrenceFilter {
  return (occurrence) => (occurrence.dayOfWeek >= 6 ? "reject" : "accept");
}

/** Stop the sequence at the first occurrence later than `limit`. */
export function stopAfter(limit: Temporal.Instant | Temporal.ZonedDateTime): OccurrenceFilter {
  const bound = limit instanceof Temporal.Instant ? limit : limit.toInstant();
  return (occurrence) =>
    Temporal.Instant.compare(occurrence.toInstant(), bound) > 0 ? "stop" : "accept";
}
