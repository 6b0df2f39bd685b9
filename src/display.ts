// Display (toString) for cron expressions and schedules.

import type { Temporal } from "@js-temporal/polyfill";
import type { FieldValueSet } from "./expand.js";

/**
 * Render a value set in canonical form: `*` when unrestricted, otherwise a
 * comma list of single values and `a-b` runs. Parsing the result yields the
 * same set.
 */
export function displayField(set: FieldValueSet): string {
  if (set.isFull) return "*";

  const [head, ...rest] = set.values;
  const parts: string[] = [];
  let runStart = head;
  let prev = runStart;
  for (const value of rest) {
    if (value === prev + 1) {
      prev = value;
      continue;
    }
    parts.push(formatRun(runStart, prev));
    runStart = value;
    prev = value;
  }
  parts.push(formatRun(runStart, prev));
  return parts.join(",");
}

function formatRun(start: number, end: number): string {
  return start === end ? `${start}` : `${start}-${end}`;
}

/** `Cron: <expression> @<zone> [<start>-><end or None>]` */
export function displaySchedule(
  source: string,
  zoneId: string,
  start: Temporal.ZonedDateTime | Temporal.Instant,
  end: Temporal.ZonedDateTime | Temporal.Instant | null,
): string {
  const endText = end ? end.toString() : "None";
  return `Cron: ${source} @${zoneId} [${start.toString()}->${endText}]`;
}
