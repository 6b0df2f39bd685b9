// Schedule: a stateful iterator of zoned occurrences.

import { Temporal } from "@js-temporal/polyfill";
import { CronExpression } from "./cron.js";
import { displaySchedule } from "./display.js";
import { nextAfter } from "./eval.js";
import { type OccurrenceFilter, runFilters } from "./filter.js";
import { Logger } from "./logger.js";
import { ianaZone, localize, type ZoneRules } from "./zone.js";

export type Moment = Temporal.ZonedDateTime | Temporal.Instant;

export type ScheduleState = "active" | "exhausted";

export interface ScheduleOptions {
  /** Occurrences are strictly after this moment. Defaults to `clock()`. */
  start?: Moment;
  /** Upper bound; exclusive unless `endInclusive` is set. */
  end?: Moment;
  endInclusive?: boolean;
  filters?: readonly OccurrenceFilter[];
  /** Source of "now" when no start is given. */
  clock?: () => Temporal.Instant;
  logger?: Logger;
}

function toInstant(moment: Moment): Temporal.Instant {
  return moment instanceof Temporal.Instant ? moment : moment.toInstant();
}

/**
 * Occurrences of a cron expression in a timezone, produced on demand.
 *
 * `next()` throws a CronError of kind `ambiguousLocalTime` or
 * `nonExistentLocalTime` when a matching wall-clock time falls in a DST
 * transition. The cursor has already moved past that time, so calling
 * `next()` again continues with the following candidate. Once the end bound
 * is reached, a filter returns `stop`, or the year field runs out, the
 * schedule is exhausted and stays so.
 *
 * Not safe to share between callers: `next()` mutates the cursor.
 */
export class Schedule implements IterableIterator<Temporal.ZonedDateTime> {
  readonly expression: CronExpression;
  readonly zone: ZoneRules;
  readonly start: Moment;
  readonly end: Moment | null;
  readonly endInclusive: boolean;
  private readonly endInstant: Temporal.Instant | null;
  private readonly filters: readonly OccurrenceFilter[];
  private readonly logger: Logger;
  private position: Temporal.PlainDateTime;
  private status: ScheduleState = "active";

  constructor(
    expression: string | CronExpression,
    zone: ZoneRules | string,
    options: ScheduleOptions = {},
  ) {
    this.expression =
      typeof expression === "string" ? CronExpression.parse(expression) : expression;
    this.zone = typeof zone === "string" ? ianaZone(zone) : zone;
    this.start = options.start ?? (options.clock ? options.clock() : Temporal.Now.instant());
    this.end = options.end ?? null;
    this.endInclusive = options.endInclusive ?? false;
    this.endInstant = this.end ? toInstant(this.end) : null;
    this.filters = [...(options.filters ?? [])];
    this.logger = options.logger ?? new Logger();
    this.position = this.zone.toPlainDateTime(toInstant(this.start));
  }

  get state(): ScheduleState {
    return this.status;
  }

  /** Wall-clock time of the last candidate considered. */
  get cursor(): Temporal.PlainDateTime {
    return this.position;
  }

  next(): IteratorResult<Temporal.ZonedDateTime, undefined> {
    while (this.status === "active") {
      const candidate = nextAfter(this.expression, this.position);
      if (candidate === null) {
        this.exhaust("no further matching year");
        break;
      }
      this.position = candidate;

      let occurrence: Temporal.ZonedDateTime;
      try {
        occurrence = localize(candidate, this.zone);
      } catch (err) {
        this.logger.debug("candidate skipped: cannot localize", {
          candidate: candidate.toString(),
          zone: this.zone.id,
        });
        throw err;
      }

      if (this.endInstant && this.reachesEnd(occurrence, this.endInstant)) {
        this.exhaust("end bound reached");
        break;
      }

      const verdict = runFilters(this.filters, occurrence);
      if (verdict === "accept") {
        return { done: false, value: occurrence };
      }
      if (verdict === "stop") {
        this.exhaust("stopped by filter");
        break;
      }
      this.logger.debug("occurrence rejected by filter", {
        occurrence: occurrence.toString(),
      });
    }
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): Schedule {
    return this;
  }

  /** Collect up to `n` further occurrences. */
  take(n: number): Temporal.ZonedDateTime[] {
    const results: Temporal.ZonedDateTime[] = [];
    while (results.length < n) {
      const result = this.next();
      if (result.done) break;
      results.push(result.value);
    }
    return results;
  }

  toString(): string {
    return displaySchedule(this.expression.source, this.zone.id, this.start, this.end);
  }

  private reachesEnd(occurrence: Temporal.ZonedDateTime, end: Temporal.Instant): boolean {
    const cmp = Temporal.Instant.compare(occurrence.toInstant(), end);
    return this.endInclusive ? cmp > 0 : cmp >= 0;
  }

  private exhaust(reason: string): void {
    this.status = "exhausted";
    this.logger.debug("schedule exhausted", {
      reason,
      expression: this.expression.source,
      cursor: this.position.toString(),
    });
  }
}
