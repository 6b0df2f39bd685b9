// Serializable schedule configuration, validated with zod.

import { Temporal } from "@js-temporal/polyfill";
import { z } from "zod";
import { CronError } from "./error.js";
import { exceptDates } from "./filter.js";
import { type Moment, Schedule, type ScheduleOptions } from "./schedule.js";

function isKnownZone(id: string): boolean {
  try {
    Temporal.Now.zonedDateTimeISO(id);
    return true;
  } catch {
    return false;
  }
}

// "...[Zone]" strings keep their zone; anything else must carry an offset.
const momentSchema = z.string().transform((value, ctx): Moment => {
  try {
    return value.includes("[")
      ? Temporal.ZonedDateTime.from(value)
      : Temporal.Instant.from(value);
  } catch {
    ctx.addIssue({ code: "custom", message: `invalid instant: ${value}` });
    return z.NEVER;
  }
});

const plainDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
  .transform((value, ctx): Temporal.PlainDate => {
    try {
      return Temporal.PlainDate.from(value);
    } catch {
      ctx.addIssue({ code: "custom", message: `invalid date: ${value}` });
      return z.NEVER;
    }
  });

export const scheduleConfigSchema = z.object({
  expression: z.string().min(1, "expression is required"),
  timezone: z.string().min(1).default("UTC").refine(isKnownZone, "unknown time zone"),
  start: momentSchema.optional(),
  end: momentSchema.optional(),
  endInclusive: z.boolean().default(false),
  exceptDates: z.array(plainDateSchema).default([]),
});

export type ScheduleConfigInput = z.input<typeof scheduleConfigSchema>;
export type ScheduleConfig = z.output<typeof scheduleConfigSchema>;

export type ScheduleRuntimeOptions = Pick<ScheduleOptions, "filters" | "clock" | "logger">;

/** Parse a config object, throwing CronError (kind `config`) on invalid input. */
export function parseScheduleConfig(input: unknown): ScheduleConfig {
  const parsed = scheduleConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw CronError.config(`invalid schedule config: ${details}`);
  }
  return parsed.data;
}

/**
 * Build a Schedule from plain data such as a JSON document. Dates listed in
 * `exceptDates` are skipped ahead of any filters given in `options`.
 */
export function scheduleFromConfig(
  input: unknown,
  options: ScheduleRuntimeOptions = {},
): Schedule {
  const config = parseScheduleConfig(input);
  const filters = config.exceptDates.length > 0 ? [exceptDates(config.exceptDates)] : [];
  return new Schedule(config.expression, config.timezone, {
    start: config.start,
    end: config.end,
    endInclusive: config.endInclusive,
    filters: [...filters, ...(options.filters ?? [])],
    clock: options.clock,
    logger: options.logger,
  });
}
