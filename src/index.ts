// Public API

export { CronExpression } from "./cron.js";
export { FieldValueSet, expandField } from "./expand.js";
export { parseExpression, parseField, type ParsedField } from "./parser.js";
export { MAX_ROLLOVERS, nextAfter } from "./eval.js";
export { ianaZone, localize, type ZoneRules } from "./zone.js";
export {
  exceptDates,
  runFilters,
  stopAfter,
  weekdaysOnly,
  type FilterResult,
  type OccurrenceFilter,
} from "./filter.js";
export {
  Schedule,
  type Moment,
  type ScheduleOptions,
  type ScheduleState,
} from "./schedule.js";
export {
  parseScheduleConfig,
  scheduleConfigSchema,
  scheduleFromConfig,
  type ScheduleConfig,
  type ScheduleConfigInput,
  type ScheduleRuntimeOptions,
} from "./config.js";
export {
  Logger,
  type LogEntry,
  type LoggerOptions,
  type LogLevel,
  type LogSink,
} from "./logger.js";
export { displayField } from "./display.js";
export type {
  FieldDomain,
  FieldKind,
  FieldToken,
  RangeToken,
  WildcardToken,
} from "./ast.js";
export { FIELD_DOMAINS, FIELD_ORDER } from "./ast.js";
export type { CronErrorKind, Span } from "./error.js";
export { CronError } from "./error.js";
export { Temporal } from "@js-temporal/polyfill";
