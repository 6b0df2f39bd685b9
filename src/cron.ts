// Six-field cron expression: minute hour day-of-month month day-of-week year.

import type { Temporal } from "@js-temporal/polyfill";
import type { FieldKind } from "./ast.js";
import { FIELD_ORDER } from "./ast.js";
import { displayField } from "./display.js";
import { expandField, type FieldValueSet } from "./expand.js";
import { parseExpression } from "./parser.js";

export class CronExpression {
  /** Expression text as given. */
  readonly source: string;
  readonly minute: FieldValueSet;
  readonly hour: FieldValueSet;
  readonly dayOfMonth: FieldValueSet;
  readonly month: FieldValueSet;
  readonly dayOfWeek: FieldValueSet;
  readonly year: FieldValueSet;

  private constructor(source: string, fields: Record<FieldKind, FieldValueSet>) {
    this.source = source;
    this.minute = fields.minute;
    this.hour = fields.hour;
    this.dayOfMonth = fields.dayOfMonth;
    this.month = fields.month;
    this.dayOfWeek = fields.dayOfWeek;
    this.year = fields.year;
    Object.freeze(this);
  }

  /** Parse and expand an expression. Throws CronError on bad input. */
  static parse(source: string): CronExpression {
    const [minute, hour, dayOfMonth, month, dayOfWeek, year] = parseExpression(
      source,
    ).map((parsed) => expandField(parsed.token, parsed.kind));
    return new CronExpression(source, {
      minute,
      hour,
      dayOfMonth,
      month,
      dayOfWeek,
      year,
    });
  }

  /** Check if a string is a valid expression. */
  static validate(source: string): boolean {
    try {
      CronExpression.parse(source);
      return true;
    } catch {
      return false;
    }
  }

  field(kind: FieldKind): FieldValueSet {
    return this[kind];
  }

  /**
   * Day rule: with both day fields restricted a date matches if either does;
   * otherwise only the restricted one applies.
   */
  matchesDate(date: Temporal.PlainDate): boolean {
    if (!this.year.has(date.year) || !this.month.has(date.month)) {
      return false;
    }
    return this.matchesDay(date.day, date.dayOfWeek);
  }

  /** Day-of-month / day-of-week check only; dayOfWeek is 1 (Monday) to 7. */
  matchesDay(day: number, dayOfWeek: number): boolean {
    if (this.dayOfMonth.isFull) return this.dayOfWeek.has(dayOfWeek);
    if (this.dayOfWeek.isFull) return this.dayOfMonth.has(day);
    return this.dayOfMonth.has(day) || this.dayOfWeek.has(dayOfWeek);
  }

  /** Check a wall-clock time against all six fields. Seconds are ignored. */
  matches(local: Temporal.PlainDateTime): boolean {
    return (
      this.matchesDate(local.toPlainDate()) &&
      this.hour.has(local.hour) &&
      this.minute.has(local.minute)
    );
  }

  equals(other: CronExpression): boolean {
    return FIELD_ORDER.every((kind) => this[kind].equals(other[kind]));
  }

  /** Canonical form; re-parsing it gives an equal expression. */
  toString(): string {
    return FIELD_ORDER.map((kind) => displayField(this[kind])).join(" ");
  }
}
