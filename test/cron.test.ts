import { Temporal } from "@js-temporal/polyfill";
import { describe, expect, it } from "vitest";
import { CronExpression } from "../src/index.js";
import { catchCronError } from "./helpers/errors.js";

const date = (s: string) => Temporal.PlainDate.from(s);
const local = (s: string) => Temporal.PlainDateTime.from(s);

describe("CronExpression.parse", () => {
  it("expands every field", () => {
    const expr = CronExpression.parse("0-10/2 9-17 1,15 jan-mar mon-fri 2030");
    expect(expr.minute.values).toEqual([0, 2, 4, 6, 8, 10]);
    expect(expr.hour.values).toEqual([9, 10, 11, 12, 13, 14, 15, 16, 17]);
    expect(expr.dayOfMonth.values).toEqual([1, 15]);
    expect(expr.month.values).toEqual([1, 2, 3]);
    expect(expr.dayOfWeek.values).toEqual([1, 2, 3, 4, 5]);
    expect(expr.year.values).toEqual([2030]);
  });

  it("keeps the source text", () => {
    expect(CronExpression.parse("30 10 * * THU *").source).toBe("30 10 * * THU *");
  });

  it("is immutable", () => {
    expect(Object.isFrozen(CronExpression.parse("* * * * * *"))).toBe(true);
  });

  it("reads a stepped single value as that value", () => {
    expect(CronExpression.parse("5/15 * * * * *").minute.values).toEqual([5]);
  });

  it("accepts years outside 1970-9999", () => {
    expect(CronExpression.parse("0 0 1 1 * 1965").year.values).toEqual([1965]);
    expect(CronExpression.parse("0 0 1 1 * 10000").year.values).toEqual([10000]);
  });

  it("matches any year for a wildcard year", () => {
    const expr = CronExpression.parse("0 0 1 1 * *");
    expect(expr.matchesDate(date("1960-01-01"))).toBe(true);
    expect(expr.matchesDate(date("+012000-01-01"))).toBe(true);
  });

  it("does not check day-of-month against month", () => {
    expect(CronExpression.parse("0 0 31 2 * *").dayOfMonth.values).toEqual([31]);
  });

  it("fails on the first bad field", () => {
    const err = catchCronError(() => CronExpression.parse("0 25 * * * *"));
    expect(err.kind).toBe("range");
    expect(err.field).toBe("hour");
    expect(err.span).toEqual({ start: 2, end: 4 });
  });

  it("validates without throwing", () => {
    expect(CronExpression.validate("*/5 * * * * *")).toBe(true);
    expect(CronExpression.validate("*/5 * * * *")).toBe(false);
    expect(CronExpression.validate("* * * smarch * *")).toBe(false);
  });
});

describe("day matching", () => {
  // 2016-09-13 is a Tuesday, 2016-09-16 a Friday, 2016-09-17 a Saturday
  it("matches either day field when both are restricted", () => {
    const expr = CronExpression.parse("0 0 13 * fri *");
    expect(expr.matchesDate(date("2016-09-13"))).toBe(true);
    expect(expr.matchesDate(date("2016-09-16"))).toBe(true);
    expect(expr.matchesDate(date("2016-09-17"))).toBe(false);
  });

  it("uses only day-of-week when day-of-month is unrestricted", () => {
    const expr = CronExpression.parse("0 0 * * fri *");
    expect(expr.matchesDate(date("2016-09-13"))).toBe(false);
    expect(expr.matchesDate(date("2016-09-16"))).toBe(true);
  });

  it("uses only day-of-month when day-of-week is unrestricted", () => {
    const expr = CronExpression.parse("0 0 13 * * *");
    expect(expr.matchesDate(date("2016-09-13"))).toBe(true);
    expect(expr.matchesDate(date("2016-09-16"))).toBe(false);
  });

  it("treats a field covering its whole domain as unrestricted", () => {
    const expr = CronExpression.parse("0 0 1-31 * fri *");
    expect(expr.matchesDate(date("2016-09-13"))).toBe(false);
    expect(expr.matchesDate(date("2016-09-16"))).toBe(true);
  });

  it("checks month and year", () => {
    const expr = CronExpression.parse("0 0 * sep * 2016");
    expect(expr.matchesDate(date("2016-09-13"))).toBe(true);
    expect(expr.matchesDate(date("2016-10-13"))).toBe(false);
    expect(expr.matchesDate(date("2017-09-13"))).toBe(false);
  });
});

describe("matches", () => {
  const expr = CronExpression.parse("30 10 * * thu 2016");

  it("checks all six fields", () => {
    expect(expr.matches(local("2016-09-29T10:30"))).toBe(true);
    expect(expr.matches(local("2016-09-29T10:31"))).toBe(false);
    expect(expr.matches(local("2016-09-29T11:30"))).toBe(false);
    expect(expr.matches(local("2016-09-28T10:30"))).toBe(false);
    expect(expr.matches(local("2017-09-28T10:30"))).toBe(false);
  });

  it("ignores seconds", () => {
    expect(expr.matches(local("2016-09-29T10:30:45"))).toBe(true);
  });
});

describe("canonical form", () => {
  it("renders full fields as wildcards", () => {
    expect(CronExpression.parse("* * * * * *").toString()).toBe("* * * * * *");
    expect(CronExpression.parse("0 0 * * 1-7 *").toString()).toBe("0 0 * * * *");
  });

  it("renders values as lists and runs", () => {
    expect(CronExpression.parse("0-10/2 * * * * *").toString()).toBe(
      "0,2,4,6,8,10 * * * * *",
    );
    expect(CronExpression.parse("*/15 9-17 1,15 jan-mar mon-fri 2030").toString()).toBe(
      "0,15,30,45 9-17 1,15 1-3 1-5 2030",
    );
  });

  it.each([
    "* * * * * *",
    "0-10/2 * * * * *",
    "30 10 * * mon,tue *",
    "5/7 */3 1-10,20-31 */2 sat,sun 2020-2030",
    "0 0 1 1 * 1965,10000",
    "0 0 29 feb * */4",
  ])("re-parses %s to an equal expression", (source) => {
    const expr = CronExpression.parse(source);
    const reparsed = CronExpression.parse(expr.toString());
    expect(reparsed.equals(expr)).toBe(true);
    expect(reparsed.toString()).toBe(expr.toString());
  });

  it("distinguishes different expressions", () => {
    const a = CronExpression.parse("0 0 * * * *");
    const b = CronExpression.parse("0 1 * * * *");
    expect(a.equals(b)).toBe(false);
  });
});
