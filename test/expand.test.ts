import { describe, expect, it } from "vitest";
import { CronError, FieldValueSet, expandField, parseField } from "../src/index.js";
import type { FieldKind } from "../src/index.js";
import { catchCronError } from "./helpers/errors.js";

function expand(text: string, kind: FieldKind): number[] {
  return [...expandField(parseField(text, kind), kind).values];
}

describe("expandField", () => {
  it("expands a wildcard to the full domain", () => {
    const set = expandField({ type: "wildcard" }, "minute");
    expect(set.values.length).toBe(60);
    expect(set.first).toBe(0);
    expect(set.last).toBe(59);
    expect(set.isFull).toBe(true);
  });

  it("expands weekdays Monday to Sunday as 1-7", () => {
    expect(expand("*", "dayOfWeek")).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it("expands a range step", () => {
    expect(expand("0-10/2", "minute")).toEqual([0, 2, 4, 6, 8, 10]);
  });

  it("expands a wildcard step from the domain minimum", () => {
    expect(expand("*/15", "minute")).toEqual([0, 15, 30, 45]);
    expect(expand("*/5", "dayOfMonth")).toEqual([1, 6, 11, 16, 21, 26, 31]);
  });

  it("expands a stepped single value to that value alone", () => {
    expect(expand("20/20", "minute")).toEqual([20]);
    expect(expand("5/15,30", "minute")).toEqual([5, 30]);
  });

  it("merges list items in ascending order without duplicates", () => {
    expect(expand("5,1-3,2", "hour")).toEqual([1, 2, 3, 5]);
  });

  it("walks year steps from 1970", () => {
    const years = expand("*/500", "year");
    expect(years.length).toBe(17);
    expect(years[0]).toBe(1970);
    expect(years[16]).toBe(9970);
  });

  it("leaves a wildcard year unbounded", () => {
    const years = expandField({ type: "wildcard" }, "year");
    expect(years.isFull).toBe(true);
    expect(years.values).toEqual([]);
    expect(years.has(1965)).toBe(true);
    expect(years.has(12000)).toBe(true);
    expect(years.nextAtOrAfter(1961)).toBe(1961);
    expect(years.nextAtOrAfter(-5)).toBe(0);
    expect(years.nextAtOrAfter(275760)).toBeNull();
  });

  it("treats a list holding a wildcard as unrestricted", () => {
    expect(expandField(parseField("2020,*", "year"), "year").isFull).toBe(true);
  });

  it("expands year literals outside 1970-9999", () => {
    expect(expand("1965,10000", "year")).toEqual([1965, 10000]);
  });

  it("is not full when part of the domain is missing", () => {
    expect(expandField(parseField("1-6", "dayOfWeek"), "dayOfWeek").isFull).toBe(false);
    expect(expandField(parseField("1-7", "dayOfWeek"), "dayOfWeek").isFull).toBe(true);
  });

  it("rejects an empty expansion", () => {
    expect(() => expandField({ type: "range", start: 5, end: 1 }, "hour")).toThrow(
      CronError,
    );
    expect(() => expandField({ type: "list", items: [] }, "hour")).toThrow(
      "hour field matches no values",
    );
  });

  it("rejects values outside the domain", () => {
    const err = catchCronError(() => expandField({ type: "literal", value: 24 }, "hour"));
    expect(err.kind).toBe("range");
    expect(err.field).toBe("hour");
    expect(err.message).toBe("hour must be 0-23, got 24");
  });

  it("rejects a non-positive step", () => {
    expect(() =>
      expandField({ type: "step", base: { type: "wildcard" }, interval: 0 }, "minute"),
    ).toThrow("step must be positive, got 0");
  });
});

describe("FieldValueSet", () => {
  const quarters = new FieldValueSet("minute", [45, 0, 30, 15, 30]);

  it("sorts and deduplicates values", () => {
    expect(quarters.values).toEqual([0, 15, 30, 45]);
  });

  it("answers membership", () => {
    expect(quarters.has(30)).toBe(true);
    expect(quarters.has(31)).toBe(false);
  });

  it("finds the next member at or after a value", () => {
    expect(quarters.nextAtOrAfter(0)).toBe(0);
    expect(quarters.nextAtOrAfter(16)).toBe(30);
    expect(quarters.nextAtOrAfter(45)).toBe(45);
    expect(quarters.nextAtOrAfter(46)).toBeNull();
  });

  it("compares by kind and values", () => {
    expect(quarters.equals(expandField(parseField("*/15", "minute"), "minute"))).toBe(true);
    expect(quarters.equals(new FieldValueSet("hour", [0, 15]))).toBe(false);
  });

  it("builds the full domain", () => {
    expect(FieldValueSet.full("month").values).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
  });

  it("treats full sets as equal however they were built", () => {
    expect(FieldValueSet.full("hour").equals(expandField(parseField("0-23", "hour"), "hour"))).toBe(
      true,
    );
    expect(FieldValueSet.full("year").equals(new FieldValueSet("year", [2030]))).toBe(false);
  });
});
