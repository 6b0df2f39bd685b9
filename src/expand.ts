// Expansion of field tokens into concrete value sets.

import type { FieldKind, FieldToken } from "./ast.js";
import { FIELD_DOMAINS, FIELD_LABELS, inDomain, stepWindow } from "./ast.js";
import { CronError } from "./error.js";

/**
 * Sorted, distinct values a single field accepts. Immutable.
 *
 * `"any"` builds the unrestricted set. For the year field it lists no values,
 * since the year domain is too large to enumerate; membership then reduces to
 * the domain check.
 */
export class FieldValueSet {
  readonly kind: FieldKind;
  readonly values: readonly number[];
  private members: ReadonlySet<number> | null;

  constructor(kind: FieldKind, values: Iterable<number> | "any") {
    const { min, max } = FIELD_DOMAINS[kind];
    this.kind = kind;
    if (values === "any") {
      this.members = null;
      this.values = Object.freeze(kind === "year" ? [] : rangeValues(min, max, 1));
      return;
    }

    const members = new Set(values);
    const label = FIELD_LABELS[kind];
    if (members.size === 0) {
      throw CronError.range(`${label} field matches no values`, { field: kind });
    }
    for (const value of members) {
      if (!Number.isInteger(value) || !inDomain(kind, value)) {
        throw CronError.range(`${label} must be ${min}-${max}, got ${value}`, { field: kind });
      }
    }
    this.members = members;
    this.values = Object.freeze([...members].sort((a, b) => a - b));
  }

  /** Every value of the field's domain. */
  static full(kind: FieldKind): FieldValueSet {
    return new FieldValueSet(kind, "any");
  }

  /** Smallest listed value; undefined for an unbounded year set. */
  get first(): number | undefined {
    return this.values[0];
  }

  get last(): number | undefined {
    return this.values[this.values.length - 1];
  }

  /** True when the set covers the whole domain, i.e. the field is unrestricted. */
  get isFull(): boolean {
    if (this.members === null) return true;
    const { min, max } = FIELD_DOMAINS[this.kind];
    return this.values.length === max - min + 1;
  }

  has(value: number): boolean {
    return this.members === null ? inDomain(this.kind, value) : this.members.has(value);
  }

  /** Smallest member >= `value`, or null when none remains. */
  nextAtOrAfter(value: number): number | null {
    if (this.members === null) {
      const { min, max } = FIELD_DOMAINS[this.kind];
      if (value > max) return null;
      return Math.max(value, min);
    }
    let lo = 0;
    let hi = this.values.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.values[mid] < value) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo < this.values.length ? this.values[lo] : null;
  }

  equals(other: FieldValueSet): boolean {
    if (this.kind !== other.kind) return false;
    if (this.isFull || other.isFull) return this.isFull === other.isFull;
    return (
      this.values.length === other.values.length &&
      this.values.every((v, i) => v === other.values[i])
    );
  }
}

/** Expand a token tree to the set of values it denotes for `kind`. */
export function expandField(token: FieldToken, kind: FieldKind): FieldValueSet {
  if (hasWildcard(token)) {
    return FieldValueSet.full(kind);
  }
  return new FieldValueSet(kind, expandToken(token, kind));
}

function hasWildcard(token: FieldToken): boolean {
  if (token.type === "wildcard") return true;
  return token.type === "list" && token.items.some(hasWildcard);
}

function expandToken(token: FieldToken, kind: FieldKind): number[] {
  switch (token.type) {
    case "wildcard": {
      const { min, max } = FIELD_DOMAINS[kind];
      return rangeValues(min, max, 1);
    }
    case "literal":
      return [token.value];
    case "range":
      return rangeValues(token.start, token.end, 1);
    case "step": {
      if (!Number.isInteger(token.interval) || token.interval <= 0) {
        throw CronError.range(`step must be positive, got ${token.interval}`, { field: kind });
      }
      const window = stepWindow(kind);
      const start = token.base.type === "wildcard" ? window.min : token.base.start;
      const end = token.base.type === "wildcard" ? window.max : token.base.end;
      return rangeValues(start, end, token.interval);
    }
    case "list":
      return token.items.flatMap((item) => expandToken(item, kind));
  }
}

function rangeValues(start: number, end: number, step: number): number[] {
  const values: number[] = [];
  for (let v = start; v <= end; v += step) {
    values.push(v);
  }
  return values;
}
