// Field kinds and token types for six-field cron expressions.

export type FieldKind =
  | "minute"
  | "hour"
  | "dayOfMonth"
  | "month"
  | "dayOfWeek"
  | "year";

/** Field order as written in an expression. */
export const FIELD_ORDER: readonly FieldKind[] = [
  "minute",
  "hour",
  "dayOfMonth",
  "month",
  "dayOfWeek",
  "year",
];

export interface FieldDomain {
  min: number;
  max: number;
}

// Year literals may name any year Temporal can represent in full.
export const FIELD_DOMAINS: Readonly<Record<FieldKind, FieldDomain>> = {
  minute: { min: 0, max: 59 },
  hour: { min: 0, max: 23 },
  dayOfMonth: { min: 1, max: 31 },
  month: { min: 1, max: 12 },
  dayOfWeek: { min: 1, max: 7 },
  year: { min: 0, max: 275759 },
};

// Years a wildcard step such as `*/4` walks over. A bare `*` year is unbounded.
const YEAR_STEP_WINDOW: FieldDomain = { min: 1970, max: 9999 };

/** Values a `*` step base covers for the given field. */
export function stepWindow(kind: FieldKind): FieldDomain {
  return kind === "year" ? YEAR_STEP_WINDOW : FIELD_DOMAINS[kind];
}

export const FIELD_LABELS: Readonly<Record<FieldKind, string>> = {
  minute: "minute",
  hour: "hour",
  dayOfMonth: "day-of-month",
  month: "month",
  dayOfWeek: "day-of-week",
  year: "year",
};

// --- Tokens ---

export type WildcardToken = { type: "wildcard" };

export type RangeToken = { type: "range"; start: number; end: number };

export type FieldToken =
  | WildcardToken
  | { type: "literal"; value: number }
  | RangeToken
  | { type: "step"; base: WildcardToken | RangeToken; interval: number }
  | { type: "list"; items: FieldToken[] };

// --- Aliases ---

const MONTH_ALIASES: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

const WEEKDAY_ALIASES: Record<string, number> = {
  mon: 1,
  tue: 2,
  wed: 3,
  thu: 4,
  fri: 5,
  sat: 6,
  sun: 7,
};

/** Resolve a three-letter month or weekday name for the given field. */
export function resolveAlias(kind: FieldKind, name: string): number | null {
  const key = name.toLowerCase();
  if (kind === "month") return MONTH_ALIASES[key] ?? null;
  if (kind === "dayOfWeek") return WEEKDAY_ALIASES[key] ?? null;
  return null;
}

export function inDomain(kind: FieldKind, value: number): boolean {
  const { min, max } = FIELD_DOMAINS[kind];
  return value >= min && value <= max;
}
