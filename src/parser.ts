// Parser for cron fields: `item (',' item)*` where
// item := ('*' | value | value '-' value) ('/' step)?

import type { FieldKind, FieldToken, RangeToken, WildcardToken } from "./ast.js";
import { FIELD_DOMAINS, FIELD_LABELS, FIELD_ORDER, inDomain, resolveAlias } from "./ast.js";
import { CronError, type CronErrorKind, type Span } from "./error.js";

export interface ParsedField {
  kind: FieldKind;
  text: string;
  span: Span;
  token: FieldToken;
}

const DIGITS = /^\d+$/;
const ALIAS = /^[a-z]{3}$/i;

/** Split an expression into its six fields and parse each one. */
export function parseExpression(input: string): ParsedField[] {
  const parts = [...input.matchAll(/\S+/g)];
  if (parts.length !== FIELD_ORDER.length) {
    throw CronError.syntax(
      `expected ${FIELD_ORDER.length} cron fields, got ${parts.length}`,
      { input, span: { start: 0, end: input.length } },
    );
  }

  return parts.map((match, i) => {
    const kind = FIELD_ORDER[i];
    const text = match[0];
    const start = match.index ?? 0;
    return {
      kind,
      text,
      span: { start, end: start + text.length },
      token: parseField(text, kind, start, input),
    };
  });
}

/**
 * Parse one field's text into a token tree.
 *
 * `offset` and `input` place error spans within a larger expression; they
 * default to the field on its own.
 */
export function parseField(
  text: string,
  kind: FieldKind,
  offset = 0,
  input: string = text,
): FieldToken {
  return new FieldParser(text, kind, offset, input).parse();
}

class FieldParser {
  private text: string;
  private kind: FieldKind;
  private offset: number;
  private input: string;

  constructor(text: string, kind: FieldKind, offset: number, input: string) {
    this.text = text;
    this.kind = kind;
    this.offset = offset;
    this.input = input;
  }

  parse(): FieldToken {
    const items: FieldToken[] = [];
    let pos = 0;
    for (const part of this.text.split(",")) {
      items.push(this.parseItem(part, pos));
      pos += part.length + 1;
    }
    return items.length === 1 ? items[0] : { type: "list", items };
  }

  private parseItem(part: string, at: number): FieldToken {
    if (part === "") {
      throw this.error("syntax", "empty list item", at, 0);
    }

    const slash = part.indexOf("/");
    if (slash === -1) {
      return this.parseBase(part, at);
    }

    const base = this.parseBase(part.slice(0, slash), at);
    const interval = this.parseStep(part.slice(slash + 1), at + slash + 1);

    // `5/15` is the one-value range 5-5
    let stepBase: WildcardToken | RangeToken;
    if (base.type === "literal") {
      stepBase = { type: "range", start: base.value, end: base.value };
    } else if (base.type === "wildcard" || base.type === "range") {
      stepBase = base;
    } else {
      throw this.error("syntax", `invalid step base: ${part}`, at, part.length);
    }
    return { type: "step", base: stepBase, interval };
  }

  private parseBase(text: string, at: number): FieldToken {
    if (text === "*") {
      return { type: "wildcard" };
    }

    const dash = text.indexOf("-");
    if (dash === -1) {
      return { type: "literal", value: this.parseValue(text, at) };
    }

    const start = this.parseValue(text.slice(0, dash), at);
    const end = this.parseValue(text.slice(dash + 1), at + dash + 1);
    if (start > end) {
      throw this.error("syntax", `range start must be <= end: ${text}`, at, text.length);
    }
    return { type: "range", start, end };
  }

  private parseValue(text: string, at: number): number {
    const label = FIELD_LABELS[this.kind];

    if (DIGITS.test(text)) {
      const value = parseInt(text, 10);
      if (!inDomain(this.kind, value)) {
        const { min, max } = FIELD_DOMAINS[this.kind];
        throw this.error("range", `${label} must be ${min}-${max}, got ${value}`, at, text.length);
      }
      return value;
    }

    if (ALIAS.test(text)) {
      const value = resolveAlias(this.kind, text);
      if (value === null) {
        throw this.error("syntax", `unknown ${label} name: ${text}`, at, text.length);
      }
      return value;
    }

    if (text === "") {
      throw this.error("syntax", `missing ${label} value`, at, 0);
    }
    throw this.error("syntax", `invalid ${label} value: ${text}`, at, text.length);
  }

  private parseStep(text: string, at: number): number {
    if (!DIGITS.test(text)) {
      throw this.error("syntax", `invalid step: ${text}`, at, text.length);
    }
    const interval = parseInt(text, 10);
    if (interval === 0) {
      throw this.error("syntax", "step cannot be 0", at, text.length);
    }
    return interval;
  }

  private error(kind: CronErrorKind, message: string, at: number, length: number): CronError {
    const start = this.offset + at;
    return new CronError(
      kind,
      `${message} (${FIELD_LABELS[this.kind]} field "${this.text}")`,
      {
        field: this.kind,
        span: { start, end: start + length },
        input: this.input,
      },
    );
  }
}
