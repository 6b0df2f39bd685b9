import type { Temporal } from "@js-temporal/polyfill";
import type { FieldKind } from "./ast.js";

/** Character range within the expression string. */
export interface Span {
  start: number;
  end: number;
}

export type CronErrorKind =
  | "syntax"
  | "range"
  | "ambiguousLocalTime"
  | "nonExistentLocalTime"
  | "unmatchable"
  | "config";

export interface CronErrorDetails {
  field?: FieldKind;
  span?: Span;
  input?: string;
  local?: Temporal.PlainDateTime;
  zone?: string;
}

/** All errors produced by zonecron. */
export class CronError extends Error {
  readonly kind: CronErrorKind;
  readonly field?: FieldKind;
  readonly span?: Span;
  readonly input?: string;
  /** Wall-clock time that could not be localized. */
  readonly local?: Temporal.PlainDateTime;
  readonly zone?: string;

  constructor(kind: CronErrorKind, message: string, details: CronErrorDetails = {}) {
    super(message);
    this.name = "CronError";
    this.kind = kind;
    this.field = details.field;
    this.span = details.span;
    this.input = details.input;
    this.local = details.local;
    this.zone = details.zone;
  }

  static syntax(message: string, details: CronErrorDetails = {}): CronError {
    return new CronError("syntax", message, details);
  }

  static range(message: string, details: CronErrorDetails = {}): CronError {
    return new CronError("range", message, details);
  }

  static ambiguous(local: Temporal.PlainDateTime, zone: string): CronError {
    return new CronError(
      "ambiguousLocalTime",
      `${local.toString()} is ambiguous in ${zone}`,
      { local, zone },
    );
  }

  static nonExistent(local: Temporal.PlainDateTime, zone: string): CronError {
    return new CronError(
      "nonExistentLocalTime",
      `${local.toString()} does not exist in ${zone}`,
      { local, zone },
    );
  }

  static unmatchable(input: string): CronError {
    return new CronError(
      "unmatchable",
      `expression never matches a calendar date: ${input}`,
      { input },
    );
  }

  static config(message: string): CronError {
    return new CronError("config", message);
  }

  displayRich(): string {
    if ((this.kind === "syntax" || this.kind === "range") && this.span && this.input) {
      let out = `error: ${this.message}\n`;
      out += `  ${this.input}\n`;
      const padding = " ".repeat(this.span.start + 2);
      const underline = "^".repeat(Math.max(this.span.end - this.span.start, 1));
      out += padding + underline;
      return out;
    }
    return `error: ${this.message}`;
  }
}
