// backend/services/shared/src/fields/fields.ts
/**
 * Typed fields. Each one owns a zod schema built from its options; messages
 * are fixed strings so clients (and tests) can rely on them.
 */

import { z } from "zod";
import { FieldBase, type FieldOptions } from "./Field";

// ── Text ────────────────────────────────────────────────────────────────────

export type CharFieldOptions = FieldOptions<string> & {
  minLength?: number;
  maxLength?: number;
  /** Strip surrounding whitespace before length checks. Default true. */
  trim?: boolean;
  /** Accept "". Default false. */
  allowBlank?: boolean;
};

export class CharField extends FieldBase<string> {
  protected readonly schema: z.ZodType<string, z.ZodTypeDef, unknown>;

  constructor(opts: CharFieldOptions = {}) {
    super(opts);
    let s = z.string({ invalid_type_error: "Not a valid string." });
    if (opts.trim ?? true) s = s.trim();
    if (!opts.allowBlank) s = s.min(1, "This field may not be blank.");
    if (opts.minLength !== undefined) {
      s = s.min(opts.minLength, `Ensure this field has at least ${opts.minLength} characters.`);
    }
    if (opts.maxLength !== undefined) {
      s = s.max(opts.maxLength, `Ensure this field has no more than ${opts.maxLength} characters.`);
    }
    this.schema = s;
  }
}

export class EmailField extends FieldBase<string> {
  protected readonly schema = z
    .string({ invalid_type_error: "Not a valid string." })
    .trim()
    .email("Enter a valid email address.");
}

// ── Numbers ─────────────────────────────────────────────────────────────────

export type NumberFieldOptions = FieldOptions<number> & {
  min?: number;
  max?: number;
};

function bounded(base: z.ZodNumber, opts: NumberFieldOptions): z.ZodNumber {
  let s = base;
  if (opts.min !== undefined) {
    s = s.gte(opts.min, `Ensure this value is greater than or equal to ${opts.min}.`);
  }
  if (opts.max !== undefined) {
    s = s.lte(opts.max, `Ensure this value is less than or equal to ${opts.max}.`);
  }
  return s;
}

export class IntegerField extends FieldBase<number> {
  protected readonly schema: z.ZodNumber;

  constructor(opts: NumberFieldOptions = {}) {
    super(opts);
    this.schema = bounded(
      z.number({ invalid_type_error: "A valid integer is required." }).int("A valid integer is required."),
      opts
    );
  }
}

export class FloatField extends FieldBase<number> {
  protected readonly schema: z.ZodNumber;

  constructor(opts: NumberFieldOptions = {}) {
    super(opts);
    this.schema = bounded(
      z.number({ invalid_type_error: "A valid number is required." }).finite("A valid number is required."),
      opts
    );
  }
}

// ── Misc ────────────────────────────────────────────────────────────────────

export class BooleanField extends FieldBase<boolean> {
  protected readonly schema = z.boolean({ invalid_type_error: "Must be a valid boolean." });
}

export type ChoiceFieldOptions<T extends string | number> = FieldOptions<T> & {
  choices: readonly T[];
};

export class ChoiceField<T extends string | number> extends FieldBase<T> {
  public readonly choices: readonly T[];
  protected readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;

  constructor(opts: ChoiceFieldOptions<T>) {
    super(opts);
    this.choices = opts.choices;
    const allowed = new Set<unknown>(opts.choices);
    this.schema = z.custom<T>((v) => allowed.has(v), {
      message: `Must be one of: ${opts.choices.join(", ")}.`,
    });
  }
}

// ── Dates ───────────────────────────────────────────────────────────────────

// ISO-8601 ("2024-05-01T10:00:00Z") or naive "YYYY-MM-DD HH:MM:SS.ffffff".
const DATETIME_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

const MSG_DATETIME = "Datetime has wrong format. Use ISO 8601 or YYYY-MM-DD HH:MM:SS[.ffffff].";

/** Minutes east of UTC; null when hours > 23 or minutes > 59. */
function offsetMinutes(zone: string | undefined): number | null {
  if (!zone || zone.toUpperCase() === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

/** Naive values (no zone) are read as UTC. Returns null when unparsable. */
export function parseDateTime(input: string): Date | null {
  const m = DATETIME_RE.exec(input.trim());
  if (!m) return null;

  const [, y, mo, d, h = "0", mi = "0", s = "0", frac = "", zone] = m;
  const year = Number(y);
  const month = Number(mo) - 1;
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (hour > 23 || minute > 59 || second > 59) return null;

  const offset = offsetMinutes(zone);
  if (offset === null) return null;

  // setUTCFullYear keeps years 0-99 as written (Date.UTC maps them to 19xx).
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  date.setUTCHours(hour, minute, second, Number(frac.padEnd(3, "0").slice(0, 3)));
  // 2021-02-30 rolls over to March; reject instead.
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    return null;
  }
  return new Date(date.getTime() - offset * 60_000);
}

export class DateTimeField extends FieldBase<Date> {
  protected readonly schema = z.unknown().transform((v, ctx): Date => {
    const parsed =
      v instanceof Date ? (Number.isNaN(v.getTime()) ? null : v) : typeof v === "string" ? parseDateTime(v) : null;
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: MSG_DATETIME });
      return z.NEVER;
    }
    return parsed;
  });

  public override toRepresentation(value: unknown): unknown {
    return value instanceof Date ? value.toISOString() : value;
  }
}
