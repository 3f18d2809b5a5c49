// backend/services/shared/src/fields/Field.ts
/**
 * Purpose:
 * - One attribute declaration of a serializer: how a raw input value is
 *   checked/cleaned, and how the stored value is shaped for output.
 *
 * Rules (validate):
 * - absent (`undefined`): required → "This field is required." (skipped on
 *   partial validation); otherwise the declared default, otherwise skip.
 * - `null`: accepted only with allowNull.
 * - parse through the field's zod schema; validators only see parsed values.
 * - every validator runs; all messages are returned together.
 *
 * Notes:
 * - Fields are declared once per serializer (module-level map) and never
 *   mutated, so one instance is shared by every request.
 * - readOnly fields are never read from input; serializers skip them.
 */

import { z } from "zod";

export const MSG_REQUIRED = "This field is required.";
export const MSG_NULL = "This field may not be null.";

export type ValidateOptions = {
  /** Partial input (updates): absent fields are skipped, not required. */
  partial?: boolean;
};

export type FieldResult<T> =
  | { kind: "value"; value: T | null }
  | { kind: "skip" }
  | { kind: "error"; errors: string[] };

/** Returns message(s) when the value is rejected, nothing when accepted. */
export type Validator<T> = (value: T) => string | readonly string[] | undefined | void;

/** Shape every field exposes to serializers. */
export interface FieldLike<T = unknown> {
  readonly required: boolean;
  readonly readOnly: boolean;
  validate(raw: unknown, opts?: ValidateOptions): FieldResult<T>;
  readValue(instance: object, name: string): unknown;
  toRepresentation(value: unknown, instance: object): unknown;
}

export type FieldMap = Readonly<Record<string, FieldLike>>;

export type FieldValue<F> = F extends FieldLike<infer T> ? T : never;

/** Cleaned, writable input keyed by field name. */
export type ValidatedData<F extends FieldMap> = {
  -readonly [K in keyof F]?: FieldValue<F[K]> | null;
};

export type FieldOptions<T> = {
  required?: boolean;
  readOnly?: boolean;
  allowNull?: boolean;
  /** Used when the field is absent from create input. */
  default?: T;
  /** Like `default`, evaluated per use (timestamps, fresh arrays). */
  defaultFactory?: () => T;
  validators?: ReadonlyArray<Validator<T>>;
};

export abstract class FieldBase<T> implements FieldLike<T> {
  public readonly required: boolean;
  public readonly readOnly: boolean;
  public readonly allowNull: boolean;
  private readonly defaultFactory?: () => T;
  private readonly validators: ReadonlyArray<Validator<T>>;

  protected abstract readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;

  constructor(opts: FieldOptions<T> = {}) {
    this.required = opts.required ?? false;
    this.readOnly = opts.readOnly ?? false;
    this.allowNull = opts.allowNull ?? false;
    this.validators = opts.validators ?? [];

    const fixed = opts.default;
    if (opts.defaultFactory) this.defaultFactory = opts.defaultFactory;
    else if (fixed !== undefined) this.defaultFactory = () => fixed;
  }

  public validate(raw: unknown, opts: ValidateOptions = {}): FieldResult<T> {
    const partial = opts.partial ?? false;

    if (raw === undefined) {
      if (partial) return { kind: "skip" };
      if (this.required) return { kind: "error", errors: [MSG_REQUIRED] };
      if (this.defaultFactory) return { kind: "value", value: this.defaultFactory() };
      return { kind: "skip" };
    }

    if (raw === null) {
      return this.allowNull
        ? { kind: "value", value: null }
        : { kind: "error", errors: [MSG_NULL] };
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      return { kind: "error", errors: dedupe(parsed.error.issues.map((i) => i.message)) };
    }

    const errors: string[] = [];
    for (const validator of this.validators) {
      const out = validator(parsed.data);
      if (typeof out === "string") errors.push(out);
      else if (out) errors.push(...out);
    }
    if (errors.length > 0) return { kind: "error", errors };

    return { kind: "value", value: parsed.data };
  }

  public readValue(instance: object, name: string): unknown {
    return Reflect.get(instance, name);
  }

  public toRepresentation(value: unknown, _instance: object): unknown {
    return value;
  }
}

function dedupe(messages: string[]): string[] {
  return [...new Set(messages)];
}

/** Untyped field: accepts any JSON value as-is. */
export class Field extends FieldBase<unknown> {
  protected readonly schema = z.unknown();
}

/**
 * Read-only field whose output is computed from the bound instance,
 * e.g. a display title built from other attributes.
 */
export class MethodField<TModel extends object> implements FieldLike<never> {
  public readonly required = false;
  public readonly readOnly = true;

  constructor(private readonly compute: (instance: TModel) => unknown) {}

  public validate(): FieldResult<never> {
    return { kind: "skip" };
  }

  public readValue(): unknown {
    return undefined;
  }

  public toRepresentation(_value: unknown, instance: TModel): unknown {
    return this.compute(instance);
  }
}
