// backend/services/shared/src/serializer/Serializer.ts
/**
 * Purpose:
 * - Bridge between raw request payloads and an application's models.
 * - Validates input against the declared field map, calls the write hooks
 *   (create/update/destroy) and shapes output from the bound instance.
 *
 * Lifecycle:
 * - Constructed per request; unbound (instance === null) for list/create,
 *   bound for retrieve/update/destroy. Never shared across requests.
 *
 * Notes:
 * - The serializer knows nothing about storage. Subclasses implement the
 *   hooks against whatever they were constructed with (repo, client, ...).
 * - Write hooks must only be called after isValid() returned true; that is
 *   the caller's contract and is not re-checked here.
 */

import { NotImplementedError, ValidationError, type FieldErrors } from "../errors/ApiError";
import type { FieldMap, ValidateOptions, ValidatedData } from "../fields/Field";

export const NON_FIELD_ERRORS = "nonFieldErrors";

type Awaitable<T> = T | Promise<T>;

export abstract class Serializer<TModel extends object, TFields extends FieldMap = FieldMap> {
  public instance: TModel | null;
  public validatedData: ValidatedData<TFields> = {};
  public errors: FieldErrors = {};

  /** Shared, module-level declaration; never mutated per request. */
  protected abstract readonly fields: TFields;

  constructor(instance: TModel | null = null) {
    this.instance = instance;
  }

  public get isBound(): boolean {
    return this.instance !== null;
  }

  /** Bound instance for hooks that need one (update/destroy). */
  protected requireInstance(): TModel {
    if (this.instance === null) {
      throw new Error(`${this.constructor.name} is not bound to an instance`);
    }
    return this.instance;
  }

  // ── Validation ────────────────────────────────────────────────────────────

  /**
   * Validate `data` against every writable field. Recomputes from scratch on
   * each call. On success `validatedData` holds only writable, present (or
   * defaulted) fields and `errors` is empty.
   */
  public isValid(data: Readonly<Record<string, unknown>>, opts: ValidateOptions = {}): boolean {
    const errors: FieldErrors = {};
    // No prototype: a field named "constructor" or "__proto__" stays a plain key.
    const cleaned: Record<string, unknown> = Object.create(null);
    const fields: FieldMap = this.fields;

    for (const [name, field] of Object.entries(fields)) {
      if (field.readOnly) continue;

      const raw = Object.prototype.hasOwnProperty.call(data, name) ? data[name] : undefined;
      const result = field.validate(raw, opts);
      switch (result.kind) {
        case "error":
          errors[name] = result.errors;
          break;
        case "value":
          cleaned[name] = result.value;
          break;
        case "skip":
          break;
      }
    }

    if (Object.keys(errors).length === 0) {
      const objectErrors = this.validate(cleaned, opts);
      if (objectErrors && objectErrors.length > 0) errors[NON_FIELD_ERRORS] = [...objectErrors];
    }

    this.errors = errors;
    if (Object.keys(errors).length > 0) {
      this.validatedData = {};
      return false;
    }
    this.validatedData = this.toValidatedData(cleaned);
    return true;
  }

  /** Throw the current `errors` as a ValidationError when there are any. */
  public assertValid(): void {
    if (Object.keys(this.errors).length > 0) throw new ValidationError(this.errors);
  }

  /**
   * Object-level hook, run after every field passed. Return messages to
   * reject the payload as a whole (they land under `nonFieldErrors`).
   */
  protected validate(
    _attrs: Readonly<Record<string, unknown>>,
    _opts: ValidateOptions
  ): readonly string[] | undefined | void {
    return undefined;
  }

  private toValidatedData(cleaned: Record<string, unknown>): ValidatedData<TFields> {
    const out: ValidatedData<TFields> = {};
    for (const key of Object.keys(this.fields)) {
      if (Object.prototype.hasOwnProperty.call(cleaned, key)) Reflect.set(out, key, cleaned[key]);
    }
    return out;
  }

  // ── Write hooks ───────────────────────────────────────────────────────────

  /** Store a new model built from validated data and return it. */
  public create(_validatedData: ValidatedData<TFields>): Awaitable<TModel> {
    throw new NotImplementedError(`${this.constructor.name} does not implement create()`);
  }

  /**
   * Apply validated data to `this.instance`. Only keys present in
   * `validatedData` may be touched. May return a replacement instance.
   */
  public update(_validatedData: ValidatedData<TFields>): Awaitable<TModel | void> {
    throw new NotImplementedError(`${this.constructor.name} does not implement update()`);
  }

  /** Remove `this.instance` from storage. */
  public destroy(): Awaitable<void> {
    throw new NotImplementedError(`${this.constructor.name} does not implement destroy()`);
  }

  public async doCreate(): Promise<TModel> {
    const created = await this.create(this.validatedData);
    this.instance = created;
    return created;
  }

  public async doUpdate(): Promise<TModel | null> {
    const replaced = await this.update(this.validatedData);
    if (replaced) this.instance = replaced;
    return this.instance;
  }

  public async doDestroy(): Promise<void> {
    await this.destroy();
    this.instance = null;
  }

  // ── Output ────────────────────────────────────────────────────────────────

  /** Every declared field (read-only included) read from the bound instance. */
  public serialize(): Record<string, unknown> {
    const instance = this.instance;
    if (instance === null) {
      throw new Error(`${this.constructor.name}.serialize() requires a bound instance`);
    }
    const out: Record<string, unknown> = {};
    const fields: FieldMap = this.fields;
    for (const [name, field] of Object.entries(fields)) {
      out[name] = field.toRepresentation(field.readValue(instance, name), instance);
    }
    return out;
  }
}

export type SerializerClass<TModel extends object, TDeps> = new (
  instance: TModel | null,
  deps: TDeps
) => Serializer<TModel>;
