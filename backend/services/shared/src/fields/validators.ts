// backend/services/shared/src/fields/validators.ts
/**
 * Reusable validators for FieldOptions.validators.
 * Each returns a message on rejection and nothing on success.
 */

import type { Validator } from "./Field";

export function minValue(min: number, message?: string): Validator<number> {
  return (v) => (v < min ? message ?? `Ensure this value is greater than or equal to ${min}.` : undefined);
}

export function maxValue(max: number, message?: string): Validator<number> {
  return (v) => (v > max ? message ?? `Ensure this value is less than or equal to ${max}.` : undefined);
}

export function minLength(min: number, message?: string): Validator<string> {
  return (v) => (v.length < min ? message ?? `Ensure this field has at least ${min} characters.` : undefined);
}

export function maxLength(max: number, message?: string): Validator<string> {
  return (v) => (v.length > max ? message ?? `Ensure this field has no more than ${max} characters.` : undefined);
}

/** `g`/`y` are dropped so a shared pattern carries no lastIndex between calls. */
export function matches(pattern: RegExp, message = "Enter a valid value."): Validator<string> {
  const re = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
  return (v) => (re.test(v) ? undefined : message);
}

export function oneOf<T>(allowed: readonly T[], message?: string): Validator<T> {
  return (v) =>
    allowed.includes(v) ? undefined : message ?? `Must be one of: ${allowed.map(String).join(", ")}.`;
}
