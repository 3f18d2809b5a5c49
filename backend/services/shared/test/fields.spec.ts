// backend/services/shared/test/fields.spec.ts
import { describe, it, expect } from "vitest";
import {
  BooleanField,
  CharField,
  ChoiceField,
  DateTimeField,
  EmailField,
  Field,
  FloatField,
  IntegerField,
  MSG_NULL,
  MSG_REQUIRED,
  MethodField,
  matches,
  maxLength,
  minValue,
  oneOf,
  parseDateTime,
} from "../src";

const MSG_DATETIME = "Datetime has wrong format. Use ISO 8601 or YYYY-MM-DD HH:MM:SS[.ffffff].";

describe("FieldBase.validate – presence rules", () => {
  it("required + absent → required error", () => {
    expect(new CharField({ required: true }).validate(undefined)).toEqual({
      kind: "error",
      errors: [MSG_REQUIRED],
    });
  });

  it("required + absent on partial input → skip", () => {
    expect(new CharField({ required: true }).validate(undefined, { partial: true })).toEqual({ kind: "skip" });
  });

  it("optional + absent → skip", () => {
    expect(new IntegerField().validate(undefined)).toEqual({ kind: "skip" });
  });

  it("default applies to absent input, not to partial input", () => {
    const f = new IntegerField({ default: 7 });
    expect(f.validate(undefined)).toEqual({ kind: "value", value: 7 });
    expect(f.validate(undefined, { partial: true })).toEqual({ kind: "skip" });
  });

  it("defaultFactory is evaluated per use", () => {
    let n = 0;
    const f = new IntegerField({ defaultFactory: () => ++n });
    expect(f.validate(undefined)).toEqual({ kind: "value", value: 1 });
    expect(f.validate(undefined)).toEqual({ kind: "value", value: 2 });
  });

  it("null is rejected unless allowNull", () => {
    expect(new CharField().validate(null)).toEqual({ kind: "error", errors: [MSG_NULL] });
    expect(new CharField({ allowNull: true }).validate(null)).toEqual({ kind: "value", value: null });
  });

  it("runs every validator and reports all messages", () => {
    const f = new IntegerField({
      validators: [minValue(10), (v) => (v % 2 === 0 ? undefined : "Must be even.")],
    });
    expect(f.validate(3)).toEqual({
      kind: "error",
      errors: ["Ensure this value is greater than or equal to 10.", "Must be even."],
    });
    expect(f.validate(12)).toEqual({ kind: "value", value: 12 });
  });

  it("Field accepts any value as-is", () => {
    expect(new Field().validate({ a: [1] })).toEqual({ kind: "value", value: { a: [1] } });
  });
});

describe("CharField", () => {
  it("trims by default", () => {
    expect(new CharField().validate("  hi ")).toEqual({ kind: "value", value: "hi" });
  });

  it("keeps whitespace with trim: false", () => {
    expect(new CharField({ trim: false }).validate(" hi ")).toEqual({ kind: "value", value: " hi " });
  });

  it("rejects blank unless allowBlank", () => {
    expect(new CharField().validate("   ")).toEqual({ kind: "error", errors: ["This field may not be blank."] });
    expect(new CharField({ allowBlank: true }).validate("")).toEqual({ kind: "value", value: "" });
  });

  it("rejects non-strings", () => {
    expect(new CharField().validate(5)).toEqual({ kind: "error", errors: ["Not a valid string."] });
  });

  it("enforces length bounds", () => {
    const f = new CharField({ minLength: 2, maxLength: 3 });
    expect(f.validate("a")).toEqual({ kind: "error", errors: ["Ensure this field has at least 2 characters."] });
    expect(f.validate("abcd")).toEqual({
      kind: "error",
      errors: ["Ensure this field has no more than 3 characters."],
    });
    expect(f.validate("abc")).toEqual({ kind: "value", value: "abc" });
  });
});

describe("EmailField", () => {
  it("accepts and trims a valid address", () => {
    expect(new EmailField().validate(" a@example.com ")).toEqual({ kind: "value", value: "a@example.com" });
  });

  it("rejects an invalid address", () => {
    expect(new EmailField().validate("nope")).toEqual({ kind: "error", errors: ["Enter a valid email address."] });
  });
});

describe("numeric fields", () => {
  it("IntegerField rejects fractions and numeric strings", () => {
    const f = new IntegerField();
    expect(f.validate(1.5)).toEqual({ kind: "error", errors: ["A valid integer is required."] });
    expect(f.validate("3")).toEqual({ kind: "error", errors: ["A valid integer is required."] });
  });

  it("IntegerField enforces min/max", () => {
    const f = new IntegerField({ min: 0, max: 5 });
    expect(f.validate(-1)).toEqual({ kind: "error", errors: ["Ensure this value is greater than or equal to 0."] });
    expect(f.validate(6)).toEqual({ kind: "error", errors: ["Ensure this value is less than or equal to 5."] });
  });

  it("FloatField accepts fractions", () => {
    expect(new FloatField().validate(2.5)).toEqual({ kind: "value", value: 2.5 });
    expect(new FloatField().validate("2.5")).toEqual({ kind: "error", errors: ["A valid number is required."] });
  });
});

describe("BooleanField and ChoiceField", () => {
  it("BooleanField only takes booleans", () => {
    expect(new BooleanField().validate(false)).toEqual({ kind: "value", value: false });
    expect(new BooleanField().validate("yes")).toEqual({ kind: "error", errors: ["Must be a valid boolean."] });
  });

  it("ChoiceField lists the allowed values", () => {
    const f = new ChoiceField({ choices: ["small", "large"] });
    expect(f.validate("large")).toEqual({ kind: "value", value: "large" });
    expect(f.validate("medium")).toEqual({ kind: "error", errors: ["Must be one of: small, large."] });
  });
});

describe("DateTimeField", () => {
  const f = new DateTimeField();

  function iso(raw: unknown): string | undefined {
    const r = f.validate(raw);
    return r.kind === "value" && r.value instanceof Date ? r.value.toISOString() : undefined;
  }

  it("parses ISO 8601 with Z", () => {
    expect(iso("2024-05-01T10:00:00Z")).toBe("2024-05-01T10:00:00.000Z");
  });

  it("applies a numeric offset", () => {
    expect(iso("2024-05-01T12:00:00+02:00")).toBe("2024-05-01T10:00:00.000Z");
  });

  it("reads naive values as UTC and truncates microseconds", () => {
    expect(iso("2024-05-01 10:00:00.123456")).toBe("2024-05-01T10:00:00.123Z");
  });

  it("rejects impossible dates and free text", () => {
    expect(f.validate("2021-02-30 00:00:00")).toEqual({ kind: "error", errors: [MSG_DATETIME] });
    expect(f.validate("yesterday")).toEqual({ kind: "error", errors: [MSG_DATETIME] });
    expect(f.validate(1714557600)).toEqual({ kind: "error", errors: [MSG_DATETIME] });
  });

  it("renders dates as ISO strings", () => {
    const d = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
    expect(f.toRepresentation(d)).toBe("2024-01-02T03:04:05.000Z");
  });

  it("parseDateTime returns null on a bad hour", () => {
    expect(parseDateTime("2024-05-01 24:00:00")).toBeNull();
  });

  it("rejects out-of-range offsets", () => {
    expect(f.validate("2024-05-01T10:00:00+99:99")).toEqual({ kind: "error", errors: [MSG_DATETIME] });
    expect(f.validate("2024-05-01T10:00:00+10:60")).toEqual({ kind: "error", errors: [MSG_DATETIME] });
    expect(iso("2024-05-01T23:59:00+23:59")).toBe("2024-05-01T00:00:00.000Z");
  });

  it("keeps years below 100 as written", () => {
    expect(iso("0050-06-15T00:00:00Z")).toBe("0050-06-15T00:00:00.000Z");
    expect(parseDateTime("0001-01-01 00:00:00")?.getUTCFullYear()).toBe(1);
  });
});

describe("MethodField", () => {
  it("is read-only and computes from the instance", () => {
    const f = new MethodField<{ id: number; name: string }>((i) => `#${i.id} ${i.name}`);
    expect(f.readOnly).toBe(true);
    expect(f.validate()).toEqual({ kind: "skip" });
    expect(f.toRepresentation(undefined, { id: 4, name: "four" })).toBe("#4 four");
  });
});

describe("validators", () => {
  it("matches uses the given or default message", () => {
    expect(matches(/^[a-z]+$/)("ABC")).toBe("Enter a valid value.");
    expect(matches(/^[a-z]+$/, "Lowercase only.")("ABC")).toBe("Lowercase only.");
    expect(matches(/^[a-z]+$/)("abc")).toBeUndefined();
  });

  it("matches gives the same answer on repeated calls with a global pattern", () => {
    const check = matches(/^a/g);
    expect(check("abc")).toBeUndefined();
    expect(check("abc")).toBeUndefined();
    expect(check("abc")).toBeUndefined();
  });

  it("oneOf and maxLength", () => {
    expect(oneOf([1, 2])(3)).toBe("Must be one of: 1, 2.");
    expect(maxLength(2)("abc")).toBe("Ensure this field has no more than 2 characters.");
  });
});
