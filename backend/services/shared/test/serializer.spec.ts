// backend/services/shared/test/serializer.spec.ts
import { describe, it, expect } from "vitest";
import {
  CharField,
  IntegerField,
  MSG_REQUIRED,
  NON_FIELD_ERRORS,
  NotImplementedError,
  Serializer,
  ValidationError,
  type FieldMap,
  type ValidatedData,
  type ValidateOptions,
} from "../src";

type Pet = { id: number; name: string; age: number | null };

const PET_FIELDS = {
  id: new IntegerField({ readOnly: true }),
  name: new CharField({ required: true }),
  age: new IntegerField({ allowNull: true, min: 0 }),
} satisfies FieldMap;

type PetData = ValidatedData<typeof PET_FIELDS>;

class PetSerializer extends Serializer<Pet, typeof PET_FIELDS> {
  protected readonly fields = PET_FIELDS;
  public hookCalls = 0;
  public createCalls = 0;

  constructor(
    instance: Pet | null,
    private readonly store: Pet[]
  ) {
    super(instance);
  }

  public override create(data: PetData): Pet {
    this.createCalls += 1;
    const pet: Pet = { id: this.store.length + 1, name: String(data.name), age: data.age ?? null };
    this.store.push(pet);
    return pet;
  }

  public override update(data: PetData): void {
    const pet = this.requireInstance();
    if (typeof data.name === "string") pet.name = data.name;
    if (data.age !== undefined) pet.age = data.age;
  }

  public override destroy(): void {
    const id = this.requireInstance().id;
    const idx = this.store.findIndex((p) => p.id === id);
    if (idx >= 0) this.store.splice(idx, 1);
  }

  protected override validate(attrs: Readonly<Record<string, unknown>>, _opts: ValidateOptions): string[] | undefined {
    this.hookCalls += 1;
    return attrs["name"] === "admin" ? ["Reserved name."] : undefined;
  }
}

class BareSerializer extends Serializer<Pet> {
  protected readonly fields: FieldMap = { name: new CharField() };
}

class ShadowingSerializer extends Serializer<Pet> {
  protected readonly fields: FieldMap = {
    constructor: new CharField(),
    toString: new CharField(),
    name: new CharField(),
  };
}

describe("Serializer.isValid", () => {
  it("collects writable fields and ignores read-only input", () => {
    const s = new PetSerializer(null, []);
    expect(s.isValid({ id: 99, name: "Rex", age: 3 })).toBe(true);
    expect(s.validatedData).toEqual({ name: "Rex", age: 3 });
    expect(s.errors).toEqual({});
  });

  it("reports missing required fields", () => {
    const s = new PetSerializer(null, []);
    expect(s.isValid({})).toBe(false);
    expect(s.errors).toEqual({ name: [MSG_REQUIRED] });
    expect(s.validatedData).toEqual({});
  });

  it("puts object-level failures under nonFieldErrors", () => {
    const s = new PetSerializer(null, []);
    expect(s.isValid({ name: "admin" })).toBe(false);
    expect(s.errors).toEqual({ [NON_FIELD_ERRORS]: ["Reserved name."] });
  });

  it("skips the object hook while any field fails", () => {
    const s = new PetSerializer(null, []);
    expect(s.isValid({ name: "admin", age: -1 })).toBe(false);
    expect(s.errors).toEqual({ age: ["Ensure this value is greater than or equal to 0."] });
    expect(s.hookCalls).toBe(0);
  });

  it("recomputes state on every call", () => {
    const s = new PetSerializer(null, []);
    expect(s.isValid({})).toBe(false);
    expect(s.isValid({ name: "Rex" })).toBe(true);
    expect(s.errors).toEqual({});
    expect(s.validatedData).toEqual({ name: "Rex" });
  });

  it("gives the same result when called twice with one payload", () => {
    const s = new PetSerializer(null, []);

    expect(s.isValid({ name: "", age: "x" })).toBe(false);
    const firstErrors = s.errors;
    expect(s.isValid({ name: "", age: "x" })).toBe(false);
    expect(s.errors).toEqual(firstErrors);
    expect(s.validatedData).toEqual({});

    expect(s.isValid({ name: "Rex", age: 2 })).toBe(true);
    const firstData = s.validatedData;
    expect(s.isValid({ name: "Rex", age: 2 })).toBe(true);
    expect(s.validatedData).toEqual(firstData);
    expect(s.errors).toEqual({});
  });

  it("fields named like Object.prototype members only appear when supplied", () => {
    const s = new ShadowingSerializer();
    expect(s.isValid({ name: "x" })).toBe(true);
    expect(Object.keys(s.validatedData)).toEqual(["name"]);
    expect(s.validatedData).toEqual({ name: "x" });

    expect(s.isValid({ constructor: "c", name: "x" }, { partial: true })).toBe(true);
    expect(Object.keys(s.validatedData)).toEqual(["constructor", "name"]);
    expect(Reflect.get(s.validatedData, "constructor")).toBe("c");
  });

  it("does not read inherited keys from the payload", () => {
    const payload: Record<string, unknown> = Object.create({ name: "Inherited" });
    const s = new PetSerializer(null, []);
    expect(s.isValid(payload)).toBe(false);
    expect(s.errors).toEqual({ name: [MSG_REQUIRED] });
  });

  it("assertValid throws the current errors", () => {
    const s = new PetSerializer(null, []);
    s.isValid({});
    expect(() => s.assertValid()).toThrow(ValidationError);
    try {
      s.assertValid();
    } catch (err) {
      expect(err instanceof ValidationError && err.errors).toEqual({ name: [MSG_REQUIRED] });
    }
  });
});

describe("Serializer write hooks", () => {
  it("doCreate stores and binds the new model", async () => {
    const store: Pet[] = [];
    const s = new PetSerializer(null, store);
    expect(s.isValid({ name: "Rex" })).toBe(true);
    await s.doCreate();
    expect(s.createCalls).toBe(1);
    expect(s.instance).toEqual({ id: 1, name: "Rex", age: null });
    expect(s.serialize()).toEqual({ id: 1, name: "Rex", age: null });
    expect(store).toHaveLength(1);
  });

  it("partial update only touches supplied keys", async () => {
    const pet: Pet = { id: 1, name: "Rex", age: 3 };
    const s = new PetSerializer(pet, [pet]);
    expect(s.isValid({ age: null }, { partial: true })).toBe(true);
    expect(s.validatedData).toEqual({ age: null });
    await s.doUpdate();
    expect(pet).toEqual({ id: 1, name: "Rex", age: null });
  });

  it("doDestroy removes and unbinds", async () => {
    const pet: Pet = { id: 1, name: "Rex", age: 3 };
    const store = [pet];
    const s = new PetSerializer(pet, store);
    await s.doDestroy();
    expect(store).toEqual([]);
    expect(s.instance).toBeNull();
    expect(s.isBound).toBe(false);
  });

  it("missing hooks raise NotImplementedError", async () => {
    const s = new BareSerializer();
    expect(s.isValid({ name: "x" })).toBe(true);
    await expect(s.doCreate()).rejects.toThrow("BareSerializer does not implement create()");
    await expect(s.doCreate()).rejects.toBeInstanceOf(NotImplementedError);
    expect(() => s.destroy()).toThrow(NotImplementedError);
  });

  it("serialize requires a bound instance", () => {
    expect(() => new BareSerializer().serialize()).toThrow("BareSerializer.serialize() requires a bound instance");
  });
});
