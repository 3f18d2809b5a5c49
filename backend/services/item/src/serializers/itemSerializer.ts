// backend/services/item/src/serializers/itemSerializer.ts
/**
 * Purpose:
 * - Wire shape of an Item and the write path into ItemRepo.
 *
 *   { id, name, title, dateCreated }
 *
 * Notes:
 * - id and title are output-only; dateCreated may be supplied on create and
 *   defaults to "now" in the repo.
 */

import {
  CharField,
  DateTimeField,
  IntegerField,
  MSG_REQUIRED,
  MethodField,
  Serializer,
  ValidationError,
  type FieldMap,
  type ValidatedData,
} from "@restset/shared";
import type { Item } from "../models/Item";
import type { ItemRepo } from "../repo/itemRepo";

export type ItemDeps = { items: ItemRepo };

export const ITEM_FIELDS = {
  id: new IntegerField({ readOnly: true }),
  name: new CharField({ required: true, maxLength: 100 }),
  title: new MethodField<Item>((item) => `Item ${item.id}: ${item.name}`),
  dateCreated: new DateTimeField(),
} satisfies FieldMap;

type ItemData = ValidatedData<typeof ITEM_FIELDS>;

export class ItemSerializer extends Serializer<Item, typeof ITEM_FIELDS> {
  protected readonly fields = ITEM_FIELDS;
  private readonly deps: ItemDeps;

  constructor(instance: Item | null, deps: ItemDeps) {
    super(instance);
    this.deps = deps;
  }

  public override async create(data: ItemData): Promise<Item> {
    const { name, dateCreated } = data;
    if (typeof name !== "string") throw new ValidationError({ name: [MSG_REQUIRED] });
    return this.deps.items.create({ name, dateCreated: dateCreated ?? undefined });
  }

  public override async update(data: ItemData): Promise<Item> {
    const item = this.requireInstance();
    if (typeof data.name === "string") item.name = data.name;
    if (data.dateCreated instanceof Date) item.dateCreated = data.dateCreated;
    return this.deps.items.save(item);
  }

  public override async destroy(): Promise<void> {
    await this.deps.items.remove(this.requireInstance().id);
  }
}
