// backend/services/item/src/repo/itemRepo.ts
/**
 * Purpose:
 * - In-process item store behind an async surface, so a database-backed
 *   repo can replace it without touching serializers or viewsets.
 *
 * Notes:
 * - Insertion order is list order.
 * - Ids start at 1 and are never reused within one store.
 * - Returned items are the stored objects; the serializer mutates them and
 *   calls save().
 */

import { ServiceBase } from "@restset/shared";
import type { Item, NewItem } from "../models/Item";

export type ItemRepoOptions = {
  seed?: readonly Item[];
  /** Clock for dateCreated when the caller gives none. */
  now?: () => Date;
};

export class ItemRepo extends ServiceBase {
  private readonly items = new Map<number, Item>();
  private nextId: number;
  private readonly now: () => Date;

  constructor(opts: ItemRepoOptions = {}) {
    super();
    this.now = opts.now ?? (() => new Date());
    for (const item of opts.seed ?? []) this.items.set(item.id, { ...item });
    this.nextId = Math.max(0, ...this.items.keys()) + 1;
  }

  public async list(): Promise<Item[]> {
    return [...this.items.values()];
  }

  public async findById(id: number): Promise<Item | undefined> {
    return this.items.get(id);
  }

  public async create(input: NewItem): Promise<Item> {
    const item: Item = {
      id: this.nextId++,
      name: input.name,
      dateCreated: input.dateCreated ?? this.now(),
    };
    this.items.set(item.id, item);
    this.log.debug({ id: item.id }, "item_created");
    return item;
  }

  public async save(item: Item): Promise<Item> {
    if (!this.items.has(item.id)) throw new Error(`Item ${item.id} is not stored`);
    this.items.set(item.id, item);
    return item;
  }

  /** false when nothing was stored under id. */
  public async remove(id: number): Promise<boolean> {
    const removed = this.items.delete(id);
    if (removed) this.log.debug({ id }, "item_removed");
    return removed;
  }

  public async count(): Promise<number> {
    return this.items.size;
  }
}
