// backend/services/item/src/viewsets/itemsViewSet.ts
import { ModelViewSet, type Pk, type SerializerClass } from "@restset/shared";
import type { Item } from "../models/Item";
import { ItemSerializer, type ItemDeps } from "../serializers/itemSerializer";

/** Full CRUD over ItemRepo: GET/POST /, GET/PUT/PATCH/DELETE /:pk. */
export class ItemsViewSet extends ModelViewSet<Item, ItemDeps> {
  public override getSerializerClass(): SerializerClass<Item, ItemDeps> {
    return ItemSerializer;
  }

  public override getModels(): Promise<Item[]> {
    return this.deps.items.list();
  }

  public override async getModel(pk: Pk): Promise<Item | undefined> {
    return typeof pk === "number" ? this.deps.items.findById(pk) : undefined;
  }
}
