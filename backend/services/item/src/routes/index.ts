// backend/services/item/src/routes/index.ts
import type { Router } from "express";
import { mountBlueprint } from "@restset/shared";
import type { CatRepo } from "../repo/catRepo";
import type { ItemRepo } from "../repo/itemRepo";
import { CatsViewSet } from "../viewsets/catsViewSet";
import { ItemsViewSet } from "../viewsets/itemsViewSet";

export type RouteDeps = { items: ItemRepo; cats: CatRepo };

// one-liners only
export function mountRoutes(api: Router, deps: RouteDeps): void {
  mountBlueprint(api, ItemsViewSet.createBlueprint("items", { items: deps.items }), "/items");
  mountBlueprint(api, CatsViewSet.createBlueprint("cats", { cats: deps.cats }), "/cats");
}
