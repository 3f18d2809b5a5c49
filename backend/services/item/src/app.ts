// backend/services/item/src/app.ts
/**
 * Purpose:
 * - Assemble the item service on the shared builder:
 *   httpLogger → health → JSON parser → /api/items, /api/cats → 404 → error.
 *
 * Notes:
 * - Repos are injected so tests build an app over their own stores.
 */

import type { Express } from "express";
import { createServiceApp } from "@restset/shared";
import { CatRepo } from "./repo/catRepo";
import { ItemRepo } from "./repo/itemRepo";
import { mountRoutes } from "./routes";

export type CreateAppOptions = {
  serviceName: string;
  items?: ItemRepo;
  cats?: CatRepo;
};

export function createApp(opts: CreateAppOptions): Express {
  const items = opts.items ?? new ItemRepo();
  const cats = opts.cats ?? new CatRepo([]);

  return createServiceApp({
    serviceName: opts.serviceName,
    apiPrefix: "/api",
    readiness: async () => ({ items: await items.count() }),
    mountRoutes: (api) => mountRoutes(api, { items, cats }),
  });
}
