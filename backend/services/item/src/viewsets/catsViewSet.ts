// backend/services/item/src/viewsets/catsViewSet.ts
/**
 * Hand-written actions on the generic viewset; only list and retrieve are
 * routed, so POST/PUT/PATCH/DELETE answer 405.
 */

import { GenericViewSet, NotFound, actionSet, ok, type ActionResponse, type Pk } from "@restset/shared";
import type { CatRepo } from "../repo/catRepo";

export type CatDeps = { cats: CatRepo };

export class CatsViewSet extends GenericViewSet<CatDeps> {
  public static override readonly actions = actionSet("list", "retrieve");

  public override async list(): Promise<ActionResponse> {
    return ok(await this.deps.cats.all());
  }

  public override async retrieve(pk: Pk): Promise<ActionResponse> {
    const cat = typeof pk === "number" ? await this.deps.cats.findById(pk) : undefined;
    if (!cat) throw new NotFound("Cat not found.");
    return ok(cat);
  }
}
