// backend/services/shared/src/viewset/GenericViewSet.ts
/**
 * Purpose:
 * - Minimal viewset: maps the five canonical actions of one resource to
 *   routes. Action bodies are written by the subclass.
 *
 *     GET    /      → list()
 *     POST   /      → create()
 *     GET    /:pk   → retrieve(pk)
 *     PUT    /:pk   → update(pk)
 *     PATCH  /:pk   → partialUpdate(pk)   (defaults to update)
 *     DELETE /:pk   → destroy(pk)
 *
 * Capabilities:
 * - Routes are registered only for the actions listed in `static actions`.
 *   An action listed there but not overridden answers 405.
 *
 * Usage:
 *   class CatsViewSet extends GenericViewSet<CatDeps> {
 *     static override readonly actions = actionSet("list", "retrieve");
 *     override async list() { return ok(await this.deps.cats.all()); }
 *     override async retrieve(pk: Pk) { ... }
 *   }
 *   app.use("/cats", CatsViewSet.createBlueprint("cats", { cats }).router);
 *
 * Notes:
 * - One instance per request; `deps` are the injected collaborators shared
 *   by every request of the blueprint.
 * - pk is parsed by `static pkSchema` (default: decimal digits only, as a
 *   safe integer; "0x1", "1e0" or " 1" do not parse). A pk
 *   that does not parse is a 404, as an unmatched route would be.
 */

import type { Request } from "express";
import { z } from "zod";
import { ServiceBase } from "../base/ServiceBase";
import { BadRequest, MethodNotAllowed } from "../errors/ApiError";
import type { IBoundLogger } from "../logger/Logger";
import { buildBlueprint, type Blueprint } from "./Blueprint";
import type { ActionResponse, CollectionHandler, ItemHandler, Pk, ViewSetAction } from "./actions";

type Awaitable<T> = T | Promise<T>;

export type ViewSetContext = {
  request: Request;
  kwargs: { pk?: Pk };
  requestId?: string;
  log?: IBoundLogger;
};

export type PkSchema = z.ZodType<Pk, z.ZodTypeDef, unknown>;

export interface ViewSetClass<TDeps> {
  new (ctx: ViewSetContext, deps: TDeps): GenericViewSet<TDeps>;
  readonly name: string;
  readonly actions: ReadonlySet<ViewSetAction>;
  readonly pkSchema: PkSchema;
}

const JSON_OBJECT = z.record(z.string(), z.unknown());

export abstract class GenericViewSet<TDeps = undefined> extends ServiceBase {
  public static readonly actions: ReadonlySet<ViewSetAction> = new Set<ViewSetAction>();
  public static readonly pkSchema: PkSchema = z
    .string()
    .regex(/^\d+$/)
    .transform(Number)
    .refine(Number.isSafeInteger);

  public readonly request: Request;
  public readonly kwargs: { pk?: Pk };
  public readonly requestId?: string;
  protected readonly deps: TDeps;

  constructor(ctx: ViewSetContext, deps: TDeps) {
    super({ context: { requestId: ctx.requestId }, log: ctx.log });
    this.request = ctx.request;
    this.kwargs = ctx.kwargs;
    this.requestId = ctx.requestId;
    this.deps = deps;
  }

  /** Assemble the routing unit for this viewset class. */
  public static createBlueprint<TDeps>(this: ViewSetClass<TDeps>, name: string, deps: TDeps): Blueprint {
    return buildBlueprint(this, name, deps);
  }

  // ── Actions (override the ones listed in `static actions`) ────────────────

  public list(): Awaitable<ActionResponse> {
    throw this.notAllowed();
  }

  public create(): Awaitable<ActionResponse> {
    throw this.notAllowed();
  }

  public retrieve(_pk: Pk): Awaitable<ActionResponse> {
    throw this.notAllowed();
  }

  public update(_pk: Pk): Awaitable<ActionResponse> {
    throw this.notAllowed();
  }

  public partialUpdate(pk: Pk): Awaitable<ActionResponse> {
    return this.update(pk);
  }

  public destroy(_pk: Pk): Awaitable<ActionResponse> {
    throw this.notAllowed();
  }

  // ── Dispatch ──────────────────────────────────────────────────────────────

  public dispatchCollection(handler: CollectionHandler): Awaitable<ActionResponse> {
    switch (handler) {
      case "list":
        return this.list();
      case "create":
        return this.create();
    }
  }

  public dispatchItem(handler: ItemHandler, pk: Pk): Awaitable<ActionResponse> {
    switch (handler) {
      case "retrieve":
        return this.retrieve(pk);
      case "update":
        return this.update(pk);
      case "partialUpdate":
        return this.partialUpdate(pk);
      case "destroy":
        return this.destroy(pk);
    }
  }

  // ── Helpers ───────────────────────────────────────────────────────────────

  /** Parsed JSON body; anything but an object is a 400. */
  protected getData(): Record<string, unknown> {
    const parsed = JSON_OBJECT.safeParse(this.request.body);
    if (!parsed.success) throw new BadRequest("Request body must be a JSON object.");
    return parsed.data;
  }

  protected notAllowed(): MethodNotAllowed {
    return new MethodNotAllowed(`Method "${this.request.method}" not allowed.`);
  }
}
