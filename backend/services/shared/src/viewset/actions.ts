// backend/services/shared/src/viewset/actions.ts
/**
 * Purpose:
 * - The fixed action → route table every viewset blueprint is cut from.
 * - ActionResponse: what an action returns; written to the wire unchanged.
 *
 * Notes:
 * - "update" covers two routes: PUT → update(), PATCH → partialUpdate().
 */

export type ViewSetAction = "list" | "create" | "retrieve" | "update" | "destroy";

export const ALL_ACTIONS: readonly ViewSetAction[] = ["list", "create", "retrieve", "update", "destroy"];

/** Capability descriptor helper: `static actions = actionSet("list", "retrieve")`. */
export function actionSet(...actions: ViewSetAction[]): ReadonlySet<ViewSetAction> {
  return new Set(actions);
}

export type Pk = string | number;

export type HttpMethod = "get" | "post" | "put" | "patch" | "delete";

export type CollectionHandler = "list" | "create";
export type ItemHandler = "retrieve" | "update" | "partialUpdate" | "destroy";

export type CollectionRoute = {
  scope: "collection";
  action: "list" | "create";
  handler: CollectionHandler;
  method: HttpMethod;
  path: "/";
};

export type ItemRoute = {
  scope: "item";
  action: "retrieve" | "update" | "destroy";
  handler: ItemHandler;
  method: HttpMethod;
  path: "/:pk";
};

export type RouteSpec = CollectionRoute | ItemRoute;

export const ROUTE_TABLE: readonly RouteSpec[] = [
  { scope: "collection", action: "list", handler: "list", method: "get", path: "/" },
  { scope: "collection", action: "create", handler: "create", method: "post", path: "/" },
  { scope: "item", action: "retrieve", handler: "retrieve", method: "get", path: "/:pk" },
  { scope: "item", action: "update", handler: "update", method: "put", path: "/:pk" },
  { scope: "item", action: "update", handler: "partialUpdate", method: "patch", path: "/:pk" },
  { scope: "item", action: "destroy", handler: "destroy", method: "delete", path: "/:pk" },
];

// ── Responses ───────────────────────────────────────────────────────────────

export type ActionResponse = {
  status: number;
  /** undefined → empty body. */
  body?: unknown;
  headers?: Record<string, string>;
};

export function ok(body: unknown, status = 200): ActionResponse {
  return { status, body };
}

export function created(body: unknown): ActionResponse {
  return { status: 201, body };
}

export function noContent(): ActionResponse {
  return { status: 204 };
}
