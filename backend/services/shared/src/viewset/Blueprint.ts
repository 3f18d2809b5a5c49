// backend/services/shared/src/viewset/Blueprint.ts
/**
 * Purpose:
 * - Turn a viewset class into a named, relocatable express.Router.
 * - Pure function of the class's capability descriptor: building twice
 *   yields the same route list.
 *
 * Per request:
 * - parse pk (item routes) → new ViewSet(ctx, deps) → action → write the
 *   ActionResponse as-is (no body → empty response).
 * - ApiErrors are rendered here through toProblem(); any other error is
 *   handed to next() untouched so the app boundary sees the real failure.
 *
 * Notes:
 * - Paths that answer at least one verb reply 405 (with Allow) to the rest.
 * - Debug logs: viewset_enter / viewset_exit / viewset_error.
 */

import express, {
  type ErrorRequestHandler,
  type IRouter,
  type RequestHandler,
  type Response,
  type Router,
} from "express";
import { isApiError, MethodNotAllowed, NotFound } from "../errors/ApiError";
import { toProblem } from "../errors/problem";
import { requestIdOf } from "../http/requestId";
import { getLogger } from "../logger/Logger";
import type { ViewSetClass } from "./GenericViewSet";
import { ROUTE_TABLE, type ActionResponse, type HttpMethod, type Pk, type RouteSpec } from "./actions";

export type BlueprintRoute = {
  action: RouteSpec["action"];
  handler: RouteSpec["handler"];
  method: Uppercase<HttpMethod>;
  path: RouteSpec["path"];
};

export type Blueprint = {
  name: string;
  router: Router;
  routes: readonly BlueprintRoute[];
};

function upper(method: HttpMethod): Uppercase<HttpMethod> {
  switch (method) {
    case "get":
      return "GET";
    case "post":
      return "POST";
    case "put":
      return "PUT";
    case "patch":
      return "PATCH";
    case "delete":
      return "DELETE";
  }
}

function register(router: Router, method: HttpMethod, path: string, handler: RequestHandler): void {
  switch (method) {
    case "get":
      router.get(path, handler);
      return;
    case "post":
      router.post(path, handler);
      return;
    case "put":
      router.put(path, handler);
      return;
    case "patch":
      router.patch(path, handler);
      return;
    case "delete":
      router.delete(path, handler);
      return;
  }
}

function writeResponse(res: Response, result: ActionResponse): void {
  if (result.headers) res.set(result.headers);
  if (result.body === undefined) {
    res.status(result.status).end();
    return;
  }
  res.status(result.status).json(result.body);
}

/** Renders ApiErrors; everything else keeps propagating. */
export const apiErrorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (!isApiError(err)) {
    next(err);
    return;
  }
  const problem = toProblem(err, requestIdOf(req));
  res.status(problem.status).set(problem.headers).json(problem.body);
};

export function buildBlueprint<TDeps>(Cls: ViewSetClass<TDeps>, name: string, deps: TDeps): Blueprint {
  const routes = ROUTE_TABLE.filter((r) => Cls.actions.has(r.action));
  const router = express.Router();
  const log = getLogger().bind({ component: "Blueprint", blueprint: name, viewset: Cls.name });

  const parsePk = (raw: string | undefined): Pk => {
    const parsed = Cls.pkSchema.safeParse(raw);
    if (!parsed.success) throw new NotFound();
    return parsed.data;
  };

  const dispatcher =
    (route: RouteSpec): RequestHandler =>
    (req, res, next) => {
      const requestId = requestIdOf(req);
      const meta = { handler: route.handler, method: req.method, url: req.originalUrl, requestId };
      const start = Date.now();
      log.debug(meta, "viewset_enter");

      Promise.resolve()
        .then(async () => {
          let result: ActionResponse;
          if (route.scope === "item") {
            const pk = parsePk(req.params["pk"]);
            result = await new Cls({ request: req, kwargs: { pk }, requestId }, deps).dispatchItem(route.handler, pk);
          } else {
            result = await new Cls({ request: req, kwargs: {}, requestId }, deps).dispatchCollection(route.handler);
          }

          writeResponse(res, result);
          log.debug({ ...meta, statusCode: result.status, tookMs: Date.now() - start }, "viewset_exit");
        })
        .catch((err: unknown) => {
          log.debug({ ...meta, err: log.serializeError(err), tookMs: Date.now() - start }, "viewset_error");
          next(err);
        });
    };

  for (const route of routes) {
    register(router, route.method, route.path, dispatcher(route));
  }

  for (const path of ["/", "/:pk"] as const) {
    const allow = [...new Set(routes.filter((r) => r.path === path).map((r) => upper(r.method)))];
    if (allow.length === 0) continue;
    router.all(path, (req, _res, next) => {
      next(new MethodNotAllowed(`Method "${req.method}" not allowed.`, allow));
    });
  }

  router.use(apiErrorHandler);

  return {
    name,
    router,
    routes: routes.map((r) => ({ action: r.action, handler: r.handler, method: upper(r.method), path: r.path })),
  };
}

/** Mount a blueprint under urlPrefix on an app or router. */
export function mountBlueprint(target: IRouter, blueprint: Blueprint, urlPrefix: string): void {
  target.use(urlPrefix, blueprint.router);
}
