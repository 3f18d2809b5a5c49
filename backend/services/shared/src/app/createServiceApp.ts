// backend/services/shared/src/app/createServiceApp.ts
/**
 * Purpose:
 * - Shared Express builder for services exposing viewset blueprints.
 * - Order: http logger (request id) → health → JSON parser → routes under
 *   apiPrefix → Problem+JSON 404 → error formatter.
 *
 * Notes:
 * - Body parsing happens before routes; malformed JSON reaches the error
 *   formatter as a 400.
 * - mountRoutes receives the API router; blueprints go on it via
 *   mountBlueprint(api, blueprint, "/items").
 */

import express, { type Express, type Router } from "express";
import { createHealthRouter, type ReadinessFn } from "../health";
import { makeHttpLogger } from "../middleware/httpLogger";
import { errorProblemJson, notFoundProblemJson } from "../middleware/problemJson";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "item"). Used in logs. */
  serviceName: string;
  /** API base path (e.g., "/api"). */
  apiPrefix: string;
  mountRoutes: (router: Router) => void;
  readiness?: ReadinessFn;
  /** express.json limit. Default "1mb". */
  bodyLimit?: string;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, apiPrefix, mountRoutes, readiness } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Transport & telemetry ───────────────────────────────────────────────────
  app.use(makeHttpLogger(serviceName));

  // ── Health (public) ────────────────────────────────────────────────────────
  app.use(createHealthRouter({ service: serviceName, readiness }));

  // ── Body parser ────────────────────────────────────────────────────────────
  app.use(express.json({ limit: opts.bodyLimit ?? "1mb" }));

  // ── Routes ─────────────────────────────────────────────────────────────────
  const api = express.Router();
  mountRoutes(api);
  app.use(apiPrefix, api);

  // ── Tails: 404 + error formatter ───────────────────────────────────────────
  app.use(notFoundProblemJson([apiPrefix, "/health"]));
  app.use(errorProblemJson(serviceName));

  return app;
}
