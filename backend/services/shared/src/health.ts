// backend/services/shared/src/health.ts
/**
 * Liveness and readiness, public and dependency-light.
 *
 * Exposes:
 *   GET /health/live    -> process is up
 *   GET /health/ready   -> readiness() details; 503 when it throws
 */

import express, { type Request, type Router } from "express";
import { requestIdOf } from "./http/requestId";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = (req: Request) => Promise<ReadinessDetails> | ReadinessDetails;

type Options = {
  service: string;
  readiness?: ReadinessFn;
};

export function createHealthRouter(opts: Options): Router {
  const router = express.Router();
  const base = () => ({ service: opts.service });

  router.get("/health/live", (req, res) => {
    res.json({ ...base(), status: "live", requestId: requestIdOf(req) });
  });

  router.get("/health/ready", (req, res, next) => {
    Promise.resolve()
      .then(() => (opts.readiness ? opts.readiness(req) : {}))
      .then((details) => {
        res.json({ ...base(), status: "ready", details, requestId: requestIdOf(req) });
      })
      .catch((err: unknown) => {
        if (res.headersSent) return next(err);
        res.status(503).json({
          ...base(),
          status: "not_ready",
          error: err instanceof Error ? err.message : String(err),
          requestId: requestIdOf(req),
        });
      });
  });

  return router;
}
