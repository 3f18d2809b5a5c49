// backend/services/shared/src/middleware/problemJson.ts
/**
 * Purpose:
 * - App-level tails: Problem+JSON 404 for unknown routes under known
 *   prefixes, and the final error formatter.
 *
 * Notes:
 * - Formatting goes through toProblem(), the same translator blueprints use.
 * - 5xx are logged at error with the thrown error (stack included);
 *   their message never reaches the client.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import { toProblem } from "../errors/problem";
import { NotFound } from "../errors/ApiError";
import { requestIdOf } from "../http/requestId";
import { getLogger } from "../logger/Logger";

export function notFoundProblemJson(validPrefixes: readonly string[]): RequestHandler {
  return (req, res) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      const problem = toProblem(new NotFound("Route not found"), requestIdOf(req));
      res.status(problem.status).set(problem.headers).json(problem.body);
      return;
    }
    res.status(404).end();
  };
}

export function errorProblemJson(serviceName?: string): ErrorRequestHandler {
  const log = getLogger({ component: "errorProblemJson", service: serviceName });

  return (err, req, res, next) => {
    const requestId = requestIdOf(req);
    const problem = toProblem(err, requestId);

    if (problem.status >= 500) {
      log.error(
        { requestId, status: problem.status, method: req.method, path: req.originalUrl, err: log.serializeError(err) },
        "request_error"
      );
    }

    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(problem.status).set(problem.headers).json(problem.body);
  };
}
