// backend/services/shared/src/middleware/httpLogger.ts
/**
 * Purpose:
 * - Structured per-request logs (pino-http) tagged with the service name.
 * - Owns the request id: reuse x-request-id / x-correlation-id /
 *   x-amzn-trace-id when supplied, otherwise mint a UUID; always echo it
 *   back as x-request-id.
 *
 * Notes:
 * - Severity: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health checks are not logged.
 */

import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import pinoHttp, { type HttpLogger } from "pino-http";
import { incomingRequestId } from "../http/requestId";
import { getRootLogger } from "../logger/Logger";

const QUIET_PATHS = new Set(["/health", "/health/live", "/health/ready", "/healthz", "/readyz", "/favicon.ico"]);

export function makeHttpLogger(serviceName: string): HttpLogger {
  const logger = getRootLogger().child({ service: serviceName });

  return pinoHttp({
    logger,

    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const id = incomingRequestId(req) ?? randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
      if (err || res.statusCode >= 500) return "error";
      if (res.statusCode >= 400) return "warn";
      return "info";
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has((req.url ?? "").split("?")[0] ?? ""),
    },

    serializers: {
      req(req: IncomingMessage & { id?: unknown }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message, stack: err.stack };
      },
    },
  });
}
