// backend/services/shared/src/http/requestId.ts
import type { IncomingMessage } from "node:http";

export const REQUEST_ID_HEADERS = ["x-request-id", "x-correlation-id", "x-amzn-trace-id"] as const;

/** First correlation header the caller supplied, if any. */
export function incomingRequestId(req: IncomingMessage): string | undefined {
  for (const name of REQUEST_ID_HEADERS) {
    const hdr = req.headers[name];
    const v = Array.isArray(hdr) ? hdr[0] : hdr;
    if (v && v.trim()) return v.trim();
  }
  return undefined;
}

/** req.id as assigned by the HTTP logger (pino-http genReqId). */
export function requestIdOf(req: IncomingMessage): string | undefined {
  const id: unknown = Reflect.get(req, "id");
  if (typeof id === "string" && id) return id;
  if (typeof id === "number") return String(id);
  return undefined;
}
