// backend/services/shared/src/errors/problem.ts
/**
 * Purpose:
 * - Pure translator from a thrown value to a Problem+JSON response shape.
 * - Shared by the blueprint error handler and the app-level error middleware,
 *   so both boundaries answer with the same body for the same error.
 *
 * Notes:
 * - Unknown errors map to a bare 500; their message never reaches the wire.
 * - Client errors raised by body-parser (http-errors with `expose: true`)
 *   keep their status; a JSON syntax error reads "Malformed JSON body.".
 */

import { isApiError, MethodNotAllowed, ValidationError, type FieldErrors } from "./ApiError";

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

export type ProblemBody = {
  type: string;
  title: string;
  status: number;
  detail: string;
  errors?: FieldErrors;
  requestId?: string;
};

export type Problem = {
  status: number;
  headers: Record<string, string>;
  body: ProblemBody;
};

const STATUS_TITLES: Record<number, string> = {
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  413: "Payload Too Large",
  415: "Unsupported Media Type",
  500: "Internal Server Error",
  501: "Not Implemented",
};

function titleFor(status: number): string {
  return STATUS_TITLES[status] ?? (status >= 500 ? "Server Error" : "Request Error");
}

function prop(obj: object, key: string): unknown {
  return Reflect.get(obj, key);
}

/** http-errors style client error (body-parser et al.), or null. */
function exposedClientError(err: unknown): { status: number; detail: string } | null {
  if (!err || typeof err !== "object") return null;
  if (prop(err, "expose") !== true) return null;

  const raw = prop(err, "status") ?? prop(err, "statusCode");
  const status = typeof raw === "number" ? raw : Number.NaN;
  if (!Number.isInteger(status) || status < 400 || status >= 500) return null;

  if (prop(err, "type") === "entity.parse.failed") {
    return { status, detail: "Malformed JSON body." };
  }
  const message = prop(err, "message");
  return { status, detail: typeof message === "string" && message ? message : titleFor(status) };
}

function withRequestId(body: ProblemBody, requestId?: string): ProblemBody {
  return requestId ? { ...body, requestId } : body;
}

export function toProblem(err: unknown, requestId?: string): Problem {
  const headers: Record<string, string> = { "content-type": PROBLEM_CONTENT_TYPE };

  if (isApiError(err)) {
    const body: ProblemBody = {
      type: "about:blank",
      title: err.title,
      status: err.status,
      detail: err.detail,
    };
    if (err instanceof ValidationError) body.errors = err.errors;
    if (err instanceof MethodNotAllowed && err.allow.length > 0) {
      headers["allow"] = err.allow.join(", ");
    }
    return { status: err.status, headers, body: withRequestId(body, requestId) };
  }

  const client = exposedClientError(err);
  if (client) {
    return {
      status: client.status,
      headers,
      body: withRequestId(
        {
          type: "about:blank",
          title: titleFor(client.status),
          status: client.status,
          detail: client.detail,
        },
        requestId
      ),
    };
  }

  return {
    status: 500,
    headers,
    body: withRequestId(
      {
        type: "about:blank",
        title: "Internal Server Error",
        status: 500,
        detail: "Internal Server Error",
      },
      requestId
    ),
  };
}
