// backend/services/shared/src/errors/ApiError.ts
/**
 * Purpose:
 * - Closed taxonomy of API failures raised by viewsets and serializers.
 * - Each error carries its HTTP status and a human-facing detail; the
 *   boundary (toProblem) is the only place that turns them into responses.
 *
 * Notes:
 * - Errors are raised at detection and never recovered inside the core.
 * - Anything that is not an ApiError is a server bug and surfaces as 500.
 */

export type ApiErrorKind =
  | "bad_request"
  | "unauthorized"
  | "forbidden"
  | "not_found"
  | "method_not_allowed"
  | "validation"
  | "not_implemented";

/** field name -> messages; `nonFieldErrors` holds object-level failures. */
export type FieldErrors = Record<string, string[]>;

export abstract class ApiError extends Error {
  public abstract readonly kind: ApiErrorKind;
  public abstract readonly status: number;
  public abstract readonly title: string;
  public readonly detail: string;

  protected constructor(detail: string) {
    super(detail);
    this.name = new.target.name;
    this.detail = detail;
  }
}

export class BadRequest extends ApiError {
  public readonly kind = "bad_request";
  public readonly status = 400;
  public readonly title = "Bad Request";

  constructor(detail = "Bad Request") {
    super(detail);
  }
}

export class Unauthorized extends ApiError {
  public readonly kind = "unauthorized";
  public readonly status = 401;
  public readonly title = "Unauthorized";

  constructor(detail = "Unauthorized") {
    super(detail);
  }
}

export class Forbidden extends ApiError {
  public readonly kind = "forbidden";
  public readonly status = 403;
  public readonly title = "Forbidden";

  constructor(detail = "Forbidden") {
    super(detail);
  }
}

export class NotFound extends ApiError {
  public readonly kind = "not_found";
  public readonly status = 404;
  public readonly title = "Not Found";

  constructor(detail = "Not Found") {
    super(detail);
  }
}

export class MethodNotAllowed extends ApiError {
  public readonly kind = "method_not_allowed";
  public readonly status = 405;
  public readonly title = "Method Not Allowed";
  /** Methods the path does answer; echoed in the Allow header. */
  public readonly allow: readonly string[];

  constructor(detail = "Method Not Allowed", allow: readonly string[] = []) {
    super(detail);
    this.allow = allow;
  }
}

export class ValidationError extends ApiError {
  public readonly kind = "validation";
  public readonly status = 400;
  public readonly title = "Bad Request";
  public readonly errors: FieldErrors;

  constructor(errors: FieldErrors, detail = "Validation failed") {
    super(detail);
    this.errors = errors;
  }
}

export class NotImplementedError extends ApiError {
  public readonly kind = "not_implemented";
  public readonly status = 501;
  public readonly title = "Not Implemented";

  constructor(detail = "Not Implemented") {
    super(detail);
  }
}

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError;
}
