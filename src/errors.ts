export interface ErrorDetail {
  field?: string;
  rule?: string;
  message: string;
}

export class AppError extends Error {
  code: string;
  status: number;
  details?: ErrorDetail[];

  constructor(
    code: string,
    status: number,
    message: string,
    details?: ErrorDetail[],
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export interface UpstreamErrorInit {
  upstreamStatus?: number;
  body?: string;
  reasons?: string[];
}

/**
 * A failed call to the GitHub API. `upstreamStatus` is unset when the request
 * never got a response (DNS, connection reset, timeout).
 */
export class UpstreamError extends AppError {
  readonly upstreamStatus?: number;
  readonly body?: string;
  readonly reasons: string[];

  constructor(message: string, init: UpstreamErrorInit = {}, code = "UPSTREAM_ERROR", status = 502) {
    super(code, status, message);
    this.upstreamStatus = init.upstreamStatus;
    this.body = init.body;
    this.reasons = init.reasons ?? [];
  }
}

export class ResourceNotFoundError extends UpstreamError {
  constructor(message: string, body?: string) {
    super(message, { upstreamStatus: 404, body }, "NOT_FOUND", 404);
  }
}

export class RateLimitedError extends UpstreamError {
  readonly resetAt: Date;

  constructor(message: string, resetAt: Date, init: UpstreamErrorInit = {}) {
    super(message, init, "RATE_LIMITED", 429);
    this.resetAt = resetAt;
  }
}

export class InvalidTargetError extends AppError {
  constructor(message: string) {
    super("INVALID_TARGET", 400, message);
  }
}

export class CancelledError extends AppError {
  constructor(message = "Request cancelled") {
    super("CANCELLED", 499, message);
  }
}

export function unauthorizedError(msg: string): AppError {
  return new AppError("UNAUTHORIZED", 401, msg);
}

export function validationError(details: ErrorDetail[]): AppError {
  return new AppError("VALIDATION_FAILED", 422, "Validation failed", details);
}

export function oauthError(msg: string): AppError {
  return new AppError("OAUTH_FAILED", 400, msg);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
