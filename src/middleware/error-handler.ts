import type { Request, Response, NextFunction } from "express";
import { AppError, UpstreamError, type ErrorDetail } from "../errors.js";

interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: ErrorDetail[];
    upstream_status?: number;
  };
}

// body-parser marks malformed JSON with a 400 status and a `body` field.
function isJSONSyntaxError(err: Error): boolean {
  return err instanceof SyntaxError && "body" in err;
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof AppError) {
    const body: ErrorBody = {
      error: {
        code: err.code,
        message: err.message,
      },
    };
    if (err.details && err.details.length > 0) {
      body.error.details = err.details;
    }
    if (err instanceof UpstreamError && err.upstreamStatus !== undefined) {
      body.error.upstream_status = err.upstreamStatus;
    }
    res.status(err.status).json(body);
    return;
  }

  if (isJSONSyntaxError(err)) {
    res.status(400).json({ error: { code: "INVALID_JSON", message: "Request body is not valid JSON" } });
    return;
  }

  console.error("ERROR:", err);
  res.status(500).json({
    error: {
      code: "INTERNAL_ERROR",
      message: "Internal server error",
    },
  });
}
