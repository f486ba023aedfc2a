import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  AppError,
  CancelledError,
  InvalidTargetError,
  RateLimitedError,
  ResourceNotFoundError,
  UpstreamError,
  errorMessage,
} from "./errors.js";

describe("error taxonomy", () => {
  it("keeps not-found and rate limiting within UpstreamError", () => {
    const notFound = new ResourceNotFoundError("User 'ghost' not found or doesn't exist");
    assert.ok(notFound instanceof UpstreamError);
    assert.ok(notFound instanceof AppError);
    assert.equal(notFound.code, "NOT_FOUND");
    assert.equal(notFound.status, 404);
    assert.equal(notFound.upstreamStatus, 404);
    assert.equal(notFound.name, "ResourceNotFoundError");

    const limited = new RateLimitedError("slow down", new Date(1_000));
    assert.ok(limited instanceof UpstreamError);
    assert.equal(limited.status, 429);
    assert.equal(limited.resetAt.getTime(), 1_000);
  });

  it("separates request-shape errors from upstream ones", () => {
    const invalid = new InvalidTargetError("bad target");
    assert.ok(!(invalid instanceof UpstreamError));
    assert.equal(invalid.status, 400);
    assert.equal(new CancelledError().code, "CANCELLED");
    assert.equal(new UpstreamError("Request failed: reset").status, 502);
  });

  it("formats unknown thrown values", () => {
    assert.equal(errorMessage(new Error("x")), "x");
    assert.equal(errorMessage("plain"), "plain");
  });
});
