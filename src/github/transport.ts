import { z } from "zod";
import { systemClock, throwIfAborted, type Clock } from "../clock.js";
import {
  CancelledError,
  RateLimitedError,
  ResourceNotFoundError,
  UpstreamError,
  errorMessage,
} from "../errors.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type Logger = Pick<Console, "log" | "warn" | "error">;

export interface RateLimitState {
  remaining: number;
  // Epoch seconds, as sent in X-RateLimit-Reset.
  reset: number;
}

export interface RequestOptions {
  body?: unknown;
  query?: Record<string, string | number | boolean | undefined>;
  signal?: AbortSignal;
}

export interface TransportOptions {
  token: string;
  baseUrl?: string;
  apiVersion?: string;
  userAgent?: string;
  timeoutMs?: number;
  maxRateLimitRetries?: number;
  maxRateLimitWaitMs?: number;
  clock?: Clock;
  fetch?: FetchFn;
  logger?: Logger;
}

// Transport is what the resource client needs from the wire layer.
export interface Transport {
  request(method: HttpMethod, path: string, opts?: RequestOptions): Promise<unknown>;
}

export const DEFAULT_REMAINING = 5000;

const githubErrorBody = z.object({
  message: z.string().optional(),
  errors: z
    .array(
      z.union([
        z.string(),
        z.object({ message: z.string().optional(), code: z.string().optional() }).passthrough(),
      ]),
    )
    .optional(),
});

interface RawResponse {
  status: number;
  headers: Headers;
  text: string;
}

/**
 * Authenticated JSON transport for the GitHub REST API.
 *
 * Tracks the primary rate limit from response headers. A 403 with no quota
 * left, or a 403/429 carrying Retry-After, is waited out and retried up to
 * `maxRateLimitRetries` times, as long as a single wait stays under
 * `maxRateLimitWaitMs`; beyond that the call fails with RateLimitedError.
 */
export class GitHubTransport implements Transport {
  private token: string;
  private baseUrl: string;
  private apiVersion: string;
  private userAgent: string;
  private timeoutMs: number;
  private maxRetries: number;
  private maxWaitMs: number;
  private clock: Clock;
  private fetchFn: FetchFn;
  private logger: Logger;
  private state: RateLimitState = { remaining: DEFAULT_REMAINING, reset: 0 };

  constructor(opts: TransportOptions) {
    this.token = opts.token;
    this.baseUrl = (opts.baseUrl ?? "https://api.github.com").replace(/\/+$/, "");
    this.apiVersion = opts.apiVersion ?? "2022-11-28";
    this.userAgent = opts.userAgent ?? "gh-invite-service";
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.maxRetries = opts.maxRateLimitRetries ?? 3;
    this.maxWaitMs = opts.maxRateLimitWaitMs ?? 15 * 60 * 1000;
    this.clock = opts.clock ?? systemClock;
    this.fetchFn = opts.fetch ?? ((url, init) => fetch(url, init));
    this.logger = opts.logger ?? console;
  }

  get rateLimit(): Readonly<RateLimitState> {
    return this.state;
  }

  async request(method: HttpMethod, path: string, opts: RequestOptions = {}): Promise<unknown> {
    return this.send(method, path, opts, 0);
  }

  private async send(
    method: HttpMethod,
    path: string,
    opts: RequestOptions,
    attempt: number,
  ): Promise<unknown> {
    throwIfAborted(opts.signal);
    const resp = await this.doFetch(method, path, opts);
    this.updateRateLimit(resp.headers);
    this.logger.log(`GitHub API Response: ${resp.status} - ${resp.text}`);

    const wait = this.throttleWait(resp);
    if (wait !== null) {
      const resetAt = new Date(this.clock.now() + wait);
      if (attempt >= this.maxRetries || wait > this.maxWaitMs) {
        const msg = `GitHub API rate limit exceeded. Reset at ${resetAt.toISOString()}`;
        this.logger.error(`ERROR: ${msg} (${method} ${path}, ${attempt} retries)`);
        throw new RateLimitedError(msg, resetAt, { upstreamStatus: resp.status, body: resp.text });
      }
      this.logger.warn(
        `WARN: GitHub rate limit exceeded. Waiting ${Math.ceil(wait / 1000)}s before retrying ${method} ${path}`,
      );
      await this.clock.sleep(wait, opts.signal);
      return this.send(method, path, opts, attempt + 1);
    }

    if (resp.status === 404 && resp.text.includes("Not Found")) {
      throw new ResourceNotFoundError(`Resource not found: ${method} ${path}`, resp.text);
    }

    if (resp.status < 200 || resp.status >= 300) {
      const msg = `GitHub API error: ${resp.text}`;
      this.logger.error(`ERROR: ${msg}`);
      throw new UpstreamError(msg, {
        upstreamStatus: resp.status,
        body: resp.text,
        reasons: parseReasons(resp.text),
      });
    }

    if (resp.text === "") return {};
    try {
      return JSON.parse(resp.text);
    } catch (err) {
      throw new UpstreamError(`Invalid JSON from GitHub: ${errorMessage(err)}`, {
        upstreamStatus: resp.status,
        body: resp.text,
      });
    }
  }

  private async doFetch(method: HttpMethod, path: string, opts: RequestOptions): Promise<RawResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    opts.signal?.addEventListener("abort", onAbort, { once: true });

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.token}`,
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": this.apiVersion,
      "User-Agent": this.userAgent,
    };
    const init: RequestInit = { method, headers, signal: controller.signal };
    if (opts.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(opts.body);
    }

    try {
      const resp = await this.fetchFn(this.buildUrl(path, opts.query), init);
      const text = await resp.text();
      return { status: resp.status, headers: resp.headers, text };
    } catch (err) {
      if (opts.signal?.aborted) throw new CancelledError();
      const reason = timedOut ? `timed out after ${this.timeoutMs}ms` : errorMessage(err);
      const msg = `Request failed: ${reason}`;
      this.logger.error(`ERROR: ${method} ${path}: ${msg}`);
      throw new UpstreamError(msg);
    } finally {
      clearTimeout(timeout);
      opts.signal?.removeEventListener("abort", onAbort);
    }
  }

  private buildUrl(path: string, query?: RequestOptions["query"]): string {
    const url = new URL(this.baseUrl + path);
    for (const [k, v] of Object.entries(query ?? {})) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }
    return url.toString();
  }

  private updateRateLimit(headers: Headers): void {
    const remaining = Number.parseInt(headers.get("x-ratelimit-remaining") ?? "", 10);
    const reset = Number.parseInt(headers.get("x-ratelimit-reset") ?? "", 10);
    this.state = {
      remaining: Number.isNaN(remaining) ? DEFAULT_REMAINING : remaining,
      reset: Number.isNaN(reset) ? 0 : reset,
    };
  }

  // Milliseconds to wait before retrying, or null when the response is not throttled.
  private throttleWait(resp: RawResponse): number | null {
    if (resp.status === 403 && this.state.remaining === 0) {
      const wait = this.state.reset * 1000 - this.clock.now();
      if (wait > 0) return wait;
    }
    if (resp.status === 403 || resp.status === 429) {
      const retryAfter = Number.parseInt(resp.headers.get("retry-after") ?? "", 10);
      if (!Number.isNaN(retryAfter) && retryAfter >= 0) return retryAfter * 1000;
    }
    return null;
  }
}

/**
 * Pulls the human-readable reasons out of a GitHub error body: the top-level
 * message followed by each `errors[]` entry.
 */
export function parseReasons(text: string): string[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return [];
  }
  const parsed = githubErrorBody.safeParse(json);
  if (!parsed.success) return [];

  const reasons: string[] = [];
  if (parsed.data.message) reasons.push(parsed.data.message);
  for (const e of parsed.data.errors ?? []) {
    if (typeof e === "string") {
      reasons.push(e);
    } else if (e.message) {
      reasons.push(e.message);
    } else if (e.code) {
      reasons.push(e.code);
    }
  }
  return reasons;
}
