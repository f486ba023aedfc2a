import http from "node:http";
import type { Express } from "express";
import { throwIfAborted, type Clock } from "./clock.js";
import type { FetchFn, Logger } from "./github/transport.js";

// Shared fakes for the test suites. Nothing here is used at run time.

export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  current: number;

  constructor(start = 1_700_000_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    this.sleeps.push(ms);
    this.current += ms;
  }
}

export interface FakeReply {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}

export interface RecordedCall {
  method: string;
  path: string;
  search: string;
  headers: Record<string, string>;
  body?: unknown;
}

/**
 * In-process stand-in for the GitHub API. Replies are queued per
 * "METHOD /path"; the last queued reply repeats. Unrouted requests get
 * GitHub's 404 body.
 */
export class FakeGitHub {
  readonly calls: RecordedCall[] = [];
  private routes = new Map<string, FakeReply[]>();

  on(method: string, path: string, ...replies: FakeReply[]): this {
    this.routes.set(`${method} ${path}`, replies);
    return this;
  }

  callsTo(method: string, path: string): RecordedCall[] {
    return this.calls.filter((c) => c.method === method && c.path === path);
  }

  fetch: FetchFn = async (url, init) => {
    const parsed = new URL(url);
    const method = init.method ?? "GET";
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });
    let body: unknown;
    if (typeof init.body === "string") {
      body = headers["content-type"] === "application/json" ? JSON.parse(init.body) : init.body;
    }
    this.calls.push({ method, path: parsed.pathname, search: parsed.search, headers, body });

    const queue = this.routes.get(`${method} ${parsed.pathname}`);
    const reply: FakeReply = queue && queue.length > 0
      ? (queue.length > 1 ? queue.shift() : queue[0]) ?? {}
      : { status: 404, body: { message: "Not Found" } };

    const status = reply.status ?? 200;
    let text: string | null;
    if (reply.body === undefined || status === 204) {
      text = status === 204 ? null : "";
    } else {
      text = typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body);
    }
    return new Response(text, { status, headers: reply.headers });
  };
}

export interface CapturedLogger extends Logger {
  lines: string[];
}

export function captureLogger(): CapturedLogger {
  const lines: string[] = [];
  const push = (...args: unknown[]) => {
    lines.push(args.map(String).join(" "));
  };
  return { lines, log: push, warn: push, error: push };
}

export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
};

export interface TestResponse {
  status: number;
  headers: Headers;
  body: unknown;
}

// Runs one request against the app on an ephemeral local port.
export async function request(
  app: Express,
  method: string,
  path: string,
  body?: unknown,
  extraHeaders: Record<string, string> = {},
  signal?: AbortSignal,
): Promise<TestResponse> {
  const server = http.createServer(app);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    server.close();
    throw new Error("test server has no TCP address");
  }
  const { port } = address;

  try {
    const resp = await fetch(`http://127.0.0.1:${port}${path}`, {
      method,
      redirect: "manual",
      signal,
      headers: {
        ...(body !== undefined ? { "Content-Type": "application/json" } : {}),
        ...extraHeaders,
      },
      body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
    });
    const text = await resp.text();
    const isJSON = resp.headers.get("content-type")?.includes("application/json") ?? false;
    const parsed: unknown = isJSON ? JSON.parse(text) : text;
    return { status: resp.status, headers: resp.headers, body: parsed };
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}
