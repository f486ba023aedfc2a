import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { z } from "zod";

const serverSchema = z
  .object({
    port: z.number().int().positive().default(8000),
    // "*" reflects any requesting origin.
    cors_origins: z.array(z.string()).default(["*"]),
  })
  .default({});

const githubSchema = z
  .object({
    api_url: z.string().url().default("https://api.github.com"),
    oauth_url: z.string().url().default("https://github.com"),
    api_version: z.string().default("2022-11-28"),
    timeout_ms: z.number().int().positive().default(30_000),
    client_id: z.string().default(""),
    client_secret: z.string().default(""),
    redirect_uri: z.string().default("http://localhost:8000/api/v1/auth/github/callback"),
    scopes: z.array(z.string()).default(["repo", "admin:org", "read:org"]),
  })
  .default({});

const rateLimitSchema = z
  .object({
    max_retries: z.number().int().nonnegative().default(3),
    max_wait_ms: z.number().int().nonnegative().default(15 * 60 * 1000),
  })
  .default({});

const batchSchema = z
  .object({
    min_interval_ms: z.number().int().nonnegative().default(500),
    max_users: z.number().int().positive().default(100),
  })
  .default({});

export const configSchema = z.object({
  server: serverSchema,
  github: githubSchema,
  rate_limit: rateLimitSchema,
  batch: batchSchema,
});

export type Config = z.infer<typeof configSchema>;
export type ServerConfig = Config["server"];
export type GitHubConfig = Config["github"];
export type RateLimitConfig = Config["rate_limit"];
export type BatchConfig = Config["batch"];

type Env = Record<string, string | undefined>;

export function parseConfig(raw: unknown, env: Env = {}): Config {
  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`invalid configuration: ${problems}`);
  }
  return applyEnv(parsed.data, env);
}

function applyEnv(cfg: Config, env: Env): Config {
  const port = env.PORT ? Number.parseInt(env.PORT, 10) : NaN;
  return {
    ...cfg,
    server: {
      port: Number.isInteger(port) && port > 0 ? port : cfg.server.port,
      cors_origins: env.CORS_ORIGINS
        ? env.CORS_ORIGINS.split(",").map((o) => o.trim()).filter((o) => o !== "")
        : cfg.server.cors_origins,
    },
    github: {
      ...cfg.github,
      api_url: (env.GITHUB_API_URL || cfg.github.api_url).replace(/\/+$/, ""),
      client_id: env.GITHUB_CLIENT_ID || cfg.github.client_id,
      client_secret: env.GITHUB_CLIENT_SECRET || cfg.github.client_secret,
      redirect_uri: env.GITHUB_REDIRECT_URI || cfg.github.redirect_uri,
    },
  };
}

// app.yaml at the package root; src/config and dist/config both sit two levels below it.
export const PACKAGE_CONFIG_PATH = fileURLToPath(new URL("../../app.yaml", import.meta.url));

export function loadConfig(env: Env = process.env): Config {
  const candidates = [path.resolve("app.yaml"), PACKAGE_CONFIG_PATH];

  let raw: unknown = {};
  for (const p of candidates) {
    if (fs.existsSync(p)) {
      raw = yaml.load(fs.readFileSync(p, "utf-8"));
      break;
    }
  }

  return parseConfig(raw, env);
}

const SENSITIVE = ["secret", "token", "key"];

/**
 * Flattens the config to dotted keys with secrets masked, for `config --show`.
 */
export function maskedConfig(cfg: Config): Record<string, string> {
  const out: Record<string, string> = {};
  const visit = (prefix: string, value: unknown): void => {
    if (value !== null && typeof value === "object" && !Array.isArray(value)) {
      for (const [k, v] of Object.entries(value)) {
        visit(prefix ? `${prefix}.${k}` : k, v);
      }
      return;
    }
    const masked = SENSITIVE.some((s) => prefix.toLowerCase().includes(s));
    out[prefix] = masked ? "********" : Array.isArray(value) ? value.join(",") : String(value);
  };
  visit("", cfg);
  return out;
}
