import cors from "cors";
import express from "express";
import morgan from "morgan";
import { githubTokenMiddleware } from "./auth/middleware.js";
import { OAuthHandler, registerOAuthRoutes } from "./auth/handler.js";
import { systemClock, type Clock } from "./clock.js";
import type { Config } from "./config/index.js";
import { clientFactory, type ClientFactory } from "./github/client.js";
import type { FetchFn } from "./github/transport.js";
import { InviteHandler, registerInviteRoutes } from "./invite/handler.js";
import { errorHandler } from "./middleware/error-handler.js";

export const SERVICE_NAME = "gh-invite-service";
export const SERVICE_VERSION = "1.0.0";

export interface AppDeps {
  // Replaces the real GitHub API and OAuth endpoints.
  fetch?: FetchFn;
  clock?: Clock;
  makeClient?: ClientFactory;
  accessLog?: boolean;
}

export function buildApp(cfg: Config, deps: AppDeps = {}): express.Express {
  const clock = deps.clock ?? systemClock;
  const makeClient = deps.makeClient ?? clientFactory(cfg, {
    clock,
    ...(deps.fetch ? { fetch: deps.fetch } : {}),
  });

  const origins = cfg.server.cors_origins;
  const app = express();
  app.use(
    cors({
      origin: origins.includes("*") ? true : origins,
      credentials: true,
    }),
  );
  app.use(express.json());
  if (deps.accessLog ?? true) {
    app.use(
      morgan(":date[clf] :status :method :url :response-time ms", {
        stream: { write: (msg: string) => process.stdout.write(msg) },
      }),
    );
  }

  app.get("/", (_req, res) => {
    res.json({
      status: "online",
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        auth: "/api/v1/auth/login/github",
        repository_invite: "/api/v1/invite/repository",
        organization_invite: "/api/v1/invite/organization",
      },
    });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy" });
  });

  const oauthHandler = new OAuthHandler(cfg.github, makeClient, deps.fetch);
  registerOAuthRoutes(app, oauthHandler);

  const inviteHandler = new InviteHandler(makeClient, cfg.batch, clock);
  registerInviteRoutes(app, inviteHandler, githubTokenMiddleware());

  // Error handler (must be last middleware)
  app.use(errorHandler);
  return app;
}
