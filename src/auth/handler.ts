import { Router, type Express, type Request, type Response, type NextFunction } from "express";
import { z } from "zod";
import type { GitHubConfig } from "../config/index.js";
import { AppError, UpstreamError, errorMessage, oauthError } from "../errors.js";
import type { ClientFactory } from "../github/client.js";
import type { FetchFn } from "../github/transport.js";
import { parseInput } from "../validation.js";

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

function asyncHandler(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

const callbackQuery = z.object({
  code: z.string().min(1, "code is required"),
});

const tokenResponse = z.object({
  access_token: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

/**
 * GitHub OAuth web flow. Stateless: the access token is handed straight back
 * to the caller, who sends it as a bearer token on invite requests.
 */
export class OAuthHandler {
  private github: GitHubConfig;
  private makeClient: ClientFactory;
  private fetchFn: FetchFn;

  constructor(github: GitHubConfig, makeClient: ClientFactory, fetchFn?: FetchFn) {
    this.github = github;
    this.makeClient = makeClient;
    this.fetchFn = fetchFn ?? ((url, init) => fetch(url, init));
  }

  authorizeUrl(): string {
    const params = new URLSearchParams({
      client_id: this.github.client_id,
      redirect_uri: this.github.redirect_uri,
      scope: this.github.scopes.join(" "),
    });
    return `${this.github.oauth_url}/login/oauth/authorize?${params.toString()}`;
  }

  login = (_req: Request, res: Response, next: NextFunction) => {
    if (!this.github.client_id) {
      return next(new AppError("OAUTH_NOT_CONFIGURED", 503, "GitHub OAuth client is not configured"));
    }
    res.redirect(this.authorizeUrl());
  };

  callback = asyncHandler(async (req: Request, res: Response) => {
    const { code } = parseInput(callbackQuery, req.query);
    const accessToken = await this.exchangeCode(code);

    const user = await this.makeClient(accessToken).getAuthenticatedUser();
    res.json({
      access_token: accessToken,
      token_type: "bearer",
      user,
    });
  });

  private async exchangeCode(code: string): Promise<string> {
    let json: unknown;
    try {
      const resp = await this.fetchFn(`${this.github.oauth_url}/login/oauth/access_token`, {
        method: "POST",
        headers: {
          Accept: "application/json",
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({
          client_id: this.github.client_id,
          client_secret: this.github.client_secret,
          code,
          redirect_uri: this.github.redirect_uri,
        }).toString(),
      });
      json = await resp.json();
    } catch (err) {
      throw new UpstreamError(`Failed to authenticate with GitHub: ${errorMessage(err)}`);
    }

    const parsed = tokenResponse.safeParse(json);
    if (!parsed.success) {
      throw new UpstreamError("Failed to authenticate with GitHub: unexpected token response");
    }
    if (parsed.data.error) {
      throw oauthError(`GitHub OAuth error: ${parsed.data.error_description ?? parsed.data.error}`);
    }
    if (!parsed.data.access_token) {
      throw oauthError("GitHub OAuth error: no access token returned");
    }
    return parsed.data.access_token;
  }
}

export function registerOAuthRoutes(app: Express, handler: OAuthHandler): void {
  const router = Router();
  router.get("/login/github", handler.login);
  router.get("/github/callback", handler.callback);
  app.use("/api/v1/auth", router);
}
