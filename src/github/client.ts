import { z } from "zod";
import type { Config } from "../config/index.js";
import { ResourceNotFoundError, UpstreamError } from "../errors.js";
import { GitHubTransport, type Transport, type TransportOptions } from "./transport.js";

export type RepositoryPermission = "read" | "write" | "admin";
export type OrganizationRole = "member" | "admin";

const userSchema = z.object({ login: z.string() }).passthrough();

// Collaborator and membership writes answer with an invitation or membership
// object; both are read through `state`, and 204 responses arrive as {}.
const invitationSchema = z
  .object({
    state: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export type GitHubUser = z.infer<typeof userSchema>;
export type InvitationResult = z.infer<typeof invitationSchema>;

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new UpstreamError(`Unexpected ${what} response from GitHub: ${parsed.error.issues[0]?.message ?? "invalid body"}`);
  }
  return parsed.data;
}

const seg = encodeURIComponent;

export class GitHubClient {
  private transport: Transport;

  constructor(transport: Transport) {
    this.transport = transport;
  }

  static create(opts: TransportOptions): GitHubClient {
    return new GitHubClient(new GitHubTransport(opts));
  }

  async getUserInfo(username: string, signal?: AbortSignal): Promise<GitHubUser> {
    try {
      const body = await this.transport.request("GET", `/users/${seg(username)}`, { signal });
      return parseBody(userSchema, body, "user");
    } catch (err) {
      if (err instanceof ResourceNotFoundError) {
        throw new ResourceNotFoundError(`User '${username}' not found or doesn't exist`, err.body);
      }
      throw err;
    }
  }

  async getAuthenticatedUser(signal?: AbortSignal): Promise<GitHubUser> {
    const body = await this.transport.request("GET", "/user", { signal });
    return parseBody(userSchema, body, "user");
  }

  /**
   * Adds `username` as a collaborator on owner/repo. A `state` of "pending"
   * means a new invitation was created; an empty result means the user
   * already had access.
   */
  async inviteToRepository(
    owner: string,
    repo: string,
    username: string,
    permission: RepositoryPermission,
    signal?: AbortSignal,
  ): Promise<InvitationResult> {
    await this.getUserInfo(username, signal);

    const body = await this.transport.request(
      "PUT",
      `/repos/${seg(owner)}/${seg(repo)}/collaborators/${seg(username)}`,
      { body: { permission }, signal },
    );
    return parseBody(invitationSchema, body, "collaborator");
  }

  /**
   * Invites `username` to `org`. An existing active or pending membership is
   * returned as-is without a write.
   */
  async inviteToOrganization(
    org: string,
    username: string,
    role: OrganizationRole,
    signal?: AbortSignal,
  ): Promise<InvitationResult> {
    await this.getUserInfo(username, signal);

    const path = `/orgs/${seg(org)}/memberships/${seg(username)}`;
    try {
      const existing = parseBody(
        invitationSchema,
        await this.transport.request("GET", path, { signal }),
        "membership",
      );
      if (existing.state === "active" || existing.state === "pending") {
        return {
          state: existing.state,
          message: `User is already ${existing.state} in the organization`,
        };
      }
    } catch (err) {
      if (!(err instanceof ResourceNotFoundError)) throw err;
    }

    const body = await this.transport.request("PUT", path, { body: { role }, signal });
    return parseBody(invitationSchema, body, "membership");
  }
}

export type ClientFactory = (token: string) => GitHubClient;

// Builds a factory producing one client (and so one rate-limit state) per
// caller token. `overrides` lets tests swap the clock or fetch.
export function clientFactory(cfg: Config, overrides: Partial<TransportOptions> = {}): ClientFactory {
  return (token) =>
    GitHubClient.create({
      baseUrl: cfg.github.api_url,
      apiVersion: cfg.github.api_version,
      timeoutMs: cfg.github.timeout_ms,
      maxRateLimitRetries: cfg.rate_limit.max_retries,
      maxRateLimitWaitMs: cfg.rate_limit.max_wait_ms,
      ...overrides,
      token,
    });
}
