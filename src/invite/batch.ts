import { systemClock, throwIfAborted, type Clock } from "../clock.js";
import {
  CancelledError,
  InvalidTargetError,
  UpstreamError,
  errorMessage,
} from "../errors.js";
import type {
  GitHubClient,
  InvitationResult,
  OrganizationRole,
  RepositoryPermission,
} from "../github/client.js";

export type InviteMode = "repository" | "organization";
export type OutcomeStatus = "success" | "info" | "error";

export interface InvitationOutcome {
  readonly username: string;
  readonly status: OutcomeStatus;
  readonly message: string;
}

export interface BatchResult {
  results: InvitationOutcome[];
  successful: number;
  failed: number;
}

export type BatchRequest =
  | { mode: "repository"; users: string[]; target: string; permission: RepositoryPermission }
  | { mode: "organization"; users: string[]; target: string; role: OrganizationRole };

export interface BatchOptions {
  // Pause between two users; no pause follows the last one.
  minIntervalMs?: number;
  clock?: Clock;
  signal?: AbortSignal;
  onOutcome?: (outcome: InvitationOutcome) => void;
}

export type InviteClient = Pick<GitHubClient, "inviteToRepository" | "inviteToOrganization">;

export const DEFAULT_MIN_INTERVAL_MS = 500;

const ALREADY_COLLABORATOR = "already a collaborator";

export interface RepositoryTarget {
  owner: string;
  repo: string;
}

export function parseRepositoryTarget(target: string): RepositoryTarget {
  const parts = target.split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new InvalidTargetError("target_name must be in format 'owner/repo'");
  }
  return { owner: parts[0], repo: parts[1] };
}

export function parseOrganizationTarget(target: string): string {
  if (!target || target.includes("/")) {
    throw new InvalidTargetError("target_name must be an organization name");
  }
  return target;
}

/**
 * Invites every user in order, one at a time, and reports one outcome per
 * user. Per-user failures become `error` outcomes; only an invalid target
 * (before any request) or cancellation fails the whole call.
 */
export async function batchInvite(
  client: InviteClient,
  req: BatchRequest,
  opts: BatchOptions = {},
): Promise<BatchResult> {
  const invite = inviterFor(client, req, opts.signal);
  const clock = opts.clock ?? systemClock;
  const interval = opts.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS;

  const results: InvitationOutcome[] = [];
  for (const [i, username] of req.users.entries()) {
    throwIfAborted(opts.signal);
    const outcome = await invite(username);
    results.push(outcome);
    opts.onOutcome?.(outcome);

    if (i < req.users.length - 1 && interval > 0) {
      await clock.sleep(interval, opts.signal);
    }
  }
  return summarize(results);
}

export function summarize(results: InvitationOutcome[]): BatchResult {
  const successful = results.filter((r) => r.status === "success" || r.status === "info").length;
  return { results, successful, failed: results.length - successful };
}

type Inviter = (username: string) => Promise<InvitationOutcome>;

function inviterFor(client: InviteClient, req: BatchRequest, signal?: AbortSignal): Inviter {
  if (req.mode === "repository") {
    const { owner, repo } = parseRepositoryTarget(req.target);
    const permission = req.permission;
    return (username) =>
      attempt(username, async () => {
        const resp = await client.inviteToRepository(owner, repo, username, permission, signal);
        return repositoryMessage(resp);
      }, (err) =>
        isAlreadyCollaborator(err)
          ? { username, status: "info", message: "User is already a collaborator" }
          : null,
      );
  }

  const org = parseOrganizationTarget(req.target);
  const role = req.role;
  return (username) =>
    attempt(username, async () => {
      const resp = await client.inviteToOrganization(org, username, role, signal);
      return organizationMessage(resp);
    });
}

async function attempt(
  username: string,
  run: () => Promise<string>,
  reclassify?: (err: unknown) => InvitationOutcome | null,
): Promise<InvitationOutcome> {
  try {
    const message = await run();
    return { username, status: "success", message };
  } catch (err) {
    if (err instanceof CancelledError) throw err;
    const info = reclassify?.(err);
    if (info) return info;
    return { username, status: "error", message: errorMessage(err) };
  }
}

function repositoryMessage(resp: InvitationResult): string {
  if (resp.state === "pending") return "Invitation sent successfully";
  return resp.message ?? "User has been added to the repository";
}

function organizationMessage(resp: InvitationResult): string {
  if (resp.state === "active") return "User is already an active member";
  if (resp.state === "pending") return "Invitation sent successfully";
  return resp.message ?? "User has been invited to the organization";
}

// Structured GitHub reasons are checked first; the message substring is the
// fallback for errors that carry none.
export function isAlreadyCollaborator(err: unknown): boolean {
  if (err instanceof UpstreamError && err.reasons.some((r) => r.toLowerCase().includes(ALREADY_COLLABORATOR))) {
    return true;
  }
  return errorMessage(err).toLowerCase().includes(ALREADY_COLLABORATOR);
}
