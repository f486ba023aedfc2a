import type { Config } from "../config/index.js";
import { maskedConfig } from "../config/index.js";
import { errorMessage } from "../errors.js";
import type { OrganizationRole, RepositoryPermission } from "../github/client.js";
import { batchInvite, type BatchRequest, type InviteClient } from "../invite/batch.js";
import { formatOutcome, formatSummary } from "./format.js";

export interface CommandDeps {
  config: Config;
  makeClient: (token: string) => InviteClient;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

export interface InviteRepoOptions {
  permission: RepositoryPermission;
  token?: string;
}

export interface InviteOrgOptions {
  role: OrganizationRole;
  token?: string;
}

// Each command resolves to the process exit code.
export async function inviteRepoCommand(
  repo: string,
  users: string[],
  options: InviteRepoOptions,
  deps: CommandDeps,
): Promise<number> {
  return runBatch({ mode: "repository", users, target: repo, permission: options.permission }, options.token, deps);
}

export async function inviteOrgCommand(
  org: string,
  users: string[],
  options: InviteOrgOptions,
  deps: CommandDeps,
): Promise<number> {
  return runBatch({ mode: "organization", users, target: org, role: options.role }, options.token, deps);
}

export function configCommand(options: { show?: boolean }, deps: CommandDeps): number {
  const out = deps.out ?? console.log;
  if (!options.show) {
    out("Nothing to do. Use --show to print the effective configuration.");
    return 0;
  }
  out(JSON.stringify(maskedConfig(deps.config), null, 2));
  return 0;
}

async function runBatch(req: BatchRequest, token: string | undefined, deps: CommandDeps): Promise<number> {
  const out = deps.out ?? console.log;
  const err = deps.err ?? console.error;

  if (!token) {
    err("Error: a GitHub token is required (--token or GITHUB_TOKEN)");
    return 1;
  }
  if (req.users.length === 0) {
    err("Error: at least one username is required");
    return 1;
  }

  try {
    const result = await batchInvite(deps.makeClient(token), req, {
      minIntervalMs: deps.config.batch.min_interval_ms,
      onOutcome: (outcome) => out(formatOutcome(outcome)),
    });
    out(formatSummary(result));
    return result.failed > 0 ? 2 : 0;
  } catch (e) {
    err(`Error: ${errorMessage(e)}`);
    return 1;
  }
}
