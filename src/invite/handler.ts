import { Router, type Express, type Request, type Response, type NextFunction, type RequestHandler } from "express";
import { z } from "zod";
import { systemClock, type Clock } from "../clock.js";
import type { BatchConfig } from "../config/index.js";
import { unauthorizedError } from "../errors.js";
import type { ClientFactory } from "../github/client.js";
import { parseInput } from "../validation.js";
import { batchInvite, type BatchRequest, type InviteMode } from "./batch.js";

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

function asyncHandler(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

function usersField(maxUsers: number) {
  return z
    .array(z.string().trim().min(1, "username must not be empty"))
    .min(1, "at least one user is required")
    .max(maxUsers, `at most ${maxUsers} users per batch`);
}

const targetField = z.string().trim().min(1, "target_name is required");

function repositoryBody(maxUsers: number) {
  return z.object({
    users: usersField(maxUsers),
    target_name: targetField,
    permission_level: z.enum(["read", "write", "admin"]).default("write"),
  });
}

// Organization roles are their own vocabulary; "write" is rejected, not mapped.
function organizationBody(maxUsers: number) {
  return z.object({
    users: usersField(maxUsers),
    target_name: targetField,
    permission_level: z.enum(["member", "admin"]).default("member"),
  });
}

export class InviteHandler {
  private makeClient: ClientFactory;
  private batch: BatchConfig;
  private clock: Clock;
  private repositoryBody: ReturnType<typeof repositoryBody>;
  private organizationBody: ReturnType<typeof organizationBody>;

  constructor(makeClient: ClientFactory, batch: BatchConfig, clock: Clock = systemClock) {
    this.makeClient = makeClient;
    this.batch = batch;
    this.clock = clock;
    this.repositoryBody = repositoryBody(batch.max_users);
    this.organizationBody = organizationBody(batch.max_users);
  }

  inviteToRepository = asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(this.repositoryBody, req.body);
    await this.run(req, res, "repository", {
      mode: "repository",
      users: body.users,
      target: body.target_name,
      permission: body.permission_level,
    });
  });

  inviteToOrganization = asyncHandler(async (req: Request, res: Response) => {
    const body = parseInput(this.organizationBody, req.body);
    await this.run(req, res, "organization", {
      mode: "organization",
      users: body.users,
      target: body.target_name,
      role: body.permission_level,
    });
  });

  private async run(req: Request, res: Response, mode: InviteMode, batch: BatchRequest): Promise<void> {
    const token = req.githubToken;
    if (!token) {
      throw unauthorizedError("Missing GitHub token");
    }

    // Stop issuing upstream calls once the caller has gone away.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const result = await batchInvite(this.makeClient(token), batch, {
      minIntervalMs: this.batch.min_interval_ms,
      clock: this.clock,
      signal: controller.signal,
    });
    console.log(
      `Batch ${mode} invite to ${batch.target}: ${result.successful} successful, ${result.failed} failed`,
    );
    res.json(result);
  }
}

export function registerInviteRoutes(app: Express, handler: InviteHandler, tokenMW: RequestHandler): void {
  const router = Router();
  router.post("/invite/repository", tokenMW, handler.inviteToRepository);
  router.post("/invite/organization", tokenMW, handler.inviteToOrganization);
  app.use("/api/v1", router);
}
