import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  batchInvite,
  isAlreadyCollaborator,
  parseOrganizationTarget,
  parseRepositoryTarget,
  summarize,
  type InviteClient,
} from "./batch.js";
import { CancelledError, InvalidTargetError, ResourceNotFoundError, UpstreamError } from "../errors.js";
import type { InvitationResult } from "../github/client.js";
import { FakeClock } from "../testing.js";

type Reply = InvitationResult | Error;

// Scripted client: replies per username, recording every call.
function scripted(replies: Record<string, Reply>) {
  const calls: string[] = [];
  const answer = async (username: string): Promise<InvitationResult> => {
    const reply = replies[username] ?? {};
    if (reply instanceof Error) throw reply;
    return reply;
  };
  const client: InviteClient = {
    inviteToRepository: async (owner, repo, username, permission) => {
      calls.push(`repo ${owner}/${repo} ${username} ${permission}`);
      return answer(username);
    },
    inviteToOrganization: async (org, username, role) => {
      calls.push(`org ${org} ${username} ${role}`);
      return answer(username);
    },
  };
  return { client, calls };
}

describe("parseRepositoryTarget", () => {
  it("splits owner/repo", () => {
    assert.deepEqual(parseRepositoryTarget("acme/widgets"), { owner: "acme", repo: "widgets" });
  });

  for (const target of ["acme", "acme/widgets/extra", "/widgets", "acme/", "", "/"]) {
    it(`rejects ${JSON.stringify(target)}`, () => {
      assert.throws(() => parseRepositoryTarget(target), InvalidTargetError);
    });
  }
});

describe("parseOrganizationTarget", () => {
  it("accepts a plain name and rejects paths", () => {
    assert.equal(parseOrganizationTarget("acme"), "acme");
    assert.throws(() => parseOrganizationTarget("acme/widgets"), InvalidTargetError);
    assert.throws(() => parseOrganizationTarget(""), InvalidTargetError);
  });
});

describe("batchInvite (repository)", () => {
  it("reports a pending invite and an existing collaborator", async () => {
    const { client } = scripted({
      alice: { state: "pending" },
      bob: new UpstreamError("GitHub API error: bob is already a collaborator", { upstreamStatus: 422 }),
    });

    const result = await batchInvite(
      client,
      { mode: "repository", users: ["alice", "bob"], target: "acme/widgets", permission: "write" },
      { clock: new FakeClock() },
    );

    assert.deepEqual(result, {
      results: [
        { username: "alice", status: "success", message: "Invitation sent successfully" },
        { username: "bob", status: "info", message: "User is already a collaborator" },
      ],
      successful: 2,
      failed: 0,
    });
  });

  it("keeps going past failures and preserves input order", async () => {
    const { client, calls } = scripted({
      carol: new ResourceNotFoundError("User 'carol' not found or doesn't exist"),
      dave: new UpstreamError("GitHub API error: boom", { upstreamStatus: 500 }),
      erin: {},
    });

    const result = await batchInvite(
      client,
      { mode: "repository", users: ["carol", "dave", "erin"], target: "acme/widgets", permission: "read" },
      { clock: new FakeClock() },
    );

    assert.deepEqual(calls, [
      "repo acme/widgets carol read",
      "repo acme/widgets dave read",
      "repo acme/widgets erin read",
    ]);
    assert.deepEqual(result.results, [
      { username: "carol", status: "error", message: "User 'carol' not found or doesn't exist" },
      { username: "dave", status: "error", message: "GitHub API error: boom" },
      { username: "erin", status: "success", message: "User has been added to the repository" },
    ]);
    assert.equal(result.successful, 1);
    assert.equal(result.failed, 2);
  });

  it("uses structured reasons to spot existing collaborators", async () => {
    const { client } = scripted({
      bob: new UpstreamError("GitHub API error: Validation Failed", {
        upstreamStatus: 422,
        reasons: ["Validation Failed", "Bob Is Already A Collaborator"],
      }),
    });

    const result = await batchInvite(
      client,
      { mode: "repository", users: ["bob"], target: "acme/widgets", permission: "write" },
      { clock: new FakeClock() },
    );

    assert.equal(result.results[0].status, "info");
  });

  it("rejects a malformed target before calling upstream", async () => {
    const { client, calls } = scripted({});

    await assert.rejects(
      batchInvite(client, { mode: "repository", users: ["alice"], target: "acme", permission: "write" }),
      InvalidTargetError,
    );
    assert.deepEqual(calls, []);
  });

  it("pauses between users but not after the last", async () => {
    const { client } = scripted({});
    const clock = new FakeClock();

    await batchInvite(
      client,
      { mode: "repository", users: ["a", "b", "c"], target: "acme/widgets", permission: "write" },
      { clock },
    );
    assert.deepEqual(clock.sleeps, [500, 500]);

    const custom = new FakeClock();
    await batchInvite(
      client,
      { mode: "repository", users: ["a", "b"], target: "acme/widgets", permission: "write" },
      { clock: custom, minIntervalMs: 250 },
    );
    assert.deepEqual(custom.sleeps, [250]);
  });

  it("stops issuing requests once cancelled", async () => {
    const { client, calls } = scripted({});
    const controller = new AbortController();

    await assert.rejects(
      batchInvite(
        client,
        { mode: "repository", users: ["a", "b", "c"], target: "acme/widgets", permission: "write" },
        { clock: new FakeClock(), signal: controller.signal, onOutcome: () => controller.abort() },
      ),
      CancelledError,
    );
    assert.deepEqual(calls, ["repo acme/widgets a write"]);
  });
});

describe("batchInvite (organization)", () => {
  it("describes membership states", async () => {
    const { client, calls } = scripted({
      alice: { state: "active", message: "User is already active in the organization" },
      bob: { state: "pending" },
      carol: { message: "custom upstream note" },
      dave: {},
    });

    const result = await batchInvite(
      client,
      { mode: "organization", users: ["alice", "bob", "carol", "dave"], target: "acme", role: "admin" },
      { clock: new FakeClock() },
    );

    assert.equal(calls[0], "org acme alice admin");
    assert.deepEqual(
      result.results.map((r) => r.message),
      [
        "User is already an active member",
        "Invitation sent successfully",
        "custom upstream note",
        "User has been invited to the organization",
      ],
    );
    assert.equal(result.successful, 4);
  });

  it("does not reclassify collaborator errors", async () => {
    const { client } = scripted({
      alice: new UpstreamError("GitHub API error: already a collaborator"),
    });

    const result = await batchInvite(
      client,
      { mode: "organization", users: ["alice"], target: "acme", role: "member" },
      { clock: new FakeClock() },
    );

    assert.deepEqual(result.results, [
      { username: "alice", status: "error", message: "GitHub API error: already a collaborator" },
    ]);
    assert.equal(result.failed, 1);
  });

  it("succeeds both times when inviting the same member twice", async () => {
    const { client } = scripted({ alice: { state: "active" } });
    const req = { mode: "organization" as const, users: ["alice"], target: "acme", role: "member" as const };

    const first = await batchInvite(client, req, { clock: new FakeClock() });
    const second = await batchInvite(client, req, { clock: new FakeClock() });

    assert.equal(first.results[0].status, "success");
    assert.equal(second.results[0].status, "success");
  });
});

describe("summarize", () => {
  it("counts info as successful", () => {
    const result = summarize([
      { username: "a", status: "success", message: "" },
      { username: "b", status: "info", message: "" },
      { username: "c", status: "error", message: "" },
    ]);
    assert.equal(result.successful, 2);
    assert.equal(result.failed, 1);
    assert.equal(result.successful + result.failed, result.results.length);
  });
});

describe("isAlreadyCollaborator", () => {
  it("falls back to the message for plain errors", () => {
    assert.equal(isAlreadyCollaborator(new Error("User is Already a Collaborator")), true);
    assert.equal(isAlreadyCollaborator(new Error("Not Found")), false);
  });
});
