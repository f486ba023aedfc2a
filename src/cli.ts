#!/usr/bin/env node

import "dotenv/config";
import { Option, program } from "commander";
import { configCommand, inviteOrgCommand, inviteRepoCommand, type CommandDeps } from "./cli/commands.js";
import { loadConfig } from "./config/index.js";
import { clientFactory } from "./github/client.js";
import { SERVICE_VERSION } from "./app.js";

function deps(): CommandDeps {
  const config = loadConfig();
  return { config, makeClient: clientFactory(config, { logger: { log: () => {}, warn: console.warn, error: () => {} } }) };
}

const tokenOption = () =>
  new Option("--token <token>", "GitHub access token").env("GITHUB_TOKEN");

program
  .name("gh-invite")
  .description("Invite users to GitHub repositories and organizations in bulk")
  .version(SERVICE_VERSION);

program
  .command("invite-repo")
  .description("Invite users to a repository (owner/repo)")
  .argument("<repo>", "repository in owner/repo form")
  .argument("<users...>", "GitHub usernames to invite")
  .addOption(new Option("--permission <level>", "permission level").choices(["read", "write", "admin"]).default("write"))
  .addOption(tokenOption())
  .action(async (repo: string, users: string[], options: { permission: "read" | "write" | "admin"; token?: string }) => {
    process.exitCode = await inviteRepoCommand(repo, users, options, deps());
  });

program
  .command("invite-org")
  .description("Invite users to an organization")
  .argument("<org>", "organization name")
  .argument("<users...>", "GitHub usernames to invite")
  .addOption(new Option("--role <role>", "organization role").choices(["member", "admin"]).default("member"))
  .addOption(tokenOption())
  .action(async (org: string, users: string[], options: { role: "member" | "admin"; token?: string }) => {
    process.exitCode = await inviteOrgCommand(org, users, options, deps());
  });

program
  .command("config")
  .description("Show the effective configuration (secrets masked)")
  .option("--show", "print the configuration")
  .action((options: { show?: boolean }) => {
    process.exitCode = configCommand(options, deps());
  });

program.parseAsync().catch((error: unknown) => {
  console.error("Error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
