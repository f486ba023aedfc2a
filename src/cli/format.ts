import chalk from "chalk";
import type { BatchResult, InvitationOutcome } from "../invite/batch.js";

export const fmt = {
  success(msg: string): string {
    return `${chalk.green("✓")} ${msg}`;
  },

  info(msg: string): string {
    return `${chalk.blue("ℹ")} ${msg}`;
  },

  error(msg: string): string {
    return `${chalk.red("✗")} ${msg}`;
  },
};

export function formatOutcome(outcome: InvitationOutcome): string {
  const line = `${outcome.username}: ${outcome.message}`;
  switch (outcome.status) {
    case "success":
      return fmt.success(line);
    case "info":
      return fmt.info(line);
    case "error":
      return fmt.error(line);
  }
}

export function formatSummary(result: BatchResult): string {
  return `\n${result.successful} successful, ${result.failed} failed (${result.results.length} total)`;
}
