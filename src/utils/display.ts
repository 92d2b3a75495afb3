import chalk from "chalk";
import { toErrorMessage } from "../core/errors.js";
import type { BatchSummary, Outcome } from "../core/types.js";

export function outcomeIcon(outcome: Outcome<unknown>): string {
  switch (outcome.status) {
    case "success": return chalk.green("✓");
    case "failure": return chalk.red("✗");
    case "cancelled": return chalk.yellow("-");
  }
}

export function formatOutcome(outcome: Outcome<unknown>): string {
  switch (outcome.status) {
    case "success":
      return `  ${outcomeIcon(outcome)} ${outcome.id}: ${String(outcome.value)}`;
    case "failure":
      return `  ${outcomeIcon(outcome)} ${outcome.id}: ${chalk.red(`${outcome.error.kind}: ${toErrorMessage(outcome.error)}`)}`;
    case "cancelled":
      return `  ${outcomeIcon(outcome)} ${outcome.id}: ${dim("cancelled")}`;
  }
}

export function formatSummary(summary: BatchSummary): string {
  const parts = [`${summary.succeeded} succeeded`, `${summary.failed} failed`];
  if (summary.cancelled > 0) parts.push(`${summary.cancelled} cancelled`);
  return `${summary.total} files: ${parts.join(", ")}`;
}

export function successMsg(msg: string): string {
  return chalk.green(`  ✓ ${msg}`);
}

export function warnMsg(msg: string): string {
  return chalk.yellow(`  ⚠ ${msg}`);
}

export function errorMsg(msg: string): string {
  return chalk.red(`  ✗ ${msg}`);
}

export function heading(msg: string): string {
  return chalk.bold(msg);
}

export function dim(msg: string): string {
  return chalk.dim(msg);
}

export function progressBar(current: number, total: number): string {
  const width = 20;
  const filled = total === 0 ? width : Math.round((current / total) * width);
  const bar = "=".repeat(filled) + " ".repeat(width - filled);
  return `  [${bar}] ${current}/${total}`;
}
