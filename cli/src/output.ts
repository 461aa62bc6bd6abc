/**
 * jarkit CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: severity tags, colors and
 * the spinner. Uses chalk (v4, CommonJS compatible) for ANSI colors and
 * ora for spinners.
 *
 * Every diagnostic line carries a severity tag so the stream reads the
 * same with or without color.
 */

import chalk from "chalk";
import ora from "ora";
import type { Ora } from "ora";
import type { ErrorCategory } from "@jarkit/engine";

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  app: chalk.bold.white,
  path: chalk.cyan,
};

// ─── Severity Tags ──────────────────────────────────────────

export const tags = {
  info: chalk.green("[info]"),
  warn: chalk.yellow("[warn]"),
  error: chalk.red("[error]"),
  done: chalk.green.bold("[done]"),
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${tags.done} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${tags.error} ${msg}`);
}

export function printWarn(msg: string): void {
  console.log(`${tags.warn} ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${tags.info} ${msg}`);
}

/**
 * Print an indented detail line under an error or warning.
 */
export function printDetail(label: string, value: string): void {
  console.error(`  ${colors.dim(label + ":")} ${value}`);
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<ErrorCategory, string> = {
  CONFIG_ERROR: "Invalid configuration",
  PRECONDITION_ERROR: "Not installed here",
  PERMISSION_ERROR: "Insufficient permissions",
  DEPENDENCY_ERROR: "Dependency installation failed",
  FETCH_ERROR: "Download failed",
  WRITE_ERROR: "File could not be written",
  LAUNCH_ERROR: "Process could not be started",
};

export function formatErrorCategory(category: ErrorCategory): string {
  return ERROR_LABELS[category];
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}

// ─── Usage ──────────────────────────────────────────────────

export const USAGE = [
  "Usage: jarkit <command>",
  "",
  "Commands:",
  "  install    Install dependencies, download the application, write the launcher and menu entry",
  "  upgrade    Re-download the configured version and rewrite the launcher",
  "  uninstall  Remove the application files, launcher, menu entry and bin link",
  "  register   Start the companion loader and return without waiting",
  "  help       Show this help",
  "",
  "Run jarkit from the application's install directory.",
].join("\n");

export function printUsage(): void {
  console.log(USAGE);
}
