/**
 * jarkit CLI — Upgrade Command
 *
 * Usage:
 *   jarkit upgrade
 *
 * Re-downloads the configured version; it does not look for newer releases.
 */

import type { Command } from "commander";
import type { CliContext } from "../config";
import { runCommand } from "./run-operation";

export function registerUpgradeCommand(program: Command, ctx: CliContext): void {
  program
    .command("upgrade")
    .description("Re-download the configured version and rewrite the launcher")
    .allowUnknownOption()
    .action((_options: unknown, command: Command) => runCommand(ctx, "upgrade", command));
}
