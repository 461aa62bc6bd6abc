/**
 * jarkit CLI — Uninstall Command
 *
 * Removes the artifact, launcher, desktop entry and bin link. The
 * companion loader and the icon stay where they are.
 *
 * Usage:
 *   jarkit uninstall
 */

import type { Command } from "commander";
import type { CliContext } from "../config";
import { runCommand } from "./run-operation";

export function registerUninstallCommand(program: Command, ctx: CliContext): void {
  program
    .command("uninstall")
    .description("Remove the application files, launcher, menu entry and bin link")
    .allowUnknownOption()
    .action((_options: unknown, command: Command) => runCommand(ctx, "uninstall", command));
}
