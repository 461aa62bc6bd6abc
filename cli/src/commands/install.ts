/**
 * jarkit CLI -- Install Command
 *
 * Installs the application into the current directory.
 *
 * Usage:
 *   jarkit install
 *
 * When the artifact is already present, asks before reinstalling.
 * Needs root (or sudo) only when system packages are missing.
 */

import type { Command } from "commander";
import type { CliContext } from "../config";
import { runCommand } from "./run-operation";

export function registerInstallCommand(program: Command, ctx: CliContext): void {
  program
    .command("install")
    .description(
      "Install dependencies, download the application, write the launcher and menu entry",
    )
    .allowUnknownOption()
    .action((_options: unknown, command: Command) => runCommand(ctx, "install", command));
}
