/**
 * jarkit CLI — Register Command
 *
 * Usage:
 *   jarkit register
 *
 * Starts the companion loader in the background and exits; whatever
 * happens inside the loader afterwards is not tracked.
 */

import type { Command } from "commander";
import type { CliContext } from "../config";
import { runCommand } from "./run-operation";

export function registerRegisterCommand(program: Command, ctx: CliContext): void {
  program
    .command("register")
    .description("Start the companion loader and return without waiting")
    .allowUnknownOption()
    .action((_options: unknown, command: Command) => runCommand(ctx, "register", command));
}
