/**
 * jarkit CLI — Program
 *
 * One positional command, no flags of its own. "help", an unknown word, an
 * unknown option or no word at all prints the usage text and exits 0.
 */

import { Command } from "commander";
import type { CliContext } from "./config";
import { printUsage } from "./output";
import { registerInstallCommand } from "./commands/install";
import { registerUpgradeCommand } from "./commands/upgrade";
import { registerUninstallCommand } from "./commands/uninstall";
import { registerRegisterCommand } from "./commands/register";

export const VERSION = "0.1.0";

export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name("jarkit")
    .description("Install, upgrade and remove a Java desktop application in the current directory")
    .version(VERSION)
    .helpCommand(false)
    .argument("[command]")
    .allowUnknownOption()
    .allowExcessArguments(true)
    .action(() => {
      printUsage();
      ctx.setExitCode(0);
    });

  registerInstallCommand(program, ctx);
  registerUpgradeCommand(program, ctx);
  registerUninstallCommand(program, ctx);
  registerRegisterCommand(program, ctx);

  return program;
}
