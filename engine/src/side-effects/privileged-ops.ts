/**
 * jarkit Engine — Privileged Operations
 *
 * Operations that need root: package installation and the symlink in the
 * shared bin directory. The engine never assumes it runs elevated; each
 * call runs directly when the process is root and through sudo otherwise,
 * and each may fail on its own.
 */

import type { CommandResult, CommandRunner, PrivilegedOps } from "../types";
import type { Logger } from "../utils/logger";

export function isRoot(): boolean {
  return typeof process.getuid === "function" && process.getuid() === 0;
}

export class SudoPrivilegedOps implements PrivilegedOps {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
    private readonly root: boolean = isRoot(),
  ) {}

  async isAvailable(): Promise<boolean> {
    if (this.root) return true;
    const hasSudo = await this.runner.exists("sudo");
    this.logger.debug({ sudo: hasSudo }, "Checked for sudo");
    return hasSudo;
  }

  run(command: string, args: string[]): Promise<CommandResult> {
    if (this.root) {
      return this.runner.run(command, args, { interactive: true });
    }
    this.logger.info({ command, args }, "Running through sudo");
    return this.runner.run("sudo", [command, ...args], { interactive: true });
  }

  symlink(target: string, linkPath: string): Promise<CommandResult> {
    return this.run("ln", ["-sf", target, linkPath]);
  }

  removeLink(linkPath: string): Promise<CommandResult> {
    return this.run("rm", ["-f", linkPath]);
  }
}
