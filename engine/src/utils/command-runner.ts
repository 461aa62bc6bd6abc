/**
 * jarkit Engine — External Command Runner
 *
 * Every shell-out goes through here and comes back as a CommandResult.
 * The promise never rejects: a missing executable is exit code 127 and a
 * signal kill is 128 + signal number, so callers branch on exit_code.
 */

import { spawn } from "child_process";
import { constants as osConstants } from "os";
import type { CommandResult, CommandRunner, RunOptions } from "../types";
import type { Logger } from "./logger";

/** Conventional shell exit code for "command not found" */
export const EXIT_NOT_FOUND = 127;

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  const num = osConstants.signals[signal];
  return typeof num === "number" ? 128 + num : 1;
}

export function createCommandRunner(logger: Logger): CommandRunner {
  const run = (
    command: string,
    args: string[],
    options: RunOptions = {},
  ): Promise<CommandResult> => {
    logger.debug({ command, args, interactive: !!options.interactive }, "Running command");

    return new Promise<CommandResult>((resolve) => {
      let stdout = "";
      let stderr = "";
      let settled = false;

      const finish = (result: CommandResult) => {
        if (settled) return;
        settled = true;
        logger.debug(
          { command, exit_code: result.exit_code },
          "Command finished",
        );
        resolve(result);
      };

      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: options.interactive ? "inherit" : ["ignore", "pipe", "pipe"],
      });

      child.stdout?.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr?.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on("error", (err: NodeJS.ErrnoException) => {
        finish({
          exit_code: err.code === "ENOENT" ? EXIT_NOT_FOUND : 1,
          stdout,
          stderr: stderr + err.message,
        });
      });

      child.on("close", (code, signal) => {
        finish({
          exit_code: code ?? signalExitCode(signal),
          stdout,
          stderr,
        });
      });
    });
  };

  return {
    run,
    async exists(command: string): Promise<boolean> {
      // `command -v` is a shell builtin, so it needs sh rather than spawn
      const result = await run("sh", ["-c", 'command -v "$1"', "sh", command]);
      return result.exit_code === 0;
    },
  };
}
