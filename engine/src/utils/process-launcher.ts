/**
 * jarkit Engine — Detached Process Launcher
 *
 * Fire-and-forget spawn for the companion loader. Resolves once the
 * child has spawned (or failed to); its exit status is never observed.
 */

import { spawn } from "child_process";
import type { LaunchResult, ProcessLauncher } from "../types";
import type { Logger } from "./logger";

export function createProcessLauncher(logger: Logger): ProcessLauncher {
  return {
    launch(command: string, args: string[], cwd: string): Promise<LaunchResult> {
      return new Promise<LaunchResult>((resolve) => {
        const child = spawn(command, args, {
          cwd,
          detached: true,
          stdio: "ignore",
        });

        child.once("spawn", () => {
          logger.info({ command, args, pid: child.pid }, "Spawned detached process");
          child.unref();
          resolve({ ok: true, pid: child.pid ?? -1 });
        });

        child.once("error", (err: Error) => {
          logger.error({ command, error: err.message }, "Failed to spawn process");
          resolve({ ok: false, message: err.message });
        });
      });
    },
  };
}
