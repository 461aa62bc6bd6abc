/**
 * jarkit CLI — Configuration
 *
 * Where the CLI keeps its own files and how it wires the engine.
 * The CLI's debug log lives under ~/.local/state/jarkit so that nothing
 * is written into the install directory besides managed files.
 */

import * as path from "path";
import * as os from "os";
import { buildConfig, createLogger, LifecycleManager } from "@jarkit/engine";
import type { Confirm } from "@jarkit/engine";
import { createConfirm } from "./prompt";

/** Per-user state directory: ~/.local/state/jarkit */
export const JARKIT_STATE = path.join(os.homedir(), ".local", "state", "jarkit");

export const paths = {
  /** Structured debug log (pino, one JSON object per line) */
  logFile: path.join(JARKIT_STATE, "jarkit.log"),
};

/**
 * Everything a command needs from the outside world. Tests supply their
 * own manager factory, prompt and exit-code sink.
 */
export interface CliContext {
  createManager(confirm: Confirm): LifecycleManager;
  confirm: Confirm;
  setExitCode(code: number): void;
}

export function createDefaultContext(): CliContext {
  return {
    createManager(confirm: Confirm): LifecycleManager {
      const config = buildConfig();
      const logger = createLogger({ level: "debug", file: paths.logFile });
      return LifecycleManager.create(config, confirm, logger);
    },
    confirm: createConfirm(),
    setExitCode(code: number): void {
      process.exitCode = code;
    },
  };
}
