/**
 * jarkit CLI — Operation Runner
 *
 * Shared by every lifecycle command: builds the manager, renders its
 * events as tagged lines, and turns the result into an exit code.
 *
 *   jarkit install
 *
 *   [info] Installing Java Desktop App v2025 into /opt/app
 *   [info] Resolving dependencies...
 *   [info] Downloading app_v2025.jar...
 *   [info] Downloaded app_v2025.jar with axel.
 *   [info] Writing launcher script...
 *   [warn] Icon /opt/app/app_icon.ico not found; the menu entry will use the default icon.
 *   [done] Java Desktop App installed. Start it from the application menu or run /opt/app/app-launcher.
 */

import { ConfigError } from "@jarkit/engine";
import type {
  LifecycleEvent,
  LifecycleManager,
  LifecycleState,
  OperationResult,
} from "@jarkit/engine";
import type { Command } from "commander";
import type { CliContext } from "../config";
import {
  colors,
  createSpinner,
  formatDuration,
  formatErrorCategory,
  printDetail,
  printError,
  printInfo,
  printUsage,
  printSuccess,
  printWarn,
} from "../output";

export type OperationName = "install" | "upgrade" | "uninstall" | "register";

/** States that run no interactive child process; the spinner may show */
const QUIET_STATES: ReadonlySet<LifecycleState> = new Set<LifecycleState>([
  "PENDING",
  "CHECKING",
]);

export function exitCodeFor(result: OperationResult): number {
  return result.final_state === "FAILED" ? 1 : 0;
}

export async function runOperation(
  ctx: CliContext,
  operation: OperationName,
): Promise<number> {
  const spinner = createSpinner("Checking install state...");

  // The spinner must never draw over a prompt
  const confirm = (question: string, defaultAnswer: boolean) => {
    spinner.stop();
    return ctx.confirm(question, defaultAnswer);
  };

  let manager: LifecycleManager;
  try {
    manager = ctx.createManager(confirm);
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      printError(`${formatErrorCategory("CONFIG_ERROR")}: ${err.message}`);
      printDetail("File", err.file);
      return 1;
    }
    throw err;
  }

  manager.on((event: LifecycleEvent) => {
    switch (event.type) {
      case "state_change": {
        const { state, message } = event.data;
        if (QUIET_STATES.has(state)) {
          if (message) {
            spinner.stop();
            printInfo(message);
          }
          spinner.start();
          return;
        }
        spinner.stop();
        if (!message) return;
        if (state === "COMPLETED") {
          printSuccess(message);
        } else if (state !== "FAILED") {
          // FAILED is printed from the result, with its hint
          printInfo(message);
        }
        return;
      }
      case "warning":
        spinner.stop();
        printWarn(event.data.message);
        return;
      case "log":
        spinner.stop();
        printInfo(event.data.message);
        return;
    }
  });

  const startTime = Date.now();
  let result: OperationResult;
  try {
    result = await manager[operation]();
  } finally {
    spinner.stop();
  }

  if (result.final_state === "FAILED" && result.error) {
    printError(`${formatErrorCategory(result.error.category)}: ${result.error.message}`);
    if (result.error.hint) {
      printDetail("Hint", result.error.hint);
    }
  } else if (result.final_state === "COMPLETED" && result.warnings.length > 0) {
    printInfo(
      colors.dim(
        `Finished in ${formatDuration(Date.now() - startTime)} with ${result.warnings.length} warning(s).`,
      ),
    );
  }

  return exitCodeFor(result);
}

/**
 * Action body shared by the lifecycle commands. The commands take no
 * options or arguments, so anything left over prints usage instead.
 */
export async function runCommand(
  ctx: CliContext,
  operation: OperationName,
  command: Command,
): Promise<void> {
  if (command.args.length > 0) {
    printUsage();
    ctx.setExitCode(0);
    return;
  }
  ctx.setExitCode(await runOperation(ctx, operation));
}
