/**
 * jarkit Engine — Lifecycle Manager
 *
 * Drives install, upgrade, uninstall and register against one install
 * directory. On-disk state is the only state: it is re-inspected at the
 * start of every operation.
 *
 *   Absent ──install──▶ Installed ──uninstall──▶ Absent
 *                        │    ▲
 *                        └────┘ install (reinstall) / upgrade
 *
 * Lifecycle-managed files: the versioned artifact, the launcher script and
 * the desktop entry (plus the optional bin symlink). The companion loader
 * and the icon are repository assets and are never created or deleted.
 *
 * Every step returns a typed result and the manager branches on it.
 * Fatal failures end the operation with final_state FAILED; best-effort
 * failures become warnings; an operator saying no is DECLINED.
 *
 * The engine has NO UI logic. The CLI listens to events and maps results
 * to exit codes.
 */

import * as fs from "fs";
import type {
  ArtifactFetcher,
  Confirm,
  DependencyResolver,
  ErrorCategory,
  InstallState,
  LifecycleConfig,
  LifecycleEvent,
  LifecycleEventHandler,
  LifecycleState,
  Operation,
  OperationResult,
  OperationWarning,
  PrivilegedOps,
  ProcessLauncher,
  ShortcutRegistrar,
} from "./types";
import { createLogger } from "./utils/logger";
import type { Logger } from "./utils/logger";
import { createCommandRunner } from "./utils/command-runner";
import { createProcessLauncher } from "./utils/process-launcher";
import { inspectInstallState, removeIfPresent } from "./state";
import { PackageDependencyResolver } from "./dependencies";
import { CommandArtifactFetcher } from "./downloader";
import {
  DesktopShortcutRegistrar,
  SudoPrivilegedOps,
  writeLauncher,
} from "./side-effects";

export interface LifecycleCollaborators {
  dependencies: DependencyResolver;
  fetcher: ArtifactFetcher;
  shortcuts: ShortcutRegistrar;
  privileged: PrivilegedOps;
  launcher: ProcessLauncher;
  confirm: Confirm;
}

/**
 * Per-operation bookkeeping: state events, warnings, and the result.
 */
interface OperationRun {
  readonly stateBefore: InstallState;
  transition(state: LifecycleState, message?: string): void;
  warn(warnings: OperationWarning[]): void;
  note(message: string): void;
  fail(
    category: ErrorCategory,
    message: string,
    state: LifecycleState,
    hint?: string,
  ): OperationResult;
  decline(message: string): OperationResult;
  complete(message: string): OperationResult;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class LifecycleManager {
  private eventHandlers: LifecycleEventHandler[] = [];

  constructor(
    readonly config: LifecycleConfig,
    private readonly collaborators: LifecycleCollaborators,
    private readonly logger: Logger = createLogger(),
  ) {}

  /**
   * Wire the manager to the real system: pacman, axel/wget, sudo,
   * update-desktop-database and detached java processes.
   */
  static create(
    config: LifecycleConfig,
    confirm: Confirm,
    logger: Logger = createLogger(),
  ): LifecycleManager {
    const runner = createCommandRunner(logger);
    const privileged = new SudoPrivilegedOps(runner, logger);
    return new LifecycleManager(
      config,
      {
        dependencies: new PackageDependencyResolver(
          config,
          runner,
          privileged,
          confirm,
          logger,
        ),
        fetcher: new CommandArtifactFetcher(
          {
            accelerated: config.accelerated_downloader,
            fallback: config.fallback_downloader,
          },
          runner,
          logger,
        ),
        shortcuts: new DesktopShortcutRegistrar(config, runner, logger),
        privileged,
        launcher: createProcessLauncher(logger),
        confirm,
      },
      logger,
    );
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. The CLI uses this to print progress.
   */
  on(handler: LifecycleEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: LifecycleEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        // Event handler errors should never abort an operation
        this.logger.debug({ error: errorMessage(err) }, "Event handler threw");
      }
    }
  }

  private begin(operation: Operation): OperationRun {
    const startedAt = new Date().toISOString();
    const stateBefore = inspectInstallState(this.config);
    const warnings: OperationWarning[] = [];
    const log = this.logger.child({ operation });

    const transition = (state: LifecycleState, message?: string) => {
      log.debug({ state, message }, "State change");
      this.emit({
        type: "state_change",
        timestamp: new Date().toISOString(),
        data: { operation, state, message },
      });
    };

    const finish = (
      final: OperationResult["final_state"],
      message: string,
      error?: OperationResult["error"],
    ): OperationResult => {
      transition(final, message);
      return {
        operation,
        final_state: final,
        state_before: stateBefore,
        started_at: startedAt,
        finished_at: new Date().toISOString(),
        error,
        warnings: [...warnings],
      };
    };

    log.info({ install_dir: this.config.install_dir, state: stateBefore }, "Starting operation");
    transition("PENDING");

    return {
      stateBefore,
      transition,
      warn: (items) => {
        for (const w of items) {
          log.warn({ kind: w.kind }, w.message);
          warnings.push(w);
          this.emit({
            type: "warning",
            timestamp: new Date().toISOString(),
            data: w,
          });
        }
      },
      note: (message) => {
        log.info(message);
        this.emit({
          type: "log",
          timestamp: new Date().toISOString(),
          data: { message },
        });
      },
      fail(category, message, state, hint) {
        log.error({ category, state, hint }, message);
        return finish("FAILED", message, { category, message, state, hint });
      },
      decline(message) {
        log.info(message);
        return finish("DECLINED", message);
      },
      complete(message) {
        log.info(message);
        return finish("COMPLETED", message);
      },
    };
  }

  // ─── Core file removal ───────────────────────────────────────

  /**
   * Delete the artifact and the launcher if present. The loader and the
   * icon are never touched. Returns the paths that were removed.
   */
  uninstallCore(): string[] {
    const removed: string[] = [];
    for (const p of [this.config.artifact_path, this.config.launcher_path]) {
      if (removeIfPresent(p)) {
        removed.push(p);
      }
    }
    this.logger.info({ removed }, "Removed core files");
    return removed;
  }

  // ─── Shared steps ────────────────────────────────────────────

  /**
   * Write the launcher (fatal on failure), then try to link it into the
   * shared bin directory (warning on failure).
   */
  private async writeLauncherStep(run: OperationRun): Promise<OperationResult | null> {
    run.transition("WRITING_LAUNCHER", "Writing launcher script...");
    try {
      writeLauncher(this.config, this.logger);
    } catch (err: unknown) {
      return run.fail(
        "WRITE_ERROR",
        `Cannot write launcher ${this.config.launcher_path}: ${errorMessage(err)}`,
        "WRITING_LAUNCHER",
      );
    }

    const { privileged } = this.collaborators;
    const fallbackNote = `Run the application from ${this.config.launcher_path}.`;
    if (!(await privileged.isAvailable())) {
      run.warn([
        {
          kind: "PRIVILEGE",
          message: `Cannot link ${this.config.bin_link_path}: neither root nor sudo is available. ${fallbackNote}`,
        },
      ]);
      return null;
    }

    const result = await privileged.symlink(
      this.config.launcher_path,
      this.config.bin_link_path,
    );
    if (result.exit_code !== 0) {
      run.warn([
        {
          kind: "PRIVILEGE",
          message: `Cannot link ${this.config.bin_link_path} (exit ${result.exit_code}). ${fallbackNote}`,
        },
      ]);
    } else {
      run.transition("WRITING_LAUNCHER", `Linked ${this.config.bin_link_path}`);
    }
    return null;
  }

  /**
   * Remove the bin symlink only when it points at this launcher.
   */
  private async removeBinLink(run: OperationRun): Promise<void> {
    const linkPath = this.config.bin_link_path;
    let target: string;
    try {
      if (!fs.lstatSync(linkPath).isSymbolicLink()) {
        run.warn([
          {
            kind: "PRIVILEGE",
            message: `${linkPath} is not a symlink; left in place.`,
          },
        ]);
        return;
      }
      target = fs.readlinkSync(linkPath);
    } catch (err: unknown) {
      // Nothing to remove
      this.logger.debug({ path: linkPath, error: errorMessage(err) }, "No bin link");
      return;
    }

    if (target !== this.config.launcher_path) {
      run.warn([
        {
          kind: "PRIVILEGE",
          message: `${linkPath} points at ${target}, not this launcher; left in place.`,
        },
      ]);
      return;
    }

    const result = await this.collaborators.privileged.removeLink(linkPath);
    if (result.exit_code !== 0) {
      run.warn([
        {
          kind: "PRIVILEGE",
          message: `Cannot remove ${linkPath} (exit ${result.exit_code}); remove it by hand.`,
        },
      ]);
    }
  }

  // ─── Core: Install ───────────────────────────────────────────

  /**
   * Install dependencies, download the artifact, write the launcher and
   * register the desktop entry.
   *
   * PENDING → CHECKING → [REMOVING] → RESOLVING → DOWNLOADING →
   * WRITING_LAUNCHER → REGISTERING → COMPLETED
   */
  async install(): Promise<OperationResult> {
    const run = this.begin("install");
    const { dependencies, fetcher, shortcuts, privileged, confirm } =
      this.collaborators;
    const { config } = this;

    run.transition("CHECKING", `Installing ${config.app_name} v${config.version} into ${config.install_dir}`);

    if (run.stateBefore.installed) {
      run.transition(
        "CHECKING",
        `${config.app_name} already appears to be installed in ${config.install_dir}.`,
      );
      const reinstall = await confirm("Reinstall it?", false);
      if (!reinstall) {
        return run.decline("Installation cancelled.");
      }
    }

    // Decide whether root is needed before anything is mutated
    const plan = await dependencies.plan();
    if (plan.missing_required.length > 0 && !(await privileged.isAvailable())) {
      const names = plan.missing_required.map((d) => d.package).join(", ");
      return run.fail(
        "PERMISSION_ERROR",
        `Installing ${names} needs root privileges, and neither root nor sudo is available.`,
        "CHECKING",
        "Run install as root, or install the packages by hand first.",
      );
    }

    if (run.stateBefore.installed) {
      run.transition("REMOVING", "Removing existing files for reinstall...");
      try {
        this.uninstallCore();
      } catch (err: unknown) {
        return run.fail(
          "WRITE_ERROR",
          `Cannot remove existing files: ${errorMessage(err)}`,
          "REMOVING",
        );
      }
    }

    run.transition("RESOLVING", "Resolving dependencies...");
    const resolution = await dependencies.resolve(plan);
    if (resolution.status === "declined") {
      return run.decline("Installation cancelled.");
    }
    if (resolution.status === "failed") {
      return run.fail(
        "DEPENDENCY_ERROR",
        resolution.message,
        "RESOLVING",
        resolution.hint,
      );
    }
    run.warn(resolution.warnings);

    run.transition("DOWNLOADING", `Downloading ${config.artifact_name}...`);
    const fetched = await fetcher.fetch(
      config.download_url,
      config.artifact_path,
      resolution.use_fallback_downloader,
    );
    if (!fetched.ok) {
      return run.fail("FETCH_ERROR", fetched.message, "DOWNLOADING", fetched.hint);
    }
    run.note(`Downloaded ${config.artifact_name} with ${fetched.tool}.`);

    const launcherFailure = await this.writeLauncherStep(run);
    if (launcherFailure) return launcherFailure;

    run.transition("REGISTERING", "Creating desktop entry...");
    const outcome = await shortcuts.register();
    run.warn(outcome.warnings);

    return run.complete(
      `${config.app_name} installed. Start it from the application menu or run ${config.launcher_path}.`,
    );
  }

  // ─── Core: Upgrade ───────────────────────────────────────────

  /**
   * Re-download the configured version and rewrite the launcher.
   * The version is fixed in config, so this never moves to a newer
   * release.
   */
  async upgrade(): Promise<OperationResult> {
    const run = this.begin("upgrade");
    const { config } = this;

    run.transition("CHECKING");
    const missing: string[] = [];
    if (!run.stateBefore.loader_present) missing.push(config.loader_path);
    if (!run.stateBefore.icon_present) missing.push(config.icon_path);
    if (missing.length > 0) {
      return run.fail(
        "PRECONDITION_ERROR",
        `${config.app_name} does not appear to be installed here; missing ${missing.join(", ")}.`,
        "CHECKING",
        "Run install first.",
      );
    }

    run.transition(
      "CHECKING",
      `Version is fixed at ${config.version}; upgrade re-downloads that version.`,
    );

    run.transition("REMOVING", `Removing ${config.artifact_name}...`);
    try {
      removeIfPresent(config.artifact_path);
    } catch (err: unknown) {
      return run.fail(
        "WRITE_ERROR",
        `Cannot remove ${config.artifact_path}: ${errorMessage(err)}`,
        "REMOVING",
      );
    }

    run.transition("DOWNLOADING", `Downloading ${config.artifact_name}...`);
    const fetched = await this.collaborators.fetcher.fetch(
      config.download_url,
      config.artifact_path,
      false,
    );
    if (!fetched.ok) {
      return run.fail("FETCH_ERROR", fetched.message, "DOWNLOADING", fetched.hint);
    }
    run.note(`Downloaded ${config.artifact_name} with ${fetched.tool}.`);

    const launcherFailure = await this.writeLauncherStep(run);
    if (launcherFailure) return launcherFailure;

    return run.complete(
      `${config.app_name} upgraded. Restart it if it is running.`,
    );
  }

  // ─── Core: Uninstall ─────────────────────────────────────────

  /**
   * Remove everything install created. Safe to run repeatedly.
   */
  async uninstall(): Promise<OperationResult> {
    const run = this.begin("uninstall");
    const { config } = this;

    run.transition("REMOVING", `Removing ${config.app_name} files from ${config.install_dir}...`);
    try {
      this.uninstallCore();
    } catch (err: unknown) {
      return run.fail(
        "WRITE_ERROR",
        `Cannot remove core files: ${errorMessage(err)}`,
        "REMOVING",
      );
    }

    run.transition("REMOVING", "Removing desktop entry and bin link...");
    const outcome = await this.collaborators.shortcuts.unregister();
    run.warn(outcome.warnings);
    await this.removeBinLink(run);

    return run.complete(
      `${config.app_name} uninstalled. ${config.loader_name} and ${config.icon_name} were kept.`,
    );
  }

  // ─── Core: Register ──────────────────────────────────────────

  /**
   * Print the registration walkthrough, then start the companion loader
   * and return without waiting for it.
   */
  async register(): Promise<OperationResult> {
    const run = this.begin("register");
    const { config } = this;

    run.transition("CHECKING");
    if (!run.stateBefore.loader_present) {
      return run.fail(
        "PRECONDITION_ERROR",
        `${config.loader_name} not found in ${config.install_dir}.`,
        "CHECKING",
        "Run this command from the install directory, after install.",
      );
    }

    config.register_steps.forEach((step, i) => run.note(`${i + 1}. ${step}`));

    run.transition("LAUNCHING", `Starting ${config.loader_name}...`);
    const launched = await this.collaborators.launcher.launch(
      "java",
      ["-jar", config.loader_path],
      config.install_dir,
    );
    if (!launched.ok) {
      return run.fail(
        "LAUNCH_ERROR",
        `Cannot start ${config.loader_name}: ${launched.message}`,
        "LAUNCHING",
        "Check that java is installed and on PATH.",
      );
    }

    return run.complete(
      `${config.loader_name} started (pid ${launched.pid}). Follow the prompts in its window; if none appears, check your Java setup.`,
    );
  }
}
