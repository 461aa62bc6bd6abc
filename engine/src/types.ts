/**
 * jarkit Engine — Core Type Definitions
 *
 * Config, derived install state, operation results, events and the
 * collaborator contracts the LifecycleManager calls through.
 */

// ─── Config ──────────────────────────────────────────────────────

export interface DependencySpec {
  /** Package name passed to the package manager */
  package: string;
  /** Command whose presence on PATH proves the package is installed */
  command?: string;
  /**
   * Optional packages never abort an install. The accelerated downloader
   * is the only optional dependency.
   */
  optional: boolean;
}

export interface PackageManagerSpec {
  command: string;
  install_args: string[];
  query_args: string[];
}

export interface LifecycleConfig {
  install_dir: string;
  app_name: string;
  app_comment: string;
  version: string;
  artifact_name: string;
  download_url: string;
  launcher_name: string;
  loader_name: string;
  icon_name: string;
  desktop_entry_name: string;
  applications_dir: string;
  bin_dir: string;
  categories: string;
  jvm_options: readonly string[];
  /** Printed in order before register starts the loader */
  register_steps: readonly string[];
  dependencies: readonly DependencySpec[];
  package_manager: PackageManagerSpec;
  aur_helpers: readonly string[];
  accelerated_downloader: string;
  fallback_downloader: string;

  // Derived absolute paths
  artifact_path: string;
  launcher_path: string;
  loader_path: string;
  icon_path: string;
  desktop_entry_path: string;
  bin_link_path: string;
}

// ─── Install State ───────────────────────────────────────────────

export interface InstallState {
  /** The versioned artifact is present */
  installed: boolean;
  /** The launcher script exists and is executable */
  launcher_ready: boolean;
  /** The desktop entry exists */
  shortcut_present: boolean;
  /** Repository assets; never created or removed by jarkit */
  loader_present: boolean;
  icon_present: boolean;
}

// ─── Lifecycle ───────────────────────────────────────────────────

export type Operation = "install" | "upgrade" | "uninstall" | "register";

export type LifecycleState =
  | "PENDING"
  | "CHECKING"
  | "RESOLVING"
  | "DOWNLOADING"
  | "WRITING_LAUNCHER"
  | "REGISTERING"
  | "REMOVING"
  | "LAUNCHING"
  | "COMPLETED"
  | "DECLINED"
  | "FAILED";

export type FinalState = Extract<
  LifecycleState,
  "COMPLETED" | "DECLINED" | "FAILED"
>;

export type ErrorCategory =
  | "CONFIG_ERROR"
  | "PRECONDITION_ERROR"
  | "PERMISSION_ERROR"
  | "DEPENDENCY_ERROR"
  | "FETCH_ERROR"
  | "WRITE_ERROR"
  | "LAUNCH_ERROR";

export interface OperationError {
  category: ErrorCategory;
  message: string;
  state: LifecycleState;
  /** What the operator can do about it */
  hint?: string;
}

export type WarningKind = "PRIVILEGE" | "SHORTCUT" | "DEPENDENCY";

export interface OperationWarning {
  kind: WarningKind;
  message: string;
}

export interface OperationResult {
  operation: Operation;
  final_state: FinalState;
  state_before: InstallState;
  started_at: string;
  finished_at: string;
  error?: OperationError;
  warnings: OperationWarning[];
}

// ─── Events ──────────────────────────────────────────────────────

export type LifecycleEvent =
  | {
      type: "state_change";
      timestamp: string;
      data: { operation: Operation; state: LifecycleState; message?: string };
    }
  | {
      type: "warning";
      timestamp: string;
      data: OperationWarning;
    }
  | {
      type: "log";
      timestamp: string;
      data: { message: string };
    };

export type LifecycleEventHandler = (event: LifecycleEvent) => void;

// ─── External Commands ───────────────────────────────────────────

export interface CommandResult {
  exit_code: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Inherit the terminal (sudo password prompts, download progress) */
  interactive?: boolean;
  cwd?: string;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
  exists(command: string): Promise<boolean>;
}

// ─── Collaborators ───────────────────────────────────────────────

export type Confirm = (
  question: string,
  defaultAnswer: boolean,
) => Promise<boolean>;

export interface DependencyPlan {
  /** Required packages that are not present */
  missing_required: DependencySpec[];
  /** Optional packages that are not present */
  missing_optional: DependencySpec[];
}

export type DependencyResolution =
  | {
      status: "ready";
      use_fallback_downloader: boolean;
      warnings: OperationWarning[];
    }
  | { status: "declined" }
  | { status: "failed"; message: string; hint?: string };

export interface DependencyResolver {
  /** Presence checks only; never elevates */
  plan(): Promise<DependencyPlan>;
  resolve(plan: DependencyPlan): Promise<DependencyResolution>;
}

export type FetchResult =
  | { ok: true; tool: string }
  | { ok: false; message: string; hint: string };

export interface ArtifactFetcher {
  fetch(
    url: string,
    destinationPath: string,
    useFallback: boolean,
  ): Promise<FetchResult>;
}

export interface ShortcutOutcome {
  entry_path: string;
  warnings: OperationWarning[];
}

export interface ShortcutRegistrar {
  register(): Promise<ShortcutOutcome>;
  unregister(): Promise<ShortcutOutcome>;
}

export interface PrivilegedOps {
  /** True when running as root or when sudo is on PATH */
  isAvailable(): Promise<boolean>;
  run(command: string, args: string[]): Promise<CommandResult>;
  symlink(target: string, linkPath: string): Promise<CommandResult>;
  removeLink(linkPath: string): Promise<CommandResult>;
}

export type LaunchResult =
  | { ok: true; pid: number }
  | { ok: false; message: string };

export interface ProcessLauncher {
  launch(command: string, args: string[], cwd: string): Promise<LaunchResult>;
}
