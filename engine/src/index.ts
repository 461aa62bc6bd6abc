/**
 * jarkit Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here, not from internal modules.
 */

// Lifecycle manager
export { LifecycleManager } from "./engine";
export type { LifecycleCollaborators } from "./engine";

// All types
export type {
  // Config types
  LifecycleConfig,
  DependencySpec,
  PackageManagerSpec,

  // State types
  InstallState,

  // Lifecycle types
  Operation,
  LifecycleState,
  FinalState,
  ErrorCategory,
  OperationError,
  OperationResult,
  OperationWarning,
  WarningKind,
  LifecycleEvent,
  LifecycleEventHandler,

  // Collaborator contracts
  CommandResult,
  CommandRunner,
  RunOptions,
  Confirm,
  DependencyPlan,
  DependencyResolution,
  DependencyResolver,
  FetchResult,
  ArtifactFetcher,
  ShortcutOutcome,
  ShortcutRegistrar,
  PrivilegedOps,
  LaunchResult,
  ProcessLauncher,
} from "./types";

// Configuration
export {
  buildConfig,
  loadManifest,
  ConfigError,
  ManifestSchema,
  MANIFEST_FILENAME,
  DEFAULT_VERSION,
  DEFAULT_JVM_OPTIONS,
  DEFAULT_REGISTER_STEPS,
  DEFAULT_DEPENDENCIES,
} from "./config";
export type { ConfigOptions, Manifest } from "./config";

// State inspection
export { inspectInstallState } from "./state";

// Collaborators (exposed for embedding and testing)
export { PackageDependencyResolver } from "./dependencies";
export { CommandArtifactFetcher, buildDownloadArgs } from "./downloader";
export type { DownloaderTools } from "./downloader";
export {
  buildLauncherScript,
  buildDesktopEntry,
  DesktopShortcutRegistrar,
  SudoPrivilegedOps,
} from "./side-effects";

// Utilities
export { createLogger } from "./utils/logger";
export type { Logger, LoggerOptions } from "./utils/logger";
export { createCommandRunner, EXIT_NOT_FOUND } from "./utils/command-runner";
export { createProcessLauncher } from "./utils/process-launcher";
