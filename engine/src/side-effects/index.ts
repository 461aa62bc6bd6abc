/**
 * jarkit Engine — Side Effects
 *
 * Everything the lifecycle writes outside the artifact itself.
 */

export { buildLauncherScript, writeLauncher, shellQuote } from "./launcher";
export {
  buildDesktopEntry,
  DesktopShortcutRegistrar,
  quoteExecArg,
} from "./shortcut-manager";
export { SudoPrivilegedOps, isRoot } from "./privileged-ops";
