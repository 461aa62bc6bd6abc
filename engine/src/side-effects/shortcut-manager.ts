/**
 * jarkit Engine — Shortcut Manager
 *
 * Creates and removes the freedesktop.org desktop entry that puts the
 * application in the desktop menu, then refreshes the desktop database.
 *
 * Every failure here is a warning: the launcher script is still usable
 * without a menu entry.
 */

import * as fs from "fs";
import type {
  CommandRunner,
  LifecycleConfig,
  OperationWarning,
  ShortcutOutcome,
  ShortcutRegistrar,
} from "../types";
import type { Logger } from "../utils/logger";
import { removeIfPresent } from "../state";

/** Characters that force an Exec argument into double quotes */
const EXEC_RESERVED = /[\s"'\\><~|&;$*?#()`]/;

/**
 * Encode one argument of the Exec key. Quoting escapes come first, then
 * the string-value escape doubles every backslash, and % is doubled so it
 * is not read as a field code.
 */
export function quoteExecArg(value: string): string {
  const arg = EXEC_RESERVED.test(value)
    ? `"${value.replace(/(["`$\\])/g, "\\$1")}"`
    : value;
  return arg.replace(/\\/g, "\\\\").replace(/%/g, "%%");
}

/**
 * Render the desktop entry. The Icon key is left out entirely when the
 * icon file is absent.
 */
export function buildDesktopEntry(
  config: LifecycleConfig,
  iconPresent: boolean,
): string {
  const lines = [
    "[Desktop Entry]",
    `Name=${config.app_name}`,
    `Comment=${config.app_comment}`,
    `Exec=${quoteExecArg(config.launcher_path)}`,
  ];
  if (iconPresent) {
    lines.push(`Icon=${config.icon_path}`);
  }
  lines.push(
    "Terminal=false",
    "Type=Application",
    `Categories=${config.categories}`,
    "StartupNotify=true",
  );
  return lines.join("\n") + "\n";
}

export class DesktopShortcutRegistrar implements ShortcutRegistrar {
  constructor(
    private readonly config: LifecycleConfig,
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
  ) {}

  async register(): Promise<ShortcutOutcome> {
    const warnings: OperationWarning[] = [];
    const entryPath = this.config.desktop_entry_path;

    const iconPresent = fs.existsSync(this.config.icon_path);
    if (!iconPresent) {
      warnings.push({
        kind: "SHORTCUT",
        message: `Icon ${this.config.icon_path} not found; the menu entry will use the default icon.`,
      });
    }

    try {
      fs.mkdirSync(this.config.applications_dir, { recursive: true });
      fs.writeFileSync(entryPath, buildDesktopEntry(this.config, iconPresent));
      this.logger.info({ path: entryPath, icon: iconPresent }, "Created desktop entry");
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ path: entryPath, error: message }, "Failed to create desktop entry");
      warnings.push({
        kind: "SHORTCUT",
        message: `Could not write desktop entry ${entryPath}: ${message}`,
      });
      return { entry_path: entryPath, warnings };
    }

    warnings.push(
      ...(await this.refresh(
        "Could not update the desktop database; the menu entry may appear after the desktop session restarts.",
      )),
    );
    return { entry_path: entryPath, warnings };
  }

  async unregister(): Promise<ShortcutOutcome> {
    const warnings: OperationWarning[] = [];
    const entryPath = this.config.desktop_entry_path;

    try {
      if (removeIfPresent(entryPath)) {
        this.logger.info({ path: entryPath }, "Removed desktop entry");
      }
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ path: entryPath, error: message }, "Failed to remove desktop entry");
      warnings.push({
        kind: "SHORTCUT",
        message: `Could not remove desktop entry ${entryPath}: ${message}`,
      });
    }

    warnings.push(
      ...(await this.refresh(
        "Could not update the desktop database; the removed entry may linger until the desktop session restarts.",
      )),
    );
    return { entry_path: entryPath, warnings };
  }

  private async refresh(failureMessage: string): Promise<OperationWarning[]> {
    const result = await this.runner.run("update-desktop-database", [
      this.config.applications_dir,
    ]);
    if (result.exit_code !== 0) {
      this.logger.warn(
        { exit_code: result.exit_code, stderr: result.stderr.trim() },
        "update-desktop-database failed",
      );
      return [{ kind: "SHORTCUT", message: failureMessage }];
    }
    return [];
  }
}
