/**
 * jarkit Engine — Install State
 *
 * Install state is read off the filesystem at the start of every
 * operation. Nothing is persisted and nothing is cached.
 */

import * as fs from "fs";
import type { InstallState, LifecycleConfig } from "./types";

function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

function isExecutableFile(p: string): boolean {
  try {
    const st = fs.statSync(p);
    return st.isFile() && (st.mode & 0o111) !== 0;
  } catch {
    return false;
  }
}

export function inspectInstallState(config: LifecycleConfig): InstallState {
  return {
    installed: isFile(config.artifact_path),
    launcher_ready: isExecutableFile(config.launcher_path),
    shortcut_present: isFile(config.desktop_entry_path),
    loader_present: isFile(config.loader_path),
    icon_present: isFile(config.icon_path),
  };
}

/**
 * Remove a file if it is there. Returns true when something was removed.
 */
export function removeIfPresent(p: string): boolean {
  try {
    fs.unlinkSync(p);
    return true;
  } catch (err: unknown) {
    if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") {
      return false;
    }
    throw err;
  }
}
