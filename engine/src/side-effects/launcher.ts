/**
 * jarkit Engine — Launcher Script
 *
 * Generates the executable script that pins the working directory and the
 * JVM flags, loads the companion loader as a Java agent, and forwards the
 * caller's arguments to the artifact.
 */

import * as fs from "fs";
import type { LifecycleConfig } from "../types";
import type { Logger } from "../utils/logger";

/**
 * Quote a value for a double-quoted bash string.
 */
export function shellQuote(value: string): string {
  return `"${value.replace(/(["\\$`])/g, "\\$1")}"`;
}

export function buildLauncherScript(config: LifecycleConfig): string {
  const indent = "     ";
  const lines = [
    "#!/bin/bash",
    `cd ${shellQuote(config.install_dir)}`,
  ];

  const javaArgs = [
    ...config.jvm_options,
    `-javaagent:${shellQuote(config.loader_path)} -noverify -jar ${shellQuote(config.artifact_path)} "$@"`,
  ];

  javaArgs.forEach((arg, i) => {
    const prefix = i === 0 ? "java " : indent;
    const suffix = i === javaArgs.length - 1 ? "" : " \\";
    lines.push(`${prefix}${arg}${suffix}`);
  });

  return lines.join("\n") + "\n";
}

/**
 * Write (or rewrite) the launcher and mark it executable. Idempotent.
 */
export function writeLauncher(config: LifecycleConfig, logger: Logger): string {
  fs.writeFileSync(config.launcher_path, buildLauncherScript(config), {
    mode: 0o755,
  });
  // writeFileSync only applies mode on creation
  fs.chmodSync(config.launcher_path, 0o755);
  logger.info({ path: config.launcher_path }, "Wrote launcher script");
  return config.launcher_path;
}
