/**
 * jarkit Engine — Configuration
 *
 * Builds the immutable LifecycleConfig once per process: built-in defaults,
 * overlaid by an optional jarkit.yaml manifest in the install directory.
 * The install directory is the working directory at invocation time.
 * No environment variables are read.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { DependencySpec, LifecycleConfig } from "./types";

export const MANIFEST_FILENAME = "jarkit.yaml";

export const DEFAULT_VERSION = "2025";

/** Runtime flags the launcher always passes to the JVM */
export const DEFAULT_JVM_OPTIONS: readonly string[] = [
  "--add-opens=java.desktop/javax.swing=ALL-UNNAMED",
  "--add-opens=java.base/java.lang=ALL-UNNAMED",
  "--add-opens=java.base/jdk.internal.org.objectweb.asm=ALL-UNNAMED",
  "--add-opens=java.base/jdk.internal.org.objectweb.asm.tree=ALL-UNNAMED",
  "--add-opens=java.base/jdk.internal.org.objectweb.asm.Opcodes=ALL-UNNAMED",
];

export const DEFAULT_REGISTER_STEPS: readonly string[] = [
  "Wait for the loader window to open.",
  "Follow the instructions shown in the loader window.",
  "Close the loader once it reports that it has finished.",
  "Start the application from the application menu or with its launcher.",
];

export const DEFAULT_DEPENDENCIES: readonly DependencySpec[] = [
  { package: "git", command: "git", optional: false },
  { package: "jre-openjdk", command: "java", optional: false },
  { package: "axel", command: "axel", optional: true },
];

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly file: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

// ─── Manifest ────────────────────────────────────────────────

const fileName = z
  .string()
  .min(1)
  .refine((v) => !v.includes("/") && v !== "." && v !== "..", {
    message: "must be a plain file name",
  });

export const ManifestSchema = z
  .object({
    app_name: z.string().min(1).max(128),
    app_comment: z.string().max(256),
    version: z
      .string()
      .min(1)
      .regex(/^[A-Za-z0-9._-]+$/),
    artifact_name: fileName,
    download_url: z.string().url(),
    launcher_name: fileName,
    loader_name: fileName,
    icon_name: fileName,
    desktop_entry_name: fileName.refine((v) => v.endsWith(".desktop"), {
      message: "must end in .desktop",
    }),
    categories: z.string().regex(/^([^;\s]+;)+$/, {
      message: "must be a ;-terminated list such as Development;Utility;",
    }),
    jvm_options: z.array(z.string().min(1)),
    register_steps: z.array(z.string().min(1)),
  })
  .partial()
  .strict();

export type Manifest = z.infer<typeof ManifestSchema>;

/**
 * Read and validate jarkit.yaml. Returns an empty manifest when the file
 * does not exist; throws ConfigError when it exists but is invalid.
 */
export function loadManifest(installDir: string): Manifest {
  const file = path.join(installDir, MANIFEST_FILENAME);
  if (!fs.existsSync(file)) return {};

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(file, "utf-8"));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot parse ${MANIFEST_FILENAME}: ${message}`, file);
  }

  // An empty file parses to null
  if (raw === null || raw === undefined) return {};

  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ${MANIFEST_FILENAME}: ${issues}`, file);
  }
  return parsed.data;
}

// ─── Config ──────────────────────────────────────────────────

export interface ConfigOptions {
  /** Defaults to process.cwd() */
  installDir?: string;
  /** Defaults to os.homedir(); only used to place the desktop entry */
  homeDir?: string;
  /** Defaults to /usr/local/bin */
  binDir?: string;
  /** Skips reading jarkit.yaml when given */
  manifest?: Manifest;
}

/**
 * Build the frozen config for one invocation.
 */
export function buildConfig(options: ConfigOptions = {}): LifecycleConfig {
  const installDir = path.resolve(options.installDir ?? process.cwd());
  const homeDir = options.homeDir ?? os.homedir();
  const manifest = options.manifest ?? loadManifest(installDir);

  const version = manifest.version ?? DEFAULT_VERSION;
  const artifactName = manifest.artifact_name ?? `app_v${version}.jar`;
  const launcherName = manifest.launcher_name ?? "app-launcher";
  const loaderName = manifest.loader_name ?? "loader.jar";
  const iconName = manifest.icon_name ?? "app_icon.ico";
  const desktopEntryName =
    manifest.desktop_entry_name ?? "java-desktop-app.desktop";
  const applicationsDir = path.join(homeDir, ".local", "share", "applications");
  const binDir = options.binDir ?? "/usr/local/bin";

  const config: LifecycleConfig = {
    install_dir: installDir,
    app_name: manifest.app_name ?? "Java Desktop App",
    app_comment: manifest.app_comment ?? "Java desktop application",
    version,
    artifact_name: artifactName,
    download_url:
      manifest.download_url ??
      "https://downloads.example.com/app/releases/latest.jar",
    launcher_name: launcherName,
    loader_name: loaderName,
    icon_name: iconName,
    desktop_entry_name: desktopEntryName,
    applications_dir: applicationsDir,
    bin_dir: binDir,
    categories: manifest.categories ?? "Development;Utility;",
    jvm_options: Object.freeze([...(manifest.jvm_options ?? DEFAULT_JVM_OPTIONS)]),
    register_steps: Object.freeze([
      ...(manifest.register_steps ?? DEFAULT_REGISTER_STEPS),
    ]),
    dependencies: Object.freeze(
      DEFAULT_DEPENDENCIES.map((d) => Object.freeze({ ...d })),
    ),
    package_manager: Object.freeze({
      command: "pacman",
      install_args: ["-Syu", "--noconfirm"],
      query_args: ["-Qq"],
    }),
    aur_helpers: Object.freeze(["paru", "yay"]),
    accelerated_downloader: "axel",
    fallback_downloader: "wget",

    artifact_path: path.join(installDir, artifactName),
    launcher_path: path.join(installDir, launcherName),
    loader_path: path.join(installDir, loaderName),
    icon_path: path.join(installDir, iconName),
    desktop_entry_path: path.join(applicationsDir, desktopEntryName),
    bin_link_path: path.join(binDir, launcherName),
  };

  return Object.freeze(config);
}
