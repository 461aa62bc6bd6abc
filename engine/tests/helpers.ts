/**
 * Test doubles and fixtures shared by the engine tests.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type {
  ArtifactFetcher,
  CommandResult,
  CommandRunner,
  FetchResult,
  LaunchResult,
  LifecycleConfig,
  PrivilegedOps,
  ProcessLauncher,
  RunOptions,
} from "../src/types";
import { buildConfig } from "../src/config";

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

export const OK: CommandResult = { exit_code: 0, stdout: "", stderr: "" };

export class FakeRunner implements CommandRunner {
  calls: RecordedCall[] = [];
  available = new Set<string>();
  exitCodes = new Map<string, number>();
  onRun?: (command: string, args: string[]) => void;

  async run(
    command: string,
    args: string[],
    options: RunOptions = {},
  ): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    const exit_code = this.exitCodes.get(command) ?? 0;
    if (exit_code === 0) this.onRun?.(command, args);
    return { exit_code, stdout: "", stderr: "" };
  }

  async exists(command: string): Promise<boolean> {
    return this.available.has(command);
  }
}

export class FakePrivilegedOps implements PrivilegedOps {
  available = true;
  runExitCode = 0;
  symlinkExitCode = 0;
  calls: string[] = [];
  onRun?: (command: string, args: string[]) => void;

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async run(command: string, args: string[]): Promise<CommandResult> {
    this.calls.push(`run ${command} ${args.join(" ")}`);
    if (this.runExitCode === 0) this.onRun?.(command, args);
    return { ...OK, exit_code: this.runExitCode };
  }

  async symlink(target: string, linkPath: string): Promise<CommandResult> {
    this.calls.push(`symlink ${linkPath}`);
    if (this.symlinkExitCode !== 0) {
      return { ...OK, exit_code: this.symlinkExitCode };
    }
    fs.rmSync(linkPath, { force: true });
    fs.symlinkSync(target, linkPath);
    return OK;
  }

  async removeLink(linkPath: string): Promise<CommandResult> {
    this.calls.push(`removeLink ${linkPath}`);
    fs.rmSync(linkPath, { force: true });
    return OK;
  }
}

/** Writes a numbered payload so successive downloads are distinguishable */
export class FakeFetcher implements ArtifactFetcher {
  calls: { url: string; dest: string; useFallback: boolean }[] = [];
  fail = false;

  async fetch(
    url: string,
    destinationPath: string,
    useFallback: boolean,
  ): Promise<FetchResult> {
    this.calls.push({ url, dest: destinationPath, useFallback });
    if (this.fail) {
      return {
        ok: false,
        message: `Downloading ${url} failed (exit 1).`,
        hint: "Download it manually.",
      };
    }
    fs.writeFileSync(destinationPath, `artifact #${this.calls.length}`);
    return { ok: true, tool: useFallback ? "wget" : "axel" };
  }
}

export class FakeLauncher implements ProcessLauncher {
  calls: { command: string; args: string[]; cwd: string }[] = [];
  result: LaunchResult = { ok: true, pid: 4242 };

  async launch(command: string, args: string[], cwd: string): Promise<LaunchResult> {
    this.calls.push({ command, args, cwd });
    return this.result;
  }
}

export interface Sandbox {
  root: string;
  installDir: string;
  homeDir: string;
  binDir: string;
  config: LifecycleConfig;
  cleanup(): void;
}

/**
 * A throwaway install directory with the two repository assets in place.
 */
export function createSandbox(options: { assets?: boolean } = {}): Sandbox {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "jarkit-test-"));
  const installDir = path.join(root, "app");
  const homeDir = path.join(root, "home");
  const binDir = path.join(root, "bin");
  fs.mkdirSync(installDir, { recursive: true });
  fs.mkdirSync(homeDir, { recursive: true });
  fs.mkdirSync(binDir, { recursive: true });

  const config = buildConfig({ installDir, homeDir, binDir, manifest: {} });

  if (options.assets ?? true) {
    fs.writeFileSync(config.loader_path, "loader-bytes");
    fs.writeFileSync(config.icon_path, "icon-bytes");
  }

  return {
    root,
    installDir,
    homeDir,
    binDir,
    config,
    cleanup() {
      fs.rmSync(root, { recursive: true, force: true });
    },
  };
}

/**
 * Every file under the sandbox root with its content (symlinks as
 * "-> target"), keyed by path relative to the root.
 */
export function snapshot(root: string): Record<string, string> {
  const out: Record<string, string> = {};
  const walk = (dir: string) => {
    for (const name of fs.readdirSync(dir).sort()) {
      const full = path.join(dir, name);
      const rel = path.relative(root, full);
      const st = fs.lstatSync(full);
      if (st.isSymbolicLink()) {
        out[rel] = `-> ${fs.readlinkSync(full)}`;
      } else if (st.isDirectory()) {
        walk(full);
      } else {
        out[rel] = `${(st.mode & 0o777).toString(8)} ${fs.readFileSync(full, "utf-8")}`;
      }
    }
  };
  walk(root);
  return out;
}
