import { describe, it, expect, beforeEach } from "vitest";
import { buildConfig } from "../src/config";
import { PackageDependencyResolver } from "../src/dependencies";
import { createLogger } from "../src/utils/logger";
import { FakePrivilegedOps, FakeRunner } from "./helpers";

const config = buildConfig({ installDir: "/opt/app", manifest: {} });

describe("PackageDependencyResolver", () => {
  let runner: FakeRunner;
  let privileged: FakePrivilegedOps;
  let prompts: string[];
  let answer: boolean;
  let resolver: PackageDependencyResolver;

  beforeEach(() => {
    runner = new FakeRunner();
    privileged = new FakePrivilegedOps();
    prompts = [];
    answer = true;
    resolver = new PackageDependencyResolver(
      config,
      runner,
      privileged,
      async (question) => {
        prompts.push(question);
        return answer;
      },
      createLogger(),
    );
  });

  it("plans nothing when every command is on PATH", async () => {
    runner.available = new Set(["git", "java", "axel"]);

    expect(await resolver.plan()).toEqual({ missing_required: [], missing_optional: [] });
  });

  it("splits missing packages into required and optional", async () => {
    runner.available = new Set(["git"]);

    const plan = await resolver.plan();

    expect(plan.missing_required.map((d) => d.package)).toEqual(["jre-openjdk"]);
    expect(plan.missing_optional.map((d) => d.package)).toEqual(["axel"]);
  });

  it("queries the package database for a dependency without a command", async () => {
    runner.exitCodes.set("pacman", 1);

    const present = await resolver.isPresent({ package: "ttf-dejavu", optional: true });

    expect(present).toBe(false);
    expect(runner.calls).toEqual([
      { command: "pacman", args: ["-Qq", "ttf-dejavu"], options: {} },
    ]);
  });

  it("installs required packages through the privileged runner", async () => {
    runner.available = new Set(["git", "axel"]);
    privileged.onRun = () => runner.available.add("java");

    const plan = await resolver.plan();
    const resolution = await resolver.resolve(plan);

    expect(privileged.calls).toEqual(["run pacman -Syu --noconfirm jre-openjdk"]);
    expect(resolution).toEqual({ status: "ready", use_fallback_downloader: false, warnings: [] });
  });

  it("fails when a required command is still missing after installation", async () => {
    runner.available = new Set(["git", "axel"]);

    const resolution = await resolver.resolve(await resolver.plan());

    expect(resolution).toEqual({
      status: "failed",
      message: "Required commands are still missing: java.",
      hint: "Resolve the missing dependencies by hand and run install again.",
    });
  });

  it("installs the optional downloader with the first AUR helper found", async () => {
    runner.available = new Set(["git", "java", "yay"]);
    runner.onRun = (command) => {
      if (command === "yay") runner.available.add("axel");
    };

    const resolution = await resolver.resolve(await resolver.plan());

    expect(runner.calls).toEqual([
      { command: "yay", args: ["-S", "--noconfirm", "axel"], options: { interactive: true } },
    ]);
    expect(privileged.calls).toEqual([]);
    expect(resolution).toEqual({ status: "ready", use_fallback_downloader: false, warnings: [] });
  });

  it("falls back when the AUR helper fails", async () => {
    runner.available = new Set(["git", "java", "paru"]);
    runner.exitCodes.set("paru", 1);

    const resolution = await resolver.resolve(await resolver.plan());

    expect(resolution).toEqual({
      status: "ready",
      use_fallback_downloader: true,
      warnings: [
        { kind: "DEPENDENCY", message: "paru could not install axel (exit 1)." },
        {
          kind: "DEPENDENCY",
          message: "axel is unavailable; downloading with wget (may be slower).",
        },
      ],
    });
    expect(prompts).toEqual([]);
  });

  it("asks before continuing without an AUR helper", async () => {
    runner.available = new Set(["git", "java"]);

    const resolution = await resolver.resolve(await resolver.plan());

    expect(prompts).toEqual([
      "axel is not installed and no AUR helper was found. Continue without it? Downloads will be slower.",
    ]);
    expect(resolution.status).toBe("ready");
    if (resolution.status === "ready") {
      expect(resolution.warnings[0].message).toBe(
        "Neither paru nor yay is available; install axel from the AUR by hand " +
          "(git clone https://aur.archlinux.org/axel.git && cd axel && makepkg -si).",
      );
    }
  });

  it("is declined when the operator will not continue", async () => {
    runner.available = new Set(["git", "java"]);
    answer = false;

    expect(await resolver.resolve(await resolver.plan())).toEqual({ status: "declined" });
  });
});
