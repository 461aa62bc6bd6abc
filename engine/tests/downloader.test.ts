import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { buildDownloadArgs, CommandArtifactFetcher } from "../src/downloader";
import { createLogger } from "../src/utils/logger";
import { FakeRunner } from "./helpers";

const URL = "https://downloads.example.com/app/releases/latest.jar";

describe("buildDownloadArgs", () => {
  it("orders arguments for each tool", () => {
    expect(buildDownloadArgs("accelerated", URL, "/tmp/app.jar")).toEqual([
      URL,
      "-o",
      "/tmp/app.jar",
    ]);
    expect(buildDownloadArgs("fallback", URL, "/tmp/app.jar")).toEqual([
      "-O",
      "/tmp/app.jar",
      URL,
    ]);
  });
});

describe("CommandArtifactFetcher", () => {
  let dir: string;
  let dest: string;
  let runner: FakeRunner;
  let fetcher: CommandArtifactFetcher;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "jarkit-download-"));
    dest = path.join(dir, "nested", "app.jar");
    runner = new FakeRunner();
    fetcher = new CommandArtifactFetcher(
      { accelerated: "axel", fallback: "wget" },
      runner,
      createLogger(),
    );
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("uses the accelerated tool when it is on PATH", async () => {
    runner.available.add("axel");

    const result = await fetcher.fetch(URL, dest, false);

    expect(result).toEqual({ ok: true, tool: "axel" });
    expect(runner.calls).toEqual([
      { command: "axel", args: [URL, "-o", dest], options: { interactive: true } },
    ]);
    expect(fs.existsSync(path.dirname(dest))).toBe(true);
  });

  it("uses the fallback when asked to, even with the accelerated tool present", async () => {
    runner.available.add("axel");

    const result = await fetcher.fetch(URL, dest, true);

    expect(result).toEqual({ ok: true, tool: "wget" });
    expect(runner.calls[0].command).toBe("wget");
  });

  it("uses the fallback when the accelerated tool is missing", async () => {
    const result = await fetcher.fetch(URL, dest, false);
    expect(result).toEqual({ ok: true, tool: "wget" });
  });

  it("reports a failed download with a manual hint", async () => {
    runner.exitCodes.set("wget", 8);

    const result = await fetcher.fetch(URL, dest, true);

    expect(result).toEqual({
      ok: false,
      message: `Downloading ${URL} to ${dest} with wget failed (exit 8).`,
      hint: `Download ${URL} manually, save it as ${dest}, then run the command again.`,
    });
  });
});
