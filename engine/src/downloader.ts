/**
 * jarkit Engine — Artifact Downloader
 *
 * Fetches the versioned artifact with an external download tool: the
 * accelerated multi-connection downloader when it is usable, otherwise
 * the single-stream fallback. Both inherit the terminal so their own
 * progress output stays visible.
 *
 * No integrity check and no resume; a failed download leaves whatever
 * the tool wrote in place.
 */

import * as fs from "fs";
import * as path from "path";
import type { ArtifactFetcher, CommandRunner, FetchResult } from "./types";
import type { Logger } from "./utils/logger";

export interface DownloaderTools {
  accelerated: string;
  fallback: string;
}

export function buildDownloadArgs(
  tool: "accelerated" | "fallback",
  url: string,
  destinationPath: string,
): string[] {
  // axel: <url> -o <file>; wget: -O <file> <url>
  return tool === "accelerated"
    ? [url, "-o", destinationPath]
    : ["-O", destinationPath, url];
}

export class CommandArtifactFetcher implements ArtifactFetcher {
  constructor(
    private readonly tools: DownloaderTools,
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
  ) {}

  hasAcceleratedDownloader(): Promise<boolean> {
    return this.runner.exists(this.tools.accelerated);
  }

  async fetch(
    url: string,
    destinationPath: string,
    useFallback: boolean,
  ): Promise<FetchResult> {
    const useAccelerated = !useFallback && (await this.hasAcceleratedDownloader());
    const kind = useAccelerated ? "accelerated" : "fallback";
    const tool = useAccelerated ? this.tools.accelerated : this.tools.fallback;

    fs.mkdirSync(path.dirname(destinationPath), { recursive: true });
    this.logger.info({ url, dest: destinationPath, tool }, "Starting download");

    const startTime = Date.now();
    const result = await this.runner.run(
      tool,
      buildDownloadArgs(kind, url, destinationPath),
      { interactive: true },
    );

    if (result.exit_code !== 0) {
      this.logger.error(
        { url, dest: destinationPath, tool, exit_code: result.exit_code },
        "Download failed",
      );
      return {
        ok: false,
        message: `Downloading ${url} to ${destinationPath} with ${tool} failed (exit ${result.exit_code}).`,
        hint: `Download ${url} manually, save it as ${destinationPath}, then run the command again.`,
      };
    }

    this.logger.info(
      { dest: destinationPath, tool, duration_ms: Date.now() - startTime },
      "Download complete",
    );
    return { ok: true, tool };
  }
}
