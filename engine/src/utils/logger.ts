/**
 * jarkit Engine -- Structured Logger
 *
 * Wraps pino for structured logging. All engine operations log through
 * this module.
 *
 * Silent by default so the terminal only shows the CLI's tagged lines.
 * The CLI points the logger at a file under the user's state directory;
 * without a file destination, logs go to stderr.
 *
 * NOTE: We use pino.destination() instead of pino transports because
 * transports spawn worker_threads, which keep short-lived CLI processes
 * alive and lose lines on exit.
 */

import pino from "pino";

export interface LoggerOptions {
  level: "silent" | "debug" | "info" | "warn" | "error";
  /** Log file path. Parent directories are created. Defaults to stderr. */
  file?: string;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const dest = opts.file
    ? pino.destination({ dest: opts.file, mkdir: true, sync: true })
    : pino.destination({ fd: 2, sync: true });

  return pino(
    {
      level: opts.level,
      base: { pid: process.pid },
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    dest,
  );
}

export type Logger = pino.Logger;
