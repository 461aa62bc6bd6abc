#!/usr/bin/env node

/**
 * jarkit CLI — Entry Point
 *
 * Installs and manages a Java desktop application in the current
 * directory.
 *
 *   jarkit install     Install dependencies, the application and its menu entry
 *   jarkit upgrade     Re-download the configured version
 *   jarkit uninstall   Remove everything install created
 *   jarkit register    Start the companion loader
 *   jarkit help        Show usage
 */

import { createDefaultContext } from "./config";
import { createProgram } from "./program";
import { printError } from "./output";

const program = createProgram(createDefaultContext());

// Parse command line
program.parseAsync(process.argv).catch((err: unknown) => {
  printError(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
