#!/usr/bin/env -S node --import tsx

/**
 * uptime-probe CLI entry point.
 *
 * Queries hosts for their last boot time and reports each one as OK, ERROR
 * or OFFLINE, flagging long-running hosts that might need patching.
 * Uses Commander for argument parsing.
 */

import { createUptimeCommand } from "./commands/uptime.js";
import { createCliLogger } from "./lib/logger.js";

// ---------------------------------------------------------------------------
// Logger — structured logging to stderr so stdout stays clean for output
// ---------------------------------------------------------------------------

const logger = createCliLogger();

// ---------------------------------------------------------------------------
// Program setup
// ---------------------------------------------------------------------------

const program = createUptimeCommand(logger).version("0.1.0");

// ---------------------------------------------------------------------------
// Global error handling
// ---------------------------------------------------------------------------

/**
 * Catch unhandled rejections and uncaught exceptions.
 * Log the error with pino and exit with code 1.
 */
process.on("unhandledRejection", (reason) => {
  logger.fatal({ err: reason }, "Unhandled rejection");
  process.exit(1);
});

process.on("uncaughtException", (err) => {
  logger.fatal({ err }, "Uncaught exception");
  process.exit(1);
});

// ---------------------------------------------------------------------------
// Parse and execute
// ---------------------------------------------------------------------------

program.parseAsync(process.argv).catch((err) => {
  logger.fatal({ err }, "CLI execution failed");
  process.exit(1);
});
