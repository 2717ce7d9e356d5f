/**
 * Output formatting utilities for the uptime-probe CLI.
 *
 * Rows are fixed-width so each host can be printed the moment its result
 * arrives, without waiting for the whole batch to size the columns. All
 * colour output uses picocolors and every width calculation ignores ANSI
 * codes, so coloured cells stay aligned.
 */

import pc from "picocolors";
import {
  ConfigError,
  ValidationError,
  type HostUptimeResult,
  type UptimeStatus,
} from "@uptime-probe/shared";

// ---------------------------------------------------------------------------
// ANSI Utilities
// ---------------------------------------------------------------------------

/** Regex to match ANSI escape sequences (colors, cursor movement, etc.) */
const ANSI_REGEX = /\x1b\[[0-9;]*[a-zA-Z]/g;

/** Strip all ANSI escape codes from a string */
export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, "");
}

/** Visible width of a string, ignoring ANSI codes */
function displayWidth(str: string): number {
  return stripAnsi(str).length;
}

/**
 * Truncate a string to maxLen characters, appending "..." if exceeded.
 * ANSI-aware: measures visible width, not byte length.
 */
export function truncate(text: string, maxLen: number): string {
  if (displayWidth(text) <= maxLen) return text;
  if (maxLen <= 3) return "...".slice(0, maxLen);

  const plain = stripAnsi(text);
  return plain.slice(0, maxLen - 3) + "...";
}

// ---------------------------------------------------------------------------
// Uptime Table
// ---------------------------------------------------------------------------

/** Column definition for the fixed-width uptime table */
interface ColumnDef {
  header: string;
  width: number;
  /** Alignment: "left" (default) or "right" */
  align?: "left" | "right";
}

const COLUMNS: ColumnDef[] = [
  { header: "COMPUTER", width: 24 },
  { header: "START TIME", width: 20 },
  { header: "UPTIME (DAYS)", width: 13, align: "right" },
  { header: "STATUS", width: 7 },
  { header: "PATCH?", width: 6 },
];

const COLUMN_GAP = "  ";

const STATUS_COLORS: Record<UptimeStatus, (s: string) => string> = {
  OK: pc.green,
  ERROR: pc.yellow,
  OFFLINE: pc.red,
};

/** Pad or truncate a cell to its column width */
function formatCell(value: string, column: ColumnDef): string {
  const visWidth = displayWidth(value);
  if (visWidth > column.width) {
    return truncate(value, column.width);
  }
  const padding = " ".repeat(column.width - visWidth);
  return column.align === "right" ? padding + value : value + padding;
}

function formatLine(cells: string[]): string {
  return cells
    .map((cell, i) => formatCell(cell, COLUMNS[i]))
    .join(COLUMN_GAP)
    .trimEnd();
}

/** Dimmed header line for the text table */
export function formatUptimeHeader(): string {
  return formatLine(COLUMNS.map((col) => pc.dim(col.header)));
}

/** Colour a status label */
export function formatStatus(status: UptimeStatus): string {
  return STATUS_COLORS[status](status);
}

/**
 * Format one result as a table row.
 * Unavailable hosts show "-" where the JSON output carries the 0 sentinels.
 */
export function formatUptimeRow(result: HostUptimeResult): string {
  if (result.status !== "OK") {
    return formatLine([result.computerName, "-", "-", formatStatus(result.status), "-"]);
  }
  return formatLine([
    result.computerName,
    result.startTime,
    result.uptimeDays.toFixed(1),
    formatStatus(result.status),
    result.mightNeedPatched ? pc.yellow("yes") : "no",
  ]);
}

/** One result as a single line of JSON (NDJSON) */
export function formatUptimeJson(result: HostUptimeResult): string {
  return JSON.stringify(result);
}

// ---------------------------------------------------------------------------
// Error Formatting
// ---------------------------------------------------------------------------

/**
 * Format an error for user-facing display.
 *
 * Handles ConfigError (bad settings), ValidationError (bad input) and
 * generic Error instances with appropriate messaging.
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigError) {
    return pc.red(`Config error (${error.code}): ${error.message}`);
  }

  if (error instanceof ValidationError) {
    return pc.red(`Invalid input (${error.code}): ${error.message}`);
  }

  if (error instanceof Error) {
    return pc.red(`Error: ${error.message}`);
  }

  return pc.red(`Error: ${String(error)}`);
}
