/**
 * Tests for CLI output formatting utilities.
 *
 * Pure unit tests -- no I/O, no mocks. Colour may or may not be enabled in
 * the test environment, so row assertions compare the ANSI-stripped text.
 */

import { describe, it, expect } from "vitest";
import { ConfigError, QueryError, ValidationError } from "@uptime-probe/shared";
import type { HostUptimeResult } from "@uptime-probe/shared";
import {
  formatError,
  formatStatus,
  formatUptimeHeader,
  formatUptimeJson,
  formatUptimeRow,
  stripAnsi,
  truncate,
} from "../formatters.js";

const OK_RESULT: HostUptimeResult = {
  computerName: "SRV-UP",
  startTime: "2026-09-04T12:00:00Z",
  uptimeDays: 45,
  status: "OK",
  mightNeedPatched: true,
};

const OFFLINE_RESULT: HostUptimeResult = {
  computerName: "SRV-DOWN",
  startTime: 0,
  uptimeDays: 0,
  status: "OFFLINE",
  mightNeedPatched: false,
};

// ---------------------------------------------------------------------------
// Tests: ANSI helpers
// ---------------------------------------------------------------------------

describe("stripAnsi", () => {
  it("removes colour codes", () => {
    expect(stripAnsi("\x1b[32mOK\x1b[39m")).toBe("OK");
  });
});

describe("truncate", () => {
  it("leaves short text alone", () => {
    expect(truncate("db-01", 10)).toBe("db-01");
  });

  it("cuts long text and appends an ellipsis", () => {
    expect(truncate("a-very-long-host-name", 10)).toBe("a-very-...");
  });
});

// ---------------------------------------------------------------------------
// Tests: uptime table
// ---------------------------------------------------------------------------

describe("formatUptimeHeader", () => {
  it("lays out all column headers", () => {
    expect(stripAnsi(formatUptimeHeader())).toBe(
      [
        "COMPUTER".padEnd(24),
        "START TIME".padEnd(20),
        "UPTIME (DAYS)",
        "STATUS ",
        "PATCH?",
      ].join("  "),
    );
  });
});

describe("formatUptimeRow", () => {
  it("formats an OK host with one decimal of uptime", () => {
    expect(stripAnsi(formatUptimeRow(OK_RESULT))).toBe(
      [
        "SRV-UP".padEnd(24),
        "2026-09-04T12:00:00Z",
        "45.0".padStart(13),
        "OK     ",
        "yes",
      ].join("  "),
    );
  });

  it("shows 'no' for an OK host under the threshold", () => {
    const row = stripAnsi(
      formatUptimeRow({ ...OK_RESULT, uptimeDays: 3.2, mightNeedPatched: false }),
    );
    expect(row.endsWith("  3.2  OK       no")).toBe(true);
  });

  it("shows dashes for an unavailable host", () => {
    expect(stripAnsi(formatUptimeRow(OFFLINE_RESULT))).toBe(
      ["SRV-DOWN".padEnd(24), "-".padEnd(20), "-".padStart(13), "OFFLINE", "-"].join("  "),
    );
  });

  it("truncates host names wider than the column", () => {
    const row = stripAnsi(
      formatUptimeRow({ ...OFFLINE_RESULT, computerName: "a-very-long-host-name-in-a-datacenter" }),
    );
    expect(row.startsWith("a-very-long-host-name...  -")).toBe(true);
  });
});

describe("formatStatus", () => {
  it("keeps the status label", () => {
    expect(stripAnsi(formatStatus("ERROR"))).toBe("ERROR");
  });
});

describe("formatUptimeJson", () => {
  it("keeps the sentinels for unavailable hosts", () => {
    expect(formatUptimeJson(OFFLINE_RESULT)).toBe(
      '{"computerName":"SRV-DOWN","startTime":0,"uptimeDays":0,"status":"OFFLINE","mightNeedPatched":false}',
    );
  });
});

// ---------------------------------------------------------------------------
// Tests: formatError
// ---------------------------------------------------------------------------

describe("formatError", () => {
  it("formats ConfigError with its code", () => {
    expect(stripAnsi(formatError(new ConfigError("bad port", "CONFIG_INVALID")))).toBe(
      "Config error (CONFIG_INVALID): bad port",
    );
  });

  it("formats ValidationError with its code", () => {
    expect(
      stripAnsi(formatError(new ValidationError("no host", "VALIDATION_INPUT_RECORD"))),
    ).toBe("Invalid input (VALIDATION_INPUT_RECORD): no host");
  });

  it("formats other errors by message", () => {
    expect(stripAnsi(formatError(new QueryError("timed out")))).toBe("Error: timed out");
  });

  it("formats non-Error values", () => {
    expect(stripAnsi(formatError("kaput"))).toBe("Error: kaput");
  });
});
