/**
 * Tests for the uptime command.
 *
 * runUptime is driven with an in-memory transport, so no SSH server is
 * needed. stdout and console.error are spied on and their output compared
 * with ANSI codes stripped.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Readable } from "node:stream";
import { pino } from "pino";
import { RoutingTransport, type UptimeTransport } from "@uptime-probe/core";
import { loadConfig } from "../../lib/config.js";
import { formatUptimeHeader, stripAnsi } from "../../lib/formatters.js";
import { createDefaultTransport, createUptimeCommand, runUptime } from "../uptime.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const NOW = new Date("2026-10-19T12:00:00Z");
const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ENV = { UPTIME_PROBE_SSH_USER: "probe", NODE_ENV: "production" };

/** Hosts the fake transport can reach, with their uptime in days */
const UPTIMES: Record<string, number> = {
  "SRV-UP": 45,
  "web-01": 3.2,
  "build-box": 1,
};

function createFakeTransport() {
  const connects: string[] = [];
  const transport: UptimeTransport = {
    async connect(host) {
      connects.push(host);
      const days = UPTIMES[host];
      if (days === undefined) {
        return { kind: "unreachable", reason: `DNS lookup failed for ${host}` };
      }
      return {
        kind: "connected",
        session: {
          queryBootTime: async () => new Date(NOW.getTime() - days * MS_PER_DAY),
          close: async () => {},
        },
      };
    },
  };
  return { transport, connects };
}

function stdinOf(text: string, isTTY?: boolean) {
  return Object.assign(Readable.from([Buffer.from(text)]), { isTTY });
}

const silentLogger = pino({ level: "silent" });

function spyOnOutput() {
  return {
    write: vi.spyOn(process.stdout, "write").mockImplementation(() => true),
    error: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}

let spies: ReturnType<typeof spyOnOutput>;

function stdoutLines(): string[] {
  return spies.write.mock.calls.map((call) => stripAnsi(String(call[0])).replace(/\n$/, ""));
}

function firstError(): string {
  return stripAnsi(String(spies.error.mock.calls[0][0]));
}

beforeEach(() => {
  spies = spyOnOutput();
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("runUptime", () => {
  it("writes one JSON line per host in input order", async () => {
    const { transport, connects } = createFakeTransport();

    await runUptime(["SRV-UP", "SRV-DOWN"], { json: true }, {
      transport,
      logger: silentLogger,
      env: ENV,
      now: () => NOW,
      stdin: stdinOf("", true),
    });

    expect(connects).toEqual(["SRV-UP", "SRV-DOWN"]);
    expect(stdoutLines()).toEqual([
      '{"computerName":"SRV-UP","startTime":"2026-09-04T12:00:00Z","uptimeDays":45,"status":"OK","mightNeedPatched":true}',
      '{"computerName":"SRV-DOWN","startTime":0,"uptimeDays":0,"status":"OFFLINE","mightNeedPatched":false}',
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it("writes a header and a table row per host", async () => {
    const { transport } = createFakeTransport();

    await runUptime(["web-01"], {}, {
      transport,
      logger: silentLogger,
      env: ENV,
      now: () => NOW,
      stdin: stdinOf("", true),
    });

    const lines = stdoutLines();
    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe(stripAnsi(formatUptimeHeader()));
    expect(lines[1].startsWith("web-01")).toBe(true);
    expect(lines[1].endsWith("3.2  OK       no")).toBe(true);
  });

  it("reads host names from piped stdin", async () => {
    const { transport, connects } = createFakeTransport();

    await runUptime([], { json: true }, {
      transport,
      logger: silentLogger,
      env: ENV,
      now: () => NOW,
      stdin: stdinOf('# inventory\nweb-01\n{"hostname":"SRV-UP"}\n'),
    });

    expect(connects).toEqual(["web-01", "SRV-UP"]);
    expect(stdoutLines()).toHaveLength(2);
  });

  it("queries the local host when there is no input", async () => {
    const { transport, connects } = createFakeTransport();

    await runUptime([], { json: true }, {
      transport,
      logger: silentLogger,
      env: ENV,
      now: () => NOW,
      stdin: stdinOf("", true),
      localHostName: "build-box",
    });

    expect(connects).toEqual(["build-box"]);
    expect(stdoutLines()).toEqual([
      '{"computerName":"build-box","startTime":"2026-10-18T12:00:00Z","uptimeDays":1,"status":"OK","mightNeedPatched":false}',
    ]);
  });

  it("applies --patch-threshold", async () => {
    const { transport } = createFakeTransport();

    await runUptime(["web-01"], { json: true, patchThreshold: "3" }, {
      transport,
      logger: silentLogger,
      env: ENV,
      now: () => NOW,
      stdin: stdinOf("", true),
    });

    expect(stdoutLines()[0]).toContain('"mightNeedPatched":true');
  });

  it("rejects an invalid host argument before querying anything", async () => {
    const { transport, connects } = createFakeTransport();

    await runUptime(["web 01"], {}, {
      transport,
      logger: silentLogger,
      env: ENV,
      now: () => NOW,
      stdin: stdinOf("", true),
    });

    expect(connects).toEqual([]);
    expect(spies.write).not.toHaveBeenCalled();
    expect(firstError()).toBe(
      'Invalid input (VALIDATION_HOST_NAME): Invalid host name "web 01": host name must not contain whitespace',
    );
    expect(process.exitCode).toBe(1);
  });

  it("reports invalid settings as a config error", async () => {
    const { transport } = createFakeTransport();

    await runUptime(["web-01"], {}, {
      transport,
      logger: silentLogger,
      env: { ...ENV, UPTIME_PROBE_SSH_PORT: "70000" },
      stdin: stdinOf("", true),
    });

    const message = firstError();
    expect(
      message.startsWith(
        "Config error (CONFIG_INVALID): Invalid configuration: UPTIME_PROBE_SSH_PORT / --port: ",
      ),
    ).toBe(true);
    expect(process.exitCode).toBe(1);
  });

  it("keeps earlier rows when a later stdin line is invalid", async () => {
    const { transport, connects } = createFakeTransport();

    await runUptime([], { json: true }, {
      transport,
      logger: silentLogger,
      env: ENV,
      now: () => NOW,
      stdin: stdinOf("web-01\n{broken\nSRV-UP\n"),
    });

    expect(connects).toEqual(["web-01"]);
    expect(stdoutLines()).toHaveLength(1);
    expect(firstError()).toBe(
      "Invalid input (VALIDATION_INPUT_RECORD): Line 2 is not valid JSON",
    );
    expect(process.exitCode).toBe(1);
  });
});

describe("createDefaultTransport", () => {
  it("routes the local host name away from SSH", () => {
    const transport = createDefaultTransport(loadConfig(ENV), "build-box");

    expect(transport).toBeInstanceOf(RoutingTransport);
    if (transport instanceof RoutingTransport) {
      expect(transport.isLocal("BUILD-BOX")).toBe(true);
      expect(transport.isLocal("web-01")).toBe(false);
    }
  });
});

describe("createUptimeCommand", () => {
  it("declares the documented options", () => {
    const flags = createUptimeCommand(silentLogger).options.map((opt) => opt.long);

    expect(flags).toEqual([
      "--json",
      "--user",
      "--port",
      "--identity",
      "--connect-timeout",
      "--query-timeout",
      "--patch-threshold",
    ]);
  });
});
