/**
 * `uptime-probe [hosts...]` — report host uptime and patch candidates.
 *
 * Hosts come from the arguments or, when there are none, from piped stdin
 * (one name or JSON record per line). With neither, the local host is
 * queried. Results print one per line as each host finishes: a fixed-width
 * table by default, NDJSON with --json. Offline hosts additionally produce a
 * warning on stderr through the logger.
 */

import * as os from "node:os";
import { Command } from "commander";
import type { Logger } from "pino";
import {
  LocalTransport,
  RoutingTransport,
  SshTransport,
  getUptime,
  type UptimeTransport,
} from "@uptime-probe/core";
import { buildSshOptions, loadConfig, type ProbeConfig } from "../lib/config.js";
import {
  formatError,
  formatUptimeHeader,
  formatUptimeJson,
  formatUptimeRow,
} from "../lib/formatters.js";
import { resolveHostNames, type HostInput } from "../lib/input.js";
import { createCliLogger } from "../lib/logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Flags as parsed by commander */
export interface UptimeCommandOptions {
  json?: boolean;
  user?: string;
  port?: string;
  identity?: string;
  connectTimeout?: string;
  queryTimeout?: string;
  patchThreshold?: string;
}

/** Collaborators that tests replace */
export interface UptimeRunDeps {
  transport?: UptimeTransport;
  logger?: Logger;
  stdin?: HostInput;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  localHostName?: string;
}

// ---------------------------------------------------------------------------
// Command Definition
// ---------------------------------------------------------------------------

/**
 * Create the uptime command. Returns a Commander Command instance that the
 * entry point uses as the program itself.
 */
export function createUptimeCommand(logger?: Logger): Command {
  const cmd = new Command("uptime-probe")
    .description("Report how long hosts have been up and flag those that might need patching")
    .argument("[hosts...]", "host names to query (default: stdin lines, else this host)")
    .option("--json", "Output one JSON object per host")
    .option("-u, --user <name>", "SSH username")
    .option("-p, --port <port>", "SSH port")
    .option("-i, --identity <path>", "SSH private key file")
    .option("--connect-timeout <ms>", "SSH handshake timeout in milliseconds")
    .option("--query-timeout <ms>", "Boot time query timeout in milliseconds")
    .option("--patch-threshold <days>", "Uptime in days above which a host might need patching")
    .action(async (hosts: string[], opts: UptimeCommandOptions) => {
      await runUptime(hosts, opts, { logger });
    });

  return cmd;
}

/**
 * SSH for remote hosts, os.uptime() for this machine.
 */
export function createDefaultTransport(
  config: ProbeConfig,
  localHostName: string,
): UptimeTransport {
  return new RoutingTransport(
    new LocalTransport(),
    new SshTransport(buildSshOptions(config)),
    localHostName,
  );
}

/**
 * Core uptime logic. Separated from Commander for testability.
 */
export async function runUptime(
  hosts: string[],
  opts: UptimeCommandOptions = {},
  deps: UptimeRunDeps = {},
): Promise<void> {
  try {
    const config = loadConfig(deps.env ?? process.env, {
      user: opts.user,
      port: opts.port,
      identity: opts.identity,
      connectTimeout: opts.connectTimeout,
      queryTimeout: opts.queryTimeout,
      patchThreshold: opts.patchThreshold,
    });

    const localHostName = deps.localHostName ?? os.hostname();
    const transport = deps.transport ?? createDefaultTransport(config, localHostName);
    const names = resolveHostNames(hosts, deps.stdin ?? process.stdin);

    if (!opts.json) {
      process.stdout.write(formatUptimeHeader() + "\n");
    }

    const results = getUptime(
      {
        transport,
        logger: deps.logger ?? createCliLogger(deps.env),
        now: deps.now,
        localHostName,
        patchThresholdDays: config.patchThresholdDays,
      },
      names,
    );

    for await (const result of results) {
      const line = opts.json ? formatUptimeJson(result) : formatUptimeRow(result);
      process.stdout.write(line + "\n");
    }
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
  }
}
