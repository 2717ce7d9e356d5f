/**
 * Uptime query: for each host name, connect, read the boot time, classify
 * the host and yield one HostUptimeResult.
 *
 * Hosts are processed strictly one after another. Every host starts from
 * fresh state, so one host's outcome can never bleed into the next record.
 * Per-host failures (unreachable host, failed query) end up in the status
 * field; only a transport that throws from connect() aborts the sequence.
 *
 * This module is pure domain logic with an injected transport and logger.
 * No CLI, no SSH knowledge.
 */

import * as os from "node:os";
import { pino, type Logger } from "pino";
import {
  PATCH_THRESHOLD_DAYS,
  type HostUptimeResult,
  type UnavailableHostUptime,
} from "@uptime-probe/shared";
import type { RemoteSession, UptimeTransport } from "./transport.js";
import {
  computeUptimeDays,
  formatStartTime,
  mightNeedPatching,
} from "./uptime-math.js";

/** Dependencies and knobs for the uptime query */
export interface UptimeQueryDeps {
  transport: UptimeTransport;
  /** Receives one warning per offline host (default: silent) */
  logger?: Logger;
  /** Clock used for the uptime computation */
  now?: () => Date;
  /** Host queried when no names are given (default: os.hostname()) */
  localHostName?: string;
  /** Cutoff for mightNeedPatched, in days */
  patchThresholdDays?: number;
}

const silentLogger = pino({ level: "silent" });

/**
 * Query every host in `names`, yielding each result as soon as it is known.
 *
 * `names` may be an array or an async stream of names from an upstream
 * producer. When it is omitted or yields nothing, the local host is queried
 * instead, so the sequence always holds at least one record.
 */
export async function* getUptime(
  deps: UptimeQueryDeps,
  names?: Iterable<string> | AsyncIterable<string>,
): AsyncGenerator<HostUptimeResult, void, undefined> {
  let queried = 0;

  for await (const name of names ?? []) {
    queried++;
    yield await queryHost(deps, name);
  }

  if (queried === 0) {
    yield await queryHost(deps, deps.localHostName ?? os.hostname());
  }
}

/**
 * Query a single host. All per-host state lives in this call.
 */
export async function queryHost(
  deps: UptimeQueryDeps,
  computerName: string,
): Promise<HostUptimeResult> {
  const logger = deps.logger ?? silentLogger;

  const outcome = await deps.transport.connect(computerName);
  if (outcome.kind === "unreachable") {
    logger.warn(
      { host: computerName, reason: outcome.reason },
      `${computerName} is offline`,
    );
    return unavailable(computerName, "OFFLINE");
  }

  const bootTime = await readBootTime(outcome.session, computerName, logger);
  if (!bootTime) {
    return unavailable(computerName, "ERROR");
  }

  const now = deps.now ? deps.now() : new Date();
  const uptimeDays = computeUptimeDays(bootTime, now);

  return {
    computerName,
    startTime: formatStartTime(bootTime),
    uptimeDays,
    status: "OK",
    mightNeedPatched: mightNeedPatching(
      uptimeDays,
      deps.patchThresholdDays ?? PATCH_THRESHOLD_DAYS,
    ),
  };
}

/**
 * Run the boot-time query and release the session on every path out.
 * Returns null when the query failed or produced no valid date.
 */
async function readBootTime(
  session: RemoteSession,
  host: string,
  logger: Logger,
): Promise<Date | null> {
  try {
    const bootTime = await session.queryBootTime();
    if (bootTime === null || Number.isNaN(bootTime.getTime())) {
      logger.debug({ host }, "Boot time query returned nothing");
      return null;
    }
    return bootTime;
  } catch (err) {
    logger.debug({ err, host }, "Boot time query failed");
    return null;
  } finally {
    try {
      await session.close();
    } catch (err) {
      logger.debug({ err, host }, "Failed to close session");
    }
  }
}

function unavailable(
  computerName: string,
  status: UnavailableHostUptime["status"],
): UnavailableHostUptime {
  return {
    computerName,
    startTime: 0,
    uptimeDays: 0,
    status,
    mightNeedPatched: false,
  };
}
