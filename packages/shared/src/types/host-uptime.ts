/**
 * Host uptime type definitions.
 *
 * A HostUptimeResult is produced once per queried host name. The status
 * decides which fields carry data: only an OK host has a real boot time and
 * uptime, every other status carries the `0` sentinels.
 */

/** All host statuses, in order of decreasing health */
export const UPTIME_STATUSES = ["OK", "ERROR", "OFFLINE"] as const;

/**
 * Outcome of querying a single host.
 *   - OK:      connected and retrieved a boot timestamp
 *   - ERROR:   connected, but the boot-time query failed or returned nothing
 *   - OFFLINE: the connection attempt failed
 */
export type UptimeStatus = (typeof UPTIME_STATUSES)[number];

/** Hosts up for longer than this many days might be missing patches */
export const PATCH_THRESHOLD_DAYS = 30;

/** Result for a host whose boot time was retrieved */
export interface OnlineHostUptime {
  /** Host name exactly as it was requested */
  computerName: string;
  /** Last boot as ISO-8601 UTC, second precision */
  startTime: string;
  /** Uptime in days, rounded to one decimal place */
  uptimeDays: number;
  status: "OK";
  /** True when uptimeDays exceeds the patch threshold */
  mightNeedPatched: boolean;
}

/** Result for a host that was offline or could not report its boot time */
export interface UnavailableHostUptime {
  computerName: string;
  startTime: 0;
  uptimeDays: 0;
  status: "ERROR" | "OFFLINE";
  mightNeedPatched: false;
}

export type HostUptimeResult = OnlineHostUptime | UnavailableHostUptime;
