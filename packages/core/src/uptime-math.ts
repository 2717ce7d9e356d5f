/**
 * Pure uptime arithmetic and formatting.
 * No I/O, no clock access: callers pass both timestamps in.
 */

import { PATCH_THRESHOLD_DAYS } from "@uptime-probe/shared";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Days between boot and now, rounded to one decimal place.
 * A boot time in the future (clock skew between hosts) counts as 0.
 */
export function computeUptimeDays(bootTime: Date, now: Date): number {
  const elapsedMs = now.getTime() - bootTime.getTime();
  if (elapsedMs <= 0) return 0;
  return Math.round((elapsedMs / MS_PER_DAY) * 10) / 10;
}

/** Strictly greater than the threshold: exactly 30.0 days is still fine */
export function mightNeedPatching(
  uptimeDays: number,
  thresholdDays: number = PATCH_THRESHOLD_DAYS,
): boolean {
  return uptimeDays > thresholdDays;
}

/** ISO-8601 in UTC without milliseconds, e.g. "2026-09-04T08:15:00Z" */
export function formatStartTime(bootTime: Date): string {
  return bootTime.toISOString().replace(/\.\d{3}Z$/, "Z");
}
