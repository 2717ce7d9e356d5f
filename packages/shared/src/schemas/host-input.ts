/**
 * Zod schemas for host input.
 *
 * Host names arrive either as bare strings (arguments, plain stdin lines)
 * or inside richer records piped from another tool. The record schema
 * accepts any object and extracts the first name-bearing field it knows.
 *
 * Used by:
 *   - CLI stdin parsing
 *   - CLI positional argument validation
 */

import { z } from "zod";

/**
 * Fields that may carry a host name, checked in this order.
 * Covers records emitted by inventory tools and by this CLI's own --json output.
 */
export const HOST_NAME_FIELDS = [
  "computerName",
  "ComputerName",
  "hostname",
  "host",
  "name",
] as const;

/** A single host name: trimmed, non-empty, no embedded whitespace */
export const hostNameSchema = z
  .string()
  .trim()
  .min(1, "host name must not be empty")
  .regex(/^\S+$/, "host name must not contain whitespace");

/**
 * Schema for a piped input record. Unknown fields pass through untouched;
 * the transform yields the host name, or undefined when no field matched.
 */
export const hostRecordSchema = z
  .record(z.unknown())
  .transform((record): string | undefined => {
    for (const field of HOST_NAME_FIELDS) {
      const value = record[field];
      if (typeof value === "string" && value.trim().length > 0) {
        return value;
      }
    }
    return undefined;
  });
