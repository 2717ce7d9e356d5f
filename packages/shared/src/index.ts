/**
 * @uptime-probe/shared — the contract layer for the uptime-probe monorepo.
 *
 * Every other package imports from here. Contains:
 *   - HostUptimeResult and status types
 *   - Zod schemas for host names and piped input records
 *   - Structured error hierarchy
 */

// Result and status types
export * from "./types/index.js";

// Zod schemas for host input
export * from "./schemas/index.js";

// Structured error classes
export * from "./errors.js";
