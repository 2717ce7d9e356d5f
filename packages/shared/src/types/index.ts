/**
 * Barrel re-export for all type definitions.
 * Import from "@uptime-probe/shared" to access these.
 */
export * from "./host-uptime.js";
