/**
 * Barrel re-export for all Zod schemas.
 * Import from "@uptime-probe/shared" to access these.
 */
export * from "./host-input.js";
