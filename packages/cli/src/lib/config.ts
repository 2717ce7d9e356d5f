/**
 * Runtime settings for the uptime-probe CLI.
 *
 * There is no config file: settings come from environment variables, and
 * command-line flags override them. Everything is validated with one Zod
 * schema so a bad value fails fast with the variable or flag that set it.
 *
 * Variables:
 *   UPTIME_PROBE_SSH_USER            — SSH username (default: current OS user)
 *   UPTIME_PROBE_SSH_PORT            — SSH port (default: 22)
 *   UPTIME_PROBE_SSH_KEY             — path to a private key file
 *   SSH_AUTH_SOCK                    — SSH agent socket
 *   UPTIME_PROBE_CONNECT_TIMEOUT_MS  — handshake timeout (default: 20000)
 *   UPTIME_PROBE_QUERY_TIMEOUT_MS    — boot-time query timeout (default: 30000)
 */

import * as fs from "node:fs";
import * as os from "node:os";
import { z } from "zod";
import { ConfigError, PATCH_THRESHOLD_DAYS } from "@uptime-probe/shared";
import type { SshTransportOptions } from "@uptime-probe/core";

// ---------------------------------------------------------------------------
// Zod schema for settings validation
// ---------------------------------------------------------------------------

/** Zod schema that validates the merged settings */
const ProbeConfigSchema = z.object({
  /** Username for every SSH connection */
  username: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535),
  /** Path to a private key; read when the transport is built */
  identityFile: z.string().min(1).optional(),
  /** SSH agent socket path */
  agent: z.string().min(1).optional(),
  connectTimeoutMs: z.coerce.number().int().positive(),
  queryTimeoutMs: z.coerce.number().int().positive(),
  /** Uptime (days) above which a host might need patching */
  patchThresholdDays: z.coerce.number().nonnegative(),
});

export type ProbeConfig = z.infer<typeof ProbeConfigSchema>;

/** Flag values as commander hands them over (all strings) */
export interface ConfigOverrides {
  user?: string;
  port?: string;
  identity?: string;
  connectTimeout?: string;
  queryTimeout?: string;
  patchThreshold?: string;
}

/** Where each setting comes from, for error messages */
const SETTING_SOURCES: Record<keyof ProbeConfig, string> = {
  username: "UPTIME_PROBE_SSH_USER / --user",
  port: "UPTIME_PROBE_SSH_PORT / --port",
  identityFile: "UPTIME_PROBE_SSH_KEY / --identity",
  agent: "SSH_AUTH_SOCK",
  connectTimeoutMs: "UPTIME_PROBE_CONNECT_TIMEOUT_MS / --connect-timeout",
  queryTimeoutMs: "UPTIME_PROBE_QUERY_TIMEOUT_MS / --query-timeout",
  patchThresholdDays: "--patch-threshold",
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Merge flags over environment over defaults and validate the result.
 *
 * @throws ConfigError CONFIG_INVALID — a value fails schema validation
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): ProbeConfig {
  const raw = {
    username:
      overrides.user ?? envValue(env, "UPTIME_PROBE_SSH_USER") ?? defaultUsername(env),
    port: overrides.port ?? envValue(env, "UPTIME_PROBE_SSH_PORT") ?? 22,
    identityFile: overrides.identity ?? envValue(env, "UPTIME_PROBE_SSH_KEY"),
    agent: envValue(env, "SSH_AUTH_SOCK"),
    connectTimeoutMs:
      overrides.connectTimeout ?? envValue(env, "UPTIME_PROBE_CONNECT_TIMEOUT_MS") ?? 20000,
    queryTimeoutMs:
      overrides.queryTimeout ?? envValue(env, "UPTIME_PROBE_QUERY_TIMEOUT_MS") ?? 30000,
    patchThresholdDays: overrides.patchThreshold ?? PATCH_THRESHOLD_DAYS,
  };

  const result = ProbeConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${settingSource(issue.path)}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`, "CONFIG_INVALID", {
      zodErrors: result.error.issues,
    });
  }

  return result.data;
}

/**
 * Translate settings into ssh2 transport options, reading the key file.
 *
 * @throws ConfigError CONFIG_KEY_UNREADABLE — the key file cannot be read
 */
export function buildSshOptions(config: ProbeConfig): SshTransportOptions {
  let privateKey: Buffer | undefined;
  if (config.identityFile) {
    try {
      privateKey = fs.readFileSync(config.identityFile);
    } catch (err) {
      throw new ConfigError(
        `Cannot read SSH key at ${config.identityFile}`,
        "CONFIG_KEY_UNREADABLE",
        { path: config.identityFile, cause: String(err) },
      );
    }
  }

  return {
    username: config.username,
    port: config.port,
    privateKey,
    agent: config.agent,
    readyTimeoutMs: config.connectTimeoutMs,
    queryTimeoutMs: config.queryTimeoutMs,
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Describe a failing schema path by the variable or flag behind it */
function settingSource(issuePath: (string | number)[]): string {
  const [field] = issuePath;
  for (const [key, source] of Object.entries(SETTING_SOURCES)) {
    if (key === field) return source;
  }
  return issuePath.join(".");
}

/** Read an env var, treating the empty string as unset */
function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === "" ? undefined : value;
}

function defaultUsername(env: NodeJS.ProcessEnv): string {
  try {
    return os.userInfo().username;
  } catch {
    // No passwd entry for the current uid (common in containers)
    return envValue(env, "USER") ?? "";
  }
}
