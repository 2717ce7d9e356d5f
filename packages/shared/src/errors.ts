/**
 * Errors raised by uptime-probe.
 *
 * Each one carries a machine-readable `code` (CONFIG_*, VALIDATION_*,
 * QUERY_*) and a `context` object. Both are own enumerable properties, so
 * pino's `err` serializer writes them into the log line as they are.
 *
 * Unreachable hosts never raise: transports report them as a value.
 */

export class UptimeProbeError extends Error {
  readonly code: string;
  /** Details for the log; the CLI prints only the message */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "UptimeProbeError";
    this.code = code;
    this.context = context;
  }
}

/**
 * Bad settings from the environment or flags, or a key file that cannot be
 * read.
 *
 * @example
 *   throw new ConfigError("Invalid SSH port", "CONFIG_INVALID", { variable: "UPTIME_PROBE_SSH_PORT" })
 */
export class ConfigError extends UptimeProbeError {
  constructor(
    message: string,
    code: string = "CONFIG_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ConfigError";
  }
}

/** A host name or piped record that cannot be used */
export class ValidationError extends UptimeProbeError {
  constructor(
    message: string,
    code: string = "VALIDATION_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ValidationError";
  }
}

/**
 * The host answered the handshake but its boot time could not be read.
 * uptime-query turns these into an ERROR record.
 */
export class QueryError extends UptimeProbeError {
  constructor(
    message: string,
    code: string = "QUERY_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "QueryError";
  }
}
