/**
 * SSH transport: reaches hosts with ssh2 and reads the kernel boot time
 * from /proc/stat.
 *
 * Connection failures (DNS, refused, timeout, auth) come back as an
 * "unreachable" outcome with a short human-readable reason. Once connected,
 * the session runs a single command; exec failures and timeouts reject with
 * QueryError and are classified by the caller.
 */

import ssh2 from "ssh2";
import type { Client, ConnectConfig } from "ssh2";
import { QueryError } from "@uptime-probe/shared";
import type {
  ConnectOutcome,
  RemoteSession,
  UptimeTransport,
} from "./transport.js";

/** Command whose output carries the `btime` line (boot time, epoch seconds) */
export const BOOT_TIME_COMMAND = "cat /proc/stat";

export interface SshTransportOptions {
  username: string;
  /** SSH port (default: 22) */
  port?: number;
  /** Private key contents, for key-based auth */
  privateKey?: Buffer | string;
  /** Path to the SSH agent socket, usually $SSH_AUTH_SOCK */
  agent?: string;
  /** Handshake timeout in milliseconds (default: 20000) */
  readyTimeoutMs?: number;
  /** Boot-time query timeout in milliseconds (default: 30000) */
  queryTimeoutMs?: number;
  /** Client factory, replaced in tests */
  createClient?: () => Client;
}

/** Output of a remote command */
export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number | undefined;
}

export class SshTransport implements UptimeTransport {
  private readonly port: number;
  private readonly readyTimeoutMs: number;
  private readonly queryTimeoutMs: number;
  private readonly createClient: () => Client;

  constructor(private readonly options: SshTransportOptions) {
    this.port = options.port ?? 22;
    this.readyTimeoutMs = options.readyTimeoutMs ?? 20000;
    this.queryTimeoutMs = options.queryTimeoutMs ?? 30000;
    this.createClient = options.createClient ?? (() => new ssh2.Client());
  }

  connect(host: string): Promise<ConnectOutcome> {
    const client = this.createClient();

    return new Promise((resolve) => {
      let settled = false;

      const onReady = (): void => {
        if (settled) return;
        settled = true;
        resolve({
          kind: "connected",
          session: new SshSession(client, host, this.queryTimeoutMs),
        });
      };

      // Stays attached for the client's whole life: after a failed handshake
      // ssh2 emits more errors ("Connection lost before handshake").
      const onError = (err: Error): void => {
        if (settled) return;
        settled = true;
        client.removeListener("ready", onReady);
        client.end();
        resolve({
          kind: "unreachable",
          reason: describeConnectError(err, host, this.port, this.options.username),
        });
      };

      client.once("ready", onReady);
      client.on("error", onError);

      try {
        client.connect(this.buildConfig(host));
      } catch (err) {
        // ssh2 throws synchronously on invalid config (e.g. unparseable key)
        onError(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  private buildConfig(host: string): ConnectConfig {
    const config: ConnectConfig = {
      host,
      port: this.port,
      username: this.options.username,
      readyTimeout: this.readyTimeoutMs,
    };
    if (this.options.privateKey) {
      config.privateKey = this.options.privateKey;
    }
    if (this.options.agent) {
      config.agent = this.options.agent;
    }
    return config;
  }
}

/**
 * One connected host. Owns its client until close().
 */
export class SshSession implements RemoteSession {
  private closed = false;

  constructor(
    private readonly client: Client,
    readonly host: string,
    private readonly queryTimeoutMs: number,
  ) {
    // Late transport errors (reset, keepalive loss) end the session
    client.on("error", () => {
      this.closed = true;
    });
  }

  async queryBootTime(): Promise<Date | null> {
    if (this.closed) {
      throw new QueryError(`Session to ${this.host} is closed`, "QUERY_EXEC_FAILED", {
        host: this.host,
      });
    }

    const result = await execCommand(
      this.client,
      BOOT_TIME_COMMAND,
      this.queryTimeoutMs,
    );
    const bootTime = parseBootTime(result.stdout);

    if (!bootTime && result.exitCode !== undefined && result.exitCode !== 0) {
      throw new QueryError(
        `'${BOOT_TIME_COMMAND}' exited with code ${result.exitCode}`,
        "QUERY_EXEC_FAILED",
        { host: this.host, exitCode: result.exitCode, stderr: result.stderr.trim() },
      );
    }
    return bootTime;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.client.end();
  }
}

/**
 * Run a command over an established client and collect its output.
 * Rejects on exec failure, on a client error while running, and on timeout.
 */
export function execCommand(
  client: Client,
  command: string,
  timeoutMs: number,
): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const finalize = (handler: () => void): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      client.removeListener("error", onClientError);
      handler();
    };

    const onClientError = (err: Error): void => {
      finalize(() =>
        reject(
          new QueryError(`Connection failed while running '${command}'`, "QUERY_EXEC_FAILED", {
            command,
            cause: err.message,
          }),
        ),
      );
    };

    const timer = setTimeout(() => {
      finalize(() =>
        reject(
          new QueryError(`'${command}' timed out after ${timeoutMs}ms`, "QUERY_TIMEOUT", {
            command,
            timeoutMs,
          }),
        ),
      );
    }, timeoutMs);

    client.on("error", onClientError);

    client.exec(command, (err, stream) => {
      if (err) {
        finalize(() =>
          reject(
            new QueryError(`Failed to run '${command}'`, "QUERY_EXEC_FAILED", {
              command,
              cause: err.message,
            }),
          ),
        );
        return;
      }

      stream.on("data", (data: Buffer) => {
        stdout.push(data);
      });

      stream.stderr.on("data", (data: Buffer) => {
        stderr.push(data);
      });

      stream.on("close", (code?: number) => {
        finalize(() =>
          resolve({
            stdout: Buffer.concat(stdout).toString("utf8"),
            stderr: Buffer.concat(stderr).toString("utf8"),
            exitCode: typeof code === "number" ? code : undefined,
          }),
        );
      });
    });
  });
}

/**
 * Extract the boot time from /proc/stat output.
 * Returns null when there is no `btime` line or it is not a positive integer.
 */
export function parseBootTime(procStat: string): Date | null {
  const match = /^btime\s+(\d+)\s*$/m.exec(procStat);
  if (!match) {
    return null;
  }
  const epochSeconds = Number(match[1]);
  if (!Number.isSafeInteger(epochSeconds) || epochSeconds <= 0) {
    return null;
  }
  return new Date(epochSeconds * 1000);
}

/**
 * Turn a connection error into a short reason naming the host.
 */
export function describeConnectError(
  err: Error,
  host: string,
  port: number,
  username: string,
): string {
  const errorMsg = err.message;
  const level = "level" in err && typeof err.level === "string" ? err.level : "";

  if (/ENOTFOUND|EAI_AGAIN|getaddrinfo/i.test(errorMsg)) {
    return `DNS lookup failed for ${host}`;
  }

  if (/timed out|timeout|ETIMEDOUT/i.test(errorMsg)) {
    return `Connection timed out (${host}:${port})`;
  }

  if (/ECONNREFUSED|connection refused/i.test(errorMsg)) {
    return `SSH port closed/refused (${host}:${port})`;
  }

  if (/EHOSTUNREACH|ENETUNREACH|unreachable/i.test(errorMsg)) {
    return `Host/network unreachable (${host})`;
  }

  if (level === "client-authentication" || /authentication methods failed/i.test(errorMsg)) {
    return `Authentication failed for ${username}@${host}`;
  }

  return errorMsg;
}
