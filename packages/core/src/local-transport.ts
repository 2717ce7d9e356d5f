/**
 * Local host transport and host-name routing.
 *
 * The local machine is answered from os.uptime() instead of an SSH
 * round-trip to itself, so the default invocation works on a machine that
 * runs no SSH server.
 */

import * as os from "node:os";
import type {
  ConnectOutcome,
  RemoteSession,
  UptimeTransport,
} from "./transport.js";

/** Names that always mean "this machine" */
const LOOPBACK_NAMES = ["localhost", "127.0.0.1", "::1"];

export interface LocalTransportOptions {
  /** Seconds since boot (default: os.uptime) */
  uptimeSeconds?: () => number;
  now?: () => Date;
}

export class LocalTransport implements UptimeTransport {
  private readonly uptimeSeconds: () => number;
  private readonly now: () => Date;

  constructor(options: LocalTransportOptions = {}) {
    this.uptimeSeconds = options.uptimeSeconds ?? (() => os.uptime());
    this.now = options.now ?? (() => new Date());
  }

  async connect(_host: string): Promise<ConnectOutcome> {
    const session: RemoteSession = {
      queryBootTime: async () => {
        const seconds = this.uptimeSeconds();
        if (!Number.isFinite(seconds) || seconds < 0) return null;
        return new Date(this.now().getTime() - seconds * 1000);
      },
      close: async () => {},
    };
    return { kind: "connected", session };
  }
}

/**
 * Sends local names to one transport and everything else to another.
 */
export class RoutingTransport implements UptimeTransport {
  private readonly localNames: Set<string>;

  constructor(
    private readonly local: UptimeTransport,
    private readonly remote: UptimeTransport,
    localHostName: string = os.hostname(),
  ) {
    this.localNames = new Set(
      [localHostName, ...LOOPBACK_NAMES].map((name) => name.toLowerCase()),
    );
  }

  isLocal(host: string): boolean {
    return this.localNames.has(host.toLowerCase());
  }

  connect(host: string): Promise<ConnectOutcome> {
    return this.isLocal(host) ? this.local.connect(host) : this.remote.connect(host);
  }
}
