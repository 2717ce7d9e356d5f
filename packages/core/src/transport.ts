/**
 * Transport contract between the uptime query and whatever reaches a host.
 *
 * A transport turns a host name into either a live session or an
 * "unreachable" outcome. Unreachability is returned as a value so the query
 * loop can branch on it without catching exceptions; a transport only throws
 * when something is wrong with the transport itself.
 */

/** A live connection to one host, owned by a single query iteration */
export interface RemoteSession {
  /**
   * Read the host's last boot time.
   * Resolves null when the host answered but reported nothing usable.
   */
  queryBootTime(): Promise<Date | null>;
  /** Release the connection. Safe to call more than once. */
  close(): Promise<void>;
}

/** Result of a connection attempt */
export type ConnectOutcome =
  | { kind: "connected"; session: RemoteSession }
  | { kind: "unreachable"; reason: string };

export interface UptimeTransport {
  connect(host: string): Promise<ConnectOutcome>;
}
