/**
 * @uptime-probe/core — domain logic barrel export.
 *
 * The uptime query walks a list of host names through an injected
 * transport and classifies each host as OK, ERROR or OFFLINE. Transports
 * own every network detail; the query owns none.
 */

// Uptime query: sequential per-host connect -> query -> classify
export {
  getUptime,
  queryHost,
  type UptimeQueryDeps,
} from "./uptime-query.js";

// Uptime arithmetic and start-time formatting
export {
  computeUptimeDays,
  mightNeedPatching,
  formatStartTime,
} from "./uptime-math.js";

// Transport contract
export type {
  UptimeTransport,
  RemoteSession,
  ConnectOutcome,
} from "./transport.js";

// SSH transport (ssh2) for remote hosts
export {
  SshTransport,
  SshSession,
  execCommand,
  parseBootTime,
  describeConnectError,
  BOOT_TIME_COMMAND,
  type SshTransportOptions,
  type ExecResult,
} from "./ssh-transport.js";

// Local host transport and name-based routing
export {
  LocalTransport,
  RoutingTransport,
  type LocalTransportOptions,
} from "./local-transport.js";
