/**
 * CLI logger factory.
 *
 * Logs go to stderr (fd 2) so stdout carries nothing but results and can be
 * piped. Outside production the output is pretty-printed; in production it
 * stays JSON.
 *
 * Configuration:
 *   - LOG_LEVEL env var controls the level (default: "warn", which still
 *     shows one line per offline host)
 *   - NODE_ENV=production disables pretty printing
 */

import { pino, destination, type Logger } from "pino";

export function createCliLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const level = env.LOG_LEVEL || "warn";

  if (env.NODE_ENV === "production") {
    return pino({ name: "uptime-probe", level }, destination(2));
  }

  return pino({
    name: "uptime-probe",
    level,
    transport: {
      target: "pino-pretty",
      options: {
        destination: 2,
        colorize: true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname,name",
      },
    },
  });
}
