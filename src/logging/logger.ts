// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

export type Logger = pino.Logger;

/** Components that get their own child logger, tagged `module`. */
export type LogModule =
  | "aggregator"
  | "merge"
  | "coordinator"
  | "cache"
  | "store"
  | "janitor"
  | "metrics"
  | "suggestions";

const SECRET_PATHS: string[] = [
  "apiKey",
  "*.apiKey",
  "databaseUrl",
  "*.databaseUrl",
  "*.password",
  "req.headers.authorization",
];

/**
 * Root logger: JSON lines with `service` and `version` base fields and
 * `err` serialised with its cause chain. Development swaps in the
 * `pino-pretty` transport; `destination` is ignored in that case.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream,
): Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "audiobook-locator",
      version: process.env["APP_VERSION"] ?? "dev",
    },
    serializers: { err: pino.stdSerializers.err },
    ...(config.redactSecrets
      ? { redact: { paths: SECRET_PATHS, censor: "[REDACTED]" } }
      : {}),
  };

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,service,version",
        },
      },
    });
  }

  return destination ? pino(options, destination) : pino(options);
}

export function moduleLogger(root: Logger, module: LogModule): Logger {
  return root.child({ module });
}
