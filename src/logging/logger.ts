// ---------------------------------------------------------------------------
// Logger construction for the client and its CLI.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

export type Logger = pino.Logger;

/** API tokens appear as `token` in config and `Token` in request params. */
const TOKEN_PATHS = ["*.token", "*.Token"];

/**
 * JSON logger tagged with `service: "qualtrics-client"`.  Tokens are
 * masked unless `redactSecrets` is off; `prettyPrint` routes output
 * through pino-pretty.
 */
export function createLogger(config: LoggingConfig): Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "qualtrics-client",
      version: process.env["APP_VERSION"] ?? "dev",
    },
    redact: config.redactSecrets ? { paths: TOKEN_PATHS, censor: "[REDACTED]" } : undefined,
  };

  if (!config.prettyPrint) return pino(options);

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
    },
  });
}

/** Logger used when the caller supplies none. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
