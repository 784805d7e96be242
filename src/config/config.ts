// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads an optional YAML file, applies QUALTRICS_* environment overrides and
// validates the result with Zod.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";

import type { ClientConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";
import type { QualtricsClientOptions } from "../client/qualtrics-client.js";
import type { Logger } from "../logging/logger.js";
import { DEFAULT_ENDPOINT } from "../transport/http-transport.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const CredentialsSchema = z.object({
  username: z.string().default(""),
  token: z.string().default(""),
  libraryId: z.string().min(1).optional(),
});

export const HttpConfigSchema = z.object({
  endpoint: z.string().url().default(DEFAULT_ENDPOINT),
  method: z.enum(["GET", "POST"]).default("GET"),
  timeoutMs: z.coerce.number().int().positive().optional(),
  maxRetries: z.coerce.number().int().min(0).default(0),
  retryBaseDelayMs: z.coerce.number().int().positive().default(500),
});

export const LoggingConfigSchema = z.object({
  level: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  prettyPrint: z.boolean().default(false),
  redactSecrets: z.boolean().default(true),
});

export const ClientConfigSchema = z.object({
  credentials: CredentialsSchema.default({}),
  http: HttpConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// ── Environment-variable placeholder resolver ───────────────────────────────

const ENV_PLACEHOLDER = /\$\{([A-Z_][A-Z0-9_]*)}/g;

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Recursively walk a value and replace `${ENV_VAR}` placeholders in strings
 * with the matching environment value.  Throws if a referenced variable is
 * not defined.
 */
function resolveEnvPlaceholders(value: unknown, env: Env): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_PLACEHOLDER, (_match, varName: string) => {
      const envValue = env[varName];
      if (envValue === undefined) {
        throw new ConfigurationError(
          `Environment variable "${varName}" is referenced in the config file but is not defined`,
        );
      }
      return envValue;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvPlaceholders(item, env));
  }
  if (value !== null && typeof value === "object") {
    const resolved: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      resolved[k] = resolveEnvPlaceholders(v, env);
    }
    return resolved;
  }
  return value;
}

// ── Environment overrides ───────────────────────────────────────────────────

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return value !== null && typeof value === "object" && !Array.isArray(value)
    ? { ...value }
    : {};
}

function setIfDefined(
  target: Record<string, unknown>,
  key: string,
  value: unknown,
): void {
  if (value !== undefined && value !== "") target[key] = value;
}

function readBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return value === "true" || value === "1";
}

function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: Env,
): Record<string, unknown> {
  const credentials = section(raw, "credentials");
  setIfDefined(credentials, "username", env["QUALTRICS_USERNAME"]);
  setIfDefined(credentials, "token", env["QUALTRICS_TOKEN"]);
  setIfDefined(credentials, "libraryId", env["QUALTRICS_LIBRARY_ID"]);

  const http = section(raw, "http");
  setIfDefined(http, "endpoint", env["QUALTRICS_ENDPOINT"]);
  setIfDefined(http, "method", env["QUALTRICS_HTTP_METHOD"]?.toUpperCase());
  setIfDefined(http, "timeoutMs", env["QUALTRICS_TIMEOUT_MS"]);
  setIfDefined(http, "maxRetries", env["QUALTRICS_MAX_RETRIES"]);
  setIfDefined(http, "retryBaseDelayMs", env["QUALTRICS_RETRY_BASE_DELAY_MS"]);

  const logging = section(raw, "logging");
  setIfDefined(logging, "level", env["QUALTRICS_LOG_LEVEL"]);
  setIfDefined(logging, "prettyPrint", readBoolean(env["QUALTRICS_LOG_PRETTY"]));

  return { ...raw, credentials, http, logging };
}

// ── Public API ──────────────────────────────────────────────────────────────

export interface LoadConfigOptions {
  /** YAML file to read; defaults to `$QUALTRICS_CONFIG` when set. */
  configPath?: string;
  env?: Env;
}

/**
 * Load the client configuration.
 *
 * Every setting has a default, so an empty environment yields a valid
 * config with blank credentials; the client itself rejects those.
 *
 * @throws ConfigurationError when the file is missing or unreadable, a
 *   placeholder is undefined, or validation fails.
 */
export function loadConfig(options: LoadConfigOptions = {}): ClientConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env["QUALTRICS_CONFIG"];

  let raw: Record<string, unknown> = {};
  if (configPath) {
    const absolutePath = path.resolve(configPath);
    if (!fs.existsSync(absolutePath)) {
      throw new ConfigurationError(`Config file does not exist: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
      parsed = parse(fs.readFileSync(absolutePath, "utf-8"));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Could not read ${absolutePath}: ${message}`, {
        cause: err,
      });
    }

    const resolved = resolveEnvPlaceholders(parsed ?? {}, env);
    if (resolved === null || typeof resolved !== "object" || Array.isArray(resolved)) {
      throw new ConfigurationError(`Config file must contain a mapping: ${absolutePath}`);
    }
    raw = { ...resolved };
  }

  const validated = ClientConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!validated.success) {
    const issues = validated.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`, {
      cause: validated.error,
    });
  }

  const { credentials, http, logging } = validated.data;
  return {
    credentials: {
      username: credentials.username,
      token: credentials.token,
      libraryId: credentials.libraryId,
    },
    http,
    logging,
  };
}

/** Client options for a loaded config. */
export function clientOptionsFromConfig(
  config: ClientConfig,
  logger?: Logger,
): QualtricsClientOptions {
  return {
    credentials: config.credentials,
    logger,
    endpoint: config.http.endpoint,
    method: config.http.method,
    timeoutMs: config.http.timeoutMs,
    maxRetries: config.http.maxRetries,
    retryBaseDelayMs: config.http.retryBaseDelayMs,
  };
}
