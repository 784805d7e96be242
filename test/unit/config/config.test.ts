// ---------------------------------------------------------------------------
// Tests for the YAML + environment configuration loader.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { pino } from "pino";

import { clientOptionsFromConfig, loadConfig } from "../../../src/config/config.js";
import { ConfigurationError } from "../../../src/core/errors.js";
import { DEFAULT_ENDPOINT } from "../../../src/transport/http-transport.js";

const fixture = (name: string): string =>
  fileURLToPath(new URL(`../../fixtures/config/${name}`, import.meta.url));

const FIXTURE_ENV = { TEST_QUALTRICS_USER: "fixture@example.com" };

describe("loadConfig", () => {
  // ── YAML file ─────────────────────────────────────────────────────────

  it("loads a YAML file and resolves placeholders", () => {
    const config = loadConfig({ configPath: fixture("qualtrics.yaml"), env: FIXTURE_ENV });

    expect(config.credentials).toEqual({
      username: "fixture@example.com",
      token: "test-secret",
      libraryId: "UR_fixture",
    });
    expect(config.http).toEqual({
      endpoint: "https://example.test/WRAPI/ControlPanel/api.php",
      method: "POST",
      timeoutMs: 5000,
      maxRetries: 0,
      retryBaseDelayMs: 500,
    });
    expect(config.logging).toEqual({
      level: "debug",
      prettyPrint: false,
      redactSecrets: true,
    });
  });

  it("reads the file named by QUALTRICS_CONFIG", () => {
    const config = loadConfig({
      env: { ...FIXTURE_ENV, QUALTRICS_CONFIG: fixture("qualtrics.yaml") },
    });
    expect(config.credentials.libraryId).toBe("UR_fixture");
  });

  it("fails when a placeholder has no environment value", () => {
    expect(() => loadConfig({ configPath: fixture("qualtrics.yaml"), env: {} })).toThrow(
      'Environment variable "TEST_QUALTRICS_USER" is referenced in the config file but is not defined',
    );
  });

  it("fails when the file does not exist", () => {
    expect(() =>
      loadConfig({ configPath: fixture("missing.yaml"), env: {} }),
    ).toThrow(ConfigurationError);
  });

  it("fails when the file is not a mapping", () => {
    expect(() =>
      loadConfig({ configPath: fixture("not-a-mapping.yaml"), env: {} }),
    ).toThrow(ConfigurationError);
  });

  // ── Environment ───────────────────────────────────────────────────────

  it("lets environment variables override the file", () => {
    const config = loadConfig({
      configPath: fixture("qualtrics.yaml"),
      env: {
        ...FIXTURE_ENV,
        QUALTRICS_TOKEN: "override-secret",
        QUALTRICS_HTTP_METHOD: "get",
        QUALTRICS_MAX_RETRIES: "3",
        QUALTRICS_LOG_PRETTY: "true",
      },
    });

    expect(config.credentials.token).toBe("override-secret");
    expect(config.http.method).toBe("GET");
    expect(config.http.maxRetries).toBe(3);
    expect(config.logging.prettyPrint).toBe(true);
  });

  it("builds a config from the environment alone", () => {
    const config = loadConfig({
      env: { QUALTRICS_USERNAME: "env@example.com", QUALTRICS_TOKEN: "test-secret" },
    });

    expect(config.credentials).toEqual({
      username: "env@example.com",
      token: "test-secret",
      libraryId: undefined,
    });
    expect(config.http.endpoint).toBe(DEFAULT_ENDPOINT);
    expect(config.http.method).toBe("GET");
    expect(config.http.timeoutMs).toBeUndefined();
    expect(config.logging.level).toBe("info");
  });

  it("rejects invalid values", () => {
    expect(() =>
      loadConfig({ env: { QUALTRICS_HTTP_METHOD: "PUT" } }),
    ).toThrow(/^Invalid configuration: http\.method/);
    expect(() =>
      loadConfig({ env: { QUALTRICS_TIMEOUT_MS: "-5" } }),
    ).toThrow(ConfigurationError);
  });
});

describe("clientOptionsFromConfig", () => {
  it("maps a loaded config to client options", () => {
    const config = loadConfig({ configPath: fixture("qualtrics.yaml"), env: FIXTURE_ENV });
    const logger = pino({ level: "silent" });

    expect(clientOptionsFromConfig(config, logger)).toEqual({
      credentials: config.credentials,
      logger,
      endpoint: "https://example.test/WRAPI/ControlPanel/api.php",
      method: "POST",
      timeoutMs: 5000,
      maxRetries: 0,
      retryBaseDelayMs: 500,
    });
  });
});
