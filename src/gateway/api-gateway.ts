// ---------------------------------------------------------------------------
// ApiGateway – owns the credentials and transport, performs one call and
// maps the answer to a success value or a typed error.
// ---------------------------------------------------------------------------

import type {
  Credentials,
  Operation,
  ParamValue,
  ParsedResult,
  RawHttpResponse,
} from "../core/types.js";
import {
  MissingParameterError,
  QualtricsClientError,
  TransportError,
} from "../core/errors.js";
import type { Logger } from "../logging/logger.js";
import type { HttpTransport } from "../transport/http-transport.js";
import {
  parseResponse,
  type ResponseParseOptions,
} from "../transport/response-parser.js";
import { interpretResponse } from "./envelope.js";
import { withRetry } from "./retry.js";

export const API_VERSION = "2.2";

export interface ApiGatewayOptions {
  credentials: Credentials;
  transport: HttpTransport;
  logger: Logger;
  /** Retries on transport failures only; 0 disables retrying. */
  maxRetries?: number;
  retryBaseDelayMs?: number;
  parseOptions?: ResponseParseOptions;
}

/**
 * Single point through which every operation reaches the API.
 *
 * `execute()` returns vendor and transport failures as a {@link ParsedResult};
 * `call()` unwraps it and throws instead.  Parse failures on a successful
 * status (unknown content-type, malformed XML) are always thrown.
 */
export class ApiGateway {
  private readonly credentials: Credentials;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly parseOptions: ResponseParseOptions;

  constructor(options: ApiGatewayOptions) {
    const { username, token } = options.credentials;
    if (!username) throw new MissingParameterError("username");
    if (!token) throw new MissingParameterError("token");

    this.credentials = Object.freeze({ ...options.credentials });
    this.transport = options.transport;
    this.maxRetries = options.maxRetries ?? 0;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500;
    this.parseOptions = options.parseOptions ?? {};
    this.logger = options.logger.child({ component: "ApiGateway" });
  }

  get libraryId(): string | undefined {
    return this.credentials.libraryId;
  }

  // ── Public API ──────────────────────────────────────────────────────────

  /** Perform the call and return the value, throwing on any failure. */
  async call(
    operation: Operation,
    params: Readonly<Record<string, ParamValue>>,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const result = await this.execute(operation, params, signal);
    if (!result.ok) throw result.error;
    return result.value;
  }

  /** Perform the call and classify the outcome. */
  async execute(
    operation: Operation,
    params: Readonly<Record<string, ParamValue>>,
    signal?: AbortSignal,
  ): Promise<ParsedResult> {
    const log = this.logger.child({ operation });
    const start = performance.now();

    log.debug({ params: Object.keys(params) }, "Sending request");

    let raw: RawHttpResponse;
    try {
      raw = await withRetry(() => this.send(operation, params, signal), {
        maxRetries: this.maxRetries,
        baseDelayMs: this.retryBaseDelayMs,
        signal,
      });
    } catch (error: unknown) {
      const responseTimeMs = Math.round(performance.now() - start);
      if (error instanceof TransportError) {
        log.warn({ err: error, responseTimeMs }, "Request failed");
        return { ok: false, error };
      }
      throw error;
    }

    const responseTimeMs = Math.round(performance.now() - start);
    const result = this.interpret(raw);

    if (result.ok) {
      log.info({ statusCode: raw.statusCode, responseTimeMs }, "Request completed");
    } else {
      log.warn(
        { statusCode: raw.statusCode, responseTimeMs, err: result.error },
        "Request returned an error",
      );
    }
    return result;
  }

  // ── Private helpers ─────────────────────────────────────────────────────

  /** One transport round trip; 5xx answers count as transport failures. */
  private async send(
    operation: Operation,
    params: Readonly<Record<string, ParamValue>>,
    signal?: AbortSignal,
  ): Promise<RawHttpResponse> {
    const raw = await this.transport.send(
      {
        ...params,
        Request: operation,
        User: this.credentials.username,
        Token: this.credentials.token,
        Version: API_VERSION,
      },
      signal,
    );

    if (raw.statusCode >= 500) {
      throw new TransportError(
        raw.statusCode,
        `Qualtrics returned HTTP ${raw.statusCode}`,
      );
    }
    return raw;
  }

  private interpret(raw: RawHttpResponse): ParsedResult {
    const isClientError = raw.statusCode >= 400 && raw.statusCode < 500;
    const isSuccess = raw.statusCode >= 200 && raw.statusCode < 300;

    if (!isSuccess && !isClientError) {
      return {
        ok: false,
        error: new TransportError(
          raw.statusCode,
          `Unexpected HTTP status ${raw.statusCode}`,
        ),
      };
    }

    let parsedBody: unknown;
    try {
      parsedBody = parseResponse(raw.headers, raw.body, this.parseOptions).parsedBody;
    } catch (error: unknown) {
      // Unreadable 4xx bodies become transport errors.
      if (isClientError && error instanceof QualtricsClientError) {
        return {
          ok: false,
          error: new TransportError(
            raw.statusCode,
            `Qualtrics returned HTTP ${raw.statusCode}`,
            { cause: error },
          ),
        };
      }
      if (error instanceof TransportError) {
        return {
          ok: false,
          error: new TransportError(raw.statusCode, error.message, { cause: error }),
        };
      }
      throw error;
    }

    return interpretResponse(raw.statusCode, parsedBody);
  }
}
