// ---------------------------------------------------------------------------
// HttpTransport – sends one request to the Control Panel endpoint.
//
// Every call is a single request with query (GET) or form (POST) parameters.
// No timeout is applied unless `timeoutMs` is configured.
// ---------------------------------------------------------------------------

import type { HttpMethod, ParamValue, RawHttpResponse } from "../core/types.js";
import { TransportError } from "../core/errors.js";

export const DEFAULT_ENDPOINT =
  "https://survey.qualtrics.com/WRAPI/ControlPanel/api.php";

/** Seam between the gateway and the network; swap it out in tests. */
export interface HttpTransport {
  send(
    params: Readonly<Record<string, ParamValue>>,
    signal?: AbortSignal,
  ): Promise<RawHttpResponse>;
}

export interface FetchTransportOptions {
  endpoint?: string;
  method?: HttpMethod;
  timeoutMs?: number;
}

/**
 * Serialise parameters as form/query pairs.  `null` and `undefined` are
 * omitted; arrays become repeated keys.
 */
export function encodeParams(
  params: Readonly<Record<string, ParamValue>>,
): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) search.append(key, String(item));
    } else {
      search.append(key, String(value));
    }
  }
  return search;
}

/**
 * Transport backed by the global `fetch`.
 */
export class FetchTransport implements HttpTransport {
  private readonly endpoint: string;
  private readonly method: HttpMethod;
  private readonly timeoutMs: number | undefined;

  constructor(options: FetchTransportOptions = {}) {
    this.endpoint = options.endpoint ?? DEFAULT_ENDPOINT;
    this.method = options.method ?? "GET";
    this.timeoutMs = options.timeoutMs;
  }

  async send(
    params: Readonly<Record<string, ParamValue>>,
    signal?: AbortSignal,
  ): Promise<RawHttpResponse> {
    const encoded = encodeParams(params);
    const { signal: requestSignal, dispose } = this.linkSignals(signal);

    let url = this.endpoint;
    let init: RequestInit;
    if (this.method === "GET") {
      url = `${this.endpoint}?${encoded.toString()}`;
      init = { method: "GET", signal: requestSignal };
    } else {
      init = {
        method: "POST",
        body: encoded,
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        signal: requestSignal,
      };
    }

    try {
      const response = await fetch(url, init);
      const body = await response.text();
      return {
        statusCode: response.status,
        headers: Object.fromEntries(response.headers.entries()),
        body,
      };
    } catch (error: unknown) {
      throw this.wrapError(error);
    } finally {
      dispose();
    }
  }

  private wrapError(error: unknown): TransportError {
    if (error instanceof TransportError) return error;

    // Aborts surface as DOMExceptions, which are Errors on Node.
    if (
      error instanceof Error &&
      (error.name === "AbortError" || error.name === "TimeoutError")
    ) {
      const reason =
        error.name === "TimeoutError"
          ? `timed out after ${this.timeoutMs}ms`
          : "was aborted";
      return new TransportError(null, `Request ${reason}`, { cause: error });
    }

    const msg = error instanceof Error ? error.message : String(error);
    return new TransportError(null, `Network error: ${msg}`, { cause: error });
  }

  /**
   * Combine the caller's signal with the configured timeout.  Without
   * either, the request has no signal at all.
   */
  private linkSignals(signal?: AbortSignal): {
    signal: AbortSignal | undefined;
    dispose: () => void;
  } {
    if (this.timeoutMs === undefined) {
      return { signal, dispose: () => {} };
    }

    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
    if (!signal) {
      return { signal: timeoutSignal, dispose: () => {} };
    }

    const controller = new AbortController();
    const abortFromCaller = () => controller.abort(signal.reason);
    const abortFromTimeout = () => controller.abort(timeoutSignal.reason);

    if (signal.aborted) {
      abortFromCaller();
    } else {
      signal.addEventListener("abort", abortFromCaller, { once: true });
      timeoutSignal.addEventListener("abort", abortFromTimeout, { once: true });
    }

    return {
      signal: controller.signal,
      dispose: () => {
        signal.removeEventListener("abort", abortFromCaller);
        timeoutSignal.removeEventListener("abort", abortFromTimeout);
      },
    };
  }
}
