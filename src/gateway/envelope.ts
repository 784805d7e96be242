// ---------------------------------------------------------------------------
// Interpretation of HTTP status + the `{ Meta, Result }` envelope.
// ---------------------------------------------------------------------------

import { z } from "zod";

import type { ParsedResult } from "../core/types.js";
import { TransportError, VendorError } from "../core/errors.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const MetaSchema = z
  .object({
    Status: z.string(),
    ErrorCode: z.union([z.number(), z.string()]).optional(),
    ErrorMessage: z.string().optional(),
  })
  .passthrough();

export const EnvelopeSchema = z
  .object({
    Meta: MetaSchema,
    Result: z.unknown().optional(),
  })
  .passthrough();

export type Envelope = z.infer<typeof EnvelopeSchema>;

export const SUCCESS_STATUS = "Success";

/** Return the envelope if `body` has one, otherwise `null`. */
export function readEnvelope(body: unknown): Envelope | null {
  const parsed = EnvelopeSchema.safeParse(body);
  return parsed.success ? parsed.data : null;
}

function envelopeMessage(envelope: Envelope): string {
  return envelope.Meta.ErrorMessage || envelope.Meta.Status;
}

// ── Interpretation ──────────────────────────────────────────────────────────

/**
 * Decide success or failure for a parsed 2xx/4xx response.
 *
 * - 2xx with `Meta.Status === "Success"`: the envelope's `Result`.
 * - 2xx without an envelope: the body itself.
 * - 2xx with any other status: `VendorError(ErrorCode, ErrorMessage)`.
 * - 4xx with an envelope: `VendorError(httpStatus, ErrorMessage)`.
 * - anything else: `TransportError`.
 */
export function interpretResponse(statusCode: number, body: unknown): ParsedResult {
  const envelope = readEnvelope(body);
  const isSuccessStatus = statusCode >= 200 && statusCode < 300;

  if (isSuccessStatus) {
    if (!envelope) return { ok: true, value: body };
    if (envelope.Meta.Status === SUCCESS_STATUS) {
      return { ok: true, value: envelope.Result };
    }
    return {
      ok: false,
      error: new VendorError(
        envelope.Meta.ErrorCode ?? statusCode,
        envelopeMessage(envelope),
      ),
    };
  }

  if (statusCode >= 400 && statusCode < 500 && envelope) {
    return {
      ok: false,
      error: new VendorError(statusCode, envelopeMessage(envelope)),
    };
  }

  return {
    ok: false,
    error: new TransportError(statusCode, `Unexpected HTTP status ${statusCode}`),
  };
}
