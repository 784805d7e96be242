// ---------------------------------------------------------------------------
// Tests for status + envelope interpretation.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { interpretResponse, readEnvelope } from "../../../src/gateway/envelope.js";
import { TransportError, VendorError } from "../../../src/core/errors.js";

describe("readEnvelope", () => {
  it("returns null for bodies without Meta.Status", () => {
    expect(readEnvelope({ Result: {} })).toBeNull();
    expect(readEnvelope([["a", "b"]])).toBeNull();
    expect(readEnvelope("text")).toBeNull();
  });
});

describe("interpretResponse", () => {
  // ── Success ───────────────────────────────────────────────────────────

  it("returns Result for a successful envelope", () => {
    const result = interpretResponse(200, {
      Meta: { Status: "Success", Debug: "" },
      Result: { x: 1 },
    });
    expect(result).toEqual({ ok: true, value: { x: 1 } });
  });

  it("returns the body itself when there is no envelope", () => {
    const table = [["First", "Last"]];
    expect(interpretResponse(200, table)).toEqual({ ok: true, value: table });
  });

  it("accepts any 2xx status", () => {
    const result = interpretResponse(201, { Meta: { Status: "Success" }, Result: "ok" });
    expect(result).toEqual({ ok: true, value: "ok" });
  });

  // ── Vendor failures ───────────────────────────────────────────────────

  it("maps a failed envelope to a VendorError", () => {
    const result = interpretResponse(200, {
      Meta: { Status: "Error", ErrorCode: 1005, ErrorMessage: "Bad thing" },
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(VendorError);
    expect(result.error).toMatchObject({ code: 1005, vendorMessage: "Bad thing" });
    expect(result.error.message).toBe("Qualtrics error 1005: Bad thing");
  });

  it("keeps string error codes from XML envelopes", () => {
    const result = interpretResponse(200, {
      Meta: { Status: "Error", ErrorCode: "1005", ErrorMessage: "Bad thing" },
    });
    if (result.ok) throw new Error("expected a failure");
    expect(result.error).toMatchObject({ code: "1005" });
  });

  it("falls back to the status text when there is no ErrorMessage", () => {
    const result = interpretResponse(200, { Meta: { Status: "Invalid Request" } });
    if (result.ok) throw new Error("expected a failure");
    expect(result.error).toMatchObject({ code: 200, vendorMessage: "Invalid Request" });
  });

  it("uses the HTTP status as the code for 4xx envelopes", () => {
    const result = interpretResponse(401, {
      Meta: { Status: "Error", ErrorCode: 1001, ErrorMessage: "Invalid token" },
    });
    if (result.ok) throw new Error("expected a failure");
    expect(result.error).toBeInstanceOf(VendorError);
    expect(result.error).toMatchObject({ code: 401, vendorMessage: "Invalid token" });
  });

  // ── Transport failures ────────────────────────────────────────────────

  it("maps a 4xx without an envelope to a TransportError", () => {
    const result = interpretResponse(404, { detail: "not found" });
    if (result.ok) throw new Error("expected a failure");
    expect(result.error).toBeInstanceOf(TransportError);
    expect(result.error).toMatchObject({ statusCode: 404 });
  });

  it("maps 5xx and 3xx statuses to TransportErrors", () => {
    for (const status of [302, 500, 503]) {
      const result = interpretResponse(status, {
        Meta: { Status: "Error", ErrorMessage: "down" },
      });
      if (result.ok) throw new Error("expected a failure");
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.error.message).toBe(`Unexpected HTTP status ${status}`);
    }
  });
});
