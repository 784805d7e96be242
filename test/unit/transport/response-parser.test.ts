// ---------------------------------------------------------------------------
// Tests for content-type classification and body parsing.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import {
  classifyContentType,
  parseResponse,
} from "../../../src/transport/response-parser.js";
import {
  MalformedXmlError,
  TransportError,
  UnknownFormatError,
} from "../../../src/core/errors.js";

// ── Fixtures ──────────────────────────────────────────────────────────────

const SURVEYS_XML = `<?xml version="1.0" encoding="UTF-8"?>
<Response>
  <Meta>
    <Status>Success</Status>
    <Debug></Debug>
  </Meta>
  <Result>
    <Surveys>
      <element><SurveyID>SV_1</SurveyID></element>
      <element><SurveyID>SV_2</SurveyID></element>
    </Surveys>
  </Result>
</Response>`;

describe("classifyContentType", () => {
  it("recognises the three supported media types", () => {
    expect(classifyContentType("text/xml")).toEqual({ kind: "xml" });
    expect(classifyContentType("application/json")).toEqual({ kind: "json" });
    expect(classifyContentType("application/vnd.msexcel")).toEqual({ kind: "csv" });
  });

  it("ignores parameters and case", () => {
    expect(classifyContentType("text/xml; charset=UTF-8")).toEqual({ kind: "xml" });
    expect(classifyContentType("Application/JSON")).toEqual({ kind: "json" });
  });

  it("reports anything else as unrecognized", () => {
    expect(classifyContentType("text/html; charset=UTF-8")).toEqual({
      kind: "unrecognized",
      contentType: "text/html; charset=utf-8",
    });
    expect(classifyContentType(undefined)).toEqual({
      kind: "unrecognized",
      contentType: "",
    });
  });
});

describe("parseResponse", () => {
  // ── JSON ──────────────────────────────────────────────────────────────

  it("parses JSON bodies", () => {
    const body = JSON.stringify({ Meta: { Status: "Success" }, Result: { Count: 3 } });
    const parsed = parseResponse({ "content-type": "application/json" }, body);

    expect(parsed.parsedBody).toEqual({ Meta: { Status: "Success" }, Result: { Count: 3 } });
    expect(parsed.headers).toEqual({ "content-type": "application/json" });
  });

  it("matches the content-type header regardless of case", () => {
    const parsed = parseResponse({ "Content-Type": "application/json" }, '{"a":1}');

    expect(parsed.parsedBody).toEqual({ a: 1 });
    expect(parsed.headers).toEqual({ "content-type": "application/json" });
  });

  it("raises a TransportError for malformed JSON", () => {
    let caught: unknown;
    try {
      parseResponse({ "content-type": "application/json" }, "{not json");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TransportError);
    expect(caught).toMatchObject({ statusCode: null });
  });

  // ── XML ───────────────────────────────────────────────────────────────

  it("converts XML envelopes to plain objects", () => {
    const parsed = parseResponse({ "content-type": "text/xml" }, SURVEYS_XML);

    expect(parsed.parsedBody).toEqual({
      Meta: { Status: "Success", Debug: "" },
      Result: {
        Surveys: { element: [{ SurveyID: "SV_1" }, { SurveyID: "SV_2" }] },
      },
    });
  });

  it("keeps XML attributes", () => {
    const parsed = parseResponse(
      { "content-type": "text/xml; charset=UTF-8" },
      '<Response><Panel id="ML_1">Staff</Panel></Response>',
    );

    expect(parsed.parsedBody).toEqual({
      Panel: { "@attributes": { id: "ML_1" }, "#text": "Staff" },
    });
  });

  it("rejects XML that is not well-formed", () => {
    expect(() =>
      parseResponse({ "content-type": "text/xml" }, "<Response><Meta></Response>"),
    ).toThrow(MalformedXmlError);
  });

  // ── CSV ───────────────────────────────────────────────────────────────

  it("parses spreadsheet exports as CSV", () => {
    const parsed = parseResponse(
      { "content-type": "application/vnd.msexcel" },
      '"First","Last"\n"Ann","Lee"',
    );

    expect(parsed.parsedBody).toEqual([
      ["First", "Last"],
      ["Ann", "Lee"],
    ]);
  });

  // ── Unknown formats ───────────────────────────────────────────────────

  it("rejects HTML", () => {
    expect(() =>
      parseResponse({ "content-type": "text/html" }, "<html><body>Error</body></html>"),
    ).toThrow(UnknownFormatError);
  });

  it("rejects other media types and names them", () => {
    expect(() =>
      parseResponse({ "content-type": "text/calendar" }, "BEGIN:VCALENDAR"),
    ).toThrow("Qualtrics returned a response in an unknown format: text/calendar");
  });

  it("rejects a missing content-type", () => {
    expect(() => parseResponse({}, "{}")).toThrow(
      "Qualtrics returned a response in an unknown format: (no content-type)",
    );
  });
});
