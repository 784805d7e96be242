// ---------------------------------------------------------------------------
// Response classification and parsing.
//
// Picks a wire format from the content-type header and turns the body into
// structured data.  Unrecognised or malformed payloads always fail loudly.
// ---------------------------------------------------------------------------

import { XMLParser, XMLValidator } from "fast-xml-parser";

import type { ParsedResponse } from "../core/types.js";
import {
  MalformedXmlError,
  TransportError,
  UnknownFormatError,
} from "../core/errors.js";
import { parseCsv } from "../utils/csv-parser.js";
import { defineOwn } from "../utils/objects.js";
import { toPlain, type XmlConvertOptions } from "../utils/xml-converter.js";

// ── Format classification ───────────────────────────────────────────────────

export type WireFormat =
  | { kind: "xml" }
  | { kind: "json" }
  | { kind: "csv" }
  | { kind: "unrecognized"; contentType: string };

const MEDIA_TYPES: Readonly<Record<string, WireFormat>> = {
  "text/xml": { kind: "xml" },
  "application/json": { kind: "json" },
  // Qualtrics' spreadsheet export type.
  "application/vnd.msexcel": { kind: "csv" },
};

/**
 * Map a raw content-type header to a wire format.  Parameters such as
 * `charset` are ignored.
 */
export function classifyContentType(contentType: string | undefined): WireFormat {
  const raw = (contentType ?? "").trim().toLowerCase();
  const mediaType = raw.split(";")[0]?.trim() ?? "";
  return MEDIA_TYPES[mediaType] ?? { kind: "unrecognized", contentType: raw };
}

// ── XML ─────────────────────────────────────────────────────────────────────

const xmlParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

function parseXml(body: string, options: XmlConvertOptions): unknown {
  const validation = XMLValidator.validate(body);
  if (validation !== true) {
    const { msg, code, line } = validation.err;
    throw new MalformedXmlError(msg, code, line);
  }
  return toPlain(xmlParser.parse(body), options);
}

// ── JSON ────────────────────────────────────────────────────────────────────

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new TransportError(
      null,
      `Malformed JSON response: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}

// ── Headers ─────────────────────────────────────────────────────────────────

/** Header names compare case-insensitively; the returned map uses lower case. */
function lowerCaseKeys(headers: Record<string, string>): Record<string, string> {
  const lowered: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    defineOwn(lowered, name.toLowerCase(), value);
  }
  return lowered;
}

// ── Public API ──────────────────────────────────────────────────────────────

export type ResponseParseOptions = XmlConvertOptions;

/**
 * Parse a response body according to its content-type.  Header names may
 * arrive in any case.
 *
 * @throws UnknownFormatError for any media type other than XML, JSON or the
 *   spreadsheet export type (HTML included).
 * @throws MalformedXmlError when an XML body is not well-formed.
 * @throws TransportError when a JSON body cannot be parsed.
 */
export function parseResponse(
  rawHeaders: Record<string, string>,
  body: string,
  options: ResponseParseOptions = {},
): ParsedResponse {
  const headers = lowerCaseKeys(rawHeaders);
  const format = classifyContentType(headers["content-type"]);

  switch (format.kind) {
    case "xml":
      return { headers, parsedBody: parseXml(body, options) };
    case "json":
      return { headers, parsedBody: parseJson(body) };
    case "csv":
      return { headers, parsedBody: parseCsv(body) };
    case "unrecognized":
      throw new UnknownFormatError(format.contentType);
  }
}
