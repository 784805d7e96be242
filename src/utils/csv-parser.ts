// ---------------------------------------------------------------------------
// Parser for the CSV dialect used by Qualtrics spreadsheet exports.
//
// Fields may be wrapped in double quotes; a doubled quote inside a quoted
// field stands for one literal quote.  Quoted content is percent-encoded
// before splitting so embedded delimiters and line breaks survive, then
// decoded field by field.
// ---------------------------------------------------------------------------

import type { CsvTable } from "../core/types.js";

export interface CsvParseOptions {
  delimiter?: string;
  /** Collapse runs of blank lines and drop leading/trailing ones. */
  skipEmptyLines?: boolean;
  /** Trim whitespace around raw (still encoded) fields. */
  trimFields?: boolean;
}

/** Stands in for an escaped `""` while quoted fields are being encoded. */
const QUOTE_SENTINEL = "\uE000";

const ESCAPED_QUOTE = /(?<!")""/g;
const QUOTED_FIELD_OR_PERCENT = /"([\s\S]*?)"|%/g;

const LINE_BREAKS_TRIMMED = /(?: *(?:\r\n|\n|\r))+/;
const LINE_BREAKS_COLLAPSED = /(?:\r\n|\n|\r)+/;
const LINE_BREAK = /\r\n|\n|\r/;

/**
 * Parse `text` into rows of string fields.
 *
 * Row 0 is conventionally the header row; the parser does not treat it
 * specially and does not enforce a rectangular shape.
 */
export function parseCsv(text: string, options: CsvParseOptions = {}): CsvTable {
  const { delimiter = ",", skipEmptyLines = true, trimFields = true } = options;

  const encoded = text
    .replace(ESCAPED_QUOTE, QUOTE_SENTINEL)
    .replace(QUOTED_FIELD_OR_PERCENT, (_match: string, quoted: string | undefined) =>
      quoted === undefined ? "%25" : encodeURIComponent(quoted),
    );

  const lineBreak = skipEmptyLines
    ? trimFields
      ? LINE_BREAKS_TRIMMED
      : LINE_BREAKS_COLLAPSED
    : LINE_BREAK;

  let lines = encoded.split(lineBreak);
  if (skipEmptyLines) {
    lines = dropOuterEmptyLines(lines);
  }

  return lines.map((line) =>
    line.split(delimiter).map((field) => decodeField(trimFields ? field.trim() : field)),
  );
}

function decodeField(field: string): string {
  return decodeURIComponent(field).split(QUOTE_SENTINEL).join('"');
}

function dropOuterEmptyLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start]?.trim() === "") start++;
  while (end > start && lines[end - 1]?.trim() === "") end--;
  return lines.slice(start, end);
}
