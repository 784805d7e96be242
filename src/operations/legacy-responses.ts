// ---------------------------------------------------------------------------
// Reshaping for getLegacyResponseData.
//
// The export comes back as a keyed JSON object, an XML list or a CSV table
// depending on the requested Format.  All three are normalised to an array
// of one flat object per survey response.
// ---------------------------------------------------------------------------

import { z } from "zod";

import type { ResponseFormat } from "../core/types.js";
import { TransportError } from "../core/errors.js";
import { defineOwn } from "../utils/objects.js";

export type LegacyResponse = Record<string, unknown>;

const QUESTION_ID = /Q\d+/i;

const JsonExportSchema = z.union([
  z.record(z.record(z.unknown())),
  // A survey without responses is exported as an empty list.
  z.array(z.never()).length(0),
]);
const XmlExportSchema = z.union([
  z.object({ Response: z.array(z.unknown()) }).passthrough(),
  // An empty `<Responses/>` root converts to "".
  z.literal(""),
]);
const CsvExportSchema = z.array(z.array(z.string()));

/**
 * Resolve the column keys of a CSV export.  A cell in the first row that
 * looks like a question ID (`Q12`, `q3_TEXT`) wins; otherwise the second
 * row's label is used.
 */
export function resolveCsvKeys(table: string[][]): string[] {
  const first = table[0] ?? [];
  const second = table[1] ?? [];
  return second.map((label, j) => {
    const id = first[j] ?? "";
    return QUESTION_ID.test(id) ? id : label;
  });
}

/**
 * Turn rows 2.. of a CSV export into objects keyed by
 * {@link resolveCsvKeys}.  Columns with an empty key are dropped.
 */
export function reshapeCsvExport(table: string[][]): LegacyResponse[] {
  const keys = resolveCsvKeys(table);
  return table.slice(2).map((row) => {
    const record: LegacyResponse = {};
    row.forEach((value, j) => {
      const key = keys[j];
      if (key) defineOwn<unknown>(record, key, value);
    });
    return record;
  });
}

/** `{ R_1: {...}, R_2: {...} }` → `[{ ..., ResponseID: "R_1" }, ...]` */
export function reshapeJsonExport(
  responses: Record<string, Record<string, unknown>>,
): LegacyResponse[] {
  return Object.entries(responses).map(([responseId, response]) => ({
    ...response,
    ResponseID: responseId,
  }));
}

/**
 * Normalise a legacy export payload for the requested format.
 *
 * @throws TransportError when the payload does not have the shape the
 *   format implies.
 */
export function reshapeLegacyResponses(
  format: ResponseFormat,
  payload: unknown,
): LegacyResponse[] {
  switch (format) {
    case "JSON": {
      const parsed = JsonExportSchema.safeParse(payload);
      if (!parsed.success) throw unexpectedShape(format);
      return Array.isArray(parsed.data) ? [] : reshapeJsonExport(parsed.data);
    }
    case "XML": {
      const parsed = XmlExportSchema.safeParse(payload);
      if (!parsed.success) throw unexpectedShape(format);
      if (parsed.data === "") return [];
      return parsed.data.Response.map((r) =>
        typeof r === "object" && r !== null && !Array.isArray(r)
          ? { ...r }
          : { value: r },
      );
    }
    case "CSV": {
      const parsed = CsvExportSchema.safeParse(payload);
      if (!parsed.success) throw unexpectedShape(format);
      return reshapeCsvExport(parsed.data);
    }
  }
}

function unexpectedShape(format: ResponseFormat): TransportError {
  return new TransportError(
    200,
    `Unexpected response shape for getLegacyResponseData (${format})`,
  );
}
