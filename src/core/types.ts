// ---------------------------------------------------------------------------
// Core types for the Qualtrics client.
// All other modules import from this file.
// ---------------------------------------------------------------------------

import type { TransportError, VendorError } from "./errors.js";

// ── Enums ───────────────────────────────────────────────────────────────────

export const Operation = {
  GET_USER_INFO: "getUserInfo",
  GET_RESPONSE_COUNTS_BY_SURVEY: "getResponseCountsBySurvey",
  ADD_RECIPIENT: "addRecipient",
  CREATE_DISTRIBUTION: "createDistribution",
  CREATE_PANEL: "createPanel",
  GET_PANEL: "getPanel",
  DELETE_PANEL: "deletePanel",
  GET_PANEL_MEMBER_COUNT: "getPanelMemberCount",
  GET_PANELS: "getPanels",
  GET_RECIPIENT: "getRecipient",
  IMPORT_PANEL: "importPanel",
  REMOVE_RECIPIENT: "removeRecipient",
  SEND_REMINDER: "sendReminder",
  SEND_SURVEY_TO_INDIVIDUAL: "sendSurveyToIndividual",
  SEND_SURVEY_TO_PANEL: "sendSurveyToPanel",
  UPDATE_RECIPIENT: "updateRecipient",
  GET_LEGACY_RESPONSE_DATA: "getLegacyResponseData",
  GET_SURVEY: "getSurvey",
  GET_SURVEYS: "getSurveys",
} as const;
export type Operation = (typeof Operation)[keyof typeof Operation];

/** Values accepted by the `Format` parameter. */
export const ResponseFormat = {
  JSON: "JSON",
  XML: "XML",
  CSV: "CSV",
} as const;
export type ResponseFormat = (typeof ResponseFormat)[keyof typeof ResponseFormat];

// ── Credentials ─────────────────────────────────────────────────────────────

export interface Credentials {
  readonly username: string;
  readonly token: string;
  /** Default library for operations that take a `LibraryID`. */
  readonly libraryId?: string;
}

// ── Request parameters ──────────────────────────────────────────────────────

export type ParamValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly (string | number)[];

export type RequestParams = Readonly<Record<string, ParamValue>>;

/** Caller params for an operation: its documented keys plus anything else. */
export type OperationParams<K extends string> = Partial<Record<K, ParamValue>> &
  RequestParams;

// ── Transport ───────────────────────────────────────────────────────────────

export type HttpMethod = "GET" | "POST";

export interface RawHttpResponse {
  statusCode: number;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  body: string;
}

// ── Parsed payloads ─────────────────────────────────────────────────────────

export type PlainValue = string | PlainObject | PlainValue[];

export interface PlainObject {
  [key: string]: PlainValue;
}

export type CsvTable = string[][];

export interface ParsedResponse {
  headers: Record<string, string>;
  parsedBody: unknown;
}

// ── Call results ────────────────────────────────────────────────────────────

export type ParsedResult =
  | { ok: true; value: unknown }
  | { ok: false; error: VendorError | TransportError };

// ── Config types ────────────────────────────────────────────────────────────

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}

export interface HttpConfig {
  endpoint: string;
  method: HttpMethod;
  /** Per-request timeout; absent means wait indefinitely. */
  timeoutMs?: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

export interface ClientConfig {
  credentials: Credentials;
  http: HttpConfig;
  logging: LoggingConfig;
}
