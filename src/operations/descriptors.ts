// ---------------------------------------------------------------------------
// Operation descriptors: default parameters and required fields for every
// Control Panel API call the client exposes.
// ---------------------------------------------------------------------------

import type { Operation, ParamValue } from "../core/types.js";
import { formatApiDate, formatApiDateTime } from "../utils/dates.js";

/** Inputs available to defaults that are computed per call. */
export interface DefaultsContext {
  libraryId: string | undefined;
  now: Date;
}

export type DefaultResolver = (ctx: DefaultsContext) => ParamValue;

export type DefaultValue = ParamValue | DefaultResolver;

export interface OperationDescriptor {
  readonly name: Operation;
  readonly defaultParams: Readonly<Record<string, DefaultValue>>;
  readonly requiredFields: readonly string[];
}

// ── Dynamic defaults ────────────────────────────────────────────────────────

const library: DefaultResolver = (ctx) => ctx.libraryId;

const today: DefaultResolver = (ctx) => formatApiDate(ctx.now);

/** Default `SendDate` lies this far before the current time. */
const SEND_DATE_OFFSET_MS = 119 * 60_000;

const sendNow: DefaultResolver = (ctx) =>
  formatApiDateTime(new Date(ctx.now.getTime() - SEND_DATE_OFFSET_MS));

// ── Descriptor table ────────────────────────────────────────────────────────

function describe(
  name: Operation,
  defaultParams: Record<string, DefaultValue>,
  requiredFields: string[] = [],
): OperationDescriptor {
  return Object.freeze({
    name,
    defaultParams: Object.freeze(defaultParams),
    requiredFields: Object.freeze(requiredFields),
  });
}

const MESSAGE_FIELDS = ["FromEmail", "FromName", "Subject", "MessageID"];

export const OPERATIONS: Readonly<Record<Operation, OperationDescriptor>> =
  Object.freeze({
    getUserInfo: describe("getUserInfo", { Format: "JSON" }),

    getResponseCountsBySurvey: describe(
      "getResponseCountsBySurvey",
      { Format: "JSON", StartDate: null, EndDate: today, SurveyID: null },
      ["StartDate", "SurveyID"],
    ),

    addRecipient: describe(
      "addRecipient",
      {
        Format: "JSON",
        LibraryID: library,
        PanelID: null,
        FirstName: null,
        LastName: null,
        Email: null,
        Language: "EN",
      },
      ["PanelID", "FirstName", "LastName", "Email"],
    ),

    createDistribution: describe(
      "createDistribution",
      {
        Format: "JSON",
        PanelLibraryID: library,
        PanelID: null,
        SurveyID: null,
        Description: null,
      },
      ["PanelID", "SurveyID", "Description"],
    ),

    createPanel: describe(
      "createPanel",
      { Format: "JSON", LibraryID: library, Name: null },
      ["Name"],
    ),

    getPanel: describe(
      "getPanel",
      { Format: "CSV", LibraryID: library, PanelID: null },
      ["PanelID"],
    ),

    deletePanel: describe(
      "deletePanel",
      { Format: "JSON", LibraryID: library, PanelID: null },
      ["PanelID"],
    ),

    getPanelMemberCount: describe(
      "getPanelMemberCount",
      { Format: "JSON", LibraryID: library, PanelID: null },
      ["PanelID"],
    ),

    getPanels: describe("getPanels", { Format: "JSON", LibraryID: library }),

    getRecipient: describe(
      "getRecipient",
      { Format: "JSON", LibraryID: library, RecipientID: null },
      ["RecipientID"],
    ),

    // TODO: the API expects the panel file as a multipart upload; only the
    // URL form of importPanel is supported for now.
    importPanel: describe(
      "importPanel",
      { Format: "JSON", LibraryID: library, ColumnHeaders: 1, Email: null },
      ["Email"],
    ),

    removeRecipient: describe(
      "removeRecipient",
      { Format: "JSON", LibraryID: library, PanelID: null, RecipientID: null },
      ["PanelID", "RecipientID"],
    ),

    sendReminder: describe(
      "sendReminder",
      {
        Format: "JSON",
        LibraryID: library,
        ParentEmailDistributionID: null,
        SendDate: sendNow,
        FromEmail: null,
        FromName: null,
        Subject: null,
        MessageID: null,
      },
      ["ParentEmailDistributionID", ...MESSAGE_FIELDS],
    ),

    sendSurveyToIndividual: describe(
      "sendSurveyToIndividual",
      {
        Format: "JSON",
        MessageLibraryID: library,
        PanelLibraryID: library,
        SurveyID: null,
        SendDate: sendNow,
        FromEmail: null,
        FromName: null,
        Subject: null,
        MessageID: null,
        PanelID: null,
        RecipientID: null,
      },
      ["SurveyID", ...MESSAGE_FIELDS, "PanelID", "RecipientID"],
    ),

    sendSurveyToPanel: describe(
      "sendSurveyToPanel",
      {
        Format: "JSON",
        MessageLibraryID: library,
        PanelLibraryID: library,
        SurveyID: null,
        SendDate: sendNow,
        FromEmail: null,
        FromName: null,
        Subject: null,
        MessageID: null,
        PanelID: null,
      },
      ["SurveyID", ...MESSAGE_FIELDS, "PanelID"],
    ),

    updateRecipient: describe(
      "updateRecipient",
      { Format: "JSON", LibraryID: library, RecipientID: null },
      ["RecipientID"],
    ),

    getLegacyResponseData: describe(
      "getLegacyResponseData",
      { Format: "JSON", SurveyID: null, ExportTags: 1 },
      ["SurveyID"],
    ),

    getSurvey: describe("getSurvey", { SurveyID: null }, ["SurveyID"]),

    getSurveys: describe("getSurveys", { Format: "JSON" }),
  });

/** Descriptor for `operation`. */
export function getDescriptor(operation: Operation): OperationDescriptor {
  return OPERATIONS[operation];
}
