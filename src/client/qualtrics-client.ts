// ---------------------------------------------------------------------------
// QualtricsClient – one method per Control Panel API operation.
// ---------------------------------------------------------------------------

import { z } from "zod";

import type {
  Credentials,
  HttpMethod,
  Operation,
  OperationParams,
  ParamValue,
  RequestParams,
} from "../core/types.js";
import { ResponseFormat } from "../core/types.js";
import { TransportError } from "../core/errors.js";
import { ApiGateway } from "../gateway/api-gateway.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { getDescriptor } from "../operations/descriptors.js";
import {
  reshapeLegacyResponses,
  type LegacyResponse,
} from "../operations/legacy-responses.js";
import { buildRequestParams } from "../operations/request-builder.js";
import { FetchTransport, type HttpTransport } from "../transport/http-transport.js";

// ── Per-operation parameter types ───────────────────────────────────────────

type FormatParam = "Format";

export type GetUserInfoParams = OperationParams<FormatParam>;
export type GetResponseCountsBySurveyParams = OperationParams<
  FormatParam | "StartDate" | "EndDate" | "SurveyID"
>;
export type AddRecipientParams = OperationParams<
  FormatParam | "LibraryID" | "PanelID" | "FirstName" | "LastName" | "Email" | "Language"
>;
export type CreateDistributionParams = OperationParams<
  FormatParam | "PanelLibraryID" | "PanelID" | "SurveyID" | "Description"
>;
export type CreatePanelParams = OperationParams<FormatParam | "LibraryID" | "Name">;
export type PanelParams = OperationParams<FormatParam | "LibraryID" | "PanelID">;
export type GetPanelsParams = OperationParams<FormatParam | "LibraryID">;
export type RecipientParams = OperationParams<FormatParam | "LibraryID" | "RecipientID">;
export type ImportPanelParams = OperationParams<
  FormatParam | "LibraryID" | "ColumnHeaders" | "Email"
>;
export type RemoveRecipientParams = OperationParams<
  FormatParam | "LibraryID" | "PanelID" | "RecipientID"
>;

type MessageParam = "SendDate" | "FromEmail" | "FromName" | "Subject" | "MessageID";

export type SendReminderParams = OperationParams<
  FormatParam | "LibraryID" | "ParentEmailDistributionID" | MessageParam
>;
export type SendSurveyToPanelParams = OperationParams<
  FormatParam | "MessageLibraryID" | "PanelLibraryID" | "SurveyID" | "PanelID" | MessageParam
>;
export type SendSurveyToIndividualParams = OperationParams<
  | FormatParam
  | "MessageLibraryID"
  | "PanelLibraryID"
  | "SurveyID"
  | "PanelID"
  | "RecipientID"
  | MessageParam
>;
export type GetLegacyResponseDataParams = OperationParams<
  FormatParam | "SurveyID" | "ExportTags"
>;
export type GetSurveyParams = OperationParams<"SurveyID">;
export type GetSurveysParams = OperationParams<FormatParam>;

// ── Response shapes the client unwraps ──────────────────────────────────────

const JsonSurveysSchema = z.object({ Surveys: z.array(z.unknown()) });
const XmlSurveysSchema = z.object({
  Surveys: z.union([z.object({ element: z.array(z.unknown()) }), z.literal("")]),
});

// ── Options ─────────────────────────────────────────────────────────────────

export interface QualtricsClientOptions {
  credentials: Credentials;
  logger?: Logger;
  /** Overrides `endpoint`, `method` and `timeoutMs`. */
  transport?: HttpTransport;
  endpoint?: string;
  method?: HttpMethod;
  /** Per-request timeout; by default requests wait indefinitely. */
  timeoutMs?: number;
  /** Retries on transport failures only; default 0. */
  maxRetries?: number;
  retryBaseDelayMs?: number;
  /** Source of "now" for computed defaults such as `SendDate`. */
  clock?: () => Date;
}

/** Read a merged `Format` parameter; unknown values fall back to JSON. */
function readFormat(value: ParamValue): ResponseFormat {
  const upper = typeof value === "string" ? value.toUpperCase() : "";
  return upper === ResponseFormat.XML || upper === ResponseFormat.CSV
    ? upper
    : ResponseFormat.JSON;
}

// ── Client ──────────────────────────────────────────────────────────────────

/**
 * Typed wrapper around the Qualtrics Control Panel API (v2.2).
 *
 * Prefer {@link QualtricsClient.connect}, which verifies the credentials
 * with a `getUserInfo` call before returning.  The constructor only checks
 * that a username and token were supplied.
 */
export class QualtricsClient {
  private readonly gateway: ApiGateway;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: QualtricsClientOptions) {
    this.logger = (options.logger ?? createSilentLogger()).child({
      component: "QualtricsClient",
    });
    this.clock = options.clock ?? (() => new Date());

    const transport =
      options.transport ??
      new FetchTransport({
        endpoint: options.endpoint,
        method: options.method,
        timeoutMs: options.timeoutMs,
      });

    this.gateway = new ApiGateway({
      credentials: options.credentials,
      transport,
      logger: this.logger,
      maxRetries: options.maxRetries,
      retryBaseDelayMs: options.retryBaseDelayMs,
    });
  }

  /**
   * Create a client and verify its credentials.  Rejects with the
   * `getUserInfo` failure; bad credentials and network problems are not
   * distinguished beyond the error type.
   */
  static async connect(
    options: QualtricsClientOptions,
    signal?: AbortSignal,
  ): Promise<QualtricsClient> {
    const client = new QualtricsClient(options);
    await client.getUserInfo({}, signal);
    client.logger.debug("Credentials verified");
    return client;
  }

  /** Whether a default library ID was supplied with the credentials. */
  hasLibrary(): boolean {
    return Boolean(this.gateway.libraryId);
  }

  // ── Account ─────────────────────────────────────────────────────────────

  async getUserInfo(params: GetUserInfoParams = {}, signal?: AbortSignal): Promise<unknown> {
    return (await this.invoke("getUserInfo", params, signal)).value;
  }

  // ── Surveys ─────────────────────────────────────────────────────────────

  async getSurvey(params: GetSurveyParams = {}, signal?: AbortSignal): Promise<unknown> {
    return (await this.invoke("getSurvey", params, signal)).value;
  }

  /** The list of surveys, unwrapped from `Result.Surveys`. */
  async getSurveys(params: GetSurveysParams = {}, signal?: AbortSignal): Promise<unknown[]> {
    const { value, format } = await this.invoke("getSurveys", params, signal);

    if (format === ResponseFormat.XML) {
      const parsed = XmlSurveysSchema.safeParse(value);
      if (!parsed.success) throw unexpectedShape("getSurveys");
      const { Surveys } = parsed.data;
      return Surveys === "" ? [] : Surveys.element;
    }

    const parsed = JsonSurveysSchema.safeParse(value);
    if (!parsed.success) throw unexpectedShape("getSurveys");
    return parsed.data.Surveys;
  }

  async getResponseCountsBySurvey(
    params: GetResponseCountsBySurveyParams = {},
    signal?: AbortSignal,
  ): Promise<unknown> {
    return (await this.invoke("getResponseCountsBySurvey", params, signal)).value;
  }

  /** Survey responses as one flat object per response, whatever the Format. */
  async getLegacyResponseData(
    params: GetLegacyResponseDataParams = {},
    signal?: AbortSignal,
  ): Promise<LegacyResponse[]> {
    const { value, format } = await this.invoke("getLegacyResponseData", params, signal);
    return reshapeLegacyResponses(format, value);
  }

  // ── Panels ──────────────────────────────────────────────────────────────

  async createPanel(params: CreatePanelParams = {}, signal?: AbortSignal): Promise<unknown> {
    return (await this.invoke("createPanel", params, signal)).value;
  }

  /** Panel members; CSV by default, so rows of strings unless Format says otherwise. */
  async getPanel(params: PanelParams = {}, signal?: AbortSignal): Promise<unknown> {
    return (await this.invoke("getPanel", params, signal)).value;
  }

  async deletePanel(params: PanelParams = {}, signal?: AbortSignal): Promise<unknown> {
    return (await this.invoke("deletePanel", params, signal)).value;
  }

  async getPanelMemberCount(params: PanelParams = {}, signal?: AbortSignal): Promise<unknown> {
    return (await this.invoke("getPanelMemberCount", params, signal)).value;
  }

  async getPanels(params: GetPanelsParams = {}, signal?: AbortSignal): Promise<unknown> {
    return (await this.invoke("getPanels", params, signal)).value;
  }

  async importPanel(params: ImportPanelParams = {}, signal?: AbortSignal): Promise<unknown> {
    return (await this.invoke("importPanel", params, signal)).value;
  }

  // ── Recipients ──────────────────────────────────────────────────────────

  async addRecipient(params: AddRecipientParams = {}, signal?: AbortSignal): Promise<unknown> {
    return (await this.invoke("addRecipient", params, signal)).value;
  }

  async getRecipient(params: RecipientParams = {}, signal?: AbortSignal): Promise<unknown> {
    return (await this.invoke("getRecipient", params, signal)).value;
  }

  async removeRecipient(
    params: RemoveRecipientParams = {},
    signal?: AbortSignal,
  ): Promise<unknown> {
    return (await this.invoke("removeRecipient", params, signal)).value;
  }

  /** Resolves to `true` once the API accepts the update. */
  async updateRecipient(params: RecipientParams = {}, signal?: AbortSignal): Promise<true> {
    await this.invoke("updateRecipient", params, signal);
    return true;
  }

  // ── Distributions ───────────────────────────────────────────────────────

  async createDistribution(
    params: CreateDistributionParams = {},
    signal?: AbortSignal,
  ): Promise<unknown> {
    return (await this.invoke("createDistribution", params, signal)).value;
  }

  async sendSurveyToPanel(
    params: SendSurveyToPanelParams = {},
    signal?: AbortSignal,
  ): Promise<unknown> {
    return (await this.invoke("sendSurveyToPanel", params, signal)).value;
  }

  async sendSurveyToIndividual(
    params: SendSurveyToIndividualParams = {},
    signal?: AbortSignal,
  ): Promise<unknown> {
    return (await this.invoke("sendSurveyToIndividual", params, signal)).value;
  }

  async sendReminder(params: SendReminderParams = {}, signal?: AbortSignal): Promise<unknown> {
    return (await this.invoke("sendReminder", params, signal)).value;
  }

  // ── Private helpers ─────────────────────────────────────────────────────

  private async invoke(
    operation: Operation,
    params: RequestParams,
    signal?: AbortSignal,
  ): Promise<{ value: unknown; format: ResponseFormat }> {
    const merged = buildRequestParams(getDescriptor(operation), params, {
      libraryId: this.gateway.libraryId,
      now: this.clock(),
    });
    const value = await this.gateway.call(operation, merged, signal);
    return { value, format: readFormat(merged["Format"]) };
  }
}

function unexpectedShape(operation: Operation): TransportError {
  return new TransportError(200, `Unexpected response shape for ${operation}`);
}
