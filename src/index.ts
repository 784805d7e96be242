// ---------------------------------------------------------------------------
// Public entry point.
// ---------------------------------------------------------------------------

export { QualtricsClient } from "./client/qualtrics-client.js";
export type {
  QualtricsClientOptions,
  AddRecipientParams,
  CreateDistributionParams,
  CreatePanelParams,
  GetLegacyResponseDataParams,
  GetPanelsParams,
  GetResponseCountsBySurveyParams,
  GetSurveyParams,
  GetSurveysParams,
  GetUserInfoParams,
  ImportPanelParams,
  PanelParams,
  RecipientParams,
  RemoveRecipientParams,
  SendReminderParams,
  SendSurveyToIndividualParams,
  SendSurveyToPanelParams,
} from "./client/qualtrics-client.js";

export { ApiGateway, API_VERSION } from "./gateway/api-gateway.js";
export { interpretResponse, readEnvelope } from "./gateway/envelope.js";
export { withRetry } from "./gateway/retry.js";

export {
  FetchTransport,
  DEFAULT_ENDPOINT,
  encodeParams,
} from "./transport/http-transport.js";
export type { HttpTransport, FetchTransportOptions } from "./transport/http-transport.js";
export { parseResponse, classifyContentType } from "./transport/response-parser.js";
export type { WireFormat } from "./transport/response-parser.js";

export { OPERATIONS, getDescriptor } from "./operations/descriptors.js";
export type { OperationDescriptor, DefaultsContext } from "./operations/descriptors.js";
export { buildRequestParams, isMissing } from "./operations/request-builder.js";
export { reshapeLegacyResponses } from "./operations/legacy-responses.js";
export type { LegacyResponse } from "./operations/legacy-responses.js";

export { parseCsv } from "./utils/csv-parser.js";
export type { CsvParseOptions } from "./utils/csv-parser.js";
export { toPlain } from "./utils/xml-converter.js";

export { loadConfig, clientOptionsFromConfig } from "./config/config.js";
export { createLogger } from "./logging/logger.js";

export * from "./core/errors.js";
export * from "./core/types.js";
