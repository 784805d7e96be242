// ---------------------------------------------------------------------------
// Error hierarchy for the Qualtrics client.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all client errors.
 */
export class QualtricsClientError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "QualtricsClientError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Request errors ──────────────────────────────────────────────────────────

/** A required parameter is absent after defaults and overrides are merged. */
export class MissingParameterError extends QualtricsClientError {
  public readonly parameter: string;

  constructor(parameter: string, options?: ErrorOptions) {
    super(
      `Missing parameter: the required ${parameter} parameter was not specified`,
      options,
    );
    this.name = "MissingParameterError";
    this.parameter = parameter;
  }
}

// ── Remote errors ───────────────────────────────────────────────────────────

/**
 * The API answered, but reported a failure in its `Meta` envelope.
 * For 4xx answers `code` is the HTTP status.
 */
export class VendorError extends QualtricsClientError {
  public readonly code: number | string;
  public readonly vendorMessage: string;

  constructor(code: number | string, vendorMessage: string, options?: ErrorOptions) {
    super(`Qualtrics error ${code}: ${vendorMessage}`, options);
    this.name = "VendorError";
    this.code = code;
    this.vendorMessage = vendorMessage;
  }
}

/**
 * The request never produced a usable answer: network failure, abort,
 * timeout, 5xx, or a body that could not be read.
 */
export class TransportError extends QualtricsClientError {
  /** HTTP status when one was received. */
  public readonly statusCode: number | null;

  constructor(statusCode: number | null, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransportError";
    this.statusCode = statusCode;
  }
}

// ── Parse errors ────────────────────────────────────────────────────────────

/** The response carried a content-type the client does not understand. */
export class UnknownFormatError extends QualtricsClientError {
  public readonly contentType: string;

  constructor(contentType: string, options?: ErrorOptions) {
    super(
      `Qualtrics returned a response in an unknown format: ${contentType || "(no content-type)"}`,
      options,
    );
    this.name = "UnknownFormatError";
    this.contentType = contentType;
  }
}

/** An XML response was not well-formed. */
export class MalformedXmlError extends QualtricsClientError {
  /** Diagnostic code reported by the XML validator. */
  public readonly code: string;
  public readonly line: number | null;

  constructor(
    detail: string,
    code: string,
    line: number | null = null,
    options?: ErrorOptions,
  ) {
    super(`XML parse error: ${detail}`, options);
    this.name = "MalformedXmlError";
    this.code = code;
    this.line = line;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends QualtricsClientError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
