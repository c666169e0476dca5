import type { StageName } from "./stages";

export type IngestErrorCode =
  | "configuration_invalid"
  | "dependency_missing"
  | "connection_failed"
  | "unsupported_filetype"
  | "invalid_document"
  | "fetch_failed"
  | "processing_failed"
  | "stage_timeout"
  | "upload_failed";

export type IngestErrorContext = {
  connector?: string;
  stage?: StageName;
  identity?: string;
  field?: string;
  dependency?: string;
  timeoutMs?: number;
};

type IngestErrorArgs = {
  code: IngestErrorCode;
  message: string;
  context?: IngestErrorContext;
  cause?: unknown;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class IngestError extends Error {
  readonly code: IngestErrorCode;
  readonly context: IngestErrorContext;

  constructor(args: IngestErrorArgs) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = "IngestError";
    this.code = args.code;
    this.context = args.context ?? {};
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Fatal. Raised while building configuration, before any I/O happens. */
export class ConfigurationError extends IngestError {
  constructor(message: string, context: IngestErrorContext = {}) {
    super({ code: "configuration_invalid", message, context });
    this.name = "ConfigurationError";
  }
}

export class MissingDependencyError extends IngestError {
  readonly missing: string[];

  constructor(missing: string[], context: IngestErrorContext = {}) {
    const subject = context.connector ? `connector "${context.connector}"` : "this pipeline";
    super({
      code: "dependency_missing",
      message: `Missing optional dependencies for ${subject}: ${missing.join(", ")}. Install them with: npm install ${missing.join(" ")}`,
      context: { ...context, dependency: missing.join(",") }
    });
    this.name = "MissingDependencyError";
    this.missing = missing;
  }
}

/** Fatal for the batch of the connector that raised it. */
export class ConnectionError extends IngestError {
  constructor(message: string, context: IngestErrorContext = {}, cause?: unknown) {
    super({ code: "connection_failed", message, context, cause });
    this.name = "ConnectionError";
  }
}

export class UnsupportedFiletypeError extends IngestError {
  constructor(message: string, context: IngestErrorContext = {}) {
    super({ code: "unsupported_filetype", message, context });
    this.name = "UnsupportedFiletypeError";
  }
}

export class InvalidDocumentError extends IngestError {
  constructor(message: string, context: IngestErrorContext = {}) {
    super({ code: "invalid_document", message, context });
    this.name = "InvalidDocumentError";
  }
}

export class FetchError extends IngestError {
  constructor(message: string, context: IngestErrorContext = {}, cause?: unknown) {
    super({ code: "fetch_failed", message, context, cause });
    this.name = "FetchError";
  }
}

export class ProcessingError extends IngestError {
  constructor(message: string, context: IngestErrorContext = {}, cause?: unknown) {
    super({ code: "processing_failed", message, context, cause });
    this.name = "ProcessingError";
  }
}

export class UploadError extends IngestError {
  constructor(message: string, context: IngestErrorContext = {}, cause?: unknown) {
    super({ code: "upload_failed", message, context, cause });
    this.name = "UploadError";
  }
}

/**
 * A stage exceeded its own deadline or the run deadline expired while it was in flight.
 */
export class StageTimeoutError extends IngestError {
  constructor(message: string, context: IngestErrorContext = {}) {
    super({ code: "stage_timeout", message, context });
    this.name = "TimeoutError";
  }
}

export const isIngestError = (value: unknown): value is IngestError => value instanceof IngestError;
