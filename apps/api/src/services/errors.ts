export type ErrorCode =
  | "invalid_document"
  | "empty_document"
  | "invalid_request"
  | "not_ready"
  | "provider_error"
  | "aborted";

export class AppError extends Error {
  readonly status: number;
  readonly code: ErrorCode;

  constructor(message: string, status: number, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

export class InvalidDocumentError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 400, "invalid_document", options);
  }
}

/** The upload was a readable PDF but yielded no text to build questions from. */
export class EmptyDocumentError extends AppError {
  constructor(message = "No text could be extracted from the PDF. Scanned documents need OCR before upload.") {
    super(message, 422, "empty_document");
  }
}

export class ServiceNotReadyError extends AppError {
  constructor(message = "The generator is still starting up. Try again shortly.") {
    super(message, 503, "not_ready");
  }
}

/**
 * Failure talking to the LLM or embedding provider. `detail` holds the provider's
 * own response text; it is logged server-side and never sent to HTTP callers.
 */
export class ProviderError extends AppError {
  readonly providerStatus: number;
  readonly detail: string;

  constructor(message: string, params: { providerStatus?: number; detail?: string; cause?: unknown } = {}) {
    super(message, 502, "provider_error", { cause: params.cause });
    this.providerStatus = params.providerStatus ?? 0;
    this.detail = params.detail ?? "";
  }
}

export class RequestAbortedError extends AppError {
  constructor(message = "Request was aborted") {
    super(message, 499, "aborted");
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof RequestAbortedError || (err instanceof Error && err.name === "AbortError");
}
