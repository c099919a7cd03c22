export const SpeechErrorCode = {
  INVALID_REQUEST: "invalid_request",
  UNAUTHORIZED: "unauthorized",
  UPSTREAM_UNAVAILABLE: "upstream_unavailable",
  UPSTREAM_REQUEST_FAILED: "upstream_request_failed",
  MALFORMED_UPSTREAM_RECORD: "malformed_upstream_record",
  ENCODING_FAILED: "encoding_failed"
} as const;

export type SpeechErrorCodeType = (typeof SpeechErrorCode)[keyof typeof SpeechErrorCode];

/**
 * Base class for every error this server renders to an HTTP client.
 * `statusCode` is what the error middleware answers with.
 */
export class SpeechError extends Error {
  readonly code: SpeechErrorCodeType;
  readonly statusCode: number;

  constructor(code: SpeechErrorCodeType, statusCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.statusCode = statusCode;
    this.name = "SpeechError";
  }
}

/** Missing or malformed request input. Raised before any backend call. */
export class ValidationError extends SpeechError {
  constructor(message: string) {
    super(SpeechErrorCode.INVALID_REQUEST, 400, message);
    this.name = "ValidationError";
  }
}

export class UnauthorizedError extends SpeechError {
  constructor(message = "Invalid X-App-Token") {
    super(SpeechErrorCode.UNAUTHORIZED, 401, message);
    this.name = "UnauthorizedError";
  }
}

/**
 * The audio codec failed its startup probe. Every synthesis call fails with
 * this until the process restarts.
 */
export class UpstreamUnavailableError extends SpeechError {
  constructor(reason: string) {
    super(SpeechErrorCode.UPSTREAM_UNAVAILABLE, 503, `Audio codec is not available: ${reason}`);
    this.name = "UpstreamUnavailableError";
  }
}

/**
 * Transport failure or non-success status from the text generation backend.
 */
export class UpstreamRequestError extends SpeechError {
  constructor(
    message: string,
    public readonly upstreamStatus?: number,
    public readonly upstreamBody?: string,
    options?: { cause?: unknown }
  ) {
    super(SpeechErrorCode.UPSTREAM_REQUEST_FAILED, 502, message, options);
    this.name = "UpstreamRequestError";
  }
}

/** One unparseable NDJSON line. Logged and skipped, never surfaced. */
export class MalformedUpstreamRecordError extends SpeechError {
  constructor(public readonly line: string, options?: { cause?: unknown }) {
    super(SpeechErrorCode.MALFORMED_UPSTREAM_RECORD, 502, `Failed to parse upstream record: ${line}`, options);
    this.name = "MalformedUpstreamRecordError";
  }
}

export class EncodingFailureError extends SpeechError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(SpeechErrorCode.ENCODING_FAILED, 500, `Audio encoding failed: ${reason}`, options);
    this.name = "EncodingFailureError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
