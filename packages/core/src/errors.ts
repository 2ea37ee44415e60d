// ---------------------------------------------------------------------------
// Error taxonomy shared by every dbplane package
// ---------------------------------------------------------------------------

export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "TRANSPORT_ERROR"
  | "API_ERROR"
  | "OPERATION_TIMEOUT"
  | "NOT_FOUND";

/** Retry decision attached to every classified failure. */
export type FailureKind = "RETRYABLE" | "FATAL" | "NOT_FOUND";

/**
 * Base class for all surfaced errors. `title` is a short summary suitable for
 * a heading; `message` carries the classified detail.
 */
export class DbPlaneError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly title: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DbPlaneError";
  }
}

/**
 * Invalid or contradictory desired state found before any network call.
 * Never retried.
 */
export class ConfigurationError extends DbPlaneError {
  constructor(
    title: string,
    message: string,
    public readonly fields: string[] = [],
  ) {
    super(message, "CONFIGURATION_ERROR", title);
    this.name = "ConfigurationError";
  }
}

/** Connection-level failure before any HTTP status was received. */
export class TransportError extends DbPlaneError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    title = "Request failed",
    options?: { cause?: unknown },
  ) {
    super(message, "TRANSPORT_ERROR", title, options);
    this.name = "TransportError";
  }
}

/** The service answered but reported an application-level failure. */
export class ApiError extends DbPlaneError {
  constructor(
    message: string,
    public readonly status: number | undefined,
    public readonly kind: FailureKind = "FATAL",
    title = "Request rejected",
  ) {
    super(message, "API_ERROR", title);
    this.name = "ApiError";
  }

  get retryable(): boolean {
    return this.kind === "RETRYABLE";
  }
}

/**
 * The poller gave up waiting. The mutation may still complete on the server,
 * so callers should re-read rather than assume failure.
 */
export class OperationTimeout extends DbPlaneError {
  constructor(
    message: string,
    public readonly resourceId: string,
    public readonly elapsedMs: number,
    public readonly cancelled = false,
    title = "Operation timed out",
  ) {
    super(message, "OPERATION_TIMEOUT", title);
    this.name = "OperationTimeout";
  }
}

/** The target resource does not exist on the server. */
export class NotFoundError extends DbPlaneError {
  constructor(
    message: string,
    public readonly resourceId?: string,
    title = "Resource not found",
  ) {
    super(message, "NOT_FOUND", title);
    this.name = "NotFoundError";
  }
}

/** True for failures the poller may swallow and retry. */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TransportError) return error.retryable;
  if (error instanceof ApiError) return error.retryable;
  return false;
}

/** Formats any thrown value as `title: message` for display. */
export function describeError(error: unknown): string {
  if (error instanceof DbPlaneError) {
    return `${error.title}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
