// ---------------------------------------------------------------------------
// Error Classifier: Maps raw API and transport failures to a retry decision
// ---------------------------------------------------------------------------

import {
  ApiError,
  MAX_ERROR_BODY_LENGTH,
  NotFoundError,
  TransportError,
  type DbPlaneError,
  type FailureKind,
} from "@dbplane/core";
import { ApiErrorBodySchema } from "./protocol";

export const TRUNCATION_NOTE =
  "NOTE: The length of the HTML output indicates your authentication token may be out of date. " +
  "A truncated response follows:";

/** What went wrong: an HTTP status with its body, or a thrown transport error. */
export type FailureInput =
  | { status: number; body: string }
  | { error: unknown };

export interface ClassifiedFailure {
  kind: FailureKind;
  message: string;
  status?: number;
  truncated: boolean;
}

/** Connection-level error codes worth another attempt. */
const RETRYABLE_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
]);

/**
 * Pulls `error.detail` out of a structured error body. Anything that is not
 * the service's JSON error shape comes back as-is.
 */
export function extractErrorMessage(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }
  const result = ApiErrorBodySchema.safeParse(parsed);
  if (result.success && result.data.error.detail) {
    return result.data.error.detail;
  }
  return body;
}

/**
 * Bounds a message at `max` characters. Only messages strictly longer than
 * the bound are cut, and a cut message is prefixed with {@link TRUNCATION_NOTE}.
 */
export function truncateErrorMessage(
  message: string,
  max = MAX_ERROR_BODY_LENGTH,
): { message: string; truncated: boolean } {
  if (message.length <= max) {
    return { message, truncated: false };
  }
  return { message: `${TRUNCATION_NOTE}\n${message.slice(0, max)}`, truncated: true };
}

export function kindForStatus(status: number): FailureKind {
  if (status === 404) return "NOT_FOUND";
  if (status === 408 || status === 429 || status >= 500) return "RETRYABLE";
  return "FATAL";
}

export function classifyFailure(input: FailureInput): ClassifiedFailure {
  if ("status" in input) {
    const extracted = extractErrorMessage(input.body).trim();
    const { message, truncated } = truncateErrorMessage(
      extracted.length > 0 ? extracted : `HTTP ${input.status}`,
    );
    return { kind: kindForStatus(input.status), message, status: input.status, truncated };
  }
  return classifyThrown(input.error);
}

function classifyThrown(error: unknown): ClassifiedFailure {
  const message = error instanceof Error ? error.message : String(error);
  const { message: bounded, truncated } = truncateErrorMessage(message);

  if (error instanceof Error) {
    // AbortSignal.timeout() rejects with TimeoutError; a caller abort is AbortError.
    if (error.name === "TimeoutError") {
      return { kind: "RETRYABLE", message: `Request timed out: ${bounded}`, truncated };
    }
    if (error.name === "AbortError") {
      return { kind: "FATAL", message: `Request was cancelled: ${bounded}`, truncated };
    }
    const code = networkCode(error);
    if (code !== undefined) {
      return {
        kind: RETRYABLE_NETWORK_CODES.has(code) ? "RETRYABLE" : "FATAL",
        message: `${bounded} (${code})`,
        truncated,
      };
    }
    // fetch() reports every connection failure as a bare TypeError
    if (error instanceof TypeError && error.message === "fetch failed") {
      return { kind: "RETRYABLE", message: bounded, truncated };
    }
  }
  return { kind: "FATAL", message: bounded, truncated };
}

function networkCode(error: Error): string | undefined {
  const own = readCode(error);
  if (own !== undefined) return own;
  return error.cause instanceof Error ? readCode(error.cause) : undefined;
}

function readCode(error: Error): string | undefined {
  const code = "code" in error ? error.code : undefined;
  return typeof code === "string" ? code : undefined;
}

/**
 * Builds the error to throw for a classified failure. `NOT_FOUND` always
 * becomes {@link NotFoundError}; transport failures keep their retry flag.
 */
export function toClassifiedError(
  failure: ClassifiedFailure,
  title: string,
  resourceId?: string,
): DbPlaneError {
  if (failure.kind === "NOT_FOUND") {
    return new NotFoundError(failure.message, resourceId);
  }
  if (failure.status === undefined) {
    return new TransportError(failure.message, failure.kind === "RETRYABLE", title);
  }
  return new ApiError(failure.message, failure.status, failure.kind, title);
}
