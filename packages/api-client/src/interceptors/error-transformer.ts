// ---------------------------------------------------------------------------
// ErrorTransformerInterceptor: Fills empty error responses with a detail
// ---------------------------------------------------------------------------

import type { ApiInterceptor, InboundResponse } from "./interface";

/**
 * Status → detail used when the server rejects a request without a body.
 * The detail is written in the same `{ error: { detail } }` shape the
 * service uses, so classification downstream reads it like any other.
 */
const DEFAULT_ERROR_MAP: Record<number, string> = {
  401: "Authentication failed. Check that the API token is valid and has not expired.",
  403: "The API token is not permitted to perform this operation.",
  429: "Too many requests were sent to the service.",
  502: "The service gateway returned an invalid response.",
  503: "The service is temporarily unavailable.",
  504: "The service gateway timed out.",
};

export interface ErrorTransformerOptions {
  /** Custom status → detail mappings. Merged with defaults (custom wins). */
  errorMap?: Record<number, string>;
}

export class ErrorTransformerInterceptor implements ApiInterceptor {
  readonly name = "error-transformer";

  private readonly errorMap: Record<number, string>;

  constructor(options?: ErrorTransformerOptions) {
    this.errorMap = { ...DEFAULT_ERROR_MAP, ...options?.errorMap };
  }

  async onInbound(response: InboundResponse): Promise<InboundResponse> {
    if (response.status < 400 || response.body.trim().length > 0) {
      return response;
    }

    const detail = this.errorMap[response.status];
    if (!detail) {
      return response;
    }

    return {
      ...response,
      body: JSON.stringify({ error: { detail, status: response.status } }),
    };
  }
}
