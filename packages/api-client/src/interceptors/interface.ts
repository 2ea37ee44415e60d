// ---------------------------------------------------------------------------
// API Interceptor Interface: Middleware for control-plane HTTP traffic
// ---------------------------------------------------------------------------

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * Request about to be sent. `path` is relative to the client's base URL.
 */
export interface OutboundRequest {
  id: string;
  method: HttpMethod;
  path: string;
  query?: Record<string, string>;
  body?: unknown;
}

/**
 * Raw response as received. `body` is the undecoded text so interceptors can
 * inspect error pages that are not JSON.
 */
export interface InboundResponse {
  id: string;
  method: HttpMethod;
  path: string;
  status: number;
  body: string;
  durationMs: number;
}

export interface ErrorContext {
  phase: "outbound" | "inbound" | "transport";
  request?: OutboundRequest;
  response?: InboundResponse;
}

/**
 * Interceptor for the API client middleware chain.
 *
 * Hooks are optional and run in registration order. `onOutbound` and
 * `onInbound` may return a transformed copy; `onError` observes failures in
 * any phase, including connection failures before a status was received.
 */
export interface ApiInterceptor {
  /** Human-readable name for this interceptor (used in logging/debugging). */
  name: string;

  onOutbound?(request: OutboundRequest): Promise<OutboundRequest>;

  onInbound?(response: InboundResponse): Promise<InboundResponse>;

  onError?(error: Error, context: ErrorContext): Promise<void>;
}
