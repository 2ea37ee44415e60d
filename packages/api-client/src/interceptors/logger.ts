// ---------------------------------------------------------------------------
// LoggerInterceptor: Request/response logging for control-plane traffic
// ---------------------------------------------------------------------------

import type { LogCallback } from "@dbplane/core";
import type {
  ApiInterceptor,
  OutboundRequest,
  InboundResponse,
  ErrorContext,
} from "./interface";

/** Payload keys whose values never reach the log. */
const REDACTED_KEYS = new Set([
  "password",
  "secret_key",
  "client_secret",
  "api_key",
  "access_key",
  "access_policy_token",
  "installation_token",
  "private_key",
  "db_credentials",
]);

export interface LoggerInterceptorOptions {
  /** Include request and response bodies. Default: false. */
  verbose?: boolean;
  /** Maximum body length before truncation. Default: 500. */
  maxBodyLength?: number;
  /** Log sink. Default: console.log for stdout, console.error for stderr. */
  logFn?: LogCallback;
}

const consoleLog: LogCallback = (message, stream) => {
  if (stream === "stderr") {
    console.error(message);
  } else {
    console.log(message);
  }
};

export class LoggerInterceptor implements ApiInterceptor {
  readonly name = "logger";

  private readonly verbose: boolean;
  private readonly maxBodyLength: number;
  private readonly logFn: LogCallback;

  constructor(options?: LoggerInterceptorOptions) {
    this.verbose = options?.verbose ?? false;
    this.maxBodyLength = options?.maxBodyLength ?? 500;
    this.logFn = options?.logFn ?? consoleLog;
  }

  async onOutbound(request: OutboundRequest): Promise<OutboundRequest> {
    let line = `[API:OUT] ${request.method} ${request.path} id=${request.id}`;
    if (this.verbose && request.body !== undefined) {
      line += ` body=${this.truncate(JSON.stringify(request.body, redact))}`;
    }
    this.logFn(line, "stdout");
    return request;
  }

  async onInbound(response: InboundResponse): Promise<InboundResponse> {
    const ok = response.status >= 200 && response.status < 300;
    let line = `[API:IN] id=${response.id} status=${response.status} duration=${response.durationMs}ms`;
    if (this.verbose && response.body.length > 0) {
      line += ` body=${this.truncate(response.body)}`;
    }
    this.logFn(line, ok ? "stdout" : "stderr");
    return response;
  }

  async onError(error: Error, context: ErrorContext): Promise<void> {
    this.logFn(`[API:ERR] phase=${context.phase} error=${error.message}`, "stderr");
  }

  private truncate(value: string): string {
    if (value.length <= this.maxBodyLength) {
      return value;
    }
    return value.slice(0, this.maxBodyLength) + "...(truncated)";
  }
}

function redact(key: string, value: unknown): unknown {
  return REDACTED_KEYS.has(key) ? "[redacted]" : value;
}
