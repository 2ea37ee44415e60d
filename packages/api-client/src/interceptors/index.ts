// ---------------------------------------------------------------------------
// Interceptors: Barrel exports
// ---------------------------------------------------------------------------

export type {
  ApiInterceptor,
  HttpMethod,
  OutboundRequest,
  InboundResponse,
  ErrorContext,
} from "./interface";

export { InterceptorChain } from "./chain";

export { LoggerInterceptor } from "./logger";
export type { LoggerInterceptorOptions } from "./logger";

export { ErrorTransformerInterceptor } from "./error-transformer";
export type { ErrorTransformerOptions } from "./error-transformer";
