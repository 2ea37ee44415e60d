export * from "./protocol";
export type { CallOptions, IManagedDbApi } from "./interface";
export { ManagedDbHttpClient } from "./client";
export type { ManagedDbClientOptions, FetchFn } from "./client";
export {
  TRUNCATION_NOTE,
  classifyFailure,
  extractErrorMessage,
  kindForStatus,
  toClassifiedError,
  truncateErrorMessage,
} from "./error-classifier";
export type { ClassifiedFailure, FailureInput } from "./error-classifier";
export * from "./interceptors";
