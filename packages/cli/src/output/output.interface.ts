import type { LogCallback } from "@dbplane/core";

/**
 * Everything the commands print goes through this service, so handlers can
 * be tested without a terminal.
 */
export interface IOutputService {
  header(text: string): void;
  info(text: string): void;
  success(text: string): void;
  warn(text: string): void;
  error(text: string): void;
  dim(text: string): void;
  newline(): void;

  startSpinner(text: string): void;
  updateSpinner(text: string): void;
  stopSpinner(outcome?: "succeed" | "fail", text?: string): void;

  /** Sink handed to the engine */
  readonly log: LogCallback;
}
