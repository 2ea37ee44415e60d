/**
 * Log sink injected into engine components. The host decides format and
 * destination; components only pick the stream.
 */
export type LogStream = "stdout" | "stderr";

export type LogCallback = (message: string, stream: LogStream) => void;

/** Sink that discards everything. */
export const noopLog: LogCallback = () => undefined;
