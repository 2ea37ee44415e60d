/**
 * Result of a single status check. `pending` keeps the poller going;
 * `done` and `failed` are terminal.
 */
export type PollOutcome<T> =
  | { state: "done"; status: string; value: T }
  | { state: "pending"; status: string }
  | { state: "failed"; status: string; message: string };

export function done<T>(status: string, value: T): PollOutcome<T> {
  return { state: "done", status, value };
}

export function pending<T = never>(status: string): PollOutcome<T> {
  return { state: "pending", status };
}

export function failed<T = never>(status: string, message: string): PollOutcome<T> {
  return { state: "failed", status, message };
}

export type OperationPhase = "SUBMITTED" | "POLLING" | "SUCCEEDED" | "FAILED" | "TIMED_OUT";

export type OperationKind =
  | "create"
  | "update"
  | "delete"
  | "scale"
  | "pause"
  | "resume"
  | "restore"
  | "associate";

/**
 * An accepted mutation being waited on. The initiating call has already
 * returned; `check` reads the current status.
 */
export interface Operation<T> {
  resourceId: string;
  kind: OperationKind;
  /** Human-readable label for log lines */
  description: string;
  /** Reads the current status; pass `signal` on to the API calls it makes */
  check: (attempt: number, signal?: AbortSignal) => Promise<PollOutcome<T>>;
  /** Overrides the policy deadline for this operation */
  timeoutMs?: number;
  /** Overrides the policy interval for this operation */
  intervalMs?: number;
  signal?: AbortSignal;
}

export interface OperationProgress {
  resourceId: string;
  kind: OperationKind;
  description: string;
  phase: OperationPhase;
  status: string | null;
  attempt: number;
  elapsedMs: number;
}

export type ProgressListener = (progress: OperationProgress) => void;
