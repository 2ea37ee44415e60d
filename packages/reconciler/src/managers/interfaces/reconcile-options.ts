/** Per-call options every manager operation accepts. */
export interface ReconcileOptions {
  /** Aborting stops any wait in progress with a cancelled `OperationTimeout` */
  signal?: AbortSignal;
  /**
   * Called with the new resource id as soon as the service accepts a
   * create, before any waiting. Lets the caller record the id even if a
   * later step fails.
   */
  onCreated?: (resourceId: string) => void;
}
