/**
 * Operation Poller Interface
 *
 * Abstraction over waiting for accepted mutations to settle. Managers
 * depend on this, not on the concrete poller, so tests can inject one.
 */

import type { Operation } from "../../poller/outcome";

export interface IOperationPoller {
  /**
   * Poll `operation.check` until it reports a terminal outcome.
   *
   * @returns The value carried by the `done` outcome
   * @throws OperationTimeout when the deadline passes or the signal aborts
   */
  waitFor<T>(operation: Operation<T>): Promise<T>;
}
