import { ApiError, OperationTimeout, TransportError } from "@dbplane/core";
import { OperationPoller } from "../poller/operation-poller";
import { RetryPolicy } from "../poller/retry-policy";
import { done, failed, pending, type Operation, type OperationProgress, type PollOutcome } from "../poller/outcome";
import { FakeClock } from "./fakes";

// ── Test helpers ───────────────────────────────────────────────────────

function createPoller(maxDurationMs = 60_000) {
  const clock = new FakeClock();
  const log = jest.fn();
  const progress: OperationProgress[] = [];
  const poller = new OperationPoller(new RetryPolicy(10_000, maxDurationMs, clock), log, (event) => {
    progress.push(event);
  });
  return { poller, clock, log, progress };
}

function operation<T>(
  check: Operation<T>["check"],
  overrides: Partial<Operation<T>> = {},
): Operation<T> {
  return { resourceId: "cluster-1", kind: "create", description: "create cluster", check, ...overrides };
}

// ── Tests ──────────────────────────────────────────────────────────────

describe("OperationPoller", () => {
  it("returns the value of the first done outcome", async () => {
    const { poller, clock } = createPoller();
    const check = jest
      .fn()
      .mockResolvedValueOnce(pending("IN_PROGRESS"))
      .mockResolvedValueOnce(done("SUCCEEDED", "cluster-1"));

    await expect(poller.waitFor(operation(check))).resolves.toBe("cluster-1");
    expect(check).toHaveBeenCalledTimes(2);
    expect(check).toHaveBeenNthCalledWith(2, 2, undefined);
    expect(clock.sleeps).toEqual([10_000]);
  });

  it("reports SUBMITTED, POLLING and SUCCEEDED in order", async () => {
    const { poller, progress } = createPoller();
    const check = jest
      .fn()
      .mockResolvedValueOnce(pending("IN_PROGRESS"))
      .mockResolvedValueOnce(done("SUCCEEDED", undefined));

    await poller.waitFor(operation(check));

    expect(progress.map((event) => [event.phase, event.status, event.attempt, event.elapsedMs])).toEqual([
      ["SUBMITTED", null, 0, 0],
      ["POLLING", "IN_PROGRESS", 1, 0],
      ["SUCCEEDED", "SUCCEEDED", 2, 10_000],
    ]);
  });

  it("logs a status line only when the status changes", async () => {
    const { poller, log } = createPoller();
    const check = jest
      .fn()
      .mockResolvedValueOnce(pending("QUEUED"))
      .mockResolvedValueOnce(pending("QUEUED"))
      .mockResolvedValueOnce(done("ACTIVE", undefined));

    await poller.waitFor(operation(check));

    expect(log.mock.calls).toEqual([
      ["  [create cluster] QUEUED - 0s elapsed", "stdout"],
      ["  [create cluster] ACTIVE - 20s elapsed", "stdout"],
    ]);
  });

  it("times out with OperationTimeout, not ApiError, when the status never settles", async () => {
    const { poller, clock, log, progress } = createPoller(60_000);
    const check = jest.fn().mockResolvedValue(pending("CREATING"));

    const error = await poller.waitFor(operation(check)).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OperationTimeout);
    expect(error).not.toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      message: "Timed out after 60s waiting for create cluster",
      resourceId: "cluster-1",
      elapsedMs: 60_000,
      cancelled: false,
    });
    expect(check).toHaveBeenCalledTimes(7);
    expect(clock.sleeps).toEqual([10_000, 10_000, 10_000, 10_000, 10_000, 10_000]);
    expect(log).toHaveBeenLastCalledWith("  [create cluster] TIMEOUT after 60s", "stderr");
    expect(progress[progress.length - 1]?.phase).toBe("TIMED_OUT");
  });

  it("clips the last sleep to the operation's own deadline", async () => {
    const { poller, clock } = createPoller();
    const check = jest.fn().mockResolvedValue(pending("PAUSING"));

    await expect(poller.waitFor(operation(check, { timeoutMs: 25_000 }))).rejects.toThrow(
      "Timed out after 25s waiting for create cluster",
    );
    expect(clock.sleeps).toEqual([10_000, 10_000, 5_000]);
  });

  it("uses the operation's own interval", async () => {
    const { poller, clock } = createPoller();
    const check = jest
      .fn()
      .mockResolvedValueOnce(pending("SYNCING"))
      .mockResolvedValueOnce(done("IN_SYNC", true));

    await poller.waitFor(operation(check, { intervalMs: 1_000 }));
    expect(clock.sleeps).toEqual([1_000]);
  });

  it("swallows retryable failures and polls again", async () => {
    const { poller, log } = createPoller();
    const check = jest
      .fn()
      .mockRejectedValueOnce(new TransportError("socket hang up", true))
      .mockRejectedValueOnce(new ApiError("Service Unavailable", 503, "RETRYABLE"))
      .mockResolvedValueOnce(done("SUCCEEDED", "ok"));

    await expect(poller.waitFor(operation(check))).resolves.toBe("ok");
    expect(log).toHaveBeenCalledWith("  [create cluster] RETRY: Request failed: socket hang up", "stdout");
    expect(log).toHaveBeenCalledWith("  [create cluster] RETRY: Request rejected: Service Unavailable", "stdout");
  });

  it("rethrows a fatal failure without polling again", async () => {
    const { poller, log, clock } = createPoller();
    const fatal = new ApiError("Forbidden", 403, "FATAL");
    const check = jest.fn().mockRejectedValue(fatal);

    await expect(poller.waitFor(operation(check))).rejects.toBe(fatal);
    expect(check).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
    expect(log).toHaveBeenCalledWith("  [create cluster] FAILED: Request rejected: Forbidden", "stderr");
  });

  it("turns a failed outcome into an ApiError with the check's message", async () => {
    const { poller, progress } = createPoller();
    const check = jest.fn().mockResolvedValue(failed("FAILED", "The CREATE_CLUSTER task for cluster-1 failed"));

    const error = await poller.waitFor(operation(check)).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      message: "The CREATE_CLUSTER task for cluster-1 failed",
      title: "Could not complete create cluster",
    });
    expect(progress.map((event) => event.phase)).toEqual(["SUBMITTED", "FAILED"]);
  });

  it("ends as a cancelled timeout when the signal is already aborted", async () => {
    const { poller } = createPoller();
    const controller = new AbortController();
    controller.abort();
    const check = jest.fn();

    const error = await poller
      .waitFor(operation(check, { signal: controller.signal }))
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OperationTimeout);
    expect(error).toMatchObject({ cancelled: true });
    expect(check).not.toHaveBeenCalled();
  });

  it("keeps the last status when the signal aborts during a later check", async () => {
    const { poller, progress } = createPoller();
    const controller = new AbortController();
    const check = jest
      .fn()
      .mockResolvedValueOnce(pending("IN_PROGRESS"))
      .mockImplementationOnce(async () => {
        controller.abort();
        return pending("IN_PROGRESS");
      });

    await expect(poller.waitFor(operation(check, { signal: controller.signal }))).rejects.toThrow(
      "Stopped waiting for create cluster: the operation was cancelled",
    );
    expect(check).toHaveBeenCalledTimes(2);
    expect(progress[progress.length - 1]).toMatchObject({ phase: "TIMED_OUT", status: "IN_PROGRESS", attempt: 2 });
  });

  it("cancels a check that is still in flight", async () => {
    const { poller, progress } = createPoller();
    const controller = new AbortController();
    const check = jest.fn((_attempt: number, _signal?: AbortSignal) => new Promise<PollOutcome<void>>(() => undefined));

    const waiting = poller.waitFor(operation(check, { signal: controller.signal }));
    controller.abort();
    const error = await waiting.catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OperationTimeout);
    expect(error).toMatchObject({ cancelled: true, resourceId: "cluster-1", elapsedMs: 0 });
    expect(check).toHaveBeenCalledWith(1, controller.signal);
    expect(progress.map((event) => event.phase)).toEqual(["SUBMITTED", "TIMED_OUT"]);
  });
});

describe("RetryPolicy", () => {
  it("rejects a non-positive interval or duration", () => {
    expect(() => new RetryPolicy(0, 1_000)).toThrow(RangeError);
    expect(() => new RetryPolicy(1_000, -1)).toThrow("Maximum duration must be positive, got -1");
  });

  it("expires once the elapsed time reaches the maximum", () => {
    const clock = new FakeClock(5_000);
    const policy = new RetryPolicy(10_000, 30_000, clock);

    expect(policy.isExpired(0)).toBe(false);
    expect(policy.nextDelay(0)).toBe(10_000);
    expect(policy.withMaxDuration(5_000).isExpired(0)).toBe(true);
    expect(policy.withMaxDuration(8_000).nextDelay(0)).toBe(3_000);
  });
});
