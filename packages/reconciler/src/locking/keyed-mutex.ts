/**
 * Keyed Mutex
 *
 * Serializes work per resource key inside one process. Passes on different
 * keys run concurrently; passes on the same key queue in arrival order.
 * The engine itself never locks; callers that may run passes concurrently
 * take a lease here first.
 */

import { v4 as uuidv4 } from "uuid";

export interface LockLease {
  /** Unique per acquisition */
  id: string;
  key: string;
  acquiredAt: Date;
  release(): void;
}

interface KeyQueue {
  holder: string | null;
  waiters: Array<() => void>;
}

export class KeyedMutex {
  private readonly queues = new Map<string, KeyQueue>();

  /** Resolves once `key` is free; the lease must be released exactly once. */
  async acquire(key: string): Promise<LockLease> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = { holder: null, waiters: [] };
      this.queues.set(key, queue);
    }

    if (queue.holder !== null) {
      const waiting = queue;
      await new Promise<void>((resolve) => waiting.waiters.push(resolve));
    }

    const id = uuidv4();
    queue.holder = id;
    let released = false;

    return {
      id,
      key,
      acquiredAt: new Date(),
      release: () => {
        if (released) return;
        released = true;
        this.handOff(key, id);
      },
    };
  }

  async withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
    const lease = await this.acquire(key);
    try {
      return await work();
    } finally {
      lease.release();
    }
  }

  isLocked(key: string): boolean {
    return (this.queues.get(key)?.holder ?? null) !== null;
  }

  /** Number of acquisitions waiting on `key`, not counting the holder. */
  pending(key: string): number {
    return this.queues.get(key)?.waiters.length ?? 0;
  }

  private handOff(key: string, id: string): void {
    const queue = this.queues.get(key);
    if (!queue || queue.holder !== id) return;

    const next = queue.waiters.shift();
    if (next) {
      // the woken waiter sets itself as holder; keep the slot taken until then
      queue.holder = "";
      next();
    } else {
      this.queues.delete(key);
    }
  }
}
