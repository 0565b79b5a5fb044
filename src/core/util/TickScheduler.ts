/**
 * Cancellable waiting for timer-driven loops.
 *
 * Loops take a scheduler instead of calling timers directly so that tests
 * can step time by hand with {@link ManualTickScheduler}.
 */

import { setTimeout as delay } from "timers/promises";

export interface TickScheduler {
  /**
   * Resolve after `ms` milliseconds. Rejects with an AbortError as soon as
   * `signal` aborts.
   */
  wait(ms: number, signal: AbortSignal): Promise<void>;
}

export const timerScheduler: TickScheduler = {
  wait: (ms, signal) => delay(ms, undefined, { signal }),
};

function abortError(): Error {
  const error = new Error("The operation was aborted");
  error.name = "AbortError";
  return error;
}

interface PendingWait {
  due: number;
  resolve: () => void;
  detach: () => void;
}

/** Yield until every queued microtask and promise continuation has run. */
function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * A scheduler driven by {@link advance}. It doubles as a clock reporting
 * its own simulated time.
 */
export class ManualTickScheduler implements TickScheduler {
  private time: number;
  private pending: PendingWait[] = [];

  constructor(startTime: number = 0) {
    this.time = startTime;
  }

  now(): number {
    return this.time;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  wait(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(abortError());
        return;
      }

      const onAbort = () => {
        this.pending = this.pending.filter((w) => w !== entry);
        reject(abortError());
      };
      const entry: PendingWait = {
        due: this.time + ms,
        resolve,
        detach: () => signal.removeEventListener("abort", onAbort),
      };

      signal.addEventListener("abort", onAbort, { once: true });
      this.pending.push(entry);
    });
  }

  /**
   * Move time forward, releasing due waits one at a time in due order and
   * letting each woken loop run until it waits again.
   */
  async advance(ms: number): Promise<void> {
    const target = this.time + ms;
    await flush();

    for (;;) {
      let next: PendingWait | null = null;
      for (const w of this.pending) {
        if (w.due <= target && (next === null || w.due < next.due)) next = w;
      }
      if (next === null) break;

      this.pending = this.pending.filter((w) => w !== next);
      this.time = next.due;
      next.detach();
      next.resolve();
      await flush();
    }

    this.time = target;
  }
}
