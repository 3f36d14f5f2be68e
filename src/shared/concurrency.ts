/**
 * Concurrency gate for outstanding image-generation requests.
 * One gate is shared by every project in the process; a waiter whose signal
 * aborts leaves the queue without taking a slot.
 */

import { getEnvironment } from '@/config/environment.js';

interface Waiter {
  grant: () => void;
  onAbort: () => void;
}

export class ConcurrencyGate {
  private active = 0;
  private queue: Waiter[] = [];

  constructor(private readonly max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new Error(`Concurrency limit must be a positive integer, got ${max}`);
    }
  }

  get inFlight(): number {
    return this.active;
  }

  get waiting(): number {
    return this.queue.length;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (this.active < this.max) {
      this.active++;
      return;
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', waiter.onAbort);
          resolve();
        },
        onAbort: () => {
          this.queue = this.queue.filter((w) => w !== waiter);
          reject(signal?.reason);
        },
      };
      signal?.addEventListener('abort', waiter.onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // The slot passes straight to the next waiter
      next.grant();
      return;
    }
    this.active = Math.max(0, this.active - 1);
  }

  /**
   * Run `task` holding one slot; the slot is released on completion, failure or abort.
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

let _renderGate: ConcurrencyGate | null = null;

export function getRenderGate(): ConcurrencyGate {
  if (!_renderGate) {
    _renderGate = new ConcurrencyGate(getEnvironment().RENDER_CONCURRENCY);
  }
  return _renderGate;
}

// Test-only helper to reset the singleton between tests
export function resetRenderGateForTests(): void {
  _renderGate = null;
}

/**
 * Map over `items` with at most `limit` tasks in flight. Results keep input order.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  // Workers share one iterator, so each entry is taken exactly once
  const entries = items.entries();

  const worker = async (): Promise<void> => {
    for (const [index, item] of entries) {
      results[index] = await task(item, index);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}
