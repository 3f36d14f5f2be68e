import { describe, it, expect } from '@jest/globals';
import { ConcurrencyGate, runWithConcurrency } from '@/shared/concurrency';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ConcurrencyGate', () => {
  it('never runs more tasks than its limit', async () => {
    const gate = new ConcurrencyGate(2);
    const releases = [deferred(), deferred(), deferred()];
    let peak = 0;
    let running = 0;

    const tasks = releases.map((release) =>
      gate.run(async () => {
        running++;
        peak = Math.max(peak, running);
        await release.promise;
        running--;
      }),
    );
    await Promise.resolve();

    expect(gate.inFlight).toBe(2);
    expect(gate.waiting).toBe(1);
    releases.forEach((r) => r.resolve());
    await Promise.all(tasks);

    expect(peak).toBe(2);
    expect(gate.inFlight).toBe(0);
  });

  it('removes an aborted waiter without taking a slot', async () => {
    const gate = new ConcurrencyGate(1);
    const hold = deferred();
    const first = gate.run(() => hold.promise);
    const controller = new AbortController();

    const second = gate.run(async () => 'never', controller.signal);
    controller.abort(new Error('cancelled'));

    await expect(second).rejects.toThrow('cancelled');
    expect(gate.waiting).toBe(0);
    hold.resolve();
    await first;
    expect(gate.inFlight).toBe(0);
  });

  it('releases the slot when a task fails', async () => {
    const gate = new ConcurrencyGate(1);

    await expect(gate.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(gate.run(async () => 'next')).resolves.toBe('next');
  });

  it('rejects a limit below one', () => {
    expect(() => new ConcurrencyGate(0)).toThrow('Concurrency limit must be a positive integer, got 0');
  });
});

describe('runWithConcurrency', () => {
  it('keeps input order and respects the limit', async () => {
    let running = 0;
    let peak = 0;

    const results = await runWithConcurrency([30, 10, 20, 0], 2, async (ms, index) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, ms));
      running--;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30]);
    expect(peak).toBe(2);
  });
});
