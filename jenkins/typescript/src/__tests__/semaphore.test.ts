import { describe, it, expect } from 'vitest';
import { Semaphore } from '../client/semaphore.js';
import { CrumbManager } from '../client/crumb.js';
import { JenkinsErrorKind } from '../errors.js';

describe('Semaphore', () => {
  it('should never exceed the permit count', async () => {
    const gate = new Semaphore(2);
    let inFlight = 0;
    let peak = 0;
    const task = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
    };

    await Promise.all(Array.from({ length: 6 }, () => gate.run(task)));

    expect(peak).toBe(2);
    expect(inFlight).toBe(0);
  });

  it('should hand a released permit to the oldest waiter', async () => {
    const gate = new Semaphore(1);
    const order: string[] = [];
    await gate.acquire();

    const first = gate.acquire().then(() => order.push('first'));
    const second = gate.acquire().then(() => order.push('second'));
    expect(gate.pending).toBe(2);

    gate.release();
    await first;
    gate.release();
    await second;

    expect(order).toEqual(['first', 'second']);
    expect(gate.pending).toBe(0);
  });

  it('should release the permit when a task throws', async () => {
    const gate = new Semaphore(1);

    await expect(gate.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(gate.run(async () => 'next')).resolves.toBe('next');
  });
});

describe('CrumbManager', () => {
  const issued = (value: string) => ({
    status: 200,
    body: JSON.stringify({ crumb: value, crumbRequestField: 'Jenkins-Crumb' }),
  });

  it('should share one fetch between concurrent callers', async () => {
    let calls = 0;
    const manager = new CrumbManager(async () => {
      calls++;
      return issued('c1');
    });

    const [a, b] = await Promise.all([manager.getOrFetch(), manager.getOrFetch()]);

    expect(calls).toBe(1);
    expect(a).toMatchObject({ field: 'Jenkins-Crumb', value: 'c1' });
    expect(b).toBe(a);
  });

  it('should refetch after invalidation', async () => {
    const values = ['c1', 'c2'];
    const manager = new CrumbManager(async () => issued(values.shift() ?? 'none'));

    await manager.getOrFetch();
    manager.invalidate();

    await expect(manager.getOrFetch()).resolves.toMatchObject({ value: 'c2' });
  });

  it('should refetch once the TTL has passed', async () => {
    const values = ['c1', 'c2'];
    const manager = new CrumbManager(async () => issued(values.shift() ?? 'none'), true, 0);

    await manager.getOrFetch();
    await new Promise((resolve) => setTimeout(resolve, 2));

    await expect(manager.getOrFetch()).resolves.toMatchObject({ value: 'c2' });
  });

  it('should return null without fetching when disabled', async () => {
    let calls = 0;
    const manager = new CrumbManager(async () => {
      calls++;
      return issued('c1');
    }, false);

    await expect(manager.getOrFetch()).resolves.toBeNull();
    expect(calls).toBe(0);
  });

  it('should reject a malformed issuer reply', async () => {
    const manager = new CrumbManager(async () => ({ status: 200, body: '{"crumb":1}' }));

    await expect(manager.getOrFetch()).rejects.toMatchObject({ kind: JenkinsErrorKind.CrumbFetchFailed });
  });
});
