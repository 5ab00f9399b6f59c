import { describe, it, expect } from 'vitest';
import { AsyncQueue, QueueAbortedError } from '../../src/bus/async-queue.js';
import { isAbortError } from '../../src/bridge/errors.js';

describe('AsyncQueue', () => {
  it('should deliver items in publish order', async () => {
    const q = new AsyncQueue<string>();
    await q.publish('a');
    await q.publish('b');
    await q.publish('c');
    expect([await q.consume(), await q.consume(), await q.consume()]).toEqual(['a', 'b', 'c']);
  });

  it('should hand an item straight to a waiting consumer', async () => {
    const q = new AsyncQueue<string>();
    const waiting = q.consume();
    expect(q.pending).toBe(1);

    await q.publish('hello');
    expect(await waiting).toBe('hello');
    expect(q.size).toBe(0);
    expect(q.pending).toBe(0);
  });

  it('should serve waiting consumers first come first served', async () => {
    const q = new AsyncQueue<number>();
    const first = q.consume();
    const second = q.consume();
    await q.publish(1);
    await q.publish(2);
    expect(await first).toBe(1);
    expect(await second).toBe(2);
  });

  it('should block a publisher while full and release it on consume', async () => {
    const q = new AsyncQueue<number>(2);
    await q.publish(1);
    await q.publish(2);

    let published = false;
    const blocked = q.publish(3).then(() => { published = true; });

    await new Promise(r => setTimeout(r, 10));
    expect(published).toBe(false);
    expect(q.size).toBe(2);

    expect(await q.consume()).toBe(1);
    await blocked;
    expect(published).toBe(true);
    expect(await q.consume()).toBe(2);
    expect(await q.consume()).toBe(3);
  });

  it('should reject a waiting consumer with an abort error', async () => {
    const q = new AsyncQueue<number>();
    const ac = new AbortController();

    const waiting = q.consume(ac.signal);
    ac.abort();

    await expect(waiting).rejects.toBeInstanceOf(QueueAbortedError);
    expect(q.pending).toBe(0);
  });

  it('should reject a blocked publisher when aborted', async () => {
    const q = new AsyncQueue<number>(1);
    await q.publish(1);

    const ac = new AbortController();
    const blocked = q.publish(2, ac.signal);
    ac.abort();

    await expect(blocked).rejects.toThrow('Aborted');
    expect(q.size).toBe(1);
  });

  it('should fail fast on an already aborted signal', async () => {
    const q = new AsyncQueue<number>();
    const ac = new AbortController();
    ac.abort();

    const err: unknown = await q.consume(ac.signal).catch((e: unknown) => e);
    expect(isAbortError(err)).toBe(true);
    await expect(q.publish(1, ac.signal)).rejects.toThrow();
    expect(q.size).toBe(0);
  });

  it('should hand back what is left on drain and release blocked publishers', async () => {
    const q = new AsyncQueue<number>(2);
    await q.publish(1);
    await q.publish(2);
    const blocked = q.publish(3);

    expect(q.drain()).toEqual([1, 2]);
    expect(q.size).toBe(0);
    await expect(blocked).rejects.toBeInstanceOf(QueueAbortedError);
  });

  it('should detach from a shared signal once served', async () => {
    const q = new AsyncQueue<number>();
    const ac = new AbortController();

    const waiting = q.consume(ac.signal);
    await q.publish(1);
    expect(await waiting).toBe(1);

    // A later abort must not disturb the queue
    ac.abort();
    await q.publish(2);
    expect(q.size).toBe(1);
    expect(await q.consume()).toBe(2);
  });
});
