import { describe, expect, it } from 'vitest';

import { RawOutputQueue } from '../src/core/session/queue.js';

describe('RawOutputQueue', () => {
  it('returns queued values in order', async () => {
    const q = new RawOutputQueue<string>();
    q.push('a');
    q.push('b');
    expect(q.size).toBe(2);
    expect(await q.receive(10)).toBe('a');
    expect(await q.receive(10)).toBe('b');
    expect(q.size).toBe(0);
  });

  it('hands a pushed value straight to a waiting receiver', async () => {
    const q = new RawOutputQueue<string>();
    const pending = q.receive(1_000);
    q.push('late');
    expect(await pending).toBe('late');
    expect(q.size).toBe(0);
  });

  it('resolves undefined when nothing arrives in time', async () => {
    const q = new RawOutputQueue<string>();
    expect(await q.receive(5)).toBeUndefined();
    q.push('after');
    expect(await q.receive(5)).toBe('after');
  });

  it('drains without waiting', () => {
    const q = new RawOutputQueue<string>();
    q.push('x');
    q.push('y');
    expect(q.drain()).toEqual(['x', 'y']);
    expect(q.drain()).toEqual([]);
  });

  it('wakes waiters on close and ignores later pushes', async () => {
    const q = new RawOutputQueue<string>();
    const pending = q.receive(1_000);
    q.close();
    expect(await pending).toBeUndefined();
    q.push('ignored');
    expect(q.size).toBe(0);
    expect(q.isClosed).toBe(true);
    expect(await q.receive(1_000)).toBeUndefined();
  });
});
