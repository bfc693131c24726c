/**
 * Command send queue tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { SendQueue } from '../src/SendQueue.ts';
import { ConnectionError } from '../src/errors.ts';

describe('SendQueue', () => {
  it('should write commands at once while under the limit', async () => {
    const written: string[] = [];
    const queue = new SendQueue((text) => written.push(text), { limit: 3, windowMs: 1000 });

    await Promise.all([queue.enqueue('a'), queue.enqueue('b')]);
    assert.deepStrictEqual(written, ['a', 'b']);
    assert.strictEqual(queue.pending, 0);
    queue.reset();
  });

  it('should hold commands over the limit until the window slides', async () => {
    const written: string[] = [];
    const queue = new SendQueue((text) => written.push(text), { limit: 2, windowMs: 50 });

    const start = Date.now();
    const sends = [queue.enqueue('a'), queue.enqueue('b'), queue.enqueue('c')];
    assert.deepStrictEqual(written, ['a', 'b']);
    assert.strictEqual(queue.pending, 1);

    await Promise.all(sends);
    assert.deepStrictEqual(written, ['a', 'b', 'c']);
    assert.ok(Date.now() - start >= 45, `third command sent after ${Date.now() - start}ms`);
  });

  it('should write protocol frames ahead of a full window', () => {
    const written: string[] = [];
    const queue = new SendQueue((text) => written.push(text), { limit: 1, windowMs: 60000 });

    void queue.enqueue('command').catch(() => {});
    const held = queue.enqueue('held');
    held.catch(() => {});
    queue.sendNow('heartbeat');

    assert.deepStrictEqual(written, ['command', 'heartbeat']);
    queue.reset();
  });

  it('should reject queued commands on reset', async () => {
    const queue = new SendQueue(() => {}, { limit: 1, windowMs: 60000 });
    await queue.enqueue('first');
    const held = queue.enqueue('second');

    queue.reset('Shard 0 connection closed');
    await assert.rejects(held, (err: Error) => {
      assert.ok(err instanceof ConnectionError);
      assert.strictEqual(err.message, 'Shard 0 connection closed');
      return true;
    });
    assert.strictEqual(queue.pending, 0);
  });

  it('should keep the send window when only queued commands are dropped', async () => {
    const written: string[] = [];
    const queue = new SendQueue((text) => written.push(text), { limit: 1, windowMs: 60000 });
    await queue.enqueue('first');
    const held = queue.enqueue('second');

    queue.rejectPending('Shard 0 session invalidated');
    await assert.rejects(held, { message: 'Shard 0 session invalidated' });

    const later = queue.enqueue('third');
    later.catch(() => {});
    assert.deepStrictEqual(written, ['first']);
    assert.strictEqual(queue.pending, 1);
    queue.reset();
  });

  it('should reject a command whose write fails', async () => {
    const queue = new SendQueue(() => {
      throw new ConnectionError('Shard 0 is not connected');
    });
    await assert.rejects(queue.enqueue('x'), { message: 'Shard 0 is not connected' });
  });
});
