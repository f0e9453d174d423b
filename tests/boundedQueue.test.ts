import assert from 'node:assert/strict';
import { test } from './testHarness';
import { BoundedQueue } from '../src/shared/queue/boundedQueue';
import { isAbortError } from '../src/domain/errors';

test('bounded queue rejects pushes beyond capacity', () => {
  const queue = new BoundedQueue<number>(2);
  assert.equal(queue.tryPush(1), true);
  assert.equal(queue.tryPush(2), true);
  assert.equal(queue.tryPush(3), false);
  assert.deepEqual(queue.snapshot(), [1, 2]);
  assert.equal(queue.tryShift(), 1);
  assert.equal(queue.tryShift(), 2);
  assert.equal(queue.tryShift(), undefined);
});

test('bounded queue evicts the oldest item when asked', () => {
  const queue = new BoundedQueue<string>(2);
  queue.tryPush('a');
  queue.tryPush('b');
  const result = queue.pushEvictingOldest('c');
  assert.deepEqual(result, { accepted: true, evicted: 'a' });
  assert.deepEqual(queue.snapshot(), ['b', 'c']);
});

test('bounded queue capacity must be positive', () => {
  assert.throws(() => new BoundedQueue<number>(0), RangeError);
  assert.throws(() => new BoundedQueue<number>(1.5), RangeError);
});

test('take hands a later push straight to the waiting consumer', async () => {
  const queue = new BoundedQueue<number>(1);
  const pending = queue.take(new AbortController().signal);
  assert.equal(queue.tryPush(7), true);
  assert.deepEqual(await pending, { kind: 'item', item: 7 });
  assert.equal(queue.size, 0);
});

test('take reports a timeout when nothing arrives', async () => {
  const queue = new BoundedQueue<number>(1);
  const result = await queue.take(new AbortController().signal, 10);
  assert.deepEqual(result, { kind: 'timeout' });
  assert.equal(queue.tryPush(1), true);
  assert.equal(queue.size, 1);
});

test('take rejects with an abort error when cancelled', async () => {
  const queue = new BoundedQueue<number>(1);
  const controller = new AbortController();
  const pending = queue.take(controller.signal);
  controller.abort();
  await assert.rejects(pending, (error: unknown) => isAbortError(error));
  assert.equal(queue.tryPush(5), true);
  assert.equal(queue.tryShift(), 5);
});

test('drain empties the queue in order', () => {
  const queue = new BoundedQueue<number>(3);
  queue.tryPush(1);
  queue.tryPush(2);
  assert.deepEqual(queue.drain(), [1, 2]);
  assert.equal(queue.isEmpty(), true);
});
