import { expect, test } from 'vitest';
import { createKeyedLock } from './create-keyed-lock.ts';

interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

function createDeferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

test('it runs tasks under the same key one after another', async () => {
  const lock = createKeyedLock();
  const gate = createDeferred();
  const events: string[] = [];

  const first = lock.run('a.txt', async () => {
    events.push('first:start');
    await gate.promise;
    events.push('first:end');
    return 1;
  });
  const second = lock.run('a.txt', async () => {
    events.push('second:start');
    return 2;
  });

  await Promise.resolve();
  await Promise.resolve();
  expect(events).toStrictEqual(['first:start']);

  gate.resolve();

  expect(await Promise.all([first, second])).toStrictEqual([1, 2]);
  expect(events).toStrictEqual(['first:start', 'first:end', 'second:start']);
});

test('it runs tasks under different keys concurrently', async () => {
  const lock = createKeyedLock();
  const gate = createDeferred();
  const events: string[] = [];

  const first = lock.run('a.txt', async () => {
    await gate.promise;
    events.push('a');
  });
  const second = lock.run('b.txt', async () => {
    events.push('b');
  });

  await second;
  expect(events).toStrictEqual(['b']);

  gate.resolve();
  await first;
  expect(events).toStrictEqual(['b', 'a']);
});

test('it keeps running queued tasks after one fails', async () => {
  const lock = createKeyedLock();

  const failing = lock.run('a.txt', async () => {
    throw new Error('write failed');
  });
  const next = lock.run('a.txt', async () => 'written');

  await expect(failing).rejects.toThrow('write failed');
  await expect(next).resolves.toBe('written');
});
