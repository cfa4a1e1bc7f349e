import { KeyedMutex } from '../keyed-mutex.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs tasks on the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('doc', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = mutex.runExclusive('doc', async () => {
      events.push('second:start');
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not block tasks on other keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const blocked = mutex.runExclusive('a', async () => {
      await gate.promise;
      events.push('a');
    });
    await mutex.runExclusive('b', async () => {
      events.push('b');
    });

    expect(events).toEqual(['b']);
    gate.resolve();
    await blocked;
    expect(events).toEqual(['b', 'a']);
  });

  it('keeps going after a failed task and releases the key', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('doc', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive('doc', async () => 7)).resolves.toBe(7);
    expect(mutex.isLocked('doc')).toBe(false);
  });
});
