import { KeyedMutex } from './keyed-mutex';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('KeyedMutex', () => {
  it('runs tasks on the same key one at a time, in arrival order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const slow = mutex.runExclusive('char42', async () => {
      events.push('a:start');
      await tick();
      await tick();
      events.push('a:end');
      return 'a';
    });
    const fast = mutex.runExclusive('char42', async () => {
      events.push('b:start');
      events.push('b:end');
      return 'b';
    });

    await expect(Promise.all([slow, fast])).resolves.toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('does not block tasks on other keys', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = mutex.runExclusive('char1', async () => {
      await gate;
      events.push('char1');
    });
    await mutex.runExclusive('char2', async () => {
      events.push('char2');
    });
    releaseFirst();
    await first;

    expect(events).toEqual(['char2', 'char1']);
  });

  it('releases the key when a task throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('char42', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('char42', async () => 'next')).resolves.toBe('next');
    expect(mutex.size).toBe(0);
  });
});
