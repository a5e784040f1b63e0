import { KeyedMutex, processInBatches } from '../../src';

describe('KeyedMutex', () => {
  it('should run tasks under the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = mutex.runExclusive('a', async () => {
      events.push('first:start');
      await gate;
      events.push('first:end');
    });
    const second = mutex.runExclusive('a', async () => {
      events.push('second');
    });

    await Promise.resolve();
    expect(mutex.isLocked('a')).toBe(true);
    release();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.size).toBe(0);
  });

  it('should not block other keys', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const slow = mutex.runExclusive('a', async () => {
      await gate;
      events.push('a');
    });
    await mutex.runExclusive('b', async () => {
      events.push('b');
    });
    release();
    await slow;

    expect(events).toEqual(['b', 'a']);
  });

  it('should keep serving a key after a task fails', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('a', () => Promise.reject(new Error('boom'))),
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive('a', async () => 42)).resolves.toBe(42);
  });
});

describe('processInBatches', () => {
  it('should never run more than the batch size at once', async () => {
    let running = 0;
    let peak = 0;

    await processInBatches([1, 2, 3, 4, 5], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 1));
      running--;
    });

    expect(peak).toBe(2);
  });

  it('should finish the batch before rethrowing the first failure', async () => {
    const done: number[] = [];

    await expect(
      processInBatches([1, 2, 3], 2, async (item) => {
        if (item === 1) {
          throw new Error('item 1 failed');
        }
        done.push(item);
      }),
    ).rejects.toThrow('item 1 failed');

    expect(done).toEqual([2]);
  });
});
