import { concatWithEagerClose, fromGenerator, type CloseableIterator } from './iterators';

const drain = async <T>(iterator: CloseableIterator<T>): Promise<T[]> => {
  const values: T[] = [];
  for await (const value of iterator) {
    values.push(value);
  }
  return values;
};

type Tracked = {
  iterator: CloseableIterator<number>;
  started: () => boolean;
  closes: () => number;
};

const tracked = (values: number[], failAfter?: number): Tracked => {
  let started = false;
  let closes = 0;

  async function* generate() {
    started = true;
    for (const [index, value] of values.entries()) {
      if (failAfter !== undefined && index >= failAfter) {
        throw new Error(`boom after ${failAfter}`);
      }
      yield value;
    }
  }

  const iterator = fromGenerator(generate(), async () => {
    closes++;
  });
  return { iterator, started: () => started, closes: () => closes };
};

describe('fromGenerator', () => {
  it('runs the close hook once when the generator is exhausted', async () => {
    const source = tracked([1, 2]);

    expect(await drain(source.iterator)).toEqual([1, 2]);
    await source.iterator.close();

    expect(source.closes()).toBe(1);
  });

  it('does not start the generator until the first value is pulled', async () => {
    const source = tracked([1]);

    await source.iterator.close();

    expect(source.started()).toBe(false);
    expect(source.closes()).toBe(1);
    await expect(source.iterator.next()).resolves.toEqual({ done: true, value: undefined });
  });

  it('closes and rethrows when the generator fails', async () => {
    const source = tracked([1, 2, 3], 1);

    await expect(source.iterator.next()).resolves.toEqual({ done: false, value: 1 });
    await expect(source.iterator.next()).rejects.toThrow('boom after 1');
    expect(source.closes()).toBe(1);
  });
});

describe('concatWithEagerClose', () => {
  it('drains constituents in order and closes everything at the end', async () => {
    const first = tracked([1, 2]);
    const second = tracked([3]);
    let released = 0;

    const merged = concatWithEagerClose([first.iterator, second.iterator], async () => {
      released++;
    });

    expect(await drain(merged)).toEqual([1, 2, 3]);
    expect(first.closes()).toBe(1);
    expect(second.closes()).toBe(1);
    expect(released).toBe(1);
  });

  it('does not start the next constituent before the current one is exhausted', async () => {
    const first = tracked([1, 2]);
    const second = tracked([3]);
    const merged = concatWithEagerClose([first.iterator, second.iterator]);

    await merged.next();
    await merged.next();

    expect(second.started()).toBe(false);
  });

  it('closes started and unstarted constituents when the consumer stops early', async () => {
    const first = tracked([1, 2]);
    const second = tracked([3]);
    let released = 0;
    const merged = concatWithEagerClose([first.iterator, second.iterator], async () => {
      released++;
    });

    for await (const value of merged) {
      if (value === 1) break;
    }

    expect(first.closes()).toBe(1);
    expect(second.closes()).toBe(1);
    expect(second.started()).toBe(false);
    expect(released).toBe(1);
  });

  it('keeps values already delivered when a later constituent fails, then closes everything', async () => {
    const first = tracked([1, 2]);
    const second = tracked([3, 4], 1);
    const third = tracked([5]);
    let released = 0;
    const merged = concatWithEagerClose([first.iterator, second.iterator, third.iterator], async () => {
      released++;
    });

    const seen: number[] = [];
    await expect(
      (async () => {
        for await (const value of merged) {
          seen.push(value);
        }
      })()
    ).rejects.toThrow('boom after 1');

    expect(seen).toEqual([1, 2, 3]);
    expect(third.started()).toBe(false);
    expect(third.closes()).toBe(1);
    expect(released).toBe(1);
  });

  it('is idempotent on close', async () => {
    let released = 0;
    const merged = concatWithEagerClose([tracked([1]).iterator], async () => {
      released++;
    });

    await merged.close();
    await merged.close();

    expect(released).toBe(1);
  });

  it('still runs the release hook when a constituent fails to close, then reports the failure', async () => {
    let released = 0;
    const failing = fromGenerator(
      (async function* () {
        yield 1;
      })(),
      async () => {
        throw new Error('close failed');
      }
    );
    const merged = concatWithEagerClose([failing], async () => {
      released++;
    });

    await expect(merged.close()).rejects.toThrow('close failed');
    expect(released).toBe(1);
  });
});
