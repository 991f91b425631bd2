/**
 * Async iterator with an explicit close operation.
 * Closing is idempotent and releases whatever the iterator holds,
 * whether or not iteration ever started.
 */
export interface CloseableIterator<T> extends AsyncIterableIterator<T> {
  next(): Promise<IteratorResult<T, undefined>>;
  return(): Promise<IteratorResult<T, undefined>>;
  close(): Promise<void>;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

const closeAll = async (closers: ReadonlyArray<() => Promise<void>>, label: string): Promise<void> => {
  const errors: unknown[] = [];
  for (const closer of closers) {
    try {
      await closer();
    } catch (err) {
      errors.push(err);
    }
  }

  if (errors.length === 1) throw errors[0];
  if (errors.length > 1) throw new AggregateError(errors, `Failed to close ${label}`);
};

class GeneratorIterator<T> implements CloseableIterator<T> {
  private closed = false;

  constructor(
    private readonly source: AsyncGenerator<T, unknown, undefined>,
    private readonly onClose?: () => Promise<void>
  ) {}

  async next(): Promise<IteratorResult<T, undefined>> {
    if (this.closed) return DONE;

    let result: IteratorResult<T, unknown>;
    try {
      result = await this.source.next();
    } catch (err) {
      await this.close();
      throw err;
    }

    if (result.done) {
      await this.close();
      return DONE;
    }
    return { done: false, value: result.value };
  }

  async return(): Promise<IteratorResult<T, undefined>> {
    await this.close();
    return DONE;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const closers: Array<() => Promise<void>> = [
      async () => {
        await this.source.return(undefined);
      },
    ];
    if (this.onClose) closers.push(this.onClose);
    await closeAll(closers, 'generator');
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}

/**
 * Wrap an async generator. The generator body does not run until the first
 * `next()`, so wrapping is free of side effects.
 */
export const fromGenerator = <T>(
  generator: AsyncGenerator<T, unknown, undefined>,
  onClose?: () => Promise<void>
): CloseableIterator<T> => new GeneratorIterator(generator, onClose);

class ConcatIterator<T> implements CloseableIterator<T> {
  private index = 0;
  private closed = false;

  constructor(
    private readonly iterators: ReadonlyArray<CloseableIterator<T>>,
    private readonly onClose?: () => Promise<void>
  ) {}

  async next(): Promise<IteratorResult<T, undefined>> {
    while (!this.closed && this.index < this.iterators.length) {
      const current = this.iterators[this.index];

      let result: IteratorResult<T, undefined>;
      try {
        result = await current.next();
      } catch (err) {
        await this.close();
        throw err;
      }

      if (!result.done) return result;
      this.index++;
    }

    await this.close();
    return DONE;
  }

  async return(): Promise<IteratorResult<T, undefined>> {
    await this.close();
    return DONE;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const closers = this.iterators.map((iterator) => () => iterator.close());
    if (this.onClose) closers.push(this.onClose);
    await closeAll(closers, `${this.iterators.length} concatenated iterators`);
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}

/**
 * Concatenate iterators, draining each one fully before starting the next.
 * Exhaustion, a failure in any constituent, or an early close closes every
 * constituent and then runs `onClose`.
 */
export const concatWithEagerClose = <T>(
  iterators: ReadonlyArray<CloseableIterator<T>>,
  onClose?: () => Promise<void>
): CloseableIterator<T> => new ConcatIterator(iterators, onClose);
