import { StateDecoratingIterator, compareCursorValues } from './checkpoint-coordinator';
import { CursorTypeMismatchError } from './errors';
import { fromGenerator } from './iterators';
import { toRecordMessage } from './record-mapper';
import { StateManager } from './state';
import type { CursorType, RecordMessage, SourceMessage, SourceRecord } from './types';

const ORDERS = { name: 'orders' };

const recordsOf = (rows: SourceRecord[]) => {
  let closed = false;
  async function* generate(): AsyncGenerator<RecordMessage> {
    for (const row of rows) {
      yield toRecordMessage(ORDERS, row, 0);
    }
  }
  const iterator = fromGenerator(generate(), async () => {
    closed = true;
  });
  return { iterator, closed: () => closed };
};

const decorate = (rows: SourceRecord[], cursorType: CursorType, priorCursor?: string, stateManager = StateManager.fromBlob(null)) =>
  new StateDecoratingIterator(recordsOf(rows).iterator, {
    stream: ORDERS,
    cursorField: 'updated',
    cursorType,
    priorCursor,
    stateManager,
  });

const drain = async (iterator: AsyncIterable<SourceMessage>): Promise<SourceMessage[]> => {
  const messages: SourceMessage[] = [];
  for await (const message of iterator) {
    messages.push(message);
  }
  return messages;
};

const cursorOf = (message: SourceMessage | undefined): string | null | undefined =>
  message?.type === 'STATE' ? message.state.stream.stream_state.cursor : undefined;

describe('StateDecoratingIterator', () => {
  it('forwards records unchanged and emits one state message after the last record', async () => {
    const rows = [
      { id: 1, updated: '2023-01-01' },
      { id: 2, updated: '2023-03-01' },
      { id: 3, updated: '2023-02-01' },
    ];

    const messages = await drain(decorate(rows, 'string'));

    expect(messages.map((message) => message.type)).toEqual(['RECORD', 'RECORD', 'RECORD', 'STATE']);
    expect(messages.slice(0, 3)).toEqual(rows.map((row) => toRecordMessage(ORDERS, row, 0)));
    expect(messages[3]).toEqual({
      type: 'STATE',
      state: {
        type: 'STREAM',
        stream: {
          stream_descriptor: { name: 'orders' },
          stream_state: { cursor_field: ['updated'], cursor: '2023-03-01' },
        },
      },
    });
  });

  it('tracks the maximum numerically rather than lexically', async () => {
    const messages = await drain(decorate([{ updated: 9 }, { updated: 10 }, { updated: 2 }], 'numeric'));

    expect(cursorOf(messages[messages.length - 1])).toBe('10');
  });

  it('keeps the prior cursor text when no records arrive', async () => {
    const messages = await drain(decorate([], 'numeric', '007'));

    expect(messages).toHaveLength(1);
    expect(cursorOf(messages[0])).toBe('007');
  });

  it('emits a null cursor when there is neither a prior cursor nor a record', async () => {
    const messages = await drain(decorate([], 'string'));

    expect(messages).toHaveLength(1);
    expect(cursorOf(messages[0])).toBeNull();
  });

  it('does not let records without the cursor attribute move the checkpoint', async () => {
    const messages = await drain(decorate([{ updated: 5 }, { id: 9 }, { updated: null }], 'numeric'));

    expect(cursorOf(messages[messages.length - 1])).toBe('5');
  });

  it('fails fast on a cursor value of the wrong type', async () => {
    const iterator = decorate([{ updated: '2023-01-01' }], 'numeric');

    await expect(iterator.next()).rejects.toThrow(CursorTypeMismatchError);
  });

  it('is done after the state message', async () => {
    const iterator = decorate([{ updated: 'a' }], 'string');

    await iterator.next();
    await iterator.next();

    await expect(iterator.next()).resolves.toEqual({ done: true, value: undefined });
    await expect(iterator.next()).resolves.toEqual({ done: true, value: undefined });
  });

  it('emits no state when closed before the records run out', async () => {
    const source = recordsOf([{ updated: 'a' }, { updated: 'b' }]);
    const stateManager = StateManager.fromBlob(null);
    const iterator = new StateDecoratingIterator(source.iterator, {
      stream: ORDERS,
      cursorField: 'updated',
      cursorType: 'string',
      stateManager,
    });

    await iterator.next();
    await iterator.close();

    await expect(iterator.next()).resolves.toEqual({ done: true, value: undefined });
    expect(source.closed()).toBe(true);
    expect(stateManager.getCursorInfo(ORDERS)).toBeUndefined();
  });

  it('ends without a state message when the scan fails', async () => {
    const stateManager = StateManager.fromBlob(null);
    async function* failing(): AsyncGenerator<RecordMessage> {
      yield toRecordMessage(ORDERS, { updated: '2023-03-01' }, 0);
      throw new Error('socket hang up');
    }
    const iterator = new StateDecoratingIterator(fromGenerator(failing()), {
      stream: ORDERS,
      cursorField: 'updated',
      cursorType: 'string',
      stateManager,
    });

    await expect(iterator.next()).resolves.toMatchObject({ done: false, value: { type: 'RECORD' } });
    await expect(iterator.next()).rejects.toThrow('socket hang up');
    await expect(iterator.next()).resolves.toEqual({ done: true, value: undefined });
    expect(stateManager.getCursorInfo(ORDERS)).toBeUndefined();
  });

  it('keeps integer cursors beyond double precision exact', async () => {
    const rows = [{ updated: 1700000000000000001n }, { updated: 1700000000000000000n }, { updated: 999 }];

    const messages = await drain(decorate(rows, 'numeric'));

    expect(cursorOf(messages[messages.length - 1])).toBe('1700000000000000001');
  });

  it('orders string cursors the way the store does', async () => {
    const messages = await drain(decorate([{ updated: '\u{1F600}' }, { updated: '\uE000' }], 'string'));

    expect(cursorOf(messages[messages.length - 1])).toBe('\u{1F600}');
  });

  it('advances the state manager only when the state message is emitted', async () => {
    const stateManager = StateManager.fromBlob(null);
    const iterator = decorate([{ updated: 'a' }], 'string', undefined, stateManager);

    await iterator.next();
    expect(stateManager.getCursorInfo(ORDERS)).toBeUndefined();

    await iterator.next();
    expect(stateManager.getCursorInfo(ORDERS)).toEqual({ cursorField: 'updated', cursor: 'a' });
  });
});

describe('compareCursorValues', () => {
  it('orders values of the same type', () => {
    expect(compareCursorValues('a', 'b')).toBe(-1);
    expect(compareCursorValues(10, 9)).toBe(1);
    expect(compareCursorValues(3, 3)).toBe(0);
  });

  it('compares strings by their UTF-8 bytes', () => {
    expect(compareCursorValues('\u{1F600}', '\uE000')).toBe(1);
    expect(compareCursorValues('\uE000', '\u{1F600}')).toBe(-1);
  });

  it('compares bigints with numbers', () => {
    expect(compareCursorValues(9007199254740993n, 9007199254740992)).toBe(1);
    expect(compareCursorValues(5, 5n)).toBe(0);
  });

  it('refuses to compare across types', () => {
    expect(() => compareCursorValues('10', 9)).toThrow(TypeError);
  });
});
