import { parseCursorText } from './cursor-type';
import { CursorTypeMismatchError } from './errors';
import type { CloseableIterator } from './iterators';
import type { StateManager } from './state';
import type { CursorType, JsonValue, RecordMessage, SourceMessage, StreamPair } from './types';

type Phase = 'streaming' | 'emit_checkpoint' | 'done';

type CursorValue = string | number | bigint;

type RetainedCursor = {
  value: CursorValue;
  /** Text written to state; a prior cursor keeps its original spelling */
  text: string;
};

export type StateDecoratingOptions = {
  stream: StreamPair;
  cursorField: string;
  cursorType: CursorType;
  priorCursor?: string;
  stateManager: StateManager;
};

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

const isNumeric = (value: CursorValue): value is number | bigint =>
  typeof value === 'number' || typeof value === 'bigint';

/**
 * Order two cursor values of the same resolved type; negative when `a` sorts
 * first. Strings are ordered by their UTF-8 bytes, as the store orders them.
 */
export const compareCursorValues = (a: CursorValue, b: CursorValue): number => {
  if (typeof a === 'string' && typeof b === 'string') {
    return Math.sign(Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8')));
  }
  if (isNumeric(a) && isNumeric(b)) {
    if (a < b) return -1;
    return a > b ? 1 : 0;
  }
  throw new TypeError(`Cannot compare cursor values of different types: ${typeof a} and ${typeof b}`);
};

/**
 * Forwards a stream's records unchanged while tracking the largest cursor
 * value, then emits exactly one state message once the records run out.
 *
 * streaming → emit_checkpoint → done
 */
export class StateDecoratingIterator implements CloseableIterator<SourceMessage> {
  private phase: Phase = 'streaming';
  private max: RetainedCursor | undefined;

  constructor(
    private readonly records: CloseableIterator<RecordMessage>,
    private readonly options: StateDecoratingOptions
  ) {
    const { stream, cursorField, cursorType, priorCursor } = options;
    if (priorCursor !== undefined) {
      this.max = { value: parseCursorText(stream.name, cursorField, cursorType, priorCursor), text: priorCursor };
    }
  }

  async next(): Promise<IteratorResult<SourceMessage, undefined>> {
    switch (this.phase) {
      case 'streaming': {
        let result: IteratorResult<RecordMessage, undefined>;
        try {
          result = await this.records.next();
          if (!result.done) {
            this.observe(result.value.record.data[this.options.cursorField]);
          }
        } catch (err) {
          // a failed scan never checkpoints
          await this.close();
          throw err;
        }

        if (!result.done) {
          return { done: false, value: result.value };
        }
        this.phase = 'emit_checkpoint';
        return this.next();
      }
      case 'emit_checkpoint': {
        this.phase = 'done';
        const { stream, cursorField, stateManager } = this.options;
        return { done: false, value: stateManager.emit(stream, cursorField, this.max?.text ?? null) };
      }
      case 'done':
        return DONE;
    }
  }

  async return(): Promise<IteratorResult<SourceMessage, undefined>> {
    await this.close();
    return DONE;
  }

  async close(): Promise<void> {
    this.phase = 'done';
    await this.records.close();
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  private toCursorValue(value: JsonValue): CursorValue {
    const { stream, cursorField, cursorType } = this.options;
    if (cursorType === 'string' && typeof value === 'string') return value;
    if (cursorType === 'numeric' && (typeof value === 'number' || typeof value === 'bigint')) return value;
    throw new CursorTypeMismatchError(stream.name, cursorField, cursorType, value);
  }

  private observe(raw: JsonValue | undefined): void {
    // rows without the cursor attribute do not move the checkpoint
    if (raw === undefined || raw === null) return;

    const value = this.toCursorValue(raw);
    // ties keep the later value
    if (this.max === undefined || compareCursorValues(value, this.max.value) >= 0) {
      this.max = { value, text: String(value) };
    }
  }
}
