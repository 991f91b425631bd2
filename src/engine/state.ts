import { z } from 'zod';
import { ConfigError } from './errors';
import type { CursorState, StateMessage, StreamPair, StreamState } from './types';

// Numeric cursors may have been saved as JSON numbers; they are kept as text
const CursorSchema = z.union([z.string(), z.number().transform(String)]).nullable().optional();

const StreamDescriptorSchema = z.object({
  name: z.string().min(1),
  namespace: z.string().nullable().optional(),
});

const PerStreamStateSchema = z.object({
  type: z.literal('STREAM'),
  stream: z.object({
    stream_descriptor: StreamDescriptorSchema,
    stream_state: z.object({
      cursor_field: z.array(z.string()),
      cursor: CursorSchema,
    }),
  }),
});

const StateEntrySchema = z.union([
  z.object({ type: z.literal('STATE'), state: PerStreamStateSchema }).transform((message) => message.state),
  PerStreamStateSchema,
]);

const LegacyStateSchema = z.object({
  streams: z.array(
    z.object({
      stream_name: z.string().min(1),
      stream_namespace: z.string().nullable().optional(),
      cursor_field: z.array(z.string()),
      cursor: CursorSchema,
    })
  ),
});

const StateBlobSchema = z.union([z.array(StateEntrySchema), LegacyStateSchema]);

type Entry = { pair: StreamPair; state: StreamState };

const toPair = (name: string, namespace: string | null | undefined): StreamPair =>
  namespace ? { name, namespace } : { name };

const pairKey = (pair: StreamPair): string => `${pair.namespace ?? ''}/${pair.name}`;

const toStateMessage = ({ pair, state }: Entry): StateMessage => ({
  type: 'STATE',
  state: {
    type: 'STREAM',
    stream: {
      stream_descriptor: pair,
      stream_state: { cursor_field: [...state.cursor_field], cursor: state.cursor },
    },
  },
});

const parseEntries = (blob: unknown): Entry[] => {
  if (blob === null || blob === undefined) return [];
  if (typeof blob === 'object' && !Array.isArray(blob) && Object.keys(blob).length === 0) return [];

  const result = StateBlobSchema.safeParse(blob);
  if (!result.success) {
    throw new ConfigError(`Invalid state: ${result.error.issues.map((issue) => issue.message).join('; ')}`, {
      cause: result.error,
    });
  }

  if (Array.isArray(result.data)) {
    return result.data.map(({ stream }) => ({
      pair: toPair(stream.stream_descriptor.name, stream.stream_descriptor.namespace),
      state: { cursor_field: stream.stream_state.cursor_field, cursor: stream.stream_state.cursor ?? null },
    }));
  }

  return result.data.streams.map((stream) => ({
    pair: toPair(stream.stream_name, stream.stream_namespace),
    state: { cursor_field: stream.cursor_field, cursor: stream.cursor ?? null },
  }));
};

/**
 * Per-run view of cursor state. Seeded from the prior-state blob; the only
 * writer afterwards is the checkpoint coordinator, through `emit`.
 */
export class StateManager {
  private readonly entries = new Map<string, Entry>();

  private constructor(entries: Entry[]) {
    for (const entry of entries) {
      this.entries.set(pairKey(entry.pair), entry);
    }
  }

  /** Accepts null, `{}`, a list of per-stream state messages, or the legacy `{ streams: [...] }` shape */
  static fromBlob(blob: unknown): StateManager {
    return new StateManager(parseEntries(blob));
  }

  getCursorInfo(pair: StreamPair): CursorState | undefined {
    const entry = this.entries.get(pairKey(pair));
    if (!entry) return undefined;

    const [cursorField] = entry.state.cursor_field;
    if (cursorField === undefined || entry.state.cursor === null) return undefined;

    return { cursorField, cursor: entry.state.cursor };
  }

  emit(pair: StreamPair, cursorField: string, cursor: string | null): StateMessage {
    const entry: Entry = { pair, state: { cursor_field: [cursorField], cursor } };
    this.entries.set(pairKey(pair), entry);
    return toStateMessage(entry);
  }

  toStateMessages(): StateMessage[] {
    return Array.from(this.entries.values(), toStateMessage);
  }
}

/**
 * Fold confirmed state messages over the prior ones, keeping the newest
 * state per stream. Streams not synced this run keep their prior state.
 */
export const mergeStateMessages = (
  prior: readonly StateMessage[],
  confirmed: readonly StateMessage[]
): StateMessage[] => {
  const merged = new Map<string, StateMessage>();
  for (const message of [...prior, ...confirmed]) {
    merged.set(pairKey(message.state.stream.stream_descriptor), message);
  }
  return Array.from(merged.values());
};
