/**
 * Tagged attribute value as produced by a table client.
 * Records have no fixed structure; every attribute is one of these.
 * Integers beyond double precision are bigints; serialize with `stringifyJson`.
 */
export type JsonValue = string | number | bigint | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** One raw row from the store: attribute name → value */
export type SourceRecord = Record<string, JsonValue>;

export type JsonSchemaType = 'string' | 'integer' | 'number' | 'boolean' | 'object' | 'array';

export type PropertySchema = {
  type: JsonSchemaType;
  /** Optional semantic override, e.g. `integer` on a `number` property */
  semantic_type?: string;
};

export type SyncMode = 'full_refresh' | 'incremental';

export type StreamPair = {
  name: string;
  namespace?: string;
};

/** Stream descriptor produced by discovery */
export type StreamDescriptor = StreamPair & {
  json_schema: {
    type: 'object';
    properties: Record<string, PropertySchema>;
  };
  source_defined_primary_key: string[];
  supported_sync_modes: SyncMode[];
};

export type Catalog = {
  streams: StreamDescriptor[];
};

export type SyncStrategy = { kind: 'full_refresh' } | { kind: 'incremental'; cursorField: string };

export type ConfiguredStream = {
  stream: StreamDescriptor;
  strategy: SyncStrategy;
};

export type ConfiguredCatalog = {
  streams: ConfiguredStream[];
};

export type CursorType = 'string' | 'numeric';

/** Strictly-greater-than filter handed to the table client */
export type ScanFilter = {
  readonly attribute: string;
  readonly value: string;
  readonly type: CursorType;
};

export type CursorState = {
  cursorField: string;
  cursor: string;
};

export type SyncPlan =
  | {
      mode: 'full_refresh';
      stream: StreamPair;
      attributes: string[];
    }
  | {
      mode: 'incremental';
      stream: StreamPair;
      attributes: string[];
      cursorField: string;
      cursorType: CursorType;
      /** Saved cursor from the previous run; undefined means bootstrap with a full scan */
      priorCursor?: string;
      filter?: ScanFilter;
    };

export type RecordMessage = {
  type: 'RECORD';
  record: {
    stream: string;
    namespace?: string;
    data: SourceRecord;
    emitted_at: number;
  };
};

export type StreamState = {
  cursor_field: string[];
  cursor: string | null;
};

export type StateMessage = {
  type: 'STATE';
  state: {
    type: 'STREAM';
    stream: {
      stream_descriptor: StreamPair;
      stream_state: StreamState;
    };
  };
};

export type SourceMessage = RecordMessage | StateMessage;

export type ConnectionStatus = { status: 'SUCCEEDED' } | { status: 'FAILED'; message: string };

/**
 * Metrics hook for monitoring sync progress.
 * Called at various points during a sync run.
 */
export type MetricsHook = {
  onStart?: (params: { name: string; streamCount: number; batchSize: number; resuming: boolean }) => void;

  /** Called after a stream's records were written and its checkpoint saved */
  onCheckpoint?: (params: { stream: string; records: number; cursor: string | null }) => void;

  /** Called after every flushed batch with running totals */
  onProgress?: (params: { read: number; written: number; checkpoints: number }) => void;

  /** Called when the run ends (completed or stopped) */
  onComplete?: (params: {
    name: string;
    read: number;
    written: number;
    checkpoints: number;
    completed: boolean;
    elapsedMs: number;
  }) => void;
};
