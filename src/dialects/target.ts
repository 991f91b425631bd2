import type { RecordMessage, SyncMode } from '../engine/types';

export type TargetStream = {
  name: string;
  syncMode: SyncMode;
};

/**
 * Target dialect interface.
 * Implement this to deliver extracted records anywhere (PostgreSQL, files, ...).
 * A resolved `write` means the batch is durable; state is only saved after that.
 */
export interface TargetDialect {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  /** Called once before any write (create tables, truncate full-refresh streams) */
  prepare(streams: readonly TargetStream[]): Promise<void>;

  /** Persist a batch of records of one stream. Return count of rows written. */
  write(stream: string, batch: RecordMessage[]): Promise<number>;

  /** Optional: cleanup resources when done */
  close?(): Promise<void>;
}

/**
 * Configuration for target dialects
 */
export type TargetConfig =
  | { type: 'postgresql'; host: string; port: number; user: string; password: string; database: string; ssl: boolean }
  | { type: 'custom'; [key: string]: unknown };
