import type { ScanFilter, SourceRecord } from '../engine/types';

export type ScanOptions = {
  /** Attributes to project; empty or absent means every attribute */
  attributes?: readonly string[];
  /** Only rows whose attribute is strictly greater than the filter value */
  filter?: ScanFilter;
  /** Stop after this many rows */
  limit?: number;
};

/**
 * Table client interface.
 * Implement this to extract from any wide-column store.
 */
export interface TableClient {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  listTables(): Promise<string[]>;

  /** Name of the table's partition key attribute */
  primaryKey(table: string): Promise<string>;

  /** Stream rows; paging happens inside. Nothing is fetched until the first row is pulled. */
  scanTable(table: string, options?: ScanOptions): AsyncGenerator<SourceRecord, void, undefined>;

  /** Release the connection. A closed client refuses further calls. */
  close(): Promise<void>;
}

/**
 * Configuration for source dialects
 */
export type SourceConfig =
  | {
      type: 'dynamodb';
      region: string;
      endpoint?: string;
      accessKeyId?: string;
      secretAccessKey?: string;
    }
  | { type: 'custom'; [key: string]: unknown };
