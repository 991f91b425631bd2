import Knex, { type Knex as KnexType } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import { insertWithRetry } from '../../engine/batch';
import { log } from '../../engine/logger';
import type { RecordMessage } from '../../engine/types';
import { stringifyJson } from '../../engine/values';
import type { TargetDialect, TargetConfig, TargetStream } from '../target';
import { registerTarget } from '../target-registry';

const MAX_IDENTIFIER_LENGTH = 63;

/** Raw table holding one stream's records, e.g. `orders` → `_raw_orders` */
export const rawTableName = (stream: string): string =>
  `_raw_${stream.toLowerCase().replace(/[^a-z0-9_]/g, '_')}`.slice(0, MAX_IDENTIFIER_LENGTH);

export const buildInsertQuery = (table: string, rowCount: number): string => {
  const values = Array.from({ length: rowCount }, () => '(?, ?, ?::jsonb)').join(', ');
  return `INSERT INTO "${table}" ("_id", "_emitted_at", "_data") VALUES ${values}`;
};

export const buildBindings = (batch: RecordMessage[], newId: () => string = uuidv4): Array<string | Date> =>
  batch.flatMap((message) => [newId(), new Date(message.record.emitted_at), stringifyJson(message.record.data)]);

/**
 * PostgreSQL target dialect.
 * Appends records as JSONB rows into one raw table per stream.
 */
class PostgreSQLTarget implements TargetDialect {
  readonly name = 'postgresql';

  private readonly client: KnexType;

  constructor(config: TargetConfig) {
    if (config.type !== 'postgresql') {
      throw new Error('Invalid config type for PostgreSQL target');
    }

    const sslConfig = config.ssl ? { rejectUnauthorized: false } : false;

    this.client = Knex({
      client: 'pg',
      connection: {
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        application_name: 'dynamo-extract',
        ssl: sslConfig,
      },
      pool: { min: 0, max: 4 },
      log: {
        warn: log.knex.warn,
        error: log.knex.error,
        deprecate: log.knex.warn,
        debug() {},
      },
    });
  }

  async prepare(streams: readonly TargetStream[]): Promise<void> {
    for (const stream of streams) {
      const table = rawTableName(stream.name);
      await this.client.raw(`
        CREATE TABLE IF NOT EXISTS "${table}" (
          "_id" uuid PRIMARY KEY,
          "_emitted_at" timestamptz NOT NULL,
          "_data" jsonb NOT NULL
        )
      `);

      if (stream.syncMode === 'full_refresh') {
        await this.client.raw(`TRUNCATE TABLE "${table}"`);
        log.stream(stream.name, `truncated ${table}`);
      }
    }
  }

  async write(stream: string, batch: RecordMessage[]): Promise<number> {
    if (batch.length === 0) {
      return 0;
    }

    const table = rawTableName(stream);
    const start = Date.now();

    const written = await insertWithRetry(
      batch,
      async (records) => {
        const result = await this.client.raw(buildInsertQuery(table, records.length), buildBindings(records));
        return typeof result.rowCount === 'number' ? result.rowCount : records.length;
      },
      (message) => `${stream} record emitted at ${new Date(message.record.emitted_at).toISOString()}`
    );

    log.db(`inserted into ${table}`, written, Date.now() - start);
    return written;
  }

  async close(): Promise<void> {
    await this.client.destroy();
  }
}

// Register the dialect
registerTarget('postgresql', (config) => new PostgreSQLTarget(config));
