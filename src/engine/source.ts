import type { SourceConfig } from '../dialects/source';
import { createSource, withSource } from '../dialects/source-registry';
import { concatWithEagerClose, type CloseableIterator } from './iterators';
import { log } from './logger';
import { openStream, planStream } from './planner';
import { DEFAULT_SAMPLE_SIZE, inferSchema } from './schema-inference';
import { StateManager } from './state';
import type { Catalog, ConfiguredCatalog, ConnectionStatus, SourceMessage, StreamDescriptor } from './types';

/**
 * Health check: succeeds when the table listing call goes through.
 */
export const check = async (config: SourceConfig): Promise<ConnectionStatus> => {
  try {
    const tables = await withSource(config, (client) => client.listTables());
    log.success(`Connection succeeded, ${tables.length} tables visible`);
    return { status: 'SUCCEEDED' };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Error while listing tables: ${message}`);
    return { status: 'FAILED', message };
  }
};

export type DiscoverOptions = {
  sampleSize?: number;
};

/**
 * Build a catalog with one stream per table. Properties are inferred from a
 * sample of each table's rows.
 */
export const discover = async (config: SourceConfig, options: DiscoverOptions = {}): Promise<Catalog> => {
  const sampleSize = options.sampleSize ?? DEFAULT_SAMPLE_SIZE;

  return withSource(config, async (client) => {
    const tables = await client.listTables();
    log.info(`Discovering ${tables.length} tables (sample size ${sampleSize.toLocaleString('en-US')})`);

    const streams: StreamDescriptor[] = [];
    for (const table of tables) {
      const properties = await inferSchema(client, table, sampleSize);
      const primaryKey = await client.primaryKey(table);
      log.stream(table, `${Object.keys(properties).length} properties, primary key ${primaryKey}`);

      streams.push({
        name: table,
        json_schema: { type: 'object', properties },
        source_defined_primary_key: [primaryKey],
        supported_sync_modes: ['full_refresh', 'incremental'],
      });
    }

    return { streams };
  });
};

export type ReadOptions = {
  now?: () => number;
};

/**
 * Read the configured streams one after the other into a single message
 * sequence. Every stream is planned before the table client is created, so
 * planning errors throw here and never leave a connection behind. The client
 * is released when the sequence ends, fails or is closed.
 */
export const read = (
  config: SourceConfig,
  catalog: ConfiguredCatalog,
  state: unknown,
  options: ReadOptions = {}
): CloseableIterator<SourceMessage> => {
  const stateManager = StateManager.fromBlob(state);
  const plans = catalog.streams.map((configured) => planStream(configured, stateManager));

  const client = createSource(config);
  const streams = plans.map((plan) => openStream(plan, { client, stateManager, now: options.now }));

  return concatWithEagerClose(streams, () => client.close());
};
