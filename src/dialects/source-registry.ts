import type { TableClient, SourceConfig } from './source';

type SourceDialectFactory = (config: SourceConfig) => TableClient;

const sources: Record<string, SourceDialectFactory> = {};

/**
 * Register a source dialect factory.
 * Call this in each dialect implementation to register itself.
 */
export const registerSource = (type: string, factory: SourceDialectFactory): void => {
  sources[type] = factory;
};

/**
 * Create a table client from configuration
 */
export const createSource = (config: SourceConfig): TableClient => {
  const factory = sources[config.type];
  if (!factory) {
    const available = Object.keys(sources).join(', ');
    throw new Error(`Unknown source type "${config.type}". Available: ${available}`);
  }
  return factory(config);
};

/**
 * List all registered source types
 */
export const listSourceTypes = (): string[] => Object.keys(sources);

/**
 * Acquire a table client for the duration of `fn` and release it on every
 * exit path, including when `fn` throws.
 */
export const withSource = async <T>(config: SourceConfig, fn: (client: TableClient) => Promise<T>): Promise<T> => {
  const client = createSource(config);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
};
