import {
  DynamoDBClient,
  DescribeTableCommand,
  ListTablesCommand,
  ScanCommand,
  type AttributeValue,
  type ListTablesCommandOutput,
  type ScanCommandInput,
  type ScanCommandOutput,
} from '@aws-sdk/client-dynamodb';
import { NumberValueImpl as NumberValue, unmarshall } from '@aws-sdk/util-dynamodb';
import { ConnectivityError } from '../../engine/errors';
import type { JsonValue, ScanFilter, SourceRecord } from '../../engine/types';
import { parseNumberText } from '../../engine/values';
import type { ScanOptions, SourceConfig, TableClient } from '../source';
import { registerSource } from '../source-registry';

type DynamoItem = Record<string, AttributeValue>;

/**
 * Turn an attribute unmarshalled with `wrapNumbers` into a JSON value.
 * Sets become arrays and binary becomes base64. Numbers arrive as their
 * decimal text: integers a double cannot hold exactly become bigints, the
 * rest become doubles.
 */
export const toJsonValue = (value: unknown): JsonValue => {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint':
      return value;
    default:
      break;
  }

  if (value instanceof NumberValue) return parseNumberText(value.toString());

  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  if (value instanceof Set) return Array.from(value, toJsonValue);
  if (Array.isArray(value)) return value.map(toJsonValue);

  if (typeof value === 'object') {
    const result: Record<string, JsonValue> = {};
    for (const [key, nested] of Object.entries(value)) {
      result[key] = toJsonValue(nested);
    }
    return result;
  }

  return String(value);
};

export const toSourceRecord = (item: DynamoItem): SourceRecord => {
  const record: SourceRecord = {};
  for (const [attribute, value] of Object.entries(unmarshall(item, { wrapNumbers: true }))) {
    record[attribute] = toJsonValue(value);
  }
  return record;
};

const filterValue = (filter: ScanFilter): AttributeValue =>
  filter.type === 'string' ? { S: filter.value } : { N: filter.value };

/**
 * Build the Scan input for one page. Attribute names always go through
 * placeholders so reserved words (e.g. `name`, `status`) stay legal.
 */
export const buildScanInput = (
  table: string,
  options: ScanOptions = {},
  exclusiveStartKey?: DynamoItem
): ScanCommandInput => {
  const names: Record<string, string> = {};

  const attributes = options.attributes ?? [];
  const placeholders = attributes.map((attribute, index) => {
    const placeholder = `#a${index}`;
    names[placeholder] = attribute;
    return placeholder;
  });

  if (options.filter) {
    names['#cursor'] = options.filter.attribute;
  }

  return {
    TableName: table,
    ...(placeholders.length > 0 ? { ProjectionExpression: placeholders.join(', ') } : {}),
    ...(options.filter
      ? {
          FilterExpression: '#cursor > :cursor',
          ExpressionAttributeValues: { ':cursor': filterValue(options.filter) },
        }
      : {}),
    ...(Object.keys(names).length > 0 ? { ExpressionAttributeNames: names } : {}),
    ...(options.limit !== undefined ? { Limit: options.limit } : {}),
    ...(exclusiveStartKey ? { ExclusiveStartKey: exclusiveStartKey } : {}),
  };
};

/**
 * DynamoDB table client.
 * Lists tables, resolves partition keys and runs paged (optionally filtered) scans.
 */
class DynamoTableClient implements TableClient {
  readonly name = 'dynamodb';

  private readonly client: DynamoDBClient;
  private closed = false;

  constructor(config: SourceConfig) {
    if (config.type !== 'dynamodb') {
      throw new Error('Invalid config type for DynamoDB source');
    }

    const credentials =
      config.accessKeyId && config.secretAccessKey
        ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
        : undefined;

    this.client = new DynamoDBClient({
      region: config.region,
      endpoint: config.endpoint,
      credentials,
    });
  }

  async listTables(): Promise<string[]> {
    const tables: string[] = [];
    let exclusiveStartTableName: string | undefined = undefined;

    do {
      const startName = exclusiveStartTableName;
      const response: ListTablesCommandOutput = await this.call('ListTables', () =>
        this.client.send(new ListTablesCommand({ ExclusiveStartTableName: startName }))
      );

      tables.push(...(response.TableNames ?? []));
      exclusiveStartTableName = response.LastEvaluatedTableName;
    } while (exclusiveStartTableName);

    return tables;
  }

  async primaryKey(table: string): Promise<string> {
    const response = await this.call(`DescribeTable ${table}`, () =>
      this.client.send(new DescribeTableCommand({ TableName: table }))
    );

    const partitionKey = response.Table?.KeySchema?.find((key) => key.KeyType === 'HASH')?.AttributeName;
    if (!partitionKey) {
      throw new Error(`Table "${table}" has no partition key`);
    }
    return partitionKey;
  }

  async *scanTable(table: string, options: ScanOptions = {}): AsyncGenerator<SourceRecord, void, undefined> {
    let produced = 0;
    let exclusiveStartKey: DynamoItem | undefined = undefined;

    do {
      if (options.limit !== undefined && produced >= options.limit) return;

      const input = buildScanInput(table, options, exclusiveStartKey);
      const response: ScanCommandOutput = await this.call(`Scan ${table}`, () => this.client.send(new ScanCommand(input)));

      for (const item of response.Items ?? []) {
        if (options.limit !== undefined && produced >= options.limit) return;
        yield toSourceRecord(item);
        produced++;
      }

      exclusiveStartKey = response.LastEvaluatedKey;
    } while (exclusiveStartKey);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.client.destroy();
  }

  private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new Error(`DynamoDB table client is closed (${operation})`);
    }

    try {
      return await request();
    } catch (err) {
      throw new ConnectivityError(operation, err);
    }
  }
}

// Register the dialect
registerSource('dynamodb', (config: SourceConfig) => new DynamoTableClient(config));
