import type { TableClient } from '../dialects/source';
import type { JsonSchemaType, JsonValue, PropertySchema, SourceRecord } from './types';

export const DEFAULT_SAMPLE_SIZE = 1000;

type Observation = {
  type: JsonSchemaType;
  fractional: boolean;
};

const typeOfValue = (value: JsonValue): JsonSchemaType | undefined => {
  if (value === null) return undefined;
  if (Array.isArray(value)) return 'array';

  switch (typeof value) {
    case 'string':
      return 'string';
    case 'boolean':
      return 'boolean';
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'number';
    case 'bigint':
      return 'integer';
    default:
      return 'object';
  }
};

const isNumeric = (type: JsonSchemaType): boolean => type === 'integer' || type === 'number';

/**
 * Fold one row into the running observations.
 * The first non-null value fixes the type; numeric attributes stay `integer`
 * until any sampled value of theirs has a fractional part.
 */
const observe = (observations: Map<string, Observation>, row: SourceRecord): void => {
  for (const [attribute, value] of Object.entries(row)) {
    const type = typeOfValue(value);
    if (!type) continue;

    const existing = observations.get(attribute);
    if (!existing) {
      observations.set(attribute, { type, fractional: type === 'number' });
      continue;
    }

    if (isNumeric(existing.type) && type === 'number') {
      existing.fractional = true;
    }
  }
};

const toPropertySchema = (observation: Observation): PropertySchema => {
  if (isNumeric(observation.type)) {
    return { type: observation.fractional ? 'number' : 'integer' };
  }
  return { type: observation.type };
};

/** Infer a property mapping from already-sampled rows */
export const inferProperties = (rows: Iterable<SourceRecord>): Record<string, PropertySchema> => {
  const observations = new Map<string, Observation>();
  for (const row of rows) {
    observe(observations, row);
  }

  const properties: Record<string, PropertySchema> = {};
  for (const [attribute, observation] of observations) {
    properties[attribute] = toPropertySchema(observation);
  }
  return properties;
};

/**
 * Sample up to `sampleSize` rows of a table and infer its properties.
 * Attributes that only show up past the sample window, or that are null in
 * every sampled row, are left out.
 */
export const inferSchema = async (
  client: TableClient,
  table: string,
  sampleSize: number = DEFAULT_SAMPLE_SIZE
): Promise<Record<string, PropertySchema>> => {
  const sample: SourceRecord[] = [];

  for await (const row of client.scanTable(table, { limit: sampleSize })) {
    if (sample.length >= sampleSize) break;
    sample.push(row);
  }

  return inferProperties(sample);
};
