import fs from 'node:fs';
import { z } from 'zod';
import type { SourceConfig } from '../dialects/source';
import type { TargetConfig } from '../dialects/target';
import { ConfigError } from './errors';
import type { ConfiguredCatalog } from './types';

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');

const parseWith = <T extends z.ZodTypeAny>(schema: T, raw: unknown, label: string): z.output<T> => {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid ${label}: ${formatIssues(result.error)}`, { cause: result.error });
  }
  return result.data;
};

export const readJsonFile = (filepath: string, label: string): unknown => {
  if (!fs.existsSync(filepath)) {
    throw new ConfigError(`${label} file not found: ${filepath}`);
  }

  try {
    return JSON.parse(fs.readFileSync(filepath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`${label} file is not valid JSON: ${filepath}`, { cause: err });
  }
};

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const SourceConfigFileSchema = z.object({
  endpoint: optionalString.pipe(z.string().url().optional()),
  region: optionalString,
  access_key_id: optionalString,
  secret_access_key: optionalString,
});

/**
 * Merge the config file (if any) with environment fallbacks.
 * File values win over the environment.
 */
export const loadSourceConfig = (raw: unknown = {}, env: NodeJS.ProcessEnv = process.env): SourceConfig => {
  const file = parseWith(SourceConfigFileSchema, raw, 'source config');

  const accessKeyId = file.access_key_id ?? env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = file.secret_access_key ?? env.AWS_SECRET_ACCESS_KEY;
  if ((accessKeyId === undefined) !== (secretAccessKey === undefined)) {
    throw new ConfigError('Invalid source config: access_key_id and secret_access_key must be given together');
  }

  return {
    type: 'dynamodb',
    region: file.region ?? env.AWS_REGION ?? 'us-east-1',
    endpoint: file.endpoint ?? (env.DYNAMODB_ENDPOINT || undefined),
    accessKeyId,
    secretAccessKey,
  };
};

const PropertySchemaSchema = z
  .object({
    type: z.enum(['string', 'integer', 'number', 'boolean', 'object', 'array']),
    semantic_type: z.string().optional(),
    // same annotation under the key other catalog producers write
    airbyte_type: z.string().optional(),
  })
  .transform(({ type, semantic_type, airbyte_type }) => {
    const annotation = semantic_type ?? airbyte_type;
    return annotation !== undefined ? { type, semantic_type: annotation } : { type };
  });

const StreamDescriptorSchema = z.object({
  name: z.string().min(1),
  namespace: z.string().optional(),
  json_schema: z.object({
    type: z.literal('object'),
    properties: z.record(PropertySchemaSchema),
  }),
  source_defined_primary_key: z.array(z.string()).default([]),
  supported_sync_modes: z.array(z.enum(['full_refresh', 'incremental'])).default(['full_refresh', 'incremental']),
});

const ConfiguredStreamSchema = z
  .object({
    stream: StreamDescriptorSchema,
    sync_mode: z.enum(['full_refresh', 'incremental']),
    cursor_field: z.array(z.string()).optional(),
  })
  .transform((configured, ctx) => {
    if (configured.sync_mode === 'full_refresh') {
      return { stream: configured.stream, strategy: { kind: 'full_refresh' as const } };
    }

    // composite cursors are not supported; only the first path element counts
    const cursorField = configured.cursor_field?.[0];
    if (!cursorField) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cursor_field'],
        message: `incremental stream "${configured.stream.name}" needs a cursor field`,
      });
      return z.NEVER;
    }
    return { stream: configured.stream, strategy: { kind: 'incremental' as const, cursorField } };
  });

const ConfiguredCatalogSchema = z.object({
  streams: z.array(ConfiguredStreamSchema),
});

export const parseConfiguredCatalog = (raw: unknown): ConfiguredCatalog =>
  parseWith(ConfiguredCatalogSchema, raw, 'configured catalog');

const TargetConfigSchema = z.object({
  PG_HOST: z.string().min(1, 'PG_HOST is required'),
  PG_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  PG_USER: z.string().min(1, 'PG_USER is required'),
  PG_PASSWORD: z.string().min(1, 'PG_PASSWORD is required'),
  PG_DATABASE: z.string().min(1).default('postgres'),
  PG_SSL: z
    .string()
    .optional()
    .transform((value) => value !== 'false'),
});

export const loadTargetConfig = (env: NodeJS.ProcessEnv = process.env): TargetConfig => {
  const parsed = parseWith(TargetConfigSchema, env, 'target config');
  return {
    type: 'postgresql',
    host: parsed.PG_HOST,
    port: parsed.PG_PORT,
    user: parsed.PG_USER,
    password: parsed.PG_PASSWORD,
    database: parsed.PG_DATABASE,
    ssl: parsed.PG_SSL,
  };
};
