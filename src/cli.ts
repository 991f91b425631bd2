#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { deleteState, getStatePath, loadState } from './engine/checkpoint';
import { loadSourceConfig, loadTargetConfig, parseConfiguredCatalog, readJsonFile } from './engine/config';
import { ExtractionError } from './engine/errors';
import { log } from './engine/logger';
import { writeJsonLine } from './engine/output';
import { run, type RunnerConfig } from './engine/runner';
import { check, discover, read } from './engine/source';

import './dialects/source/dynamodb';

import 'dotenv/config';

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    config: { type: 'string', short: 'c' },
    catalog: { type: 'string' },
    state: { type: 'string', short: 's' },
    name: { type: 'string', short: 'n', default: 'default' },
    'sample-size': { type: 'string' },
    'batch-size': { type: 'string', short: 'b' },
    'state-dir': { type: 'string' },
    'source-type': { type: 'string', default: 'dynamodb' },
    'target-type': { type: 'string', default: 'postgresql' },
  },
});

const command = positionals[0] ?? 'help';
const STATE_DIR = values['state-dir'] ?? process.env.SYNC_STATE_DIR ?? process.cwd();

const fail = (message: string): never => {
  log.error(message);
  process.exit(1);
};

const parsePositiveInt = (raw: string | undefined, flag: string): number | undefined => {
  if (raw === undefined) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    return fail(`${flag} must be a positive integer, got "${raw}"`);
  }
  return parsed;
};

const emit = (value: unknown): Promise<void> => writeJsonLine(process.stdout, value);

const buildSourceConfig = () => {
  if (values['source-type'] !== 'dynamodb') {
    return fail(`Unknown source type "${values['source-type']}"`);
  }
  const raw = values.config ? readJsonFile(values.config, 'Config') : {};
  return loadSourceConfig(raw);
};

const requireCatalog = () => {
  if (!values.catalog) {
    return fail('--catalog <file> is required');
  }
  return parseConfiguredCatalog(readJsonFile(values.catalog, 'Catalog'));
};

const checkCommand = async (): Promise<void> => {
  const status = await check(buildSourceConfig());
  await emit({ type: 'CONNECTION_STATUS', connectionStatus: status });
  if (status.status === 'FAILED') process.exitCode = 1;
};

const discoverCommand = async (): Promise<void> => {
  const sampleSize = parsePositiveInt(values['sample-size'], '--sample-size');
  const catalog = await discover(buildSourceConfig(), { sampleSize });
  await emit({ type: 'CATALOG', catalog });
};

const readCommand = async (): Promise<void> => {
  const catalog = requireCatalog();
  const state = values.state ? readJsonFile(values.state, 'State') : undefined;
  const messages = read(buildSourceConfig(), catalog, state);

  try {
    for await (const message of messages) {
      await emit(message);
    }
  } finally {
    await messages.close();
  }
};

const syncCommand = async (): Promise<void> => {
  if (values['target-type'] !== 'postgresql') {
    fail(`Unknown target type "${values['target-type']}"`);
  }

  const config: RunnerConfig = {
    name: values.name,
    sourceConfig: buildSourceConfig(),
    targetConfig: loadTargetConfig(),
    catalog: requireCatalog(),
    batchSize: parsePositiveInt(values['batch-size'], '--batch-size') ?? 500,
    stateDir: STATE_DIR,
  };

  const abortController = new AbortController();
  const shouldStop = () => abortController.signal.aborted;

  const onSignal = () => {
    if (abortController.signal.aborted) return;
    abortController.abort();
    log.warn('Graceful shutdown requested, finishing the current batch...');
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const result = await run(config, shouldStop);
    if (!result.completed) process.exitCode = 130;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
};

const stateCommand = async (): Promise<void> => {
  await emit(loadState(STATE_DIR, values.name) ?? []);
};

const resetCommand = (): void => {
  if (deleteState(STATE_DIR, values.name)) {
    log.info(`Deleted ${getStatePath(STATE_DIR, values.name)}. Next sync starts from the beginning.`);
  } else {
    log.info('No saved state to delete.');
  }
};

const printUsage = (): void => {
  process.stderr.write(`
Usage: dynamo-extract <command> [options]

Commands:
  check      Verify the store is reachable (lists tables)
  discover   Infer a catalog from sampled rows of every table
  read       Write RECORD and STATE messages as JSON lines to stdout
  sync       Read into PostgreSQL, saving state after each delivered stream
  state      Print the saved state of a sync
  reset      Delete the saved state; the next sync re-reads everything

Options:
  -c, --config <file>        Source config JSON (endpoint, region, access_key_id, secret_access_key)
  --catalog <file>           Configured catalog JSON (read, sync)
  -s, --state <file>         Prior state JSON (read)
  -n, --name <name>          Sync name, used for the state file (default: default)
  --sample-size <n>          Rows sampled per table during discover (default: 1000)
  -b, --batch-size <n>       Target insert batch size (default: 500)
  --state-dir <dir>          Directory for state files (or env SYNC_STATE_DIR, default: cwd)
  --source-type <type>       Source dialect type (default: dynamodb)
  --target-type <type>       Target dialect type (default: postgresql)

Environment:
  DYNAMODB_ENDPOINT      Custom endpoint (e.g. a local DynamoDB)
  AWS_REGION             AWS region (default: us-east-1)
  AWS_ACCESS_KEY_ID      Access key (otherwise the default credential chain)
  AWS_SECRET_ACCESS_KEY  Secret key
  PG_HOST                PostgreSQL host
  PG_PORT                PostgreSQL port (default: 5432)
  PG_USER                PostgreSQL user
  PG_PASSWORD            PostgreSQL password
  PG_DATABASE            PostgreSQL database (default: postgres)
  PG_SSL                 Use SSL (default: true)
`);
};

const main = async (): Promise<void> => {
  switch (command) {
    case 'check':
      await checkCommand();
      break;
    case 'discover':
      await discoverCommand();
      break;
    case 'read':
      await readCommand();
      break;
    case 'sync':
      await syncCommand();
      break;
    case 'state':
      await stateCommand();
      break;
    case 'reset':
      resetCommand();
      break;
    default:
      printUsage();
      process.exit(command === 'help' ? 0 : 1);
  }
};

main().catch((err: unknown) => {
  if (err instanceof ExtractionError) {
    log.error(`${err.code}: ${err.message}`);
  } else {
    log.error(`Fatal error: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}`);
  }
  process.exit(1);
});
