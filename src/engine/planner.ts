import type { TableClient } from '../dialects/source';
import { StateDecoratingIterator } from './checkpoint-coordinator';
import { parseCursorText, resolveCursorType } from './cursor-type';
import { MissingCursorAttributeError } from './errors';
import { fromGenerator, type CloseableIterator } from './iterators';
import { log } from './logger';
import { toRecordMessage } from './record-mapper';
import type { StateManager } from './state';
import type { ConfiguredStream, ScanFilter, SourceMessage, StreamPair, SyncPlan } from './types';

const toPair = (configured: ConfiguredStream): StreamPair => {
  const { name, namespace } = configured.stream;
  return namespace !== undefined ? { name, namespace } : { name };
};

/**
 * Decide how a stream is read this run. Discovery-time properties bound the
 * projected attributes; incremental streams resolve their cursor type here so
 * type problems surface before any row is fetched.
 */
export const planStream = (configured: ConfiguredStream, stateManager: StateManager): SyncPlan => {
  const stream = toPair(configured);
  const properties = configured.stream.json_schema.properties;
  const attributes = Object.keys(properties);
  const strategy = configured.strategy;

  switch (strategy.kind) {
    case 'full_refresh':
      return { mode: 'full_refresh', stream, attributes };

    case 'incremental': {
      const { cursorField } = strategy;
      const property = properties[cursorField];
      if (!property) {
        throw new MissingCursorAttributeError(stream.name, cursorField);
      }

      const cursorType = resolveCursorType(stream.name, cursorField, property);
      const prior = stateManager.getCursorInfo(stream);

      if (!prior) {
        return { mode: 'incremental', stream, attributes, cursorField, cursorType };
      }

      if (prior.cursorField !== cursorField) {
        log.warn(
          `Stream "${stream.name}": cursor field changed from "${prior.cursorField}" to "${cursorField}", re-reading from the start`
        );
        return { mode: 'incremental', stream, attributes, cursorField, cursorType };
      }

      // a saved cursor that does not parse as the resolved type fails here, not mid-scan
      parseCursorText(stream.name, cursorField, cursorType, prior.cursor);

      const filter: ScanFilter = { attribute: cursorField, value: prior.cursor, type: cursorType };
      return { mode: 'incremental', stream, attributes, cursorField, cursorType, priorCursor: prior.cursor, filter };
    }
  }
};

export type OpenStreamOptions = {
  client: TableClient;
  stateManager: StateManager;
  now?: () => number;
};

/**
 * Turn a plan into its message sequence. Nothing is fetched until the first
 * message is pulled. Incremental sequences end with one state message.
 */
export const openStream = (plan: SyncPlan, options: OpenStreamOptions): CloseableIterator<SourceMessage> => {
  const { client, stateManager } = options;
  const now = options.now ?? Date.now;
  const filter = plan.mode === 'incremental' ? plan.filter : undefined;

  async function* records() {
    log.stream(plan.stream.name, filter ? `${plan.mode} scan where ${filter.attribute} > ${filter.value}` : `${plan.mode} scan`);

    let count = 0;
    for await (const row of client.scanTable(plan.stream.name, { attributes: plan.attributes, filter })) {
      count++;
      yield toRecordMessage(plan.stream, row, now());
    }

    log.stream(plan.stream.name, `read ${count.toLocaleString('en-US')} records`);
  }

  switch (plan.mode) {
    case 'full_refresh':
      return fromGenerator(records());

    case 'incremental':
      return new StateDecoratingIterator(fromGenerator(records()), {
        stream: plan.stream,
        cursorField: plan.cursorField,
        cursorType: plan.cursorType,
        priorCursor: plan.priorCursor,
        stateManager,
      });
  }
};
