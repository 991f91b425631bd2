import type { SourceConfig } from '../dialects/source';
import type { TargetConfig } from '../dialects/target';
import { createTarget } from '../dialects/target-registry';
import { loadState, saveState } from './checkpoint';
import type { CloseableIterator } from './iterators';
import { log } from './logger';
import { read } from './source';
import { StateManager, mergeStateMessages } from './state';
import type { ConfiguredCatalog, MetricsHook, RecordMessage, SourceMessage, StateMessage } from './types';

// Import dialects to register them
import '../dialects/source/dynamodb';
import '../dialects/target/postgresql';

export type RunnerConfig = {
  /** Names the state file, so several syncs can share a state directory */
  name: string;
  sourceConfig: SourceConfig;
  targetConfig: TargetConfig;
  catalog: ConfiguredCatalog;
  batchSize: number;
  stateDir: string;
  /** Optional metrics hook for monitoring */
  metrics?: MetricsHook;
  now?: () => number;
};

export type RunResult = {
  recordsRead: number;
  recordsWritten: number;
  checkpoints: number;
  completed: boolean;
};

/**
 * Pull every configured stream into the target. Buffered records are flushed
 * before each state message is persisted, so the saved state never runs ahead
 * of what the target holds.
 */
export const run = async (config: RunnerConfig, shouldStop: () => boolean): Promise<RunResult> => {
  const startTime = Date.now();
  const { metrics } = config;

  const prior = loadState(config.stateDir, config.name);
  let confirmed: StateMessage[] = StateManager.fromBlob(prior).toStateMessages();
  const resuming = confirmed.length > 0;

  const target = createTarget(config.targetConfig);
  let messages: CloseableIterator<SourceMessage> | undefined;

  const buffers = new Map<string, RecordMessage[]>();
  const streamCounts = new Map<string, number>();
  let recordsRead = 0;
  let recordsWritten = 0;
  let checkpoints = 0;

  const flush = async (): Promise<void> => {
    for (const [stream, batch] of buffers) {
      if (batch.length === 0) continue;
      buffers.set(stream, []);
      recordsWritten += await target.write(stream, batch);
      metrics?.onProgress?.({ read: recordsRead, written: recordsWritten, checkpoints });
    }
  };

  try {
    // planning happens here, before the target touches any table
    messages = read(config.sourceConfig, config.catalog, prior, { now: config.now });

    const streams = config.catalog.streams.map((configured) => ({
      name: configured.stream.name,
      syncMode: configured.strategy.kind,
    }));

    log.sync.start({
      name: config.name,
      batchSize: config.batchSize,
      streams: streams.map((stream) => `${stream.name} (${stream.syncMode})`),
      resuming,
    });
    metrics?.onStart?.({ name: config.name, streamCount: streams.length, batchSize: config.batchSize, resuming });

    await target.prepare(streams);

    let stopped = false;
    for await (const message of messages) {
      if (shouldStop()) {
        log.info('Graceful shutdown: flushing buffered records, state stays at the last checkpoint');
        stopped = true;
        break;
      }

      switch (message.type) {
        case 'RECORD': {
          const { stream } = message.record;
          const batch = buffers.get(stream) ?? [];
          batch.push(message);
          buffers.set(stream, batch);
          streamCounts.set(stream, (streamCounts.get(stream) ?? 0) + 1);
          recordsRead++;

          if (batch.length >= config.batchSize) {
            await flush();
          }
          break;
        }

        case 'STATE': {
          await flush();

          confirmed = mergeStateMessages(confirmed, [message]);
          saveState(config.stateDir, config.name, confirmed);
          checkpoints++;

          const { stream_descriptor: descriptor, stream_state: state } = message.state.stream;
          log.stream(descriptor.name, `checkpoint saved (${state.cursor_field.join('.')} = ${state.cursor ?? 'none'})`);
          metrics?.onCheckpoint?.({
            stream: descriptor.name,
            records: streamCounts.get(descriptor.name) ?? 0,
            cursor: state.cursor,
          });
          log.runningTotal({ read: recordsRead, written: recordsWritten, checkpoints });
          break;
        }
      }
    }

    await flush();

    const completed = !stopped;
    const elapsedMs = Date.now() - startTime;

    log.sync.summary({ read: recordsRead, written: recordsWritten, checkpoints, completed, elapsed: elapsedMs });
    metrics?.onComplete?.({
      name: config.name,
      read: recordsRead,
      written: recordsWritten,
      checkpoints,
      completed,
      elapsedMs,
    });

    return { recordsRead, recordsWritten, checkpoints, completed };
  } finally {
    if (messages) {
      await messages.close();
    }
    if (target.close) {
      await target.close();
    }
    log.info('Connections closed');
  }
};
