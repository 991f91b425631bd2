import type { RecordMessage, SourceRecord, StreamPair } from './types';

export const toRecordMessage = (stream: StreamPair, data: SourceRecord, emittedAt: number): RecordMessage => ({
  type: 'RECORD',
  record: {
    stream: stream.name,
    ...(stream.namespace !== undefined ? { namespace: stream.namespace } : {}),
    data,
    emitted_at: emittedAt,
  },
});
