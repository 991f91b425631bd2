import { Writable } from 'node:stream';
import { writeJsonLine } from './output';

const slowSink = () => {
  const lines: string[] = [];
  let drains = 0;
  const sink = new Writable({
    highWaterMark: 1,
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString());
      setImmediate(callback);
    },
  });
  sink.on('drain', () => {
    drains++;
  });
  return { sink, lines, drains: () => drains };
};

describe('writeJsonLine', () => {
  it('writes one JSON line per value', async () => {
    const { sink, lines } = slowSink();

    await writeJsonLine(sink, { type: 'RECORD', n: 1n });
    await writeJsonLine(sink, { type: 'STATE' });

    expect(lines).toEqual(['{"type":"RECORD","n":1}\n', '{"type":"STATE"}\n']);
  });

  it('waits for a full buffer to drain before returning', async () => {
    const { sink, drains } = slowSink();

    await writeJsonLine(sink, { type: 'RECORD' });

    expect(drains()).toBe(1);
  });
});
