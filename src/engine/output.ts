import { once } from 'node:events';
import { stringifyJson } from './values';

/**
 * Write one JSON line and wait for the stream to drain when its buffer is
 * full, so a slow reader throttles whoever produces the values.
 */
export const writeJsonLine = async (out: NodeJS.WritableStream, value: unknown): Promise<void> => {
  if (!out.write(`${stringifyJson(value)}\n`)) {
    await once(out, 'drain');
  }
};
