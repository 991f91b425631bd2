import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { deleteState, getStatePath, loadState, saveState } from './checkpoint';
import { ConfigError } from './errors';
import type { StateMessage } from './types';

const ORDERS_STATE: StateMessage = {
  type: 'STATE',
  state: {
    type: 'STREAM',
    stream: {
      stream_descriptor: { name: 'orders' },
      stream_state: { cursor_field: ['updated'], cursor: '2023-02-01' },
    },
  },
};

describe('state file', () => {
  let stateDir: string;

  beforeEach(() => {
    stateDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dynamo-extract-'));
  });

  afterEach(() => {
    fs.rmSync(stateDir, { recursive: true, force: true });
  });

  it('names the file after the sync', () => {
    expect(getStatePath('/var/lib/extract', 'nightly')).toBe(path.join('/var/lib/extract', 'sync-nightly.state.json'));
  });

  it('returns undefined before the first save', () => {
    expect(loadState(stateDir, 'nightly')).toBeUndefined();
  });

  it('loads what was saved and leaves no temp file behind', () => {
    saveState(stateDir, 'nightly', [ORDERS_STATE]);

    expect(loadState(stateDir, 'nightly')).toEqual([ORDERS_STATE]);
    expect(fs.readdirSync(stateDir)).toEqual(['sync-nightly.state.json']);
  });

  it('creates the state directory when it is missing', () => {
    const nested = path.join(stateDir, 'a', 'b');

    saveState(nested, 'nightly', []);

    expect(loadState(nested, 'nightly')).toEqual([]);
  });

  it('rejects a state file that is not JSON', () => {
    fs.writeFileSync(getStatePath(stateDir, 'nightly'), '{"streams": [');

    expect(() => loadState(stateDir, 'nightly')).toThrow(ConfigError);
  });

  it('deletes the state file once', () => {
    saveState(stateDir, 'nightly', [ORDERS_STATE]);

    expect(deleteState(stateDir, 'nightly')).toBe(true);
    expect(deleteState(stateDir, 'nightly')).toBe(false);
    expect(loadState(stateDir, 'nightly')).toBeUndefined();
  });
});
