import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from './errors';
import type { StateMessage } from './types';

export const getStatePath = (stateDir: string, name: string): string => {
  return path.join(stateDir, `sync-${name}.state.json`);
};

/**
 * Load the saved state blob of a sync, or undefined on the first run.
 * The blob is handed to the state manager unparsed.
 */
export const loadState = (stateDir: string, name: string): unknown => {
  const filepath = getStatePath(stateDir, name);
  if (!fs.existsSync(filepath)) return undefined;

  const raw = fs.readFileSync(filepath, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`State file is not valid JSON: ${filepath}`, { cause: err });
  }
};

/** Written to a temp file first, then renamed into place */
export const saveState = (stateDir: string, name: string, messages: StateMessage[]): void => {
  const filepath = getStatePath(stateDir, name);
  const tmp = `${filepath}.tmp`;
  fs.mkdirSync(stateDir, { recursive: true });
  fs.writeFileSync(tmp, JSON.stringify(messages, null, 2));
  fs.renameSync(tmp, filepath);
};

export const deleteState = (stateDir: string, name: string): boolean => {
  const filepath = getStatePath(stateDir, name);
  if (!fs.existsSync(filepath)) return false;
  fs.unlinkSync(filepath);
  return true;
};
