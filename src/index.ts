export * from './dialects';
export { check, discover, read } from './engine/source';
export type { DiscoverOptions, ReadOptions } from './engine/source';
export { run } from './engine/runner';
export type { RunnerConfig, RunResult } from './engine/runner';
export { inferSchema, inferProperties, DEFAULT_SAMPLE_SIZE } from './engine/schema-inference';
export { resolveCursorType } from './engine/cursor-type';
export { planStream, openStream } from './engine/planner';
export { StateDecoratingIterator } from './engine/checkpoint-coordinator';
export { StateManager, mergeStateMessages } from './engine/state';
export { concatWithEagerClose, fromGenerator } from './engine/iterators';
export type { CloseableIterator } from './engine/iterators';
export * from './engine/errors';
export * from './engine/types';
export { parseNumberText, stringifyJson } from './engine/values';
