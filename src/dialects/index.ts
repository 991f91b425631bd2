export type { TableClient, ScanOptions, SourceConfig } from './source';
export type { TargetDialect, TargetConfig, TargetStream } from './target';
export { createSource, listSourceTypes, registerSource, withSource } from './source-registry';
export { createTarget, registerTarget } from './target-registry';
