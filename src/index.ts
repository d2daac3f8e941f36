export * from './types/storage-unit';
export * from './types/source-config';
export * from './types/image-holder';
export * from './types/source-state';
export * from './lib/device-discovery';
export * from './lib/mount-manager';
export * from './lib/directory-cache';
export * from './lib/selection-engine';
export * from './lib/keyword-registry';
export * from './lib/config-store';
export * from './lib/storage-service';
export * from './lib/source-factory';
export { CommandError, execCommand, defaultProcessRunner } from './utils/process-utils';
export type { ProcessRunner } from './utils/process-utils';
export { ConsoleLogger, createLogger } from './utils/logger';
export type { Logger, LoggerOptions } from './utils/logger';
export { KeyedMutex } from './utils/keyed-mutex';
