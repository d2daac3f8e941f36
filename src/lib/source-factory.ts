import * as path from 'path';
import { SourceConfig, resolveMountRoot } from '../types/source-config';
import { ContentSource } from '../types/source-state';
import { ConfigStore } from './config-store';
import { DeviceDiscovery } from './device-discovery';
import { DirectoryCache } from './directory-cache';
import { KeywordRegistry } from './keyword-registry';
import { MountManager } from './mount-manager';
import { StorageService } from './storage-service';
import { ProcessRunner, defaultProcessRunner } from '../utils/process-utils';
import { LoggerOptions, createLogger } from '../utils/logger';

export interface SourceComponents {
  config: SourceConfig;
  store: ConfigStore;
  discovery: DeviceDiscovery;
  cache: DirectoryCache;
  mountManager: MountManager;
  registry: KeywordRegistry;
  service: StorageService;
}

export interface CreateSourceOptions {
  store?: ConfigStore;
  runner?: ProcessRunner;
  /** Use an existing directory instead of mounting a device */
  directory?: string;
  verbose?: boolean;
  /** Also append log entries to <config dir>/logs/usbframe.log */
  logToFile?: boolean;
}

/**
 * Wire every component from the stored configuration
 */
export async function createStorageSource(options: CreateSourceOptions = {}): Promise<SourceComponents> {
  const store = options.store ?? new ConfigStore();
  await store.initialize();
  const config = await store.loadConfig();
  const runner = options.runner ?? defaultProcessRunner;

  const loggerOptions: LoggerOptions = {
    verbose: options.verbose,
    logFilePath: options.logToFile ? path.join(store.getLogsDir(), 'usbframe.log') : undefined,
  };

  const source: ContentSource = options.directory
    ? { kind: 'directory', contentRoot: path.resolve(options.directory) }
    : { kind: 'usb', mountRoot: resolveMountRoot(config) };

  const contentRoot =
    source.kind === 'usb' ? path.join(source.mountRoot, config.contentDirName) : source.contentRoot;

  const discovery = new DeviceDiscovery({
    runner,
    logger: createLogger('Device Discovery', loggerOptions),
  });
  const cache = new DirectoryCache({
    resetHour: config.cacheResetHour,
    logger: createLogger('Directory Cache', loggerOptions),
  });
  const mountManager = new MountManager({
    discovery,
    cache,
    runner,
    contentDirName: config.contentDirName,
    useSudo: config.useSudo,
    logger: createLogger('Mount Manager', loggerOptions),
  });
  const registry = new KeywordRegistry({
    store,
    cache,
    contentRoot,
    contentDirName: config.contentDirName,
    logger: createLogger('Keyword Registry', loggerOptions),
  });
  const service = new StorageService({
    source,
    discovery,
    mountManager,
    cache,
    registry,
    decaySource: store,
    contentDirName: config.contentDirName,
    maxImages: config.maxImages,
    logger: createLogger('Storage Service', loggerOptions),
  });

  return { config, store, discovery, cache, mountManager, registry, service };
}
