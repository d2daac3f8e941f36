import * as path from 'path';
import { StorageUnit, createStorageUnit } from '../types/storage-unit';
import { DeviceDiscovery } from './device-discovery';
import { DirectoryCache } from './directory-cache';
import { ProcessRunner, defaultProcessRunner, privileged, CommandError } from '../utils/process-utils';
import { KeyedMutex } from '../utils/keyed-mutex';
import { fileExists, isDirectory } from '../utils/file-utils';
import { Logger, createLogger, describeError } from '../utils/logger';

export type MountAttemptOutcome = 'mounted' | 'no-content' | 'failed';

export interface MountAttempt {
  device: string;
  outcome: MountAttemptOutcome;
  error?: string;
}

export interface MountResult {
  success: boolean;
  device: StorageUnit | null;
  attempts: MountAttempt[];
  error?: string;
}

/**
 * Called after a device with a content directory was mounted
 */
export type MountListener = (device: StorageUnit, mountRoot: string) => Promise<void>;

export interface MountManagerOptions {
  discovery: DeviceDiscovery;
  cache: DirectoryCache;
  runner?: ProcessRunner;
  logger?: Logger;
  contentDirName?: string;
  useSudo?: boolean;
}

export class MountManager {
  private readonly discovery: DeviceDiscovery;
  private readonly cache: DirectoryCache;
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;
  private readonly contentDirName: string;
  private readonly useSudo: boolean;
  private readonly mutex = new KeyedMutex();
  private readonly activeDevices = new Map<string, StorageUnit>();
  private readonly listeners: MountListener[] = [];

  constructor(options: MountManagerOptions) {
    this.discovery = options.discovery;
    this.cache = options.cache;
    this.runner = options.runner ?? defaultProcessRunner;
    this.logger = options.logger ?? createLogger('Mount Manager');
    this.contentDirName = options.contentDirName ?? 'photoframe';
    this.useSudo = options.useSudo ?? true;
  }

  onMounted(listener: MountListener): void {
    this.listeners.push(listener);
  }

  getActiveDevice(mountRoot: string): StorageUnit | null {
    return this.activeDevices.get(mountRoot) ?? null;
  }

  /**
   * Record a device that was already mounted at `mountRoot` (e.g. at boot)
   */
  adopt(mountRoot: string, device: StorageUnit): void {
    this.activeDevices.set(mountRoot, device);
  }

  release(mountRoot: string): void {
    this.activeDevices.delete(mountRoot);
  }

  contentDir(mountRoot: string): string {
    return path.join(mountRoot, this.contentDirName);
  }

  /**
   * Mount the freshest unmounted device that carries the content directory.
   *
   * Candidates are tried in discovery order. A candidate that fails to mount,
   * or mounts without the content directory, is unmounted again before the
   * next one is tried.
   */
  async mount(mountRoot: string): Promise<MountResult> {
    if (this.mutex.isLocked(mountRoot)) {
      this.logger.info(`Mount operation already in progress on '${mountRoot}', waiting`);
    }
    return this.mutex.runExclusive(mountRoot, async () => {
      await this.ensureMountRoot(mountRoot);

      const candidates = await this.discovery.enumerate({ onlyUnmounted: true });
      const attempts: MountAttempt[] = [];

      // Re-plugging a stick makes it show up as a new device
      for (const candidate of candidates) {
        try {
          await this.exec('mount', [candidate.device, mountRoot]);
          this.logger.info(`Storage device '${candidate.device}' mounted to '${mountRoot}'`);

          if (await isDirectory(this.contentDir(mountRoot))) {
            attempts.push({ device: candidate.device, outcome: 'mounted' });
            const device = createStorageUnit({ ...candidate, mountpoint: mountRoot });
            this.activeDevices.set(mountRoot, device);
            this.cache.invalidateAll();
            await this.notifyMounted(device, mountRoot);
            return { success: true, device, attempts };
          }

          attempts.push({ device: candidate.device, outcome: 'no-content' });
          this.logger.debug(`'${candidate.device}' has no '${this.contentDirName}' directory`);
        } catch (error) {
          attempts.push({ device: candidate.device, outcome: 'failed', error: describeError(error) });
          this.logger.warn(`Unable to mount storage device '${candidate.device}' to '${mountRoot}'`);
          if (error instanceof CommandError && error.output) {
            this.logger.warn(`Output: ${error.output}`);
          }
        }
        await this.unmountRoot(mountRoot);
      }

      this.activeDevices.delete(mountRoot);
      this.logger.debug(`Unable to mount any storage device to '${mountRoot}'`);
      return {
        success: false,
        device: null,
        attempts,
        error:
          candidates.length === 0
            ? 'No storage device detected'
            : `No storage device with a '${this.contentDirName}' directory could be mounted`,
      };
    });
  }

  /**
   * Unmount `mountRoot`. Unmounting something that is not mounted only logs.
   * @returns true if the umount command succeeded
   */
  async unmount(mountRoot: string): Promise<boolean> {
    return this.mutex.runExclusive(mountRoot, () => this.unmountRoot(mountRoot));
  }

  private async unmountRoot(mountRoot: string): Promise<boolean> {
    try {
      await this.exec('umount', [mountRoot]);
    } catch (error) {
      this.logger.debug(`Unable to unmount '${mountRoot}': ${describeError(error)}`);
      return false;
    }
    this.activeDevices.delete(mountRoot);
    this.cache.invalidateAll();
    return true;
  }

  private async ensureMountRoot(mountRoot: string): Promise<void> {
    if (await fileExists(mountRoot)) {
      return;
    }
    try {
      await this.runner.run('mkdir', [mountRoot]);
    } catch (error) {
      // Mounting will fail and report it
      this.logger.error(`Unable to create directory: ${mountRoot}`, error);
    }
  }

  private async exec(command: 'mount' | 'umount', args: string[]): Promise<string> {
    const [file, fullArgs] = privileged(this.useSudo, command, args);
    return this.runner.run(file, fullArgs);
  }

  private async notifyMounted(device: StorageUnit, mountRoot: string): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await listener(device, mountRoot);
      } catch (error) {
        this.logger.error('Mount listener failed', error);
      }
    }
  }
}
