import * as fs from 'fs/promises';
import * as path from 'path';
import { StorageUnit, getStorageUnitName } from '../types/storage-unit';
import { ImageHolder, createImageHolder, createErrorHolder } from '../types/image-holder';
import { ContentSource, SourceMessage, SourceState } from '../types/source-state';
import { DeviceDiscovery } from './device-discovery';
import { DirectoryCache } from './directory-cache';
import { DecayFactorSource } from './config-store';
import { KeywordRegistry, ROOT_IMAGES } from './keyword-registry';
import { MountManager, MountResult } from './mount-manager';
import { RandomSource, selectWeighted } from './selection-engine';
import { isDirectory, isFile } from '../utils/file-utils';
import { getMimetype, hashString } from '../utils/image-utils';
import { Logger, createLogger } from '../utils/logger';

export interface StorageServiceOptions {
  source: ContentSource;
  discovery: DeviceDiscovery;
  mountManager: MountManager;
  cache: DirectoryCache;
  registry: KeywordRegistry;
  decaySource: DecayFactorSource;
  contentDirName?: string;
  maxImages?: number;
  random?: RandomSource;
  logger?: Logger;
}

export interface FetchResult {
  httpCode: 200 | 400 | 418;
  filename?: string;
}

/**
 * Photo source backed by removable storage (or a fixed directory).
 * Composes discovery, mounting, the directory cache, keyword handling and
 * weighted selection behind the interface the slideshow consumes.
 */
export class StorageService {
  private readonly source: ContentSource;
  private readonly discovery: DeviceDiscovery;
  private readonly mountManager: MountManager;
  private readonly cache: DirectoryCache;
  private readonly registry: KeywordRegistry;
  private readonly decaySource: DecayFactorSource;
  private readonly contentDirName: string;
  private readonly maxImages: number;
  private readonly random: RandomSource;
  private readonly logger: Logger;
  private currentState: SourceState = { state: 'no-images' };

  constructor(options: StorageServiceOptions) {
    this.source = options.source;
    this.discovery = options.discovery;
    this.mountManager = options.mountManager;
    this.cache = options.cache;
    this.registry = options.registry;
    this.decaySource = options.decaySource;
    this.contentDirName = options.contentDirName ?? 'photoframe';
    this.maxImages = options.maxImages ?? 200;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger('Storage Service');

    // Entering Mounted-with-content always sweeps the keyword list
    this.mountManager.onMounted(async () => {
      await this.registry.reconcile();
    });
  }

  get state(): SourceState {
    return this.currentState;
  }

  get activeDevice(): StorageUnit | null {
    switch (this.source.kind) {
      case 'usb':
        return this.mountManager.getActiveDevice(this.source.mountRoot);
      case 'directory':
        return null;
    }
  }

  get keywords(): KeywordRegistry {
    return this.registry;
  }

  /**
   * Root of the content tree: <mountRoot>/<contentDirName> or the directory itself
   */
  contentRoot(): string {
    switch (this.source.kind) {
      case 'usb':
        return path.join(this.source.mountRoot, this.contentDirName);
      case 'directory':
        return this.source.contentRoot;
    }
  }

  /**
   * Startup sequence: mount when nothing usable is mounted, otherwise sweep
   * keywords and identify the device that is already there.
   */
  async setup(): Promise<void> {
    const source = this.source;
    switch (source.kind) {
      case 'directory':
        await this.registry.reconcile();
        return;
      case 'usb': {
        const contentDir = this.contentRoot();
        if (!(await isDirectory(contentDir))) {
          await this.mountManager.mount(source.mountRoot);
          return;
        }
        if ((await this.countEntries(contentDir)) === 0) {
          await this.mountManager.unmount(source.mountRoot);
          await this.mountManager.mount(source.mountRoot);
          return;
        }

        await this.registry.reconcile();
        const device = await this.discovery.findMountedAt(source.mountRoot);
        if (device) {
          this.mountManager.adopt(source.mountRoot, device);
          this.logger.info(`Detected device '${device.device}' at '${source.mountRoot}'`);
        } else {
          this.logger.warn(`Unable to determine which storage device is mounted to '${source.mountRoot}'`);
        }
        return;
      }
    }
  }

  /**
   * Re-evaluate the source. A missing content directory triggers a mount
   * attempt for USB sources.
   */
  async updateState(): Promise<SourceState> {
    const contentDir = this.contentRoot();

    if (!(await isDirectory(contentDir))) {
      const mounted = await this.remount();
      if (!mounted) {
        this.currentState =
          this.source.kind === 'usb'
            ? { state: 'no-images', subState: 'not-connected' }
            : { state: 'no-images' };
        return this.currentState;
      }
    }

    const albums = await this.registry.albumNames();
    const rootImages = await this.registry.rootImageNames();
    this.currentState =
      albums.length === 0 && rootImages.length === 0 ? { state: 'no-images' } : { state: 'ready' };
    return this.currentState;
  }

  explainState(): string | null {
    if (this.currentState.state !== 'no-images') {
      return null;
    }
    if (this.currentState.subState === 'not-connected') {
      return 'No storage device (e.g. USB-stick) has been detected';
    }
    return `Place images and/or albums inside a "${this.contentDirName}"-directory on your storage device`;
  }

  async getMessages(): Promise<SourceMessage[]> {
    const contentExists = await isDirectory(this.contentRoot());
    const source = this.source;

    switch (source.kind) {
      case 'usb': {
        const device = this.activeDevice;
        if (device && contentExists) {
          return [
            {
              level: 'SUCCESS',
              message: `Storage device "${getStorageUnitName(device)}" is connected`,
              link: null,
            },
          ];
        }
        return [
          {
            level: 'ERROR',
            message:
              `No storage device could be found that contains the "/${this.contentDirName}/"-directory! ` +
              `Try to reboot or manually mount the desired storage device to "${source.mountRoot}"`,
            link: null,
          },
        ];
      }
      case 'directory':
        return [
          contentExists
            ? { level: 'SUCCESS', message: `Using directory "${source.contentRoot}"`, link: null }
            : { level: 'ERROR', message: `Directory "${source.contentRoot}" does not exist`, link: null },
        ];
    }
  }

  /**
   * Recency-biased selection of images for one keyword
   */
  async getImagesFor(keyword: string): Promise<ImageHolder[]> {
    const contentDir = this.contentRoot();
    if (!(await isDirectory(contentDir))) {
      return [];
    }

    let albumPath = contentDir;
    if (keyword !== ROOT_IMAGES) {
      if (keyword === '' || keyword === '.' || keyword === '..' || keyword.includes('/')) {
        this.logger.warn(`Ignoring invalid album name '${keyword}'`);
        return [];
      }
      albumPath = path.join(contentDir, keyword);
      if (!(await isDirectory(albumPath))) {
        const device = this.activeDevice;
        this.logger.warn(
          `The album '${albumPath}' does not exist. Did you unplug the storage device` +
            (device ? ` associated with '${device.device}'?` : '?')
        );
        return [];
      }
    }

    const files = await this.cache.fileNames(albumPath);
    const decayFactor = await this.decaySource.getDecayFactor();
    const selected = selectWeighted(files, this.maxImages, decayFactor, this.random);

    const images: ImageHolder[] = [];
    for (const filename of selected) {
      const fullPath = path.join(albumPath, filename);
      if (!(await isFile(fullPath))) {
        this.logger.warn(`File ${fullPath} does not exist, skipping`);
        continue;
      }
      images.push(
        createImageHolder({
          id: hashString(fullPath),
          source: fullPath,
          url: fullPath,
          mimetype: getMimetype(fullPath),
          filename,
          cacheAllowed: false,
        })
      );
    }
    return images;
  }

  /**
   * Images for every active keyword, keyword order preserved
   */
  async getImages(): Promise<ImageHolder[]> {
    const images: ImageHolder[] = [];
    for (const keyword of await this.registry.list()) {
      images.push(...(await this.getImagesFor(keyword)));
    }
    return images;
  }

  /**
   * Placeholder handed to the slideshow when there is nothing to show
   */
  async noImagesHolder(): Promise<ImageHolder> {
    const guide =
      `Place albums inside /${this.contentDirName}/{album_name} directory and add each {album_name} as keyword.` +
      `\n\nAlternatively, put images directly inside the "/${this.contentDirName}/"-directory on your storage device.`;

    const source = this.source;
    switch (source.kind) {
      case 'usb': {
        const device = this.activeDevice;
        if (device && (await isDirectory(source.mountRoot))) {
          return createErrorHolder(
            `No images could be found on storage device "${getStorageUnitName(device)}"!\n\n${guide}`
          );
        }
        return createErrorHolder(
          `No external storage device detected! Please connect a USB-stick!\n\n${guide}`
        );
      }
      case 'directory':
        return createErrorHolder(`No images could be found in "${source.contentRoot}"!\n\n${guide}`);
    }
  }

  /**
   * Hand a local image to the slideshow by copying it to `destination`
   */
  async fetchImage(url: string, destination?: string): Promise<FetchResult> {
    if (!destination || !(await isFile(url))) {
      return { httpCode: 400 };
    }
    try {
      await fs.copyFile(url, destination);
      return { httpCode: 200, filename: destination };
    } catch (error) {
      this.logger.error(`Unable to copy ${url} to ${destination}`, error);
      return { httpCode: 418 };
    }
  }

  private async remount(): Promise<boolean> {
    const source = this.source;
    switch (source.kind) {
      case 'usb': {
        // Content vanished: drop the stale mount before trying the next device
        await this.mountManager.unmount(source.mountRoot);
        this.mountManager.release(source.mountRoot);
        const result: MountResult = await this.mountManager.mount(source.mountRoot);
        return result.success;
      }
      case 'directory':
        return false;
    }
  }

  private async countEntries(dirPath: string): Promise<number> {
    try {
      return (await fs.readdir(dirPath)).length;
    } catch {
      return 0;
    }
  }
}
