import * as fs from 'fs/promises';
import path from 'path';
import { createHash } from 'crypto';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { StorageService } from './storage-service';
import { DeviceDiscovery } from './device-discovery';
import { DirectoryCache } from './directory-cache';
import { KeywordRegistry, ROOT_IMAGES } from './keyword-registry';
import { MountManager } from './mount-manager';
import type { RandomSource } from './selection-engine';
import { createStorageUnit, type StorageUnit } from '../types/storage-unit';
import type { ContentSource } from '../types/source-state';
import {
  createMockDecaySource,
  createMockLogger,
  createMockProcessRunner,
  MemoryKeywordStore,
  type MockLogger,
  type MockProcessRunnerOptions,
} from '../../tests/mocks';
import { addDir, addFile, createTempDir, removeTempDir } from '../../tests/fixtures/content-tree';
import { sequenceRandom } from '../../tests/fixtures/random';

const CAMERA = createStorageUnit({ device: '/dev/sda1', filesystem: 'vfat', freshness: 100, label: 'CAMERA' });

const GUIDE =
  'Place albums inside /photoframe/{album_name} directory and add each {album_name} as keyword.' +
  '\n\nAlternatively, put images directly inside the "/photoframe/"-directory on your storage device.';

function md5(value: string): string {
  return createHash('md5').update(value).digest('hex');
}

interface ServiceSetup {
  candidates?: StorageUnit[];
  runner?: MockProcessRunnerOptions;
  keywords?: string[];
  decayFactor?: number;
  maxImages?: number;
  random?: RandomSource;
}

describe('StorageService', () => {
  let tempDir: string;
  let logger: MockLogger;

  beforeEach(async () => {
    tempDir = await createTempDir();
    logger = createMockLogger();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  function createService(source: ContentSource, setup: ServiceSetup = {}) {
    const runner = createMockProcessRunner(setup.runner);
    const discovery = new DeviceDiscovery({ runner, logger: createMockLogger() });
    vi.spyOn(discovery, 'enumerate').mockResolvedValue(setup.candidates ?? []);
    const cache = new DirectoryCache({ logger: createMockLogger() });
    const mountManager = new MountManager({ discovery, cache, runner, logger: createMockLogger() });
    const contentRoot =
      source.kind === 'usb' ? path.join(source.mountRoot, 'photoframe') : source.contentRoot;
    const store = new MemoryKeywordStore(setup.keywords);
    const registry = new KeywordRegistry({ store, cache, contentRoot, logger: createMockLogger() });
    const decaySource = createMockDecaySource(setup.decayFactor);

    const service = new StorageService({
      source,
      discovery,
      mountManager,
      cache,
      registry,
      decaySource,
      maxImages: setup.maxImages,
      random: setup.random,
      logger,
    });
    return { service, discovery, cache, mountManager, registry, store, decaySource, contentRoot };
  }

  describe('directory source', () => {
    let root: string;

    beforeEach(async () => {
      root = path.join(tempDir, 'photoframe');
      await fs.mkdir(root);
    });

    function createDirectoryService(setup?: ServiceSetup) {
      return createService({ kind: 'directory', contentRoot: root }, setup);
    }

    it('uses the directory as content root', () => {
      const { service } = createDirectoryService();

      expect(service.contentRoot()).toBe(root);
      expect(service.activeDevice).toBeNull();
    });

    describe('updateState', () => {
      it('is ready when albums exist', async () => {
        await addDir(root, 'Trip', { files: ['t1.jpg'] });
        const { service } = createDirectoryService();

        expect(await service.updateState()).toEqual({ state: 'ready' });
        expect(service.state).toEqual({ state: 'ready' });
        expect(service.explainState()).toBeNull();
      });

      it('is ready when only root images exist', async () => {
        await addFile(root, 'a.jpg');
        const { service } = createDirectoryService();

        expect(await service.updateState()).toEqual({ state: 'ready' });
      });

      it('has no images when the directory is empty', async () => {
        const { service } = createDirectoryService();

        expect(await service.updateState()).toEqual({ state: 'no-images' });
        expect(service.explainState()).toBe(
          'Place images and/or albums inside a "photoframe"-directory on your storage device'
        );
      });

      it('has no images when the directory is missing', async () => {
        await fs.rm(root, { recursive: true });
        const { service } = createDirectoryService();

        expect(await service.updateState()).toEqual({ state: 'no-images' });
      });
    });

    it('reports the directory in its messages', async () => {
      const { service } = createDirectoryService();

      expect(await service.getMessages()).toEqual([
        { level: 'SUCCESS', message: `Using directory "${root}"`, link: null },
      ]);

      await fs.rm(root, { recursive: true });
      expect(await service.getMessages()).toEqual([
        { level: 'ERROR', message: `Directory "${root}" does not exist`, link: null },
      ]);
    });

    it('sweeps keywords on setup', async () => {
      const { service, store } = createDirectoryService({ keywords: ['Gone'] });

      await service.setup();

      expect(store.keywords).toEqual([]);
    });

    describe('getImagesFor', () => {
      it('describes root images newest first', async () => {
        const older = await addFile(root, 'a.jpg', 1000);
        const newer = await addFile(root, 'b.png', 2000);
        const { service } = createDirectoryService();

        expect(await service.getImagesFor(ROOT_IMAGES)).toEqual([
          {
            id: md5(newer),
            source: newer,
            url: newer,
            mimetype: 'image/png',
            filename: 'b.png',
            cacheAllowed: false,
            error: null,
          },
          {
            id: md5(older),
            source: older,
            url: older,
            mimetype: 'image/jpeg',
            filename: 'a.jpg',
            cacheAllowed: false,
            error: null,
          },
        ]);
      });

      it('selects at most maxImages from an album', async () => {
        const album = await addDir(root, 'Trip', { files: ['t1.jpg', 't2.jpg', 't3.jpg'] });
        const { service } = createDirectoryService({ maxImages: 2 });

        const images = await service.getImagesFor('Trip');

        expect(images).toHaveLength(2);
        expect(new Set(images.map((i) => i.filename)).size).toBe(2);
        for (const image of images) {
          expect(path.dirname(image.source ?? '')).toBe(album);
        }
      });

      it('reads the decay factor on every call', async () => {
        const album = await addDir(root, 'Trip');
        await addFile(album, 'x.jpg', 3000);
        await addFile(album, 'y.jpg', 2000);
        await addFile(album, 'z.jpg', 1000);
        const { service, decaySource } = createDirectoryService({
          maxImages: 2,
          decayFactor: 1,
          random: sequenceRandom([0.01, 0.99, 0.99]),
        });

        // keys: x = ln(.01), y = ln(.99)e, z = ln(.99)e^2
        expect((await service.getImagesFor('Trip')).map((i) => i.filename)).toEqual(['y.jpg', 'z.jpg']);
        await service.getImagesFor('Trip');

        expect(decaySource.getDecayFactor).toHaveBeenCalledTimes(2);
      });

      it('warns about a missing album', async () => {
        const { service } = createDirectoryService();

        expect(await service.getImagesFor('Missing')).toEqual([]);
        expect(logger.warn).toHaveBeenCalledWith(
          `The album '${path.join(root, 'Missing')}' does not exist. Did you unplug the storage device?`
        );
      });

      it('refuses album names outside the content directory', async () => {
        await addDir(tempDir, 'secret', { files: ['s.jpg'] });
        const { service } = createDirectoryService();

        expect(await service.getImagesFor('../secret')).toEqual([]);
        expect(await service.getImagesFor('..')).toEqual([]);
        expect(await service.getImagesFor('')).toEqual([]);
        expect(logger.warn).toHaveBeenCalledWith("Ignoring invalid album name '../secret'");
      });

      it('skips files that vanished after the scan', async () => {
        const kept = await addFile(root, 'a.jpg');
        const { service, cache } = createDirectoryService();
        vi.spyOn(cache, 'fileNames').mockResolvedValue(['a.jpg', 'ghost.jpg']);

        const images = await service.getImagesFor(ROOT_IMAGES);

        expect(images.map((i) => i.source)).toEqual([kept]);
        expect(logger.warn).toHaveBeenCalledWith(`File ${path.join(root, 'ghost.jpg')} does not exist, skipping`);
      });

      it('returns nothing when the content directory is missing', async () => {
        await fs.rm(root, { recursive: true });
        const { service, decaySource } = createDirectoryService();

        expect(await service.getImagesFor(ROOT_IMAGES)).toEqual([]);
        expect(decaySource.getDecayFactor).not.toHaveBeenCalled();
      });
    });

    it('collects images for every keyword in order', async () => {
      await addDir(root, 'Trip', { files: ['t1.jpg'] });
      await addFile(root, 'a.jpg');
      const { service } = createDirectoryService({ keywords: ['Trip', ROOT_IMAGES] });

      expect((await service.getImages()).map((i) => i.filename)).toEqual(['t1.jpg', 'a.jpg']);
    });

    it('explains an empty directory in the placeholder', async () => {
      const { service } = createDirectoryService();

      expect(await service.noImagesHolder()).toEqual({
        id: null,
        source: null,
        url: null,
        mimetype: null,
        filename: null,
        cacheAllowed: false,
        error: `No images could be found in "${root}"!\n\n${GUIDE}`,
      });
    });

    describe('fetchImage', () => {
      it('copies the image to the destination', async () => {
        const source = await addFile(root, 'a.jpg');
        const destination = path.join(tempDir, 'copy.jpg');
        const { service } = createDirectoryService();

        expect(await service.fetchImage(source, destination)).toEqual({ httpCode: 200, filename: destination });
        expect(await fs.readFile(destination, 'utf-8')).toBe('image data for a.jpg');
      });

      it('rejects requests without destination or source file', async () => {
        const source = await addFile(root, 'a.jpg');
        const { service } = createDirectoryService();

        expect(await service.fetchImage(source)).toEqual({ httpCode: 400 });
        expect(await service.fetchImage(path.join(root, 'missing.jpg'), path.join(tempDir, 'x.jpg'))).toEqual({
          httpCode: 400,
        });
      });

      it('reports a failed copy', async () => {
        const source = await addFile(root, 'a.jpg');
        const destination = path.join(tempDir, 'no-such-dir', 'copy.jpg');
        const { service } = createDirectoryService();

        expect(await service.fetchImage(source, destination)).toEqual({ httpCode: 418 });
        expect(logger.error).toHaveBeenCalledWith(
          `Unable to copy ${source} to ${destination}`,
          expect.any(Error)
        );
      });
    });
  });

  describe('usb source', () => {
    let mountRoot: string;

    beforeEach(async () => {
      mountRoot = path.join(tempDir, 'usb1');
      await fs.mkdir(mountRoot);
    });

    function createUsbService(setup?: ServiceSetup) {
      return createService({ kind: 'usb', mountRoot }, setup);
    }

    /** Simulates a device whose volume holds photoframe/Trip/t1.jpg */
    const mountWithAlbum = async (_device: string, root: string) => {
      await addDir(path.join(root, 'photoframe'), 'Trip', { files: ['t1.jpg'] });
    };

    it('places the content root under the mount root', () => {
      const { service } = createUsbService();

      expect(service.contentRoot()).toBe(path.join(mountRoot, 'photoframe'));
    });

    describe('updateState', () => {
      it('reports a missing device', async () => {
        const { service } = createUsbService();

        expect(await service.updateState()).toEqual({ state: 'no-images', subState: 'not-connected' });
        expect(service.explainState()).toBe('No storage device (e.g. USB-stick) has been detected');
      });

      it('mounts a device when the content directory is missing', async () => {
        const { service } = createUsbService({ candidates: [CAMERA], runner: { mount: mountWithAlbum } });

        expect(await service.updateState()).toEqual({ state: 'ready' });
        expect(service.activeDevice).toEqual(createStorageUnit({ ...CAMERA, mountpoint: mountRoot }));
      });

      it('sweeps keywords after mounting', async () => {
        const { service, store } = createUsbService({
          candidates: [CAMERA],
          runner: { mount: mountWithAlbum },
          keywords: ['Trip', 'Gone'],
        });

        await service.updateState();

        expect(store.keywords).toEqual(['Trip']);
      });

      it('forgets the device when its content disappears', async () => {
        const { service, mountManager } = createUsbService();
        mountManager.adopt(mountRoot, CAMERA);

        expect(await service.updateState()).toEqual({ state: 'no-images', subState: 'not-connected' });
        expect(service.activeDevice).toBeNull();
      });

      it('unmounts the stale device before mounting the next one', async () => {
        const { service, mountManager } = createUsbService({
          candidates: [CAMERA],
          runner: { mount: mountWithAlbum, umount: async () => {} },
        });
        mountManager.adopt(mountRoot, createStorageUnit({ device: '/dev/sdb1', filesystem: 'vfat' }));
        const unmount = vi.spyOn(mountManager, 'unmount');
        const mount = vi.spyOn(mountManager, 'mount');

        expect(await service.updateState()).toEqual({ state: 'ready' });

        expect(unmount).toHaveBeenCalledWith(mountRoot);
        expect(unmount.mock.invocationCallOrder[0]).toBeLessThan(mount.mock.invocationCallOrder[0]);
        expect(service.activeDevice?.device).toBe('/dev/sda1');
      });
    });

    describe('getMessages', () => {
      it('reports the connected device by label', async () => {
        await fs.mkdir(path.join(mountRoot, 'photoframe'));
        const { service, mountManager } = createUsbService();
        mountManager.adopt(mountRoot, CAMERA);

        expect(await service.getMessages()).toEqual([
          { level: 'SUCCESS', message: 'Storage device "CAMERA" is connected', link: null },
        ]);
      });

      it('explains how to connect a device', async () => {
        const { service } = createUsbService();

        expect(await service.getMessages()).toEqual([
          {
            level: 'ERROR',
            message:
              'No storage device could be found that contains the "/photoframe/"-directory! ' +
              `Try to reboot or manually mount the desired storage device to "${mountRoot}"`,
            link: null,
          },
        ]);
      });
    });

    describe('setup', () => {
      it('mounts when the content directory is missing', async () => {
        const { service, mountManager } = createUsbService();
        const mount = vi.spyOn(mountManager, 'mount');

        await service.setup();

        expect(mount).toHaveBeenCalledWith(mountRoot);
      });

      it('remounts when the content directory is empty', async () => {
        await fs.mkdir(path.join(mountRoot, 'photoframe'));
        const { service, mountManager } = createUsbService();
        const unmount = vi.spyOn(mountManager, 'unmount');
        const mount = vi.spyOn(mountManager, 'mount');

        await service.setup();

        expect(unmount).toHaveBeenCalledWith(mountRoot);
        expect(mount).toHaveBeenCalledWith(mountRoot);
        expect(unmount.mock.invocationCallOrder[0]).toBeLessThan(mount.mock.invocationCallOrder[0]);
      });

      it('adopts the device that is already mounted', async () => {
        await addDir(path.join(mountRoot, 'photoframe'), 'Trip', { files: ['t1.jpg'] });
        const mounted = createStorageUnit({ ...CAMERA, mountpoint: mountRoot });
        const { service, discovery, mountManager, store } = createUsbService({ keywords: ['Trip', 'Gone'] });
        vi.spyOn(discovery, 'findMountedAt').mockResolvedValue(mounted);
        const mount = vi.spyOn(mountManager, 'mount');

        await service.setup();

        expect(service.activeDevice).toBe(mounted);
        expect(store.keywords).toEqual(['Trip']);
        expect(mount).not.toHaveBeenCalled();
      });

      it('warns when the mounted device cannot be identified', async () => {
        await addFile(await addDir(mountRoot, 'photoframe'), 'a.jpg');
        const { service, discovery } = createUsbService();
        vi.spyOn(discovery, 'findMountedAt').mockResolvedValue(null);

        await service.setup();

        expect(service.activeDevice).toBeNull();
        expect(logger.warn).toHaveBeenCalledWith(
          `Unable to determine which storage device is mounted to '${mountRoot}'`
        );
      });
    });

    it('names the device when an album is missing', async () => {
      await fs.mkdir(path.join(mountRoot, 'photoframe'));
      const { service, mountManager } = createUsbService();
      mountManager.adopt(mountRoot, CAMERA);

      await service.getImagesFor('Trip');

      expect(logger.warn).toHaveBeenCalledWith(
        `The album '${path.join(mountRoot, 'photoframe', 'Trip')}' does not exist. ` +
          "Did you unplug the storage device associated with '/dev/sda1'?"
      );
    });

    describe('noImagesHolder', () => {
      it('asks for a device when none is connected', async () => {
        const { service } = createUsbService();

        expect((await service.noImagesHolder()).error).toBe(
          `No external storage device detected! Please connect a USB-stick!\n\n${GUIDE}`
        );
      });

      it('names the connected device', async () => {
        const { service, mountManager } = createUsbService();
        mountManager.adopt(mountRoot, CAMERA);

        expect((await service.noImagesHolder()).error).toBe(
          `No images could be found on storage device "CAMERA"!\n\n${GUIDE}`
        );
      });
    });
  });
});
