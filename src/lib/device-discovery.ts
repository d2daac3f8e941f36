import * as fs from 'fs/promises';
import * as path from 'path';
import {
  StorageUnit,
  createStorageUnit,
  isSupportedFilesystem,
} from '../types/storage-unit';
import { ProcessRunner, defaultProcessRunner } from '../utils/process-utils';
import { Logger, createLogger, describeError } from '../utils/logger';

export interface EnumerateOptions {
  onlyMounted?: boolean;
  onlyUnmounted?: boolean;
}

export interface DeviceDiscoveryOptions {
  runner?: ProcessRunner;
  logger?: Logger;
  sysBlockDir?: string;
}

/**
 * A partition entry as reported by `lsblk -bOJ`. Older lsblk releases emit
 * strings for numeric and boolean columns, newer ones emit native JSON types.
 */
export interface LsblkPartition {
  name: string;
  fstype: string | null;
  uuid: string | null;
  size: number;
  label: string | null;
  hotplug: boolean;
  mountpoint: string | null;
}

/**
 * Parse `udevadm info --query=property` output (KEY=value per line)
 */
export function parseUdevProperties(output: string): Map<string, string> {
  const values = new Map<string, string>();
  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();
    if (line === '') continue;

    const separator = line.indexOf('=');
    if (separator <= 0) continue;

    values.set(line.slice(0, separator), line.slice(separator + 1));
  }
  return values;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asNullableString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function asNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function asHotplug(value: unknown): boolean {
  return value === true || value === 1 || value === '1';
}

function asMountpoint(entry: Record<string, unknown>): string | null {
  const single = asNullableString(entry.mountpoint);
  if (single) return single;

  // lsblk >= 2.37 reports every mountpoint in an array
  if (Array.isArray(entry.mountpoints)) {
    const first = entry.mountpoints.find((m): m is string => typeof m === 'string' && m !== '');
    return first ?? null;
  }
  return null;
}

/**
 * Extract the partitions of the first block device from `lsblk -bOJ` JSON.
 * Throws on malformed JSON or an unexpected document shape.
 */
export function parseLsblkPartitions(output: string): LsblkPartition[] {
  const document: unknown = JSON.parse(output);
  if (!isRecord(document) || !Array.isArray(document.blockdevices)) {
    throw new Error('lsblk output has no "blockdevices" array');
  }

  const [device] = document.blockdevices;
  if (!isRecord(device)) {
    throw new Error('lsblk output has no block device');
  }
  if (!Array.isArray(device.children)) {
    return [];
  }

  const partitions: LsblkPartition[] = [];
  for (const child of device.children) {
    if (!isRecord(child) || typeof child.name !== 'string') continue;
    partitions.push({
      name: child.name,
      fstype: asNullableString(child.fstype),
      uuid: asNullableString(child.uuid),
      size: asNumber(child.size),
      label: asNullableString(child.label),
      hotplug: asHotplug(child.hotplug),
      mountpoint: asMountpoint(child),
    });
  }
  return partitions;
}

export class DeviceDiscovery {
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;
  private readonly sysBlockDir: string;

  constructor(options: DeviceDiscoveryOptions = {}) {
    this.runner = options.runner ?? defaultProcessRunner;
    this.logger = options.logger ?? createLogger('Device Discovery');
    this.sysBlockDir = options.sysBlockDir ?? '/sys/block';
  }

  /**
   * List USB partitions with a supported filesystem, freshest device first.
   * Never throws: an unreadable device layer means no candidates.
   */
  async enumerate(options: EnumerateOptions = {}): Promise<StorageUnit[]> {
    const { onlyMounted = false, onlyUnmounted = false } = options;

    let blockDevices: string[];
    try {
      blockDevices = await fs.readdir(this.sysBlockDir);
    } catch (error) {
      this.logger.debug(`Unable to list ${this.sysBlockDir}: ${describeError(error)}`);
      return [];
    }

    const candidates: StorageUnit[] = [];
    for (const blockDevice of blockDevices.sort()) {
      const units = await this.inspectBlockDevice(blockDevice);
      for (const unit of units) {
        if (unit.mountpoint === null && onlyMounted) continue;
        if (unit.mountpoint !== null && onlyUnmounted) continue;
        candidates.push(unit);
      }
    }

    // Freshest device first (ie, last plugged in). Sort is stable for ties.
    return candidates.sort((a, b) => b.freshness - a.freshness);
  }

  /**
   * Find the partition currently mounted at `mountRoot`
   */
  async findMountedAt(mountRoot: string): Promise<StorageUnit | null> {
    const mounted = await this.enumerate({ onlyMounted: true });
    return mounted.find((unit) => unit.mountpoint === mountRoot) ?? null;
  }

  private async inspectBlockDevice(blockDevice: string): Promise<StorageUnit[]> {
    let properties: Map<string, string>;
    try {
      const output = await this.runner.run('udevadm', [
        'info',
        '--query=property',
        path.posix.join(this.sysBlockDir, blockDevice),
      ]);
      properties = parseUdevProperties(output);
    } catch (error) {
      this.logger.debug(`udevadm failed for ${blockDevice}: ${describeError(error)}`);
      return [];
    }

    if (properties.get('ID_BUS') !== 'usb') return [];

    const devName = properties.get('DEVNAME');
    if (!devName) return [];

    let partitions: LsblkPartition[];
    try {
      const output = await this.runner.run('lsblk', ['-bOJ', devName]);
      partitions = parseLsblkPartitions(output);
    } catch (error) {
      this.logger.debug(`lsblk failed for ${devName}: ${describeError(error)}`);
      return [];
    }

    const freshness = asNumber(properties.get('USEC_INITIALIZED'));
    const units: StorageUnit[] = [];
    for (const partition of partitions) {
      const filesystem = partition.fstype;
      if (!isSupportedFilesystem(filesystem)) continue;

      units.push(
        createStorageUnit({
          device: path.posix.join(path.posix.dirname(devName), partition.name),
          filesystem,
          uuid: partition.uuid,
          size: partition.size,
          label: partition.label,
          hotplug: partition.hotplug,
          mountpoint: partition.mountpoint,
          freshness,
        })
      );
    }
    return units;
  }
}
