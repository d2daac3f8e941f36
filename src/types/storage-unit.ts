export const SUPPORTED_FILESYSTEMS = ['exfat', 'vfat', 'ntfs', 'ext2', 'ext3', 'ext4'] as const;

export type SupportedFilesystem = (typeof SUPPORTED_FILESYSTEMS)[number];

export interface StorageUnit {
  readonly device: string;            // /dev/sda1
  readonly uuid: string | null;
  readonly size: number;              // bytes
  readonly filesystem: SupportedFilesystem;
  readonly hotplug: boolean;
  readonly mountpoint: string | null;
  readonly freshness: number;         // USEC_INITIALIZED of the parent device
  readonly label: string | null;
}

export interface StorageUnitInit {
  device: string;
  filesystem: SupportedFilesystem;
  uuid?: string | null;
  size?: number;
  hotplug?: boolean;
  mountpoint?: string | null;
  freshness?: number;
  label?: string | null;
}

const FILESYSTEM_NAMES: readonly string[] = SUPPORTED_FILESYSTEMS;

export function isSupportedFilesystem(value: unknown): value is SupportedFilesystem {
  return typeof value === 'string' && FILESYSTEM_NAMES.includes(value);
}

/**
 * Build a frozen StorageUnit. Negative or non-finite sizes and freshness
 * values are clamped to 0, blank labels become null.
 */
export function createStorageUnit(init: StorageUnitInit): StorageUnit {
  const label = init.label?.trim();
  return Object.freeze({
    device: init.device,
    uuid: init.uuid ?? null,
    size: toNonNegativeInteger(init.size),
    filesystem: init.filesystem,
    hotplug: init.hotplug ?? false,
    mountpoint: init.mountpoint ?? null,
    freshness: toNonNegativeInteger(init.freshness),
    label: label ? label : null,
  });
}

/**
 * Name shown to the operator: the volume label, or the device path
 */
export function getStorageUnitName(unit: StorageUnit): string {
  return unit.label ?? unit.device;
}

function toNonNegativeInteger(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value < 0) {
    return 0;
  }
  return Math.floor(value);
}
