export const DEFAULT_DECAY_FACTOR = 0.003;

export interface SourceConfig {
  version: string;
  deviceIndex: number;          // mount root is /mnt/usb<deviceIndex>
  mountRoot?: string;           // overrides the derived mount root
  contentDirName: string;       // directory at the volume root holding albums
  maxImages: number;            // upper bound per keyword selection
  decayFactor: number;          // recency bias, <= 0 means uniform
  cacheResetHour: number;       // local hour at which cached scans expire
  useSudo: boolean;             // prefix mount/umount with `sudo -n`
  keywords: string[];
}

/**
 * Default source configuration
 */
export const DEFAULT_SOURCE_CONFIG: SourceConfig = {
  version: '1.0.0',
  deviceIndex: 1,
  contentDirName: 'photoframe',
  maxImages: 200,
  decayFactor: DEFAULT_DECAY_FACTOR,
  cacheResetHour: 3,
  useSudo: true,
  keywords: [],
};

/**
 * Resolve where the removable device gets mounted
 */
export function resolveMountRoot(config: Pick<SourceConfig, 'deviceIndex' | 'mountRoot'>): string {
  if (config.mountRoot && config.mountRoot.trim() !== '') {
    return config.mountRoot;
  }
  return `/mnt/usb${config.deviceIndex}`;
}
