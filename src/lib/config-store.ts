import {
  SourceConfig,
  DEFAULT_SOURCE_CONFIG,
  DEFAULT_DECAY_FACTOR,
  resolveMountRoot,
} from '../types/source-config';
import { resolveDecayFactor } from './selection-engine';
import {
  ensureDir,
  writeJsonAtomic,
  readJson,
  fileExists,
  getConfigDir,
  getConfigPath,
  getLogsDir,
} from '../utils/file-utils';

/**
 * Persistence for the keyword list
 */
export interface KeywordStore {
  loadKeywords(): Promise<string[]>;
  saveKeywords(keywords: string[]): Promise<void>;
}

/**
 * Supplies the decay factor, read fresh on every call
 */
export interface DecayFactorSource {
  getDecayFactor(): Promise<number>;
}

export type ConfigKey = Exclude<keyof SourceConfig, 'version' | 'keywords'>;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'deviceIndex',
  'mountRoot',
  'contentDirName',
  'maxImages',
  'decayFactor',
  'cacheResetHour',
  'useSudo',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const CONFIG_KEY_NAMES: readonly string[] = CONFIG_KEYS;

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEY_NAMES.includes(key);
}

/**
 * Merge a parsed config file over the defaults. Fields with the wrong type
 * keep their default.
 */
export function mergeSourceConfig(raw: unknown): SourceConfig {
  const config: SourceConfig = { ...DEFAULT_SOURCE_CONFIG, keywords: [] };
  if (!isRecord(raw)) return config;

  if (typeof raw.version === 'string') config.version = raw.version;
  if (typeof raw.deviceIndex === 'number' && Number.isInteger(raw.deviceIndex)) {
    config.deviceIndex = raw.deviceIndex;
  }
  if (typeof raw.mountRoot === 'string') config.mountRoot = raw.mountRoot;
  if (typeof raw.contentDirName === 'string' && raw.contentDirName.trim() !== '') {
    config.contentDirName = raw.contentDirName;
  }
  if (typeof raw.maxImages === 'number' && raw.maxImages >= 0) config.maxImages = raw.maxImages;
  if (raw.decayFactor !== undefined) {
    config.decayFactor = resolveDecayFactor(raw.decayFactor);
  }
  if (
    typeof raw.cacheResetHour === 'number' &&
    Number.isInteger(raw.cacheResetHour) &&
    raw.cacheResetHour >= 0 &&
    raw.cacheResetHour <= 23
  ) {
    config.cacheResetHour = raw.cacheResetHour;
  }
  if (typeof raw.useSudo === 'boolean') config.useSudo = raw.useSudo;
  if (Array.isArray(raw.keywords)) {
    config.keywords = raw.keywords.filter((k): k is string => typeof k === 'string');
  }
  return config;
}

/**
 * Parse a command-line value for a config key
 * @throws Error if the value does not fit the key
 */
export function parseConfigValue(key: string, value: string): Partial<SourceConfig> {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key}. Valid keys: ${CONFIG_KEYS.join(', ')}`);
  }

  switch (key) {
    case 'deviceIndex':
      return { deviceIndex: parseNonNegativeInteger(key, value) };
    case 'maxImages':
      return { maxImages: parseNonNegativeInteger(key, value) };
    case 'cacheResetHour': {
      const hour = parseNonNegativeInteger(key, value);
      if (hour > 23) {
        throw new Error(`Invalid cacheResetHour: ${value}. Must be 0-23.`);
      }
      return { cacheResetHour: hour };
    }
    case 'decayFactor': {
      const parsed = Number(value);
      if (value.trim() === '' || !Number.isFinite(parsed)) {
        throw new Error(`Invalid decayFactor: ${value}. Must be a number.`);
      }
      return { decayFactor: parsed };
    }
    case 'useSudo':
      if (value !== 'true' && value !== 'false') {
        throw new Error(`Invalid useSudo: ${value}. Must be true or false.`);
      }
      return { useSudo: value === 'true' };
    case 'mountRoot':
      return { mountRoot: parseNonEmpty(key, value) };
    case 'contentDirName':
      return { contentDirName: parseNonEmpty(key, value) };
  }
}

function parseNonNegativeInteger(key: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid ${key}: ${value}. Must be a non-negative integer.`);
  }
  return parsed;
}

function parseNonEmpty(key: string, value: string): string {
  if (value.trim() === '') {
    throw new Error(`Invalid ${key}: value cannot be empty.`);
  }
  return value;
}

export class ConfigStore implements KeywordStore, DecayFactorSource {
  private readonly configDir: string;
  private readonly configPath: string;

  constructor(configDir?: string) {
    this.configDir = configDir ?? getConfigDir();
    this.configPath = getConfigPath(this.configDir);
  }

  /**
   * Create the config directory and a default config file
   */
  async initialize(): Promise<void> {
    await ensureDir(this.configDir);
    await ensureDir(getLogsDir(this.configDir));

    if (!(await fileExists(this.configPath))) {
      await this.saveConfig({ ...DEFAULT_SOURCE_CONFIG, keywords: [] });
    }
  }

  /**
   * Load configuration, defaults filled in. Never writes.
   * @throws Error if the config file is not valid JSON
   */
  async loadConfig(): Promise<SourceConfig> {
    if (!(await fileExists(this.configPath))) {
      return mergeSourceConfig(null);
    }
    return mergeSourceConfig(await readJson(this.configPath));
  }

  async saveConfig(config: SourceConfig): Promise<void> {
    await ensureDir(this.configDir);
    await writeJsonAtomic(this.configPath, config);
  }

  /**
   * Update configuration with partial changes
   */
  async updateConfig(updates: Partial<SourceConfig>): Promise<SourceConfig> {
    const config = await this.loadConfig();
    const updated = { ...config, ...updates };
    await this.saveConfig(updated);
    return updated;
  }

  async getMountRoot(): Promise<string> {
    return resolveMountRoot(await this.loadConfig());
  }

  async loadKeywords(): Promise<string[]> {
    const config = await this.loadConfig();
    return config.keywords;
  }

  async saveKeywords(keywords: string[]): Promise<void> {
    await this.updateConfig({ keywords });
  }

  /**
   * Never throws: a missing or corrupt config means the default
   */
  async getDecayFactor(): Promise<number> {
    try {
      const raw = await readJson(this.configPath);
      return isRecord(raw) ? resolveDecayFactor(raw.decayFactor) : DEFAULT_DECAY_FACTOR;
    } catch {
      return DEFAULT_DECAY_FACTOR;
    }
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getLogsDir(): string {
    return getLogsDir(this.configDir);
  }
}
