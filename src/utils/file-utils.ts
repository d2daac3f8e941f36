import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true, mode: 0o755 });
}

/**
 * Write a file atomically (write to temp, then rename)
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await fs.writeFile(tempPath, content, 'utf-8');
  await fs.rename(tempPath, filePath);
}

/**
 * Write JSON to a file atomically
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const content = JSON.stringify(data, null, 2);
  await writeFileAtomic(filePath, content);
}

/**
 * Read and parse JSON file
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, 'utf-8');
  return JSON.parse(content);
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

export async function isFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Get the usbframe config directory (~/.usbframe, or $USBFRAME_HOME)
 */
export function getConfigDir(): string {
  const override = process.env.USBFRAME_HOME;
  if (override && override.trim() !== '') {
    return expandHome(override);
  }
  return path.join(os.homedir(), '.usbframe');
}

/**
 * Get the logs directory (~/.usbframe/logs)
 */
export function getLogsDir(configDir: string = getConfigDir()): string {
  return path.join(configDir, 'logs');
}

/**
 * Get the config file path
 */
export function getConfigPath(configDir: string = getConfigDir()): string {
  return path.join(configDir, 'config.json');
}

/**
 * Expand tilde (~) in path to home directory
 */
export function expandHome(filePath: string): string {
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}
