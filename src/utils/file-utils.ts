import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

/**
 * Ensure a directory exists, creating it if necessary.
 * Throws if the path is taken by something that is not a directory.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true, mode: 0o755 });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'EEXIST') {
      throw error;
    }
  }
  const stats = await fs.stat(dirPath);
  if (!stats.isDirectory()) {
    throw new Error(`${dirPath} exists and is not a directory`);
  }
}

/**
 * Move a finished file over its destination.
 * rename(2) replaces the target atomically when both live on the same filesystem.
 */
export async function replaceFileAtomic(sourcePath: string, targetPath: string): Promise<void> {
  await fs.rename(sourcePath, targetPath);
}

/**
 * Give targetPath the permission bits of sourcePath
 */
export async function copyFileMode(sourcePath: string, targetPath: string): Promise<void> {
  const stats = await fs.stat(sourcePath);
  await fs.chmod(targetPath, stats.mode & 0o7777);
}

/**
 * Follow symlinks to the file they point at
 */
export async function resolveRealPath(filePath: string): Promise<string> {
  return fs.realpath(filePath);
}

/**
 * Delete a file, doing nothing if it is already gone
 */
export async function removeFileIfExists(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw error;
    }
  }
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

/**
 * Check if a path exists and is a regular file (not a directory)
 */
export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Get the size of a file in bytes, 0 if it cannot be read
 */
export async function getFileSize(filePath: string): Promise<number> {
  try {
    const stats = await fs.stat(filePath);
    return stats.size;
  } catch {
    return 0;
  }
}

/**
 * Get the pdfshrink config directory (~/.pdfshrink)
 */
export function getConfigDir(): string {
  return path.join(os.homedir(), '.pdfshrink');
}

/**
 * Get the global config file path
 */
export function getGlobalConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
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
