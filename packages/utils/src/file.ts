/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import {
  mkdir,
  writeFile,
  readFile,
  readdir,
  stat,
  symlink,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import { promisify } from 'node:util';
import { gunzip, gzip } from 'node:zlib';
import { dirname, join, relative } from 'node:path';

const gunzipAsync = promisify(gunzip);
const gzipAsync = promisify(gzip);

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely write a file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content);
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Check whether a path exists (a dangling symlink counts as missing)
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

/**
 * Read and decompress a gzip text file
 */
export async function readGzipFile(filePath: string): Promise<string> {
  const compressed = await readFile(filePath);
  const content = await gunzipAsync(compressed);
  return content.toString('utf8');
}

/**
 * Compress and write a text file, ensuring the directory exists
 */
export async function writeGzipFile(filePath: string, content: string): Promise<void> {
  const compressed = await gzipAsync(Buffer.from(content, 'utf8'));
  await safeWriteFile(filePath, compressed);
}

/**
 * Copy a file to a new location
 */
export async function copyFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  await fsCopyFile(source, destination);
}

/**
 * Create a symlink at `destination` pointing to `source` by a relative path
 */
export async function symlinkRelative(
  source: string,
  destination: string
): Promise<void> {
  const linkDir = dirname(destination);
  await ensureDir(linkDir);
  await symlink(relative(linkDir, source), destination);
}

/**
 * Recursively list files under `root` whose basename is `name`, sorted.
 * A missing root yields an empty list.
 */
export async function findFiles(root: string, name: string): Promise<string[]> {
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    let entries;
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return;
      }
      throw error;
    }

    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(path);
      } else if (entry.name === name) {
        found.push(path);
      }
    }
  }

  await walk(root);
  return found.sort();
}
