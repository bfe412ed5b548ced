/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import {
  mkdir,
  writeFile,
  readFile,
  rename,
  rm,
  stat,
  appendFile,
  open,
} from 'node:fs/promises';
import { randomBytes } from 'node:crypto';
import { basename, dirname, extname, join } from 'node:path';
import { isErrnoException } from './guards.js';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
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
 * Write a file so that readers only ever see the old or the new content:
 * the data goes to a sibling temp file which is then renamed over the target.
 */
export async function atomicWriteFile(
  filePath: string,
  content: string | Buffer,
  options: { mode?: number } = {}
): Promise<void> {
  await ensureDir(dirname(filePath));
  const tempPath = join(
    dirname(filePath),
    `.${basename(filePath)}.${randomBytes(6).toString('hex')}.tmp`
  );

  try {
    await writeFile(tempPath, content, { mode: options.mode ?? 0o644 });
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Append one line to a file, creating it if necessary
 */
export async function appendLine(filePath: string, line: string): Promise<void> {
  await ensureDir(dirname(filePath));
  await appendFile(filePath, `${line}\n`, 'utf8');
}

/**
 * Check whether a path exists
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Pick a free file name inside a directory.
 * `name.ext` is returned as is when free, else `name-1.ext`, `name-2.ext`, ...
 */
export async function uniqueDestination(dirPath: string, fileName: string): Promise<string> {
  const ext = extname(fileName);
  const stem = basename(fileName, ext);

  let candidate = join(dirPath, fileName);
  for (let suffix = 1; await pathExists(candidate); suffix++) {
    candidate = join(dirPath, `${stem}-${suffix}${ext}`);
  }
  return candidate;
}

/**
 * Move a file to a new location
 */
export async function moveFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  await rename(source, destination);
}

/**
 * Remove a file, ignoring a missing one
 */
export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/**
 * Read the last `count` non-empty lines of a text file.
 * Reads backwards in chunks so large logs are not loaded whole.
 */
export async function readLastLines(filePath: string, count: number): Promise<string[]> {
  if (count <= 0) {
    return [];
  }

  const handle = await open(filePath, 'r').catch((error: unknown) => {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  });
  if (!handle) {
    return [];
  }

  try {
    const { size } = await handle.stat();
    const chunkSize = 64 * 1024;
    let position = size;
    let text = '';

    while (position > 0) {
      const length = Math.min(chunkSize, position);
      position -= length;
      const buffer = Buffer.alloc(length);
      await handle.read(buffer, 0, length, position);
      text = buffer.toString('utf8') + text;

      if (text.split('\n').filter(line => line.trim() !== '').length > count) {
        break;
      }
    }

    const lines = text.split('\n').filter(line => line.trim() !== '');
    return lines.slice(-count);
  } finally {
    await handle.close();
  }
}
