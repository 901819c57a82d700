import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir, pathExists } from 'fs-extra';

/**
 * Ensures the parent directory of `path` exists.
 */
export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes through a temporary sibling and renames it into place, so readers see
 * either the old content or the new content, never a torn file.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path), prefix: '.tmp-' });
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Like `atomicWrite`, but the final step is a hard link that fails with
 * `EEXIST` when `path` already exists, so an existing file is never replaced.
 * Returns false in that case.
 */
export async function atomicCreate(path: string, content: string | Buffer): Promise<boolean> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path), prefix: '.tmp-' });
  try {
    await fs.writeFile(tempPath, content, { flag: 'wx' });
    await fs.link(tempPath, path);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  } finally {
    await fs.rm(tempPath, { force: true });
  }
}

export async function atomicWriteJson(path: string, value: unknown): Promise<void> {
  await atomicWrite(path, JSON.stringify(value, null, 2) + '\n');
}

/**
 * Reads and parses a JSON file, or returns `null` when it does not exist.
 */
export async function readJsonIfExists(path: string): Promise<unknown> {
  if (!(await pathExists(path))) {
    return null;
  }
  const content = await fs.readFile(path, 'utf8');
  return JSON.parse(content) as unknown;
}
