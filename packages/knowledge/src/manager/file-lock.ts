import { promises as fs } from 'fs';
import { hostname } from 'os';
import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import { StorageError, ensureDir } from '@logkb/shared';

const LockInfoSchema = z.object({
  pid: z.number().int(),
  hostname: z.string(),
  acquiredAt: z.string(),
});

export type LockInfo = z.infer<typeof LockInfoSchema>;

export interface FileLockOptions {
  /** How long to wait for another holder before giving up. */
  timeoutMs?: number;
  pollMs?: number;
  /** A lock file that cannot be parsed is taken over once it is this old. */
  unreadableGraceMs?: number;
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return errorCode(error) !== 'ESRCH';
  }
}

/**
 * An exclusive lock held by this process through a file created with the
 * `wx` flag. Other processes see the file and wait until it is removed.
 */
export class FileLock {
  private released = false;

  constructor(readonly path: string) {}

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await fs.rm(this.path, { force: true });
  }
}

/** Reads the holder of a lock file, or null when it is missing or unreadable. */
export async function readLockInfo(path: string): Promise<LockInfo | null> {
  try {
    const parsed = LockInfoSchema.safeParse(JSON.parse(await fs.readFile(path, 'utf8')));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    if (errorCode(error) === 'ENOENT' || error instanceof SyntaxError) return null;
    throw error;
  }
}

/**
 * True when the lock at `path` can be taken over: its holder ran on this host
 * and is gone, or the file stayed unreadable for longer than the grace period.
 */
async function isStale(path: string, unreadableGraceMs: number): Promise<boolean> {
  const info = await readLockInfo(path);
  if (info) {
    return info.hostname === hostname() && !processAlive(info.pid);
  }
  try {
    const stat = await fs.stat(path);
    return Date.now() - stat.mtimeMs > unreadableGraceMs;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return false;
    throw error;
  }
}

/**
 * Creates the lock file at `path`, waiting while another process holds it.
 * Locks left behind by a crashed process on this host are taken over.
 */
export async function acquireFileLock(path: string, options: FileLockOptions = {}): Promise<FileLock> {
  const { timeoutMs = 10 * 60_000, pollMs = 100, unreadableGraceMs = 5_000 } = options;
  const deadline = Date.now() + timeoutMs;
  await ensureDir(path);

  for (;;) {
    const info: LockInfo = { pid: process.pid, hostname: hostname(), acquiredAt: new Date().toISOString() };
    try {
      await fs.writeFile(path, JSON.stringify(info), { flag: 'wx' });
      return new FileLock(path);
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw new StorageError(`Failed to create lock file ${path}`, { cause: error });
      }
    }

    if (await isStale(path, unreadableGraceMs)) {
      await fs.rm(path, { force: true });
      continue;
    }
    if (Date.now() >= deadline) {
      const holder = await readLockInfo(path);
      throw new StorageError(
        `Timed out waiting for lock ${path}` +
          (holder ? ` held by pid ${holder.pid} on ${holder.hostname} since ${holder.acquiredAt}` : ''),
      );
    }
    await sleep(pollMs);
  }
}
