import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import { join } from 'path';
import { atomicCreate, atomicWrite, atomicWriteJson, readJsonIfExists } from './io';

describe('fs/io', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  it('creates parent directories and replaces content atomically', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'logkb-io-'));
    const target = join(tmpDir, 'a', 'b', 'CURRENT');

    await atomicWrite(target, 'gen-1');
    await atomicWrite(target, 'gen-2');

    expect(await fs.readFile(target, 'utf8')).toBe('gen-2');
    expect(await fs.readdir(join(tmpDir, 'a', 'b'))).toEqual(['CURRENT']);
  });

  it('round-trips JSON and returns null for missing files', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'logkb-io-'));
    const target = join(tmpDir, 'status.json');

    expect(await readJsonIfExists(target)).toBeNull();
    await atomicWriteJson(target, { status: 'succeeded', count: 3 });
    expect(await readJsonIfExists(target)).toEqual({ status: 'succeeded', count: 3 });
  });

  it('creates a file once and never replaces it', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'logkb-io-'));
    const target = join(tmpDir, 'raw', 'app.log');

    const results = await Promise.all([
      atomicCreate(target, 'first'),
      atomicCreate(target, 'second'),
      atomicCreate(target, 'third'),
    ]);

    expect(results.filter(Boolean)).toHaveLength(1);
    const winner = ['first', 'second', 'third'][results.indexOf(true)];
    expect(await fs.readFile(target, 'utf8')).toBe(winner);
    expect(await atomicCreate(target, 'later')).toBe(false);
    expect(await fs.readFile(target, 'utf8')).toBe(winner);
    expect(await fs.readdir(join(tmpDir, 'raw'))).toEqual(['app.log']);
  });
});
