import * as fs from 'fs/promises';
import * as os from 'os';
import { join } from 'path';
import { ModelMismatchError, StorageError } from '@logkb/shared';
import { encodeVectorFile } from './vector-file';
import { InMemoryVectorSource, PagedFileVectorSource } from './vector-source';

describe('InMemoryVectorSource', () => {
  it('grows as vectors are pushed and returns rows by position', () => {
    const source = new InMemoryVectorSource(2, 1);
    expect(source.push([1, 2])).toBe(0);
    expect(source.push([3, 4])).toBe(1);
    expect(source.push([5, 6])).toBe(2);

    expect(source.size).toBe(3);
    expect(Array.from(source.get(2))).toEqual([5, 6]);
    expect(() => source.get(3)).toThrow(RangeError);
    expect(() => source.push([1])).toThrow(ModelMismatchError);
  });
});

describe('PagedFileVectorSource', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'logkb-vectors-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function writeVectors(rows: number[][], modelId = 'test:paged:3'): Promise<string> {
    const path = join(tmpDir, 'vectors.bin');
    await fs.writeFile(path, encodeVectorFile(modelId, 3, rows.length, (i) => rows[i] ?? []));
    return path;
  }

  it('reads rows on demand while holding at most maxCachedPages pages', async () => {
    const rows = [
      [1, 0, 0],
      [0, 1, 0],
      [0, 0, 1],
      [1, 1, 0],
      [0.5, 0.25, 2],
    ];
    const source = new PagedFileVectorSource(await writeVectors(rows), {
      pageSizeVectors: 2,
      maxCachedPages: 1,
    });

    expect(source.modelId).toBe('test:paged:3');
    expect(source.dimensions).toBe(3);
    expect(source.size).toBe(5);
    expect(Array.from(source.get(4))).toEqual([0.5, 0.25, 2]);
    expect(Array.from(source.get(1))).toEqual([0, 1, 0]);
    expect(Array.from(source.get(2))).toEqual([0, 0, 1]);
    expect(source.cachedPages).toBe(1);
    expect(() => source.get(5)).toThrow(RangeError);

    source.close();
    expect(() => source.get(0)).toThrow(/closed/);
  });

  it('rejects files that are not vector files or are truncated', async () => {
    const notVectors = join(tmpDir, 'notes.txt');
    await fs.writeFile(notVectors, 'just some text that is long enough');
    expect(() => new PagedFileVectorSource(notVectors, { pageSizeVectors: 2, maxCachedPages: 1 })).toThrow(
      StorageError,
    );

    const path = await writeVectors([[1, 2, 3]]);
    const bytes = await fs.readFile(path);
    await fs.writeFile(path, bytes.subarray(0, bytes.length - 4));
    expect(() => new PagedFileVectorSource(path, { pageSizeVectors: 2, maxCachedPages: 1 })).toThrow(
      /expected/,
    );
  });
});
