import { closeSync, fstatSync, openSync, readSync } from 'node:fs';
import { LRUCache, ModelMismatchError } from '@logkb/shared';
import { FIXED_HEADER_BYTES, decodeVectorFileHeader, headerLength } from './vector-file';
import type { VectorFileHeader } from './vector-file';

function readAt(fd: number, position: number, length: number): Buffer {
  const buffer = Buffer.alloc(length);
  let read = 0;
  while (read < length) {
    const n = readSync(fd, buffer, read, length - read, position + read);
    if (n === 0) break;
    read += n;
  }
  return read === length ? buffer : buffer.subarray(0, read);
}

function readHeader(fd: number, path: string): VectorFileHeader {
  const fileSize = fstatSync(fd).size;
  const fixed = readAt(fd, 0, Math.min(FIXED_HEADER_BYTES, fileSize));
  const head = readAt(fd, 0, Math.min(headerLength(fixed), fileSize));
  return decodeVectorFileHeader(head, fileSize, path);
}

/**
 * Read-only random access to a fixed-size array of equal-length vectors.
 * Positions are stable for the lifetime of the source.
 */
export interface VectorSource {
  readonly dimensions: number;
  readonly size: number;
  get(index: number): Float32Array;
  close(): void;
}

/**
 * Vectors held in one contiguous, growable Float32Array.
 */
export class InMemoryVectorSource implements VectorSource {
  private data: Float32Array;
  private count = 0;

  constructor(
    readonly dimensions: number,
    initialCapacity = 16,
  ) {
    this.data = new Float32Array(Math.max(1, initialCapacity) * dimensions);
  }

  static from(source: VectorSource): InMemoryVectorSource {
    const copy = new InMemoryVectorSource(source.dimensions, source.size);
    for (let i = 0; i < source.size; i++) {
      copy.push(source.get(i));
    }
    return copy;
  }

  /** Wraps already-decoded rows without copying. */
  static fromBuffer(dimensions: number, data: Float32Array): InMemoryVectorSource {
    const source = new InMemoryVectorSource(dimensions, 1);
    source.data = data;
    source.count = dimensions === 0 ? 0 : data.length / dimensions;
    return source;
  }

  get size(): number {
    return this.count;
  }

  get(index: number): Float32Array {
    if (!Number.isInteger(index) || index < 0 || index >= this.count) {
      throw new RangeError(`Vector index ${index} out of range [0, ${this.count})`);
    }
    return this.data.subarray(index * this.dimensions, (index + 1) * this.dimensions);
  }

  push(vector: ArrayLike<number>): number {
    if (vector.length !== this.dimensions) {
      throw new ModelMismatchError(
        `Vector of dimension ${vector.length} does not fit an index of dimension ${this.dimensions}`,
      );
    }
    const needed = (this.count + 1) * this.dimensions;
    if (needed > this.data.length) {
      const grown = new Float32Array(Math.max(needed, this.data.length * 2));
      grown.set(this.data);
      this.data = grown;
    }
    this.data.set(vector, this.count * this.dimensions);
    return this.count++;
  }

  close(): void {}
}

export interface PagedVectorSourceOptions {
  pageSizeVectors: number;
  maxCachedPages: number;
}

/**
 * Reads a `vectors.bin` file on demand, a page of rows at a time, keeping the
 * most recently used pages in memory. Suitable for indexes that should not be
 * loaded whole; a linear scan touches each page once.
 */
export class PagedFileVectorSource implements VectorSource {
  readonly dimensions: number;
  readonly size: number;
  readonly modelId: string;
  private fd: number | null;
  private readonly dataOffset: number;
  private readonly pageSize: number;
  private readonly pages: LRUCache<number, Float32Array>;

  constructor(
    private readonly path: string,
    options: PagedVectorSourceOptions,
  ) {
    const fd = openSync(path, 'r');
    let header: VectorFileHeader;
    try {
      header = readHeader(fd, path);
    } catch (error) {
      closeSync(fd);
      throw error;
    }
    this.dimensions = header.dimensions;
    this.size = header.count;
    this.modelId = header.modelId;
    this.dataOffset = header.dataOffset;
    this.fd = fd;
    this.pageSize = options.pageSizeVectors;
    this.pages = new LRUCache(options.maxCachedPages);
  }

  get(index: number): Float32Array {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(`Vector index ${index} out of range [0, ${this.size})`);
    }
    const pageNumber = Math.floor(index / this.pageSize);
    const page = this.pages.get(pageNumber) ?? this.loadPage(pageNumber);
    const offset = (index - pageNumber * this.pageSize) * this.dimensions;
    return page.subarray(offset, offset + this.dimensions);
  }

  /** Number of pages currently held in memory. */
  get cachedPages(): number {
    return this.pages.size;
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
    this.pages.clear();
  }

  private loadPage(pageNumber: number): Float32Array {
    if (this.fd === null) {
      throw new Error(`Vector source ${this.path} is closed`);
    }
    const first = pageNumber * this.pageSize;
    const rows = Math.min(this.pageSize, this.size - first);
    const rowBytes = this.dimensions * 4;
    const bytes = readAt(this.fd, this.dataOffset + first * rowBytes, rows * rowBytes);

    const page = new Float32Array(rows * this.dimensions);
    for (let i = 0; i < page.length; i++) {
      page[i] = bytes.readFloatLE(i * 4);
    }
    this.pages.set(pageNumber, page);
    return page;
  }
}
