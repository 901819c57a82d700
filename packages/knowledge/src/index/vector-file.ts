import { StorageError } from '@logkb/shared';

/**
 * Binary layout of `vectors.bin`:
 *
 * | bytes | field |
 * | --- | --- |
 * | 4 | magic `LKBV` |
 * | 4 | format version (u32 LE) |
 * | 4 | dimension (u32 LE) |
 * | 4 | vector count (u32 LE) |
 * | 4 | model id byte length (u32 LE) |
 * | n | model id (UTF-8) |
 * | 0-7 | zero padding up to a multiple of 8 |
 * | count * dimension * 4 | float32 LE rows, positionally aligned with `chunks.jsonl` |
 */
export const VECTOR_FILE_MAGIC = 'LKBV';
export const VECTOR_FILE_VERSION = 1;
const FIXED_HEADER_BYTES = 20;

export interface VectorFileHeader {
  version: number;
  dimensions: number;
  count: number;
  modelId: string;
  /** Byte offset of the first row */
  dataOffset: number;
}

function align8(n: number): number {
  return Math.ceil(n / 8) * 8;
}

export function encodeVectorFile(
  modelId: string,
  dimensions: number,
  count: number,
  row: (index: number) => ArrayLike<number>,
): Buffer {
  const modelBytes = Buffer.from(modelId, 'utf8');
  const dataOffset = align8(FIXED_HEADER_BYTES + modelBytes.length);
  const buffer = Buffer.alloc(dataOffset + count * dimensions * 4);

  buffer.write(VECTOR_FILE_MAGIC, 0, 'ascii');
  buffer.writeUInt32LE(VECTOR_FILE_VERSION, 4);
  buffer.writeUInt32LE(dimensions, 8);
  buffer.writeUInt32LE(count, 12);
  buffer.writeUInt32LE(modelBytes.length, 16);
  modelBytes.copy(buffer, FIXED_HEADER_BYTES);

  let offset = dataOffset;
  for (let i = 0; i < count; i++) {
    const vector = row(i);
    for (let d = 0; d < dimensions; d++) {
      buffer.writeFloatLE(vector[d] ?? 0, offset);
      offset += 4;
    }
  }
  return buffer;
}

/**
 * Parses the header. `head` must hold at least the fixed header and the model
 * id; `fileSize` is checked against the declared row count.
 */
export function decodeVectorFileHeader(head: Buffer, fileSize: number, path: string): VectorFileHeader {
  if (head.length < FIXED_HEADER_BYTES || head.toString('ascii', 0, 4) !== VECTOR_FILE_MAGIC) {
    throw new StorageError(`${path} is not a vector file`);
  }
  const version = head.readUInt32LE(4);
  if (version !== VECTOR_FILE_VERSION) {
    throw new StorageError(`${path} has unsupported vector file version ${version}`);
  }
  const dimensions = head.readUInt32LE(8);
  const count = head.readUInt32LE(12);
  const modelLength = head.readUInt32LE(16);
  if (head.length < FIXED_HEADER_BYTES + modelLength) {
    throw new StorageError(`${path} has a truncated header`);
  }
  const modelId = head.toString('utf8', FIXED_HEADER_BYTES, FIXED_HEADER_BYTES + modelLength);
  const dataOffset = align8(FIXED_HEADER_BYTES + modelLength);

  const expectedSize = dataOffset + count * dimensions * 4;
  if (fileSize !== expectedSize) {
    throw new StorageError(
      `${path} is ${fileSize} bytes, expected ${expectedSize} for ${count} vectors of dimension ${dimensions}`,
    );
  }
  return { version, dimensions, count, modelId, dataOffset };
}

/** Bytes needed to decode the header, given the first FIXED_HEADER_BYTES of the file. */
export function headerLength(fixedHead: Buffer): number {
  return fixedHead.length < FIXED_HEADER_BYTES
    ? FIXED_HEADER_BYTES
    : FIXED_HEADER_BYTES + fixedHead.readUInt32LE(16);
}

export { FIXED_HEADER_BYTES };
