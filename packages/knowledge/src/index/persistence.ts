import { readFileSync, statSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ensureDir } from 'fs-extra';
import { z } from 'zod';
import { StorageError } from '@logkb/shared';
import type { Chunk } from '../types';
import { decodeVectorFileHeader, encodeVectorFile } from './vector-file';
import { VectorIndex } from './vector-index';
import { InMemoryVectorSource, PagedFileVectorSource } from './vector-source';
import type { VectorSource } from './vector-source';

export const CHUNKS_FILE = 'chunks.jsonl';
export const VECTORS_FILE = 'vectors.bin';
export const METADATA_FILE = 'metadata.json';

export const ChunkRecordSchema = z.object({
  chunkId: z.string().min(1),
  sourceFile: z.string(),
  lineStart: z.number().int().positive(),
  lineEnd: z.number().int().positive(),
  text: z.string(),
  contentHash: z.string().min(1),
  timestampRange: z.tuple([z.string(), z.string()]).nullable().default(null),
});

export const KnowledgeBaseMetadataSchema = z.object({
  schemaVersion: z.literal(1),
  issueId: z.string(),
  generation: z.string(),
  modelId: z.string(),
  dimensions: z.number().int().positive(),
  chunkCount: z.number().int().min(0),
  sourceFiles: z.array(z.string()),
  buildMode: z.enum(['rebuild', 'append']),
  builtAt: z.string(),
  /** Every model the knowledge base has been built with, oldest first. */
  modelsHistory: z.array(z.object({ modelId: z.string(), since: z.string() })),
  /** Chunking parameters the chunks were cut with; chunks are only reused under the same ones. */
  chunking: z
    .object({ chunkSize: z.number().int().positive(), overlap: z.number().int().min(0) })
    .optional(),
});

export type KnowledgeBaseMetadata = z.infer<typeof KnowledgeBaseMetadataSchema>;

export interface IndexReadOptions {
  /** Vector files up to this size are read whole; larger ones are paged. */
  inMemoryMaxBytes: number;
  pageSizeVectors: number;
  maxCachedPages: number;
}

/**
 * Writes the three files of a committed index into `dir`, which must be a
 * fresh directory nobody reads yet.
 */
export async function writeIndexFiles(
  dir: string,
  index: VectorIndex,
  metadata: KnowledgeBaseMetadata,
): Promise<void> {
  await ensureDir(dir);
  const lines = index.allChunks().map((chunk) => JSON.stringify(chunk) + '\n');
  await writeFile(join(dir, CHUNKS_FILE), lines.join(''), 'utf8');
  await writeFile(
    join(dir, VECTORS_FILE),
    encodeVectorFile(index.modelId, index.dimensions, index.size, (i) => index.vector(i)),
  );
  await writeFile(join(dir, METADATA_FILE), JSON.stringify(metadata, null, 2) + '\n', 'utf8');
}

export function readMetadata(dir: string): KnowledgeBaseMetadata {
  const path = join(dir, METADATA_FILE);
  try {
    return KnowledgeBaseMetadataSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
  } catch (error) {
    throw new StorageError(`Failed to read knowledge base metadata at ${path}`, { cause: error });
  }
}

export function readChunks(dir: string): Chunk[] {
  const path = join(dir, CHUNKS_FILE);
  let content: string;
  try {
    content = readFileSync(path, 'utf8');
  } catch (error) {
    throw new StorageError(`Failed to read chunk records at ${path}`, { cause: error });
  }

  const chunks: Chunk[] = [];
  content.split('\n').forEach((line, i) => {
    if (line.trim() === '') return;
    let record: unknown;
    try {
      record = JSON.parse(line);
    } catch (error) {
      throw new StorageError(`Malformed chunk record at ${path}:${i + 1}`, { cause: error });
    }
    const parsed = ChunkRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new StorageError(`Invalid chunk record at ${path}:${i + 1}`, {
        details: parsed.error.flatten(),
      });
    }
    chunks.push(parsed.data);
  });
  return chunks;
}

function openVectorSource(
  path: string,
  options: IndexReadOptions,
): { source: VectorSource; modelId: string } {
  const size = statSync(path).size;
  if (size > options.inMemoryMaxBytes) {
    const source = new PagedFileVectorSource(path, options);
    return { source, modelId: source.modelId };
  }

  const buffer = readFileSync(path);
  const header = decodeVectorFileHeader(buffer, buffer.length, path);
  const data = new Float32Array(header.count * header.dimensions);
  for (let i = 0; i < data.length; i++) {
    data[i] = buffer.readFloatLE(header.dataOffset + i * 4);
  }
  return {
    source: InMemoryVectorSource.fromBuffer(header.dimensions, data),
    modelId: header.modelId,
  };
}

/**
 * Opens a committed index read-only. Synchronous, so a caller that opens and
 * searches without awaiting in between cannot observe a generation being
 * pruned underneath it.
 */
export function loadIndex(dir: string, options: IndexReadOptions): VectorIndex {
  const metadata = readMetadata(dir);
  const chunks = readChunks(dir);
  const { source, modelId } = openVectorSource(join(dir, VECTORS_FILE), options);

  if (
    modelId !== metadata.modelId ||
    source.dimensions !== metadata.dimensions ||
    source.size !== chunks.length
  ) {
    source.close();
    throw new StorageError(
      `Index at ${dir} is inconsistent: ${chunks.length} chunk records and ${source.size} vectors of model "${modelId}", metadata says "${metadata.modelId}"`,
    );
  }
  return new VectorIndex(metadata.modelId, metadata.dimensions, chunks, source);
}
