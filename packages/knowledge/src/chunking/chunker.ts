import { createHash } from 'crypto';
import { ConfigError } from '@logkb/shared';
import type { Chunk, ChunkingOptions } from '../types';
import { timestampRange } from './timestamps';

export function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

export function chunkIdFor(sourceFile: string, lineStart: number, lineEnd: number): string {
  return sha256(`${sourceFile}:${lineStart}-${lineEnd}`).slice(0, 24);
}

export function validateChunkingOptions({ chunkSize, overlap }: ChunkingOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigError(`overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new ConfigError(
      `overlap (${overlap}) must be strictly less than chunkSize (${chunkSize})`,
    );
  }
}

function splitLines(text: string): string[] {
  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Splits log text into overlapping, line-aligned chunks.
 *
 * Lines are accumulated until their weight (length + 1 for the newline)
 * reaches `chunkSize`; a chunk always holds at least one line. The next chunk
 * starts by stepping back over whole lines until at least `overlap` characters
 * are repeated, but always after the previous chunk's first line, so every
 * line is covered and the walk always advances.
 *
 * Pure: identical input and options yield identical boundaries and ids.
 */
export function chunkLogText(text: string, sourceFile: string, options: ChunkingOptions): Chunk[] {
  validateChunkingOptions(options);
  const { chunkSize, overlap } = options;

  const lines = splitLines(text);
  const weight = (i: number) => (lines[i]?.length ?? 0) + 1;
  const chunks: Chunk[] = [];

  let start = 0;
  while (start < lines.length) {
    let end = start;
    let size = 0;
    do {
      size += weight(end);
      end++;
    } while (end < lines.length && size < chunkSize);

    const chunkText = lines.slice(start, end).join('\n');
    if (chunkText.trim().length > 0) {
      const lineStart = start + 1;
      const lineEnd = end;
      chunks.push({
        chunkId: chunkIdFor(sourceFile, lineStart, lineEnd),
        sourceFile,
        lineStart,
        lineEnd,
        text: chunkText,
        contentHash: sha256(chunkText),
        timestampRange: timestampRange(chunkText),
      });
    }

    if (end >= lines.length) {
      break;
    }

    let next = end;
    let covered = 0;
    while (covered < overlap && next - 1 > start) {
      next--;
      covered += weight(next);
    }
    start = next;
  }

  return chunks;
}
