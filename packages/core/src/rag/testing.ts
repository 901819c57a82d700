import type { SearchHit } from '@logkb/knowledge';

export function makeHit(
  sourceFile: string,
  lineStart: number,
  lineEnd: number,
  text: string,
  score = 0.5,
): SearchHit {
  return {
    chunkId: `${sourceFile}:${lineStart}-${lineEnd}`,
    sourceFile,
    lineStart,
    lineEnd,
    text,
    contentHash: `hash-${sourceFile}-${lineStart}`,
    timestampRange: null,
    score,
  };
}
