import { createHash } from 'crypto';
import { ConfigError } from '@logkb/shared';
import { chunkLogText } from './chunker';

const bounds = (text: string, chunkSize: number, overlap: number) =>
  chunkLogText(text, 'app.log', { chunkSize, overlap }).map((c) => [c.lineStart, c.lineEnd]);

const FIVE_LINES = ['aaaa', 'bbbb', 'cccc', 'dddd', 'eeee'].join('\n');

describe('chunkLogText', () => {
  it('returns no chunks for empty or whitespace-only input', () => {
    expect(chunkLogText('', 'app.log', { chunkSize: 10, overlap: 2 })).toEqual([]);
    expect(chunkLogText('\n  \n', 'app.log', { chunkSize: 10, overlap: 2 })).toEqual([]);
  });

  it.each([
    [{ chunkSize: 10, overlap: 10 }],
    [{ chunkSize: 10, overlap: 11 }],
    [{ chunkSize: 0, overlap: 0 }],
    [{ chunkSize: 10.5, overlap: 1 }],
    [{ chunkSize: 10, overlap: -1 }],
  ])('rejects %o before chunking', (options) => {
    expect(() => chunkLogText(FIVE_LINES, 'app.log', options)).toThrow(ConfigError);
  });

  it('accumulates lines until the chunk size is reached and steps back by the overlap', () => {
    // Each line weighs 5 characters including its newline.
    expect(bounds(FIVE_LINES, 10, 5)).toEqual([
      [1, 2],
      [2, 3],
      [3, 4],
      [4, 5],
    ]);
  });

  it('produces adjacent chunks without overlap', () => {
    expect(bounds(FIVE_LINES, 10, 0)).toEqual([
      [1, 2],
      [3, 4],
      [5, 5],
    ]);
  });

  it('keeps an over-long line as its own chunk and never steps back before a chunk start', () => {
    const text = ['x'.repeat(50), 'short', 'line'].join('\n');
    expect(bounds(text, 20, 10)).toEqual([
      [1, 1],
      [2, 3],
    ]);
  });

  it('covers every line', () => {
    const text = Array.from({ length: 37 }, (_, i) => `line ${i} ${'z'.repeat(i % 7)}`).join('\n');
    const chunks = chunkLogText(text, 'app.log', { chunkSize: 45, overlap: 12 });
    const covered = new Set<number>();
    for (const chunk of chunks) {
      for (let line = chunk.lineStart; line <= chunk.lineEnd; line++) covered.add(line);
    }
    expect(covered.size).toBe(37);
    expect(chunks[chunks.length - 1]?.lineEnd).toBe(37);
  });

  it('is deterministic', () => {
    const text = 'a\nb\nc\nd\ne\nf\ng';
    expect(chunkLogText(text, 'app.log', { chunkSize: 6, overlap: 2 })).toEqual(
      chunkLogText(text, 'app.log', { chunkSize: 6, overlap: 2 }),
    );
  });

  it('strips carriage returns and fills chunk fields', () => {
    const [chunk, ...rest] = chunkLogText(
      '2024-03-01 10:00:00 INFO up\r\n2024-03-01 10:00:09 ERROR down\r\n',
      'svc/app.log',
      { chunkSize: 800, overlap: 100 },
    );
    const text = '2024-03-01 10:00:00 INFO up\n2024-03-01 10:00:09 ERROR down';

    expect(rest).toEqual([]);
    expect(chunk).toEqual({
      chunkId: createHash('sha256').update('svc/app.log:1-2').digest('hex').slice(0, 24),
      sourceFile: 'svc/app.log',
      lineStart: 1,
      lineEnd: 2,
      text,
      contentHash: createHash('sha256').update(text).digest('hex'),
      timestampRange: ['2024-03-01T10:00:00', '2024-03-01T10:00:09'],
    });
  });
});
