import { makeHit } from './testing';
import { buildPrompt, parseGeneratedAnswer, referenceFor } from './prompt';

describe('buildPrompt', () => {
  it('numbers excerpts with their provenance and ends with the JSON instructions', () => {
    const prompt = buildPrompt('Why did the disk fill up?', [
      makeHit('app.log', 2, 3, 'ERROR disk full'),
      makeHit('db.log', 10, 10, 'WARN vacuum skipped'),
    ]);

    expect(prompt).toContain('[1] app.log, lines 2-3\nERROR disk full\n\n[2] db.log, lines 10-10\nWARN vacuum skipped');
    expect(prompt).toContain('QUESTION:\nWhy did the disk fill up?\n');
    expect(prompt.split('\n').at(-1)).toBe(
      'Respond with JSON only: {"answer": "...", "references": ["app.log: lines 10-20"]}',
    );
  });
});

describe('referenceFor', () => {
  it('formats file and line range', () => {
    expect(referenceFor({ sourceFile: 'app.log', lineStart: 4, lineEnd: 9 })).toBe('app.log: lines 4-9');
  });
});

describe('parseGeneratedAnswer', () => {
  it('reads the requested JSON', () => {
    expect(
      parseGeneratedAnswer('{"answer": "The disk filled up.", "references": ["app.log: lines 2-3"]}'),
    ).toEqual({ answer: 'The disk filled up.', references: ['app.log: lines 2-3'] });
  });

  it('tolerates code fences and missing references', () => {
    expect(parseGeneratedAnswer('```json\n{"answer": "No errors."}\n```')).toEqual({
      answer: 'No errors.',
      references: [],
    });
  });

  it('mines fields out of almost-JSON', () => {
    const reply = 'Sure! {"answer": "Disk full at 10:03", "references": ["app.log: lines 2-3",]}';
    expect(parseGeneratedAnswer(reply)).toEqual({
      answer: 'Disk full at 10:03',
      references: ['app.log: lines 2-3'],
    });
  });

  it('falls back to the raw reply', () => {
    expect(parseGeneratedAnswer('  The logs show a disk failure.  ')).toEqual({
      answer: 'The logs show a disk failure.',
      references: [],
    });
  });
});
