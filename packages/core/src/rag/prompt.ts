import { z } from 'zod';
import type { SearchHit } from '@logkb/knowledge';

const GeneratedAnswerSchema = z.object({
  answer: z.string(),
  references: z.array(z.string()).default([]),
});

export type GeneratedAnswer = z.infer<typeof GeneratedAnswerSchema>;

export function referenceFor(hit: Pick<SearchHit, 'sourceFile' | 'lineStart' | 'lineEnd'>): string {
  return `${hit.sourceFile}: lines ${hit.lineStart}-${hit.lineEnd}`;
}

/**
 * Numbered excerpts with their provenance, the question, and instructions to
 * answer as JSON with citations.
 */
export function buildPrompt(question: string, hits: SearchHit[]): string {
  const excerpts = hits.map(
    (hit, i) => `[${i + 1}] ${hit.sourceFile}, lines ${hit.lineStart}-${hit.lineEnd}\n${hit.text}`,
  );
  return [
    'You are an expert log analyst. Answer the question using only the log excerpts below.',
    '',
    'LOG EXCERPTS:',
    excerpts.join('\n\n'),
    '',
    'QUESTION:',
    question,
    '',
    'Cite the files and line ranges your answer relies on. If the excerpts do not contain the answer, say so.',
    'Respond with JSON only: {"answer": "...", "references": ["app.log: lines 10-20"]}',
  ].join('\n');
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Reads the generator's reply. Code fences around the JSON are tolerated;
 * a reply that is not the requested JSON is mined for its `answer` and
 * `references` fields, and otherwise used verbatim as the answer.
 */
export function parseGeneratedAnswer(text: string): GeneratedAnswer {
  const unfenced = text
    .trim()
    .replace(/^```(?:json)?\s*/, '')
    .replace(/\s*```$/, '');

  const parsed = GeneratedAnswerSchema.safeParse(parseJson(unfenced));
  if (parsed.success) {
    return parsed.data;
  }

  const answerMatch = /"answer"\s*:\s*"((?:[^"\\]|\\.)*)"/s.exec(text);
  const referencesMatch = /"references"\s*:\s*\[(.*?)\]/s.exec(text);
  const references = referencesMatch
    ? [...referencesMatch[1].matchAll(/"([^"]+)"/g)].map((match) => match[1])
    : [];
  return { answer: answerMatch ? answerMatch[1] : text.trim(), references };
}
