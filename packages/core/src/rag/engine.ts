import { logger as defaultLogger } from '@logkb/shared';
import type { KnowledgeBaseConfig, Logger } from '@logkb/shared';
import type { Retriever, SearchHit } from '@logkb/knowledge';
import type { SessionStore } from '../session/session-store';
import { buildPrompt, parseGeneratedAnswer, referenceFor } from './prompt';
import type { RagQuery, RagResult, TextGenerator } from './types';

export const NO_RELEVANT_DATA_ANSWER = 'No relevant log data found for this query.';

export interface RagEngineOptions {
  retriever: Pick<Retriever, 'retrieve'>;
  generator: TextGenerator;
  logger?: Logger;
  /** When set, every answered question and its answer are appended to the issue's history. */
  history?: Pick<SessionStore, 'append'>;
}

/**
 * Retrieve, then generate: the top excerpts of an issue's knowledge base are
 * assembled into a prompt for the injected text generator.
 */
export class RagEngine {
  private readonly retriever: Pick<Retriever, 'retrieve'>;
  private readonly generator: TextGenerator;
  private readonly logger: Logger;
  private readonly history: Pick<SessionStore, 'append'> | undefined;

  constructor(options: RagEngineOptions) {
    this.retriever = options.retriever;
    this.generator = options.generator;
    this.logger = options.logger ?? defaultLogger;
    this.history = options.history;
  }

  async query(query: RagQuery, config: KnowledgeBaseConfig): Promise<RagResult> {
    const result = await this.answer(query, config);
    if (this.history && query.record !== false) {
      await this.history.append(query.issueId, { role: 'user', content: query.question });
      await this.history.append(query.issueId, {
        role: 'assistant',
        content: result.answer,
        references: result.references,
        metadata: {
          topK: result.metadata.topK,
          chunksRetrieved: result.metadata.chunksRetrieved,
          fallback: result.metadata.fallback,
        },
      });
    }
    return result;
  }

  private async answer(query: RagQuery, config: KnowledgeBaseConfig): Promise<RagResult> {
    const started = Date.now();
    const topK = query.topK ?? config.retrieval.topK;
    const log = this.logger.child({ issueId: query.issueId });

    const chunks = await this.retriever.retrieve(query.issueId, query.question, topK, config, {
      modelId: query.modelId,
      signal: query.signal,
    });
    const metadata = (fallback: boolean): RagResult['metadata'] => ({
      issueId: query.issueId,
      question: query.question,
      topK,
      chunksRetrieved: chunks.length,
      fallback,
      timestamp: new Date().toISOString(),
      durationMs: Date.now() - started,
    });

    if (chunks.length === 0) {
      return { answer: NO_RELEVANT_DATA_ANSWER, references: [], chunks, metadata: metadata(false) };
    }

    await log.debug(`Generating an answer from ${chunks.length} excerpt(s)`);
    let reply: string;
    try {
      reply = await this.generator.generate(buildPrompt(query.question, chunks), {
        signal: query.signal,
      });
    } catch (error) {
      if (query.signal?.aborted || !(error instanceof Error)) {
        throw error;
      }
      await log.error(error, 'Answer generation failed; returning the retrieved excerpts');
      return {
        answer: fallbackAnswer(chunks, error.message),
        references: chunks.map(referenceFor),
        chunks,
        metadata: metadata(true),
      };
    }

    const generated = parseGeneratedAnswer(reply);
    return {
      answer: generated.answer,
      references: generated.references.length > 0 ? generated.references : chunks.map(referenceFor),
      chunks,
      metadata: metadata(false),
    };
  }
}

function fallbackAnswer(chunks: SearchHit[], reason: string): string {
  const ranges = new Map<string, string[]>();
  for (const chunk of chunks) {
    const list = ranges.get(chunk.sourceFile) ?? [];
    list.push(`lines ${chunk.lineStart}-${chunk.lineEnd}`);
    ranges.set(chunk.sourceFile, list);
  }
  const lines = [...ranges].map(([file, list]) => `- ${file}: ${list.join(', ')}`);
  return [
    `An answer could not be generated (${reason}). The most relevant log excerpts are:`,
    ...lines,
  ].join('\n');
}
