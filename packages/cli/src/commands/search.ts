import type { Command } from 'commander';
import { referenceFor } from '@logkb/core';
import type { SearchHit } from '@logkb/knowledge';
import { withRuntime } from '../runtime';
import type { CliContext, GlobalOptions } from '../types';
import { parsePositiveInt } from '../utils/parse';

interface SearchOptions {
  topk?: string;
}

export function registerSearchCommand(program: Command, context: CliContext) {
  program
    .command('search <issueId> <query...>')
    .description("Find the log chunks most similar to a query in an issue's knowledge base")
    .option('--topk <n>', 'Number of chunks to return (default: retrieval.topK)')
    .action(async (issueId: string, words: string[], options: SearchOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const flags =
        options.topk === undefined ? {} : { retrieval: { topK: parsePositiveInt(options.topk, '--topk') } };

      await withRuntime(globalOpts, context, flags, async ({ retriever, renderer, config }) => {
        const query = words.join(' ');
        const topK = config.retrieval.topK;
        const hits = await retriever.retrieve(issueId, query, topK, config);

        renderer.render({ issueId, query, topK, hits }, (result) => {
          if (result.hits.length === 0) {
            renderer.line('No matching chunks.');
            return;
          }
          result.hits.forEach((hit: SearchHit, i) => {
            renderer.line(`${i + 1}. ${referenceFor(hit)} (score ${hit.score.toFixed(3)})`);
            for (const line of hit.text.split('\n')) {
              renderer.line(`   ${line}`);
            }
          });
        });
      });
    });
}
