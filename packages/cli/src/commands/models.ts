import type { Command } from 'commander';
import { listEmbeddingProviders } from '@logkb/adapters';
import { withRuntime } from '../runtime';
import type { CliContext, GlobalOptions } from '../types';

export function registerModelsCommand(program: Command, context: CliContext) {
  program
    .command('models')
    .description('List the embedding providers and example model ids')
    .action(async (_options: unknown, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      await withRuntime(globalOpts, context, {}, async ({ renderer, config }) => {
        const result = { defaultModelId: config.embeddings.modelId, providers: listEmbeddingProviders() };
        renderer.render(result, (r) => {
          renderer.table(
            r.providers.map((p): [string, string] => [
              p.provider,
              [p.description, ...p.exampleModelIds.map((id) => `  ${id}`)].join('\n'),
            ]),
            ['Provider', 'Models'],
          );
          renderer.line(`Configured model: ${r.defaultModelId}`);
          renderer.hint('Model ids read <provider>:<model>:<dimensions>.');
        });
      });
    });
}
