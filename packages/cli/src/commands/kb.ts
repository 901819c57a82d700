import type { Command } from 'commander';
import type { BuildReport, KnowledgeBaseStatus } from '@logkb/knowledge';
import type { OutputRenderer } from '../output/renderer';
import { withRuntime } from '../runtime';
import type { CliContext, GlobalOptions } from '../types';

interface UpdateOptions {
  model?: string;
  force?: boolean;
}

function printReport(renderer: OutputRenderer, report: BuildReport): void {
  if (report.mode === 'unchanged') {
    renderer.success(
      `Knowledge base for ${report.issueId} is up to date (${report.chunksProcessed} chunks, ${report.modelId})`,
    );
    return;
  }
  const verb = report.mode === 'append' ? 'Extended' : 'Rebuilt';
  renderer.success(`${verb} knowledge base for ${report.issueId} (generation ${report.generation ?? '-'})`);
  renderer.line(`- Model: ${report.modelId}`);
  renderer.line(`- Chunks: ${report.chunksProcessed} (${report.newChunks} new)`);
  renderer.line(
    `- Cache: ${report.cacheHits} hits, ${report.cacheMisses} misses, ${report.reusedFromIndex} reused from the index`,
  );
  renderer.line(`- Embedded ${report.embeddedTexts} text(s)`);
  renderer.line(`- Took ${report.durationMs}ms`);
}

function printStatus(renderer: OutputRenderer, status: KnowledgeBaseStatus): void {
  const { metadata, lastBuild } = status;
  if (!metadata) {
    renderer.line(`No knowledge base built for ${status.issueId} yet.`);
    renderer.hint(`Run 'logkb kb update ${status.issueId}' to build one.`);
  } else {
    renderer.success(`Knowledge base for ${status.issueId}`);
    renderer.table(
      [
        ['Model', metadata.modelId],
        ['Dimensions', metadata.dimensions],
        ['Chunks', metadata.chunkCount],
        ['Source files', metadata.sourceFiles.length],
        ['Generation', metadata.generation],
        ['Built at', metadata.builtAt],
        ['Build mode', metadata.buildMode],
        [
          'Chunking',
          metadata.chunking ? `${metadata.chunking.chunkSize}/${metadata.chunking.overlap}` : 'unknown',
        ],
      ],
      ['Metric', 'Value'],
    );
  }
  if (lastBuild && lastBuild.status !== 'succeeded') {
    renderer.line(`Last build ${lastBuild.status} at ${lastBuild.finishedAt}: ${lastBuild.error ?? 'no details'}`);
  }
  if (status.building) {
    renderer.line('A build is in progress.');
  }
}

export function registerKbCommand(program: Command, context: CliContext) {
  const kbCommand = program.command('kb').description('Build and inspect knowledge bases');

  kbCommand
    .command('update <issueId>')
    .description('Chunk and embed new logs, then commit a new knowledge base generation')
    .option('--model <modelId>', 'Embedding model, e.g. openai:text-embedding-3-small:1536')
    .option('--force', 'Re-chunk every log instead of appending new ones', false)
    .action(async (issueId: string, options: UpdateOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      await withRuntime(globalOpts, context, {}, async ({ manager, renderer, config }) => {
        const controller = new AbortController();
        const onSigint = () => controller.abort();
        process.once('SIGINT', onSigint);
        try {
          const report = await manager.update(
            {
              issueId,
              modelId: options.model,
              forceRebuild: options.force ?? false,
              signal: controller.signal,
              onProgress: (progress) => renderer.progress(progress),
            },
            config,
          );
          renderer.render(report, (r) => printReport(renderer, r));
        } finally {
          process.removeListener('SIGINT', onSigint);
        }
      });
    });

  kbCommand
    .command('status <issueId>')
    .description('Show the committed knowledge base and the last build of an issue')
    .action(async (issueId: string, _options: unknown, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      await withRuntime(globalOpts, context, {}, async ({ manager, renderer, config }) => {
        const status = await manager.status(issueId, config);
        renderer.render(status, (s) => printStatus(renderer, s));
      });
    });
}
