import type { Command } from 'commander';
import pc from 'picocolors';
import { UsageError } from '@logkb/shared';
import type { ChatTurn, HistoryExportFormat } from '@logkb/core';
import { withRuntime } from '../runtime';
import type { CliContext, GlobalOptions } from '../types';
import { parsePositiveInt } from '../utils/parse';

interface HistoryOptions {
  limit?: string;
  clear?: boolean;
  export?: string;
}

const EXPORT_FORMATS: Record<string, HistoryExportFormat> = {
  json: 'json',
  md: 'markdown',
  markdown: 'markdown',
};

function parseExportFormat(value: string): HistoryExportFormat {
  const format = Object.hasOwn(EXPORT_FORMATS, value) ? EXPORT_FORMATS[value] : undefined;
  if (!format) {
    throw new UsageError(`--export must be md or json, got "${value}"`);
  }
  return format;
}

export function registerHistoryCommand(program: Command, context: CliContext) {
  program
    .command('history <issueId>')
    .description('Show, export or clear the question-and-answer history of an issue')
    .option('--limit <n>', 'Only the most recent n messages')
    .option('--clear', 'Delete the history', false)
    .option('--export <format>', 'Print the whole history as md or json')
    .action(async (issueId: string, options: HistoryOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const limit = options.limit === undefined ? undefined : parsePositiveInt(options.limit, '--limit');
      const format = options.export === undefined ? undefined : parseExportFormat(options.export);
      if (options.clear && format) {
        throw new UsageError('--clear and --export cannot be combined');
      }

      await withRuntime(globalOpts, context, {}, async ({ sessions, renderer }) => {
        if (options.clear) {
          const cleared = await sessions.clearHistory(issueId);
          renderer.render({ issueId, cleared }, (r) =>
            renderer.success(`Cleared ${r.cleared} message(s) from the history of ${issueId}`),
          );
          return;
        }

        if (format) {
          renderer.line(await sessions.exportHistory(issueId, format));
          return;
        }

        const history = await sessions.loadHistory(issueId, limit);
        renderer.render({ issueId, history }, (r) => {
          if (r.history.length === 0) {
            renderer.line(`No history for ${issueId} yet.`);
            return;
          }
          r.history.forEach((turn: ChatTurn) => {
            const who = turn.role === 'user' ? pc.cyan('User') : pc.green('Assistant');
            renderer.line(`[${turn.timestamp}] ${who}: ${turn.content}`);
            for (const reference of turn.references ?? []) {
              renderer.line(`   - ${reference}`);
            }
          });
        });
      });
    });
}
