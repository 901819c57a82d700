import type { Command } from 'commander';
import { collectIssueStats } from '@logkb/core';
import type { IssueStats } from '@logkb/core';
import type { IssueManifest } from '@logkb/knowledge';
import type { OutputRenderer } from '../output/renderer';
import { withRuntime } from '../runtime';
import type { CliContext, GlobalOptions } from '../types';

function printStats(renderer: OutputRenderer, stats: IssueStats): void {
  const { metadata, lastBuild } = stats.knowledgeBase;
  const { conversation } = stats;
  renderer.success(`Issue ${stats.issueId}`);
  renderer.table(
    [
      ['Created at', stats.createdAt],
      ['Raw logs', `${stats.rawLogs.files} file(s), ${stats.rawLogs.totalBytes} bytes`],
      ['Model', metadata?.modelId ?? '-'],
      ['Chunks', metadata?.chunkCount ?? 0],
      ['Built at', metadata?.builtAt ?? '-'],
      ['Last build', lastBuild ? `${lastBuild.status} at ${lastBuild.finishedAt}` : '-'],
      ['Messages', `${conversation.totalMessages} (${conversation.userMessages} questions)`],
      ['Last message', conversation.lastMessage ?? '-'],
    ],
    ['Metric', 'Value'],
  );
}

export function registerIssueCommand(program: Command, context: CliContext) {
  const issueCommand = program.command('issue').description('Create, list and delete issues');

  issueCommand
    .command('create <issueId>')
    .description('Create an empty issue to upload logs into')
    .action(async (issueId: string, _options: unknown, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      await withRuntime(globalOpts, context, {}, async ({ workspace, renderer }) => {
        const manifest = await workspace.createIssue(issueId);
        renderer.render(manifest, (m) => {
          renderer.success(`Created issue ${m.issueId}`);
          renderer.hint(`Add logs with 'logkb logs add ${m.issueId} <files...>'.`);
        });
      });
    });

  issueCommand
    .command('list')
    .description('List all issues')
    .action(async (_options: unknown, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      await withRuntime(globalOpts, context, {}, async ({ workspace, renderer }) => {
        const issues = await workspace.listIssues();
        renderer.render(issues, (list: IssueManifest[]) => {
          if (list.length === 0) {
            renderer.line('No issues yet.');
            renderer.hint("Create one with 'logkb issue create <issueId>'.");
            return;
          }
          renderer.table(
            list.map((issue): [string, string] => [issue.issueId, issue.createdAt]),
            ['Issue', 'Created At'],
          );
        });
      });
    });

  issueCommand
    .command('delete <issueId>')
    .description('Delete an issue with its logs and knowledge base')
    .action(async (issueId: string, _options: unknown, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      await withRuntime(globalOpts, context, {}, async ({ workspace, renderer }) => {
        await workspace.deleteIssue(issueId);
        renderer.render({ issueId, deleted: true }, () => renderer.success(`Deleted issue ${issueId}`));
      });
    });

  issueCommand
    .command('stats <issueId>')
    .description('Show uploads, knowledge base and conversation statistics of an issue')
    .action(async (issueId: string, _options: unknown, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      await withRuntime(globalOpts, context, {}, async ({ workspace, manager, sessions, renderer, config }) => {
        const stats = await collectIssueStats({ workspace, manager, sessions }, issueId, config);
        renderer.render(stats, (s) => printStats(renderer, s));
      });
    });
}
