import path from 'path';
import { promises as fs } from 'fs';
import type { Command } from 'commander';
import { pathExists } from 'fs-extra';
import { StorageError, UsageError } from '@logkb/shared';
import { sanitizeFileName } from '@logkb/knowledge';
import type { IssueWorkspace } from '@logkb/knowledge';
import { withRuntime } from '../runtime';
import type { CliContext, GlobalOptions } from '../types';

interface AddedLog {
  source: string;
  name: string;
  sizeBytes: number;
}

/**
 * Resolves every upload and checks that it exists and that its stored name is
 * free, before anything is copied.
 */
async function planUploads(
  workspace: IssueWorkspace,
  issueId: string,
  files: string[],
  cwd: string,
): Promise<Array<{ source: string; name: string }>> {
  const uploads: Array<{ source: string; name: string }> = [];
  const names = new Map<string, string>();
  for (const file of files) {
    const source = path.resolve(cwd, file);
    if (!(await pathExists(source))) {
      throw new UsageError(`Log file not found: ${file}`);
    }
    const name = sanitizeFileName(path.basename(source));
    const clash = names.get(name);
    if (clash !== undefined) {
      throw new UsageError(`${clash} and ${file} would both be stored as "${name}". Rename one of them.`);
    }
    if (await pathExists(path.join(workspace.rawDir(issueId), name))) {
      throw new UsageError(
        `Issue "${issueId}" already has a log named "${name}"; raw logs cannot be replaced.`,
      );
    }
    names.set(name, file);
    uploads.push({ source, name });
  }
  return uploads;
}

/** Names the logs that were stored before an upload failed; they stay stored. */
function partialUploadError(error: unknown, added: AddedLog[]): unknown {
  if (added.length === 0) return error;
  const names = added.map((log) => log.name);
  const message = `${error instanceof Error ? error.message : String(error)} Already stored: ${names.join(', ')}.`;
  const options = { cause: error, details: { added: names } };
  return error instanceof UsageError ? new UsageError(message, options) : new StorageError(message, options);
}

export function registerLogsCommand(program: Command, context: CliContext) {
  const logsCommand = program.command('logs').description('Upload raw log files');

  logsCommand
    .command('add <issueId> <files...>')
    .description('Copy log files into an issue; stored logs are never replaced')
    .action(async (issueId: string, files: string[], _options: unknown, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      await withRuntime(globalOpts, context, {}, async ({ workspace, renderer, logger, config, cwd }) => {
        await workspace.assertIssueExists(issueId);
        const extensions = new Set(config.logFiles.extensions.map((ext) => ext.toLowerCase()));

        const uploads = await planUploads(workspace, issueId, files, cwd);
        const added: AddedLog[] = [];
        for (const upload of uploads) {
          let content: Buffer;
          try {
            content = await fs.readFile(upload.source);
            await workspace.addRawLog(issueId, upload.name, content);
          } catch (error) {
            throw partialUploadError(error, added);
          }
          if (!extensions.has(path.extname(upload.name).toLowerCase())) {
            await logger.warn(
              `${upload.name} does not end in ${[...extensions].join(', ')} and will be skipped by 'logkb kb update'.`,
            );
          }
          added.push({ source: upload.source, name: upload.name, sizeBytes: content.length });
        }

        renderer.render({ issueId, added }, (result) => {
          for (const log of result.added) {
            renderer.success(`Added ${log.name} to ${issueId} (${log.sizeBytes} bytes)`);
          }
          renderer.hint(`Run 'logkb kb update ${issueId}' to index the new logs.`);
        });
      });
    });
}
