import { Command } from 'commander';
import { version } from '../package.json';
import { registerHistoryCommand } from './commands/history';
import { registerIssueCommand } from './commands/issue';
import { registerKbCommand } from './commands/kb';
import { registerLogsCommand } from './commands/logs';
import { registerModelsCommand } from './commands/models';
import { registerSearchCommand } from './commands/search';
import type { CliContext } from './types';

export const name = '@logkb/cli';

export function createProgram(context: CliContext = {}): Command {
  const program = new Command();

  program
    .name('logkb')
    .description('Per-issue knowledge bases over raw log files')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerIssueCommand(program, context);
  registerLogsCommand(program, context);
  registerKbCommand(program, context);
  registerSearchCommand(program, context);
  registerHistoryCommand(program, context);
  registerModelsCommand(program, context);

  return program;
}
