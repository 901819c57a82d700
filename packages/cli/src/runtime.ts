import path from 'path';
import { ensureDirSync } from 'fs-extra';
import { EmbeddingAdapter } from '@logkb/adapters';
import { ConfigLoader, SessionStore } from '@logkb/core';
import { IssueWorkspace, KnowledgeBaseManager, Retriever } from '@logkb/knowledge';
import { ConsoleLogger, JsonlLogger } from '@logkb/shared';
import type { KnowledgeBaseConfig, KnowledgeBaseConfigInput, LogLevel, Logger } from '@logkb/shared';
import { OutputRenderer } from './output/renderer';
import type { CliContext, GlobalOptions } from './types';

/** Everything one command invocation works with. */
export interface Runtime {
  config: KnowledgeBaseConfig;
  logger: Logger;
  renderer: OutputRenderer;
  workspace: IssueWorkspace;
  manager: KnowledgeBaseManager;
  retriever: Retriever;
  sessions: SessionStore;
  cwd: string;
}

export function createLogger(config: KnowledgeBaseConfig, globals: GlobalOptions): Logger {
  if (config.logging.traceFile) {
    ensureDirSync(path.dirname(config.logging.traceFile));
    return new JsonlLogger(config.logging.traceFile);
  }
  // Under --json only warnings and errors are printed, and those go to stderr.
  const level: LogLevel = globals.verbose ? 'debug' : globals.json ? 'warn' : config.logging.level;
  return new ConsoleLogger({ level });
}

/**
 * Loads the configuration for this invocation, wires the services and runs
 * `task` with them. Open caches and snapshots are closed afterwards.
 */
export async function withRuntime<T>(
  globals: GlobalOptions,
  context: CliContext,
  flags: KnowledgeBaseConfigInput,
  task: (runtime: Runtime) => Promise<T>,
): Promise<T> {
  const cwd = context.cwd ?? process.cwd();
  const config = ConfigLoader.load({
    configPath: globals.config && path.resolve(cwd, globals.config),
    flags,
    cwd,
    env: context.env,
    homeDir: context.homeDir,
  });
  const logger = createLogger(config, globals);
  const adapter = new EmbeddingAdapter({ logger });
  const manager = new KnowledgeBaseManager({ adapter, logger });
  const retriever = new Retriever({ adapter, logger });

  const workspace = new IssueWorkspace(config.rootDir);

  try {
    return await task({
      config,
      logger,
      renderer: new OutputRenderer(globals.json ?? false),
      workspace,
      manager,
      retriever,
      sessions: new SessionStore(workspace, logger),
      cwd,
    });
  } finally {
    retriever.close();
    await manager.close();
  }
}
