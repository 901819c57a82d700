import type { KnowledgeBaseConfig } from '@logkb/shared';
import type { IssueWorkspace, KnowledgeBaseManager, KnowledgeBaseStatus } from '@logkb/knowledge';
import type { ConversationSummary, SessionStore } from './session-store';

export interface IssueStats {
  issueId: string;
  createdAt: string;
  /** Raw logs the next build will index */
  rawLogs: { files: number; totalBytes: number };
  knowledgeBase: Omit<KnowledgeBaseStatus, 'issueId'>;
  conversation: ConversationSummary;
}

export interface IssueStatsSources {
  workspace: IssueWorkspace;
  manager: Pick<KnowledgeBaseManager, 'status'>;
  sessions: Pick<SessionStore, 'getConversationSummary'>;
}

/** One view of an issue: its uploads, its knowledge base and its conversation. */
export async function collectIssueStats(
  sources: IssueStatsSources,
  issueId: string,
  config: KnowledgeBaseConfig,
): Promise<IssueStats> {
  const manifest = await sources.workspace.getIssue(issueId);
  const files = await sources.workspace.listRawFiles(issueId, config.logFiles.extensions);
  const { metadata, lastBuild, building } = await sources.manager.status(issueId, config);
  return {
    issueId,
    createdAt: manifest.createdAt,
    rawLogs: { files: files.length, totalBytes: files.reduce((sum, file) => sum + file.sizeBytes, 0) },
    knowledgeBase: { metadata, lastBuild, building },
    conversation: await sources.sessions.getConversationSummary(issueId),
  };
}
