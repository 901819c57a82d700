export const name = '@logkb/core';

export { ConfigLoader, PROJECT_CONFIG_FILE, USER_CONFIG_PATH } from './config/loader';
export type { ConfigOptions } from './config/loader';
export { RagEngine, NO_RELEVANT_DATA_ANSWER } from './rag/engine';
export type { RagEngineOptions } from './rag/engine';
export { buildPrompt, parseGeneratedAnswer, referenceFor } from './rag/prompt';
export type { GeneratedAnswer } from './rag/prompt';
export type { RagQuery, RagResult, TextGenerator } from './rag/types';
export { SessionStore } from './session/session-store';
export type {
  ChatRole,
  ChatTurn,
  ConversationSummary,
  HistoryExportFormat,
  NewChatTurn,
} from './session/session-store';
export { collectIssueStats } from './session/issue-stats';
export type { IssueStats, IssueStatsSources } from './session/issue-stats';
