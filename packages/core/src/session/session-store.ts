import { promises as fs } from 'fs';
import { join } from 'path';
import { pathExists, remove } from 'fs-extra';
import { z } from 'zod';
import { UsageError, ensureDir, logger as defaultLogger } from '@logkb/shared';
import type { Logger } from '@logkb/shared';
import type { IssueWorkspace } from '@logkb/knowledge';

const HISTORY_FILE = 'history.jsonl';

const ChatTurnSchema = z.object({
  timestamp: z.string(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  references: z.array(z.string()).optional(),
  metadata: z.record(z.unknown()).optional(),
});

export type ChatTurn = z.infer<typeof ChatTurnSchema>;
export type ChatRole = ChatTurn['role'];

export type NewChatTurn = Omit<ChatTurn, 'timestamp'>;

export interface ConversationSummary {
  totalMessages: number;
  userMessages: number;
  assistantMessages: number;
  /** Timestamp of the oldest turn, or null without history */
  firstMessage: string | null;
  lastMessage: string | null;
}

export type HistoryExportFormat = 'json' | 'markdown';

/**
 * Per-issue conversation history, one JSON turn per line in
 * `<issue>/history.jsonl`. Turns are only ever appended; clearing removes the
 * file.
 */
export class SessionStore {
  constructor(
    private readonly workspace: IssueWorkspace,
    private readonly logger: Logger = defaultLogger,
  ) {}

  historyPath(issueId: string): string {
    return join(this.workspace.issueDir(issueId), HISTORY_FILE);
  }

  async append(issueId: string, turn: NewChatTurn): Promise<ChatTurn> {
    await this.workspace.assertIssueExists(issueId);
    const entry: ChatTurn = { timestamp: new Date().toISOString(), ...turn };
    const path = this.historyPath(issueId);
    await ensureDir(path);
    await fs.appendFile(path, JSON.stringify(entry) + '\n', 'utf8');
    return entry;
  }

  /** Turns oldest first; with `limit`, only the most recent ones. */
  async loadHistory(issueId: string, limit?: number): Promise<ChatTurn[]> {
    await this.workspace.assertIssueExists(issueId);
    const path = this.historyPath(issueId);
    if (!(await pathExists(path))) {
      return [];
    }
    const turns: ChatTurn[] = [];
    const lines = (await fs.readFile(path, 'utf8')).split('\n');
    for (const [i, line] of lines.entries()) {
      if (!line.trim()) continue;
      const parsed = parseTurn(line);
      if (parsed) {
        turns.push(parsed);
      } else {
        await this.logger.warn(`Skipping unreadable line ${i + 1} of ${path}`);
      }
    }
    return limit === undefined ? turns : turns.slice(Math.max(0, turns.length - limit));
  }

  /** Deletes the history of an issue and returns how many turns it held. */
  async clearHistory(issueId: string): Promise<number> {
    const removed = (await this.loadHistory(issueId)).length;
    await remove(this.historyPath(issueId));
    return removed;
  }

  async getConversationSummary(issueId: string): Promise<ConversationSummary> {
    const turns = await this.loadHistory(issueId);
    return {
      totalMessages: turns.length,
      userMessages: turns.filter((turn) => turn.role === 'user').length,
      assistantMessages: turns.filter((turn) => turn.role === 'assistant').length,
      firstMessage: turns[0]?.timestamp ?? null,
      lastMessage: turns.at(-1)?.timestamp ?? null,
    };
  }

  async exportHistory(issueId: string, format: HistoryExportFormat): Promise<string> {
    const turns = await this.loadHistory(issueId);
    switch (format) {
      case 'json':
        return JSON.stringify(turns, null, 2);
      case 'markdown':
        return renderMarkdown(issueId, turns);
      default:
        throw new UsageError(`Unsupported export format "${String(format)}". Use json or markdown.`);
    }
  }
}

function parseTurn(line: string): ChatTurn | null {
  try {
    const parsed = ChatTurnSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function renderMarkdown(issueId: string, turns: ChatTurn[]): string {
  const lines = [`# Chat History - Issue ${issueId}`];
  for (const turn of turns) {
    lines.push('', `## ${turn.role === 'user' ? 'User' : 'Assistant'} (${turn.timestamp})`, '', turn.content);
    if (turn.references && turn.references.length > 0) {
      lines.push('', '*References:*', '');
      lines.push(...turn.references.map((reference) => `- ${reference}`));
    }
  }
  return lines.join('\n') + '\n';
}
