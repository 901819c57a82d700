import { promises as fs } from 'fs';
import { extname, join } from 'path';
import { pathExists, remove } from 'fs-extra';
import { z } from 'zod';
import {
  IssueNotFoundError,
  UsageError,
  atomicCreate,
  atomicWriteJson,
  readJsonIfExists,
} from '@logkb/shared';

const ISSUE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

const IssueManifestSchema = z.object({
  issueId: z.string(),
  createdAt: z.string(),
});

export type IssueManifest = z.infer<typeof IssueManifestSchema>;

export interface RawFileInfo {
  name: string;
  sizeBytes: number;
}

/**
 * Replaces characters that are unsafe in file names, trims leading and
 * trailing dots and spaces, and falls back to `unnamed`.
 */
export function sanitizeFileName(name: string): string {
  const replaced = name.replace(/[<>:"/\\|?*\u0000-\u001f]/g, '_');
  const trimmed = replaced.replace(/^[. ]+|[. ]+$/g, '');
  return trimmed || 'unnamed';
}

export function assertIssueId(issueId: string): void {
  if (!ISSUE_ID_PATTERN.test(issueId)) {
    throw new UsageError(
      `Invalid issue id "${issueId}". Use letters, digits, ".", "_" and "-", starting with a letter or digit.`,
    );
  }
}

/**
 * File storage for issues: one directory per issue under `<rootDir>/issues`,
 * holding the uploaded raw logs (append-only), the committed knowledge base
 * and the last build status.
 */
export class IssueWorkspace {
  constructor(readonly rootDir: string) {}

  issueDir(issueId: string): string {
    assertIssueId(issueId);
    return join(this.rootDir, 'issues', issueId);
  }

  rawDir(issueId: string): string {
    return join(this.issueDir(issueId), 'raw');
  }

  kbDir(issueId: string): string {
    return join(this.issueDir(issueId), 'kb');
  }

  /** Held by the process building the knowledge base of the issue. */
  buildLockPath(issueId: string): string {
    return join(this.kbDir(issueId), 'BUILD.lock');
  }

  buildStatusPath(issueId: string): string {
    return join(this.issueDir(issueId), 'build-status.json');
  }

  /** The embedding cache is shared by every issue under this root. */
  cachePath(): string {
    return join(this.rootDir, 'cache', 'embeddings.sqlite');
  }

  async issueExists(issueId: string): Promise<boolean> {
    return pathExists(join(this.issueDir(issueId), 'issue.json'));
  }

  async assertIssueExists(issueId: string): Promise<void> {
    if (!(await this.issueExists(issueId))) {
      throw new IssueNotFoundError(issueId);
    }
  }

  async createIssue(issueId: string): Promise<IssueManifest> {
    if (await this.issueExists(issueId)) {
      throw new UsageError(`Issue "${issueId}" already exists.`);
    }
    const manifest: IssueManifest = { issueId, createdAt: new Date().toISOString() };
    await fs.mkdir(this.rawDir(issueId), { recursive: true });
    await atomicWriteJson(join(this.issueDir(issueId), 'issue.json'), manifest);
    return manifest;
  }

  async getIssue(issueId: string): Promise<IssueManifest> {
    const parsed = IssueManifestSchema.safeParse(await readJsonIfExists(join(this.issueDir(issueId), 'issue.json')));
    if (!parsed.success) {
      throw new IssueNotFoundError(issueId);
    }
    return parsed.data;
  }

  async listIssues(): Promise<IssueManifest[]> {
    const issuesDir = join(this.rootDir, 'issues');
    if (!(await pathExists(issuesDir))) {
      return [];
    }
    const manifests: IssueManifest[] = [];
    for (const entry of await fs.readdir(issuesDir, { withFileTypes: true })) {
      if (!entry.isDirectory() || !ISSUE_ID_PATTERN.test(entry.name)) continue;
      const parsed = IssueManifestSchema.safeParse(
        await readJsonIfExists(join(issuesDir, entry.name, 'issue.json')),
      );
      if (parsed.success) manifests.push(parsed.data);
    }
    return manifests.sort((a, b) => a.issueId.localeCompare(b.issueId));
  }

  async deleteIssue(issueId: string): Promise<void> {
    await this.assertIssueExists(issueId);
    await remove(this.issueDir(issueId));
  }

  /**
   * Stores an uploaded log under a sanitized name. Raw logs are append-only:
   * a name that is already taken is rejected rather than overwritten.
   */
  async addRawLog(issueId: string, name: string, content: string | Buffer): Promise<string> {
    await this.assertIssueExists(issueId);
    const fileName = sanitizeFileName(name);
    if (!(await atomicCreate(join(this.rawDir(issueId), fileName), content))) {
      throw new UsageError(
        `Issue "${issueId}" already has a log named "${fileName}"; raw logs cannot be replaced.`,
      );
    }
    return fileName;
  }

  /** Raw log files with one of `extensions`, sorted by name. */
  async listRawFiles(issueId: string, extensions: string[]): Promise<RawFileInfo[]> {
    await this.assertIssueExists(issueId);
    const rawDir = this.rawDir(issueId);
    if (!(await pathExists(rawDir))) {
      return [];
    }
    const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
    const files: RawFileInfo[] = [];
    for (const entry of await fs.readdir(rawDir, { withFileTypes: true })) {
      if (!entry.isFile() || !wanted.has(extname(entry.name).toLowerCase())) continue;
      const stat = await fs.stat(join(rawDir, entry.name));
      files.push({ name: entry.name, sizeBytes: stat.size });
    }
    return files.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  async readRawFile(issueId: string, name: string): Promise<string> {
    return fs.readFile(join(this.rawDir(issueId), sanitizeFileName(name)), 'utf8');
  }
}
