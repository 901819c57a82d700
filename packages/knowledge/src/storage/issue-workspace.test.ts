import * as fs from 'fs/promises';
import * as os from 'os';
import { join } from 'path';
import { IssueNotFoundError, UsageError } from '@logkb/shared';
import { IssueWorkspace, assertIssueId, sanitizeFileName } from './issue-workspace';

describe('sanitizeFileName', () => {
  it.each([
    ['app.log', 'app.log'],
    ['../../etc/passwd', '_.._etc_passwd'],
    ['a:b|c?.log', 'a_b_c_.log'],
    ['  .hidden.log. ', 'hidden.log'],
    ['...', 'unnamed'],
  ])('%s -> %s', (input, expected) => {
    expect(sanitizeFileName(input)).toBe(expected);
  });
});

describe('assertIssueId', () => {
  it('accepts ticket-like ids', () => {
    expect(() => assertIssueId('INC-42_v1.2')).not.toThrow();
  });

  it.each(['', '-leading', '../escape', 'has space'])('rejects %j', (issueId) => {
    expect(() => assertIssueId(issueId)).toThrow(UsageError);
  });
});

describe('IssueWorkspace', () => {
  let root: string;
  let workspace: IssueWorkspace;

  beforeEach(async () => {
    root = await fs.mkdtemp(join(os.tmpdir(), 'logkb-ws-'));
    workspace = new IssueWorkspace(root);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('creates, lists and deletes issues', async () => {
    await workspace.createIssue('INC-2');
    await workspace.createIssue('INC-1');

    expect((await workspace.listIssues()).map((issue) => issue.issueId)).toEqual(['INC-1', 'INC-2']);
    expect(await workspace.issueExists('INC-1')).toBe(true);

    await workspace.deleteIssue('INC-1');
    expect(await workspace.issueExists('INC-1')).toBe(false);
    expect((await workspace.listIssues()).map((issue) => issue.issueId)).toEqual(['INC-2']);
  });

  it('reads the manifest of one issue', async () => {
    const created = await workspace.createIssue('INC-1');

    expect(await workspace.getIssue('INC-1')).toEqual(created);
    await expect(workspace.getIssue('INC-2')).rejects.toBeInstanceOf(IssueNotFoundError);
  });

  it('keeps the build lock inside the knowledge base directory', () => {
    expect(workspace.buildLockPath('INC-1')).toBe(join(root, 'issues', 'INC-1', 'kb', 'BUILD.lock'));
  });

  it('refuses to create an issue twice', async () => {
    await workspace.createIssue('INC-1');
    await expect(workspace.createIssue('INC-1')).rejects.toThrow('Issue "INC-1" already exists.');
  });

  it('raises IssueNotFoundError for unknown issues', async () => {
    await expect(workspace.addRawLog('INC-9', 'a.log', 'x')).rejects.toBeInstanceOf(IssueNotFoundError);
    await expect(workspace.deleteIssue('INC-9')).rejects.toBeInstanceOf(IssueNotFoundError);
  });

  it('stores raw logs append-only under sanitized names', async () => {
    await workspace.createIssue('INC-1');

    const stored = await workspace.addRawLog('INC-1', 'dir/app.log', 'line one\n');
    expect(stored).toBe('dir_app.log');
    expect(await workspace.readRawFile('INC-1', 'dir_app.log')).toBe('line one\n');

    await expect(workspace.addRawLog('INC-1', 'dir/app.log', 'other')).rejects.toThrow(
      'Issue "INC-1" already has a log named "dir_app.log"; raw logs cannot be replaced.',
    );
    expect(await workspace.readRawFile('INC-1', 'dir_app.log')).toBe('line one\n');
  });

  it('stores only one of two concurrent uploads under the same name', async () => {
    await workspace.createIssue('INC-1');

    const results = await Promise.allSettled([
      workspace.addRawLog('INC-1', 'app.log', 'from first\n'),
      workspace.addRawLog('INC-1', 'app.log', 'from second\n'),
    ]);

    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(UsageError);
    const winner = results[0].status === 'fulfilled' ? 'from first\n' : 'from second\n';
    expect(await workspace.readRawFile('INC-1', 'app.log')).toBe(winner);
    expect(await fs.readdir(workspace.rawDir('INC-1'))).toEqual(['app.log']);
  });

  it('lists raw files with matching extensions, sorted by name', async () => {
    await workspace.createIssue('INC-1');
    await workspace.addRawLog('INC-1', 'b.log', 'bb');
    await workspace.addRawLog('INC-1', 'a.TXT', 'a');
    await workspace.addRawLog('INC-1', 'image.png', 'png');

    expect(await workspace.listRawFiles('INC-1', ['.log', '.txt'])).toEqual([
      { name: 'a.TXT', sizeBytes: 1 },
      { name: 'b.log', sizeBytes: 2 },
    ]);
  });

  it('keeps the embedding cache outside issue directories', () => {
    expect(workspace.cachePath()).toBe(join(root, 'cache', 'embeddings.sqlite'));
    expect(workspace.kbDir('INC-1')).toBe(join(root, 'issues', 'INC-1', 'kb'));
  });
});
