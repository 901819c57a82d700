import {
  BuildFailureError,
  ConfigError,
  ProviderError,
  StorageError,
  UsageError,
} from '@logkb/shared';
import { exitCodeFor, reportError } from './errors';

describe('exitCodeFor', () => {
  it('uses 2 for configuration and usage errors', () => {
    expect(exitCodeFor(new ConfigError('bad config'))).toBe(2);
    expect(exitCodeFor(new UsageError('bad flag'))).toBe(2);
  });

  it('uses 1 for everything else', () => {
    expect(exitCodeFor(new ProviderError('down'))).toBe(1);
    expect(exitCodeFor(new StorageError('disk'))).toBe(1);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor('boom')).toBe(1);
  });
});

describe('reportError', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints app errors as a JSON document under --json', () => {
    const code = reportError(new UsageError('bad flag', { details: { flag: '--topk' } }), { json: true });

    expect(code).toBe(2);
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      error: { code: 'UsageError', message: 'bad flag', details: { flag: '--topk' } },
    });
    expect(errSpy).not.toHaveBeenCalled();
  });

  it('includes the build report of a failed build', () => {
    const error = new BuildFailureError('2 of 4 text(s) could not be embedded', { issueId: 'INC-1', failedBatches: 1 });

    const code = reportError(error, { json: true });

    expect(code).toBe(1);
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      error: {
        code: 'BuildFailure',
        message: '2 of 4 text(s) could not be embedded',
        report: { issueId: 'INC-1', failedBatches: 1 },
      },
    });
  });

  it('reports foreign errors as UnknownError', () => {
    reportError(new Error('boom'), { json: true });

    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      error: { code: 'UnknownError', message: 'boom' },
    });
  });

  it('prints a readable message on stderr otherwise', () => {
    const code = reportError(new ConfigError('Config file not found: x.yaml', { details: 'check --config' }), {});

    expect(code).toBe(2);
    const lines = errSpy.mock.calls.map((c) => String(c[0]));
    expect(lines).toEqual([
      '❌ Error: Config file not found: x.yaml',
      '  Details: check --config',
      '\nFor more details, run with the --verbose flag.',
    ]);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('says that a failed build left the knowledge base untouched', () => {
    reportError(new BuildFailureError('embedding failed', { issueId: 'INC-1' }), {});

    expect(errSpy.mock.calls.map((c) => String(c[0]))).toContain(
      '  Nothing was committed; the previous knowledge base is still in place.',
    );
  });

  it('prints the stack trace with --verbose', () => {
    const error = new Error('boom');

    reportError(error, { verbose: true });

    expect(errSpy).toHaveBeenLastCalledWith(`\nStack Trace:\n${error.stack}`);
  });
});
