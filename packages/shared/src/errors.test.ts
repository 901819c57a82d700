import { describe, it, expect } from 'vitest';
import {
  AppError,
  BuildCancelledError,
  BuildFailureError,
  ConfigError,
  ConsistencyViolationError,
  IssueNotFoundError,
  KnowledgeBaseNotFoundError,
  ModelMismatchError,
  ProviderError,
  RateLimitError,
  StorageError,
  TimeoutError,
  UsageError,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('ProviderError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });
});

describe('error subclasses', () => {
  it.each([
    [new ConfigError('x'), 'ConfigError'],
    [new UsageError('x'), 'UsageError'],
    [new ProviderError('x'), 'ProviderError'],
    [new TimeoutError('x'), 'TimeoutError'],
    [new ModelMismatchError('x'), 'ModelMismatchError'],
    [new StorageError('x'), 'StorageError'],
  ])('%s carries code %s', (error, code) => {
    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe(code);
  });

  it('keeps retryAfter on rate limit errors', () => {
    const error = new RateLimitError('slow down', { retryAfter: 3 });
    expect(error.code).toBe('RateLimitError');
    expect(error.retryAfter).toBe(3);
  });

  it('treats a missing knowledge base as a model mismatch with its own name', () => {
    const error = new KnowledgeBaseNotFoundError('INC-1');
    expect(error).toBeInstanceOf(ModelMismatchError);
    expect(error.name).toBe('KnowledgeBaseNotFoundError');
    expect(error.issueId).toBe('INC-1');
    expect(error.message).toBe('No knowledge base has been built for issue "INC-1" yet.');
  });

  it('names the conflicting cache key', () => {
    const error = new ConsistencyViolationError('abcdef0123456789', 'local-hash:feature:8');
    expect(error.code).toBe('ConsistencyViolation');
    expect(error.contentHash).toBe('abcdef0123456789');
    expect(error.message).toContain('abcdef012345 for model "local-hash:feature:8"');
  });

  it('attaches build reports to build failures and cancellations', () => {
    const report = { cacheHits: 2, embeddingFailures: 4 };
    const failure = new BuildFailureError('build failed', report);
    const cancelled = new BuildCancelledError('cancelled', report);
    expect(failure.code).toBe('BuildFailure');
    expect(failure.report).toBe(report);
    expect(cancelled.code).toBe('BuildCancelled');
    expect(cancelled.report).toEqual({ cacheHits: 2, embeddingFailures: 4 });
  });

  it('reports missing issues as storage errors', () => {
    const error = new IssueNotFoundError('INC-9');
    expect(error).toBeInstanceOf(StorageError);
    expect(error.message).toBe('Issue "INC-9" does not exist.');
  });
});
