import { describe, it, expect, vi, beforeEach } from 'vitest';
import { APIError } from 'openai';
import { ConfigError, RateLimitError } from '@logkb/shared';
import { OpenAIEmbedder } from './openai_embedder';

const mockEmbeddingsCreate = vi.fn();

vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      embeddings = {
        create: mockEmbeddingsCreate,
      };
    },
    APIError: class extends Error {
      status: number | undefined;
      headers: Record<string, string> | undefined;
      constructor(
        status: number | undefined,
        _error: object | undefined,
        message: string | undefined,
        headers: Record<string, string> | undefined,
      ) {
        super(message);
        this.status = status;
        this.headers = headers;
      }
    },
  };
});

describe('OpenAIEmbedder', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('throws ConfigError when API key is missing', () => {
    expect(() => new OpenAIEmbedder({ apiKeyEnv: 'LOGKB_TEST_MISSING_KEY' })).toThrow(ConfigError);
  });

  it('reads the API key from env and returns embeddings in input order', async () => {
    process.env.LOGKB_TEST_OPENAI_KEY = 'test-secret';
    mockEmbeddingsCreate.mockResolvedValue({
      data: [
        { index: 1, embedding: [3, 4] },
        { index: 0, embedding: [1, 2] },
      ],
    });

    const embedder = new OpenAIEmbedder({
      apiKeyEnv: 'LOGKB_TEST_OPENAI_KEY',
      model: 'text-embedding-3-small',
      dimensions: 2,
    });
    await expect(embedder.embedTexts(['a', 'b'])).resolves.toEqual([
      [1, 2],
      [3, 4],
    ]);
    expect(mockEmbeddingsCreate).toHaveBeenCalledWith(
      { model: 'text-embedding-3-small', input: ['a', 'b'], dimensions: 2 },
      { signal: undefined },
    );
    delete process.env.LOGKB_TEST_OPENAI_KEY;
  });

  it('does not request a dimension from models that do not accept one', async () => {
    mockEmbeddingsCreate.mockResolvedValue({ data: [{ index: 0, embedding: [1] }] });
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret', model: 'text-embedding-ada-002' });

    await embedder.embedTexts(['a']);

    expect(mockEmbeddingsCreate.mock.calls[0]?.[0]).toEqual({
      model: 'text-embedding-ada-002',
      input: ['a'],
      dimensions: undefined,
    });
  });

  it('forwards the abort signal to the SDK', async () => {
    mockEmbeddingsCreate.mockResolvedValue({ data: [] });
    const controller = new AbortController();
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret' });

    await embedder.embedTexts([], { signal: controller.signal });

    expect(mockEmbeddingsCreate.mock.calls[0]?.[1]).toEqual({ signal: controller.signal });
  });

  it('maps rate limit errors and keeps retry-after', async () => {
    mockEmbeddingsCreate.mockRejectedValue(new APIError(429, undefined, 'rate limited', { 'retry-after': '2' }));
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret' });

    const error = await embedder.embedTexts(['a']).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfter: 2 });
  });

  it('maps auth errors to ConfigError', async () => {
    mockEmbeddingsCreate.mockRejectedValue(new APIError(401, undefined, 'unauthorized', undefined));
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret' });

    await expect(embedder.embedTexts(['a'])).rejects.toBeInstanceOf(ConfigError);
  });

  it('passes server errors through with their status', async () => {
    mockEmbeddingsCreate.mockRejectedValue(new APIError(502, undefined, 'bad gateway', undefined));
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret' });

    await expect(embedder.embedTexts(['a'])).rejects.toMatchObject({ status: 502 });
  });

  it('wraps non-Error failures', async () => {
    mockEmbeddingsCreate.mockRejectedValue('boom');
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret' });

    await expect(embedder.embedTexts(['a'])).rejects.toThrow('boom');
  });

  it('derives dims and a full model id', () => {
    expect(new OpenAIEmbedder({ apiKey: 'test-secret' }).id()).toBe('openai:text-embedding-3-small:1536');
    expect(new OpenAIEmbedder({ apiKey: 'test-secret', model: 'text-embedding-3-large' }).dims()).toBe(3072);
    expect(new OpenAIEmbedder({ apiKey: 'test-secret', model: 'm', dimensions: 12 }).id()).toBe('openai:m:12');
  });
});
