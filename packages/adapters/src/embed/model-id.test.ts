import { ConfigError } from '@logkb/shared';
import { parseModelId } from './model-id';

describe('parseModelId', () => {
  it('splits provider, model and dimension', () => {
    expect(parseModelId('openai:text-embedding-3-small:1536')).toEqual({
      id: 'openai:text-embedding-3-small:1536',
      provider: 'openai',
      model: 'text-embedding-3-small',
      dims: 1536,
    });
  });

  it('keeps colons inside the model name', () => {
    expect(parseModelId('local-hash:v2:bow:64')).toMatchObject({ model: 'v2:bow', dims: 64 });
  });

  it.each(['openai', 'openai:1536', 'openai:m:0', 'openai:m:-3', 'openai:m:1.5', ':m:8', 'x::8'])(
    'rejects %s',
    (modelId) => {
      expect(() => parseModelId(modelId)).toThrow(ConfigError);
    },
  );
});
