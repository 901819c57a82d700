import { describe, it, expect } from 'vitest';
import { name } from './index';

describe('@logkb/knowledge', () => {
  it('exports the package name', () => {
    expect(name).toBe('@logkb/knowledge');
  });
});
