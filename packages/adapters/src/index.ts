export const name = '@logkb/adapters';

export * from './types';
export * from './common';
export * from './embed';
