export const name = '@logkb/shared';

export * from './types/events';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './config/schema';
export * from './fs/io';
export * from './lru-cache';
