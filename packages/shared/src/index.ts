export const name = '@embedcache/shared';

export * from './types/events';
export * from './logger';
export * from './errors';
export * from './config/schema';
