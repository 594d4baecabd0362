export const name = '@embedcache/core';

export * from './cache/keys';
export * from './cache/codec';
export * from './cache/engine';
export * from './config/loader';
