export const name = '@embedcache/store';

export * from './types';
export * from './namespace';
export * from './factory';
export { SQLiteKeyValueStore, type SQLiteKeyValueStoreOptions } from './sqlite/sqlite-store';
export { InMemoryKeyValueStore } from './memory/memory-store';
