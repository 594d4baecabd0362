// packages/store/src/factory.ts

import path from 'node:path';
import { ConfigError, type Logger, type StoreConfig } from '@embedcache/shared';
import type { KeyValueStore } from './types';
import { SQLiteKeyValueStore } from './sqlite/sqlite-store';
import { InMemoryKeyValueStore } from './memory/memory-store';

export interface CreateStoreOptions {
  /** Base directory for relative sqlite paths (default: process.cwd()) */
  cwd?: string;
  logger?: Logger;
}

/**
 * Opens a key-value store for the configured backend.
 */
export function createKeyValueStore(
  config: StoreConfig,
  options: CreateStoreOptions = {},
): KeyValueStore {
  switch (config.backend) {
    case 'sqlite': {
      const dbPath =
        config.path === ':memory:' || path.isAbsolute(config.path)
          ? config.path
          : path.join(options.cwd ?? process.cwd(), config.path);
      return new SQLiteKeyValueStore({
        path: dbPath,
        readChunkSize: config.readChunkSize,
        writePageSize: config.writePageSize,
        logger: options.logger,
      });
    }
    case 'memory':
      return new InMemoryKeyValueStore();
    default: {
      const unknownBackend: never = config.backend;
      throw new ConfigError(`Unsupported store backend: ${String(unknownBackend)}`);
    }
  }
}

/**
 * Opens a store, hands it to `fn`, and closes it whether `fn` resolves or
 * rejects.
 */
export async function withStore<T>(
  config: StoreConfig,
  fn: (store: KeyValueStore) => Promise<T>,
  options: CreateStoreOptions = {},
): Promise<T> {
  const store = createKeyValueStore(config, options);
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
