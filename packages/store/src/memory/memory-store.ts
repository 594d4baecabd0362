// packages/store/src/memory/memory-store.ts

import { StoreUnavailableError } from '@embedcache/shared';
import type { KeyValuePair, KeyValueStore, StoreInfo } from '../types';
import { assertValidNamespace } from '../namespace';

/**
 * Process-local store for tests and throwaway runs. Values are copied on the
 * way in and out, so callers cannot mutate what is stored.
 */
export class InMemoryKeyValueStore implements KeyValueStore {
  private data: Map<string, Map<string, Uint8Array>> = new Map();
  private closed = false;

  async ensureNamespace(name: string): Promise<void> {
    assertValidNamespace(name);
    this.assertOpen();
    if (!this.data.has(name)) {
      this.data.set(name, new Map());
    }
  }

  async batchGet(namespace: string, keys: readonly string[]): Promise<Map<string, Uint8Array>> {
    const found = new Map<string, Uint8Array>();
    if (keys.length === 0) return found;

    const partition = this.partition(namespace);
    for (const key of keys) {
      const value = partition.get(key);
      if (value) {
        found.set(key, value.slice());
      }
    }
    return found;
  }

  async batchPutIfAbsent(namespace: string, entries: readonly KeyValuePair[]): Promise<void> {
    if (entries.length === 0) return;

    const partition = this.partition(namespace);
    for (const [key, value] of entries) {
      if (!partition.has(key)) {
        partition.set(key, value.slice());
      }
    }
  }

  info(): StoreInfo {
    return { backend: 'memory', location: 'memory' };
  }

  async close(): Promise<void> {
    this.closed = true;
    this.data.clear();
  }

  /** Get the number of entries stored in a namespace (for testing) */
  size(namespace: string): number {
    return this.data.get(namespace)?.size ?? 0;
  }

  private partition(namespace: string): Map<string, Uint8Array> {
    this.assertOpen();
    const partition = this.data.get(namespace);
    if (!partition) {
      throw new StoreUnavailableError(`Namespace "${namespace}" is not provisioned`, {
        details: { namespace },
      });
    }
    return partition;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreUnavailableError('In-memory store is closed');
    }
  }
}
