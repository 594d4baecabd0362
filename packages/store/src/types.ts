// packages/store/src/types.ts

/** A cache entry as handed to the store: hex key and encoded vector bytes. */
export type KeyValuePair = readonly [key: string, value: Uint8Array];

/**
 * Backend information returned by info().
 * Used by CLI diagnostics.
 */
export interface StoreInfo {
  backend: string;
  location: string;
}

/**
 * Durable, namespace-partitioned key-value storage with batch semantics.
 *
 * Entries are write-once: `batchPutIfAbsent` never overwrites, so racing
 * writers need no locking and the first successful writer wins.
 */
export interface KeyValueStore {
  /**
   * Provisions storage for a namespace. Safe to call repeatedly.
   */
  ensureNamespace(name: string): Promise<void>;

  /**
   * Fetches the subset of `keys` present in the namespace. Duplicate keys are
   * allowed; absent keys are omitted. An empty list resolves to an empty map
   * without touching the backend.
   */
  batchGet(namespace: string, keys: readonly string[]): Promise<Map<string, Uint8Array>>;

  /**
   * Inserts every entry whose key is absent and skips the rest. Atomic per
   * call. An empty list is a no-op.
   */
  batchPutIfAbsent(namespace: string, entries: readonly KeyValuePair[]): Promise<void>;

  info(): StoreInfo;

  /**
   * Releases the backend handle. Further calls fail with StoreUnavailableError.
   */
  close(): Promise<void>;
}
