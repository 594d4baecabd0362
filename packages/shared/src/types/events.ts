/**
 * Base interface for all cache events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Cache partition the event belongs to */
  namespace: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted after the batched store lookup of an embed call.
 */
export interface CacheLookup extends BaseEvent {
  type: 'CacheLookup';
  payload: {
    /** Sentences in the request, duplicates included */
    requested: number;
    /** Distinct sentences looked up */
    distinct: number;
    hits: number;
    misses: number;
  };
}

/** Emitted when the provider has returned vectors for the miss batch */
export interface EmbeddingsComputed extends BaseEvent {
  type: 'EmbeddingsComputed';
  payload: {
    providerId: string;
    count: number;
    dims: number;
    durationMs: number;
  };
}

/** Emitted after newly computed vectors were handed to the store */
export interface CacheWrite extends BaseEvent {
  type: 'CacheWrite';
  payload: {
    entries: number;
    bytes: number;
  };
}

export type CacheEvent = CacheLookup | EmbeddingsComputed | CacheWrite;

export type CacheEventType = CacheEvent['type'];

export const CACHE_EVENT_SCHEMA_VERSION = 1;
