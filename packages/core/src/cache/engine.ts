// packages/core/src/cache/engine.ts

import { objectHash } from 'ohash';
import {
  CACHE_EVENT_SCHEMA_VERSION,
  ComputationFailedError,
  ConfigError,
  IntegrityError,
  NoopLogger,
  type EmbeddingsConfig,
  type Logger,
} from '@embedcache/shared';
import { createEmbedder, type Embedder } from '@embedcache/adapters';
import type { KeyValuePair, KeyValueStore } from '@embedcache/store';
import { cacheKey, resolveNamespace } from './keys';
import { decodeVector, encodeVector, toFloat32 } from './codec';

export interface EmbedOptions {
  /** Overrides `config.normalize` for this call */
  normalize?: boolean;
  /** Overrides `config.truncateDim` for this call */
  truncateDim?: number;
}

export interface EmbedResult {
  namespace: string;
  /** One vector per input sentence, in input order */
  vectors: Float32Array[];
  /** Distinct sentences served from the store */
  hits: number;
  /** Distinct sentences sent to the embedder */
  misses: number;
}

export interface CachedEmbeddingEngineOptions {
  store: KeyValueStore;
  logger?: Logger;
  /** Builds the embedder for a config (default: createEmbedder) */
  embedderFactory?: (config: EmbeddingsConfig) => Embedder;
}

/**
 * Cache-aside batch embedding over a key-value store.
 *
 * Per call: one store lookup for the distinct sentences, one embedder call for
 * the distinct misses, one write-back. Results are never kept in process
 * between calls; the store is the only source of truth.
 */
export class CachedEmbeddingEngine {
  private readonly store: KeyValueStore;
  private readonly logger: Logger;
  private readonly embedderFactory: (config: EmbeddingsConfig) => Embedder;
  private readonly embedders = new Map<string, Embedder>();

  constructor(options: CachedEmbeddingEngineOptions) {
    this.store = options.store;
    this.logger = options.logger ?? new NoopLogger();
    this.embedderFactory = options.embedderFactory ?? createEmbedder;
  }

  async embed(
    config: EmbeddingsConfig,
    sentences: readonly string[],
    options: EmbedOptions = {},
  ): Promise<Float32Array[]> {
    const result = await this.embedWithStats(config, sentences, options);
    return result.vectors;
  }

  async embedOne(
    config: EmbeddingsConfig,
    sentence: string,
    options: EmbedOptions = {},
  ): Promise<Float32Array> {
    const [vector] = await this.embed(config, [sentence], options);
    return vector;
  }

  async embedWithStats(
    config: EmbeddingsConfig,
    sentences: readonly string[],
    options: EmbedOptions = {},
  ): Promise<EmbedResult> {
    const effective = this.effectiveConfig(config, options);
    const namespace = resolveNamespace(effective);
    if (sentences.length === 0) {
      return { namespace, vectors: [], hits: 0, misses: 0 };
    }

    const embedder = this.embedderFor(effective);
    this.assertTruncationFits(embedder, effective.truncateDim);
    let expectedDims = embedder.dims(effective.truncateDim);

    await this.store.ensureNamespace(namespace);

    const distinct = [...new Set(sentences)];
    const keyOf = new Map(distinct.map((sentence) => [sentence, cacheKey(sentence)]));
    const stored = await this.store.batchGet(namespace, [...keyOf.values()]);

    const vectors = new Map<string, Float32Array>();
    const misses: string[] = [];

    for (const [sentence, key] of keyOf) {
      const bytes = stored.get(key);
      if (!bytes) {
        misses.push(sentence);
        continue;
      }
      const vector = this.decodeHit(namespace, key, bytes, expectedDims);
      expectedDims ??= vector.length;
      vectors.set(sentence, vector);
    }

    await this.logger.log({
      schemaVersion: CACHE_EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      namespace,
      type: 'CacheLookup',
      payload: {
        requested: sentences.length,
        distinct: distinct.length,
        hits: distinct.length - misses.length,
        misses: misses.length,
      },
    });

    if (misses.length > 0) {
      const computed = await this.computeMisses(embedder, namespace, misses, effective, expectedDims);
      const entries: KeyValuePair[] = [];
      let bytes = 0;
      misses.forEach((sentence, i) => {
        const value = encodeVector(computed[i]);
        bytes += value.byteLength;
        entries.push([keyOf.get(sentence) ?? cacheKey(sentence), value]);
        vectors.set(sentence, computed[i]);
      });

      await this.store.batchPutIfAbsent(namespace, entries);
      await this.logger.log({
        schemaVersion: CACHE_EVENT_SCHEMA_VERSION,
        timestamp: new Date().toISOString(),
        namespace,
        type: 'CacheWrite',
        payload: { entries: entries.length, bytes },
      });
    }

    return {
      namespace,
      vectors: sentences.map((sentence) => this.vectorFor(vectors, sentence).slice()),
      hits: distinct.length - misses.length,
      misses: misses.length,
    };
  }

  private effectiveConfig(config: EmbeddingsConfig, options: EmbedOptions): EmbeddingsConfig {
    const truncateDim = options.truncateDim ?? config.truncateDim;
    if (truncateDim !== undefined && (!Number.isInteger(truncateDim) || truncateDim <= 0)) {
      throw new ConfigError(`truncateDim must be a positive integer, got ${truncateDim}`);
    }
    return {
      ...config,
      normalize: options.normalize ?? config.normalize,
      truncateDim,
    };
  }

  private assertTruncationFits(embedder: Embedder, truncateDim: number | undefined): void {
    const width = embedder.dims();
    if (truncateDim !== undefined && width !== undefined && truncateDim > width) {
      throw new ConfigError(
        `truncateDim (${truncateDim}) exceeds the ${width} dimensions of ${embedder.id()}`,
        { details: { truncateDim, dims: width } },
      );
    }
  }

  /** Embedders are reused across calls; they hold clients, never results. */
  private embedderFor(config: EmbeddingsConfig): Embedder {
    const id = objectHash({
      provider: config.provider,
      model: config.model ?? null,
      dims: config.dims,
      batchSize: config.batchSize,
      apiKeyEnv: config.apiKeyEnv,
    });
    let embedder = this.embedders.get(id);
    if (!embedder) {
      embedder = this.embedderFactory(config);
      this.embedders.set(id, embedder);
    }
    return embedder;
  }

  private decodeHit(
    namespace: string,
    key: string,
    bytes: Uint8Array,
    expectedDims: number | undefined,
  ): Float32Array {
    try {
      return decodeVector(bytes, expectedDims);
    } catch (error) {
      if (error instanceof IntegrityError) {
        throw new IntegrityError(`Stored value for key ${key} in ${namespace}: ${error.message}`, {
          cause: error,
          details: { namespace, key, byteLength: bytes.byteLength, expectedDims },
        });
      }
      throw error;
    }
  }

  private async computeMisses(
    embedder: Embedder,
    namespace: string,
    misses: string[],
    config: EmbeddingsConfig,
    expectedDims: number | undefined,
  ): Promise<Float32Array[]> {
    const started = Date.now();
    let raw: unknown;
    try {
      raw = await embedder.embedTexts(misses, {
        normalize: config.normalize,
        truncateDim: config.truncateDim,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ComputationFailedError(`Embedder ${embedder.id()} failed: ${message}`, {
        cause: error,
        details: { namespace, batchSize: misses.length },
      });
    }

    const computed = this.validateComputed(embedder, namespace, raw, misses.length, expectedDims);
    await this.logger.log({
      schemaVersion: CACHE_EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      namespace,
      type: 'EmbeddingsComputed',
      payload: {
        providerId: embedder.id(),
        count: computed.length,
        dims: computed[0].length,
        durationMs: Date.now() - started,
      },
    });
    return computed;
  }

  private validateComputed(
    embedder: Embedder,
    namespace: string,
    raw: unknown,
    expectedCount: number,
    expectedDims: number | undefined,
  ): Float32Array[] {
    if (!Array.isArray(raw)) {
      throw new ComputationFailedError(`Embedder ${embedder.id()} did not return an array`, {
        details: { namespace },
      });
    }
    if (raw.length !== expectedCount) {
      throw new IntegrityError(
        `Embedder ${embedder.id()} returned ${raw.length} vectors for ${expectedCount} sentences`,
        { details: { namespace, expected: expectedCount, actual: raw.length } },
      );
    }

    let dims = expectedDims;
    return raw.map((row: unknown, index) => {
      if (
        !Array.isArray(row) ||
        row.length === 0 ||
        !row.every((value) => typeof value === 'number')
      ) {
        throw new ComputationFailedError(
          `Embedder ${embedder.id()} returned a malformed vector at index ${index}`,
          { details: { namespace, index } },
        );
      }
      dims ??= row.length;
      if (row.length !== dims) {
        throw new IntegrityError(
          `Embedder ${embedder.id()} returned ${row.length} components at index ${index}, expected ${dims}`,
          { details: { namespace, index, expectedDims: dims } },
        );
      }
      return toFloat32(row);
    });
  }

  private vectorFor(vectors: Map<string, Float32Array>, sentence: string): Float32Array {
    const vector = vectors.get(sentence);
    if (!vector) {
      throw new IntegrityError(`No vector resolved for sentence "${sentence}"`);
    }
    return vector;
  }
}
