// packages/core/src/cache/keys.ts

import { createHash } from 'crypto';
import { objectHash } from 'ohash';
import type { EmbeddingsConfig } from '@embedcache/shared';

/** Bumped whenever the stored value layout changes. */
export const VALUE_FORMAT_VERSION = 1;
export const VALUE_ENCODING = 'float32-le';

const MAX_SLUG_LENGTH = 32;
const FINGERPRINT_LENGTH = 16;

/** The config fields that can change the bytes produced for a sentence. */
export type NamespaceConfig = Pick<
  EmbeddingsConfig,
  'provider' | 'model' | 'dims' | 'normalize' | 'truncateDim'
>;

/** Matches an unpaired UTF-16 surrogate, which UTF-8 cannot represent. */
const LONE_SURROGATE = /\p{Surrogate}/u;

/** Never occurs in UTF-8, so it separates the two key spaces. */
const UTF16_KEY_MARKER = Buffer.from([0xff]);

/**
 * Cache key for a sentence: hex SHA-256 of its UTF-8 text. Model identity
 * lives in the namespace, so one sentence has one key everywhere.
 *
 * Strings holding lone surrogates would all encode to U+FFFD, so they are
 * hashed as a marker byte followed by their UTF-16 code units instead.
 */
export function cacheKey(sentence: string): string {
  const hash = createHash('sha256');
  if (LONE_SURROGATE.test(sentence)) {
    hash.update(UTF16_KEY_MARKER).update(Buffer.from(sentence, 'utf16le'));
  } else {
    hash.update(sentence, 'utf8');
  }
  return hash.digest('hex');
}

/**
 * Identifies the model that produces the vectors. The local hash embedder has
 * no model name; its output depends on the configured dimensionality instead.
 */
export function modelIdentity(config: NamespaceConfig): string {
  if (config.provider === 'local-hash') {
    return `local-hash-${config.dims}`;
  }
  return config.model ?? config.provider;
}

function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/_+$/g, '');
  return slug || 'model';
}

/**
 * Derives the namespace for a configuration as `emb_<model-slug>_<fingerprint>`.
 *
 * The slug is for humans reading table names. The fingerprint hashes a
 * canonical serialization of every field that affects output bytes, so two
 * configs whose models slugify alike still land in different namespaces.
 */
export function resolveNamespace(config: NamespaceConfig): string {
  const model = modelIdentity(config);
  const identity = {
    format: VALUE_FORMAT_VERSION,
    encoding: VALUE_ENCODING,
    provider: config.provider,
    model,
    normalize: config.normalize,
    truncateDim: config.truncateDim ?? null,
  };
  const fingerprint = createHash('sha256')
    .update(objectHash(identity))
    .digest('hex')
    .slice(0, FINGERPRINT_LENGTH);
  return `emb_${slugify(model)}_${fingerprint}`;
}
