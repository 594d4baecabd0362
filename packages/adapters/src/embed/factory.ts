import type { EmbeddingsConfig } from '@embedcache/shared';
import { ConfigError } from '@embedcache/shared';
import { Embedder } from './embedder';
import { OpenAIEmbedder } from './openai_embedder';
import { LocalHashEmbedder } from './local_hash_embedder';

/**
 * Builds the embedder selected by `config.provider`. Truncation and
 * normalization are per-call options and are not baked in here.
 */
export function createEmbedder(config: EmbeddingsConfig): Embedder {
  switch (config.provider) {
    case 'openai':
      return new OpenAIEmbedder({
        apiKeyEnv: config.apiKeyEnv,
        model: config.model,
        batchSize: config.batchSize,
      });
    case 'local-hash':
      return new LocalHashEmbedder(config.dims);
    default: {
      const provider: never = config.provider;
      throw new ConfigError(`Unsupported embedder provider: ${String(provider)}`);
    }
  }
}
