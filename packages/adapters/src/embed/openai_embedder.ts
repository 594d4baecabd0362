// packages/adapters/src/embed/openai_embedder.ts

import OpenAI, { APIError } from 'openai';
import { ConfigError, RateLimitError } from '@embedcache/shared';
import { Embedder, EmbedTextsOptions } from './embedder';
import { applyOutputOptions } from './postprocess';

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_BATCH_SIZE = 32;

const KNOWN_MODEL_DIMS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

export interface OpenAIEmbedderConfig {
  apiKey?: string;
  apiKeyEnv?: string;
  model?: string;
  dimensions?: number;
  /** Maximum inputs per API request */
  batchSize?: number;
}

export class OpenAIEmbedder implements Embedder {
  private client: OpenAI;
  private model: string;
  private dimensions?: number;
  private batchSize: number;

  constructor(config: OpenAIEmbedderConfig) {
    const apiKey = config.apiKey || (config.apiKeyEnv && process.env[config.apiKeyEnv]);
    if (!apiKey) {
      throw new ConfigError(
        `Missing API Key for OpenAI provider. Checked config.apiKey and env var ${config.apiKeyEnv}`,
      );
    }
    this.model = config.model || DEFAULT_MODEL;
    this.dimensions = config.dimensions;
    this.batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;
    this.client = new OpenAI({
      apiKey,
    });
  }

  async embedTexts(texts: string[], opts: EmbedTextsOptions = {}): Promise<number[][]> {
    // The API truncates and re-normalizes natively when given `dimensions`.
    const dimensions = opts.truncateDim ?? this.dimensions;
    const out: number[][] = [];
    try {
      for (let i = 0; i < texts.length; i += this.batchSize) {
        const response = await this.client.embeddings.create({
          model: this.model,
          input: texts.slice(i, i + this.batchSize),
          dimensions,
        });
        // The OpenAI library guarantees the embeddings will be in the same order as the inputs.
        for (const d of response.data) {
          out.push(applyOutputOptions(d.embedding, { normalize: opts.normalize }));
        }
      }
    } catch (error) {
      throw this.mapError(error);
    }
    return out;
  }

  dims(truncateDim?: number): number | undefined {
    return truncateDim ?? this.dimensions ?? KNOWN_MODEL_DIMS[this.model];
  }

  id(): string {
    return `openai:${this.model}`;
  }

  private mapError(error: unknown): Error {
    if (error instanceof APIError) {
      if (error.status === 429) {
        const retryAfter = Number(error.headers?.['retry-after']);
        return new RateLimitError(error.message, {
          cause: error,
          retryAfter: Number.isFinite(retryAfter) ? retryAfter : undefined,
        });
      }
      if (error.status === 401) {
        return new ConfigError(error.message, { cause: error });
      }
    }
    if (error instanceof Error) return error;
    return new Error(String(error));
  }
}
