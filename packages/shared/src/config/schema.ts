import { z } from 'zod';

export const EMBEDDING_PROVIDERS = ['local-hash', 'openai'] as const;
export type EmbeddingProviderKind = (typeof EMBEDDING_PROVIDERS)[number];

export const STORE_BACKENDS = ['sqlite', 'memory'] as const;
export type StoreBackendKind = (typeof STORE_BACKENDS)[number];

export const EmbeddingsConfigSchema = z
  .object({
    provider: z.enum(EMBEDDING_PROVIDERS).default('local-hash'),
    model: z.string().min(1).optional(),
    dims: z.number().int().positive().default(384),
    normalize: z.boolean().default(false),
    truncateDim: z.number().int().positive().optional(),
    batchSize: z.number().int().positive().default(32),
    apiKeyEnv: z.string().default('OPENAI_API_KEY'),
  })
  .superRefine((data, ctx) => {
    if (data.provider !== 'local-hash' && !data.model) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "embeddings.model is required when provider is not 'local-hash'",
        path: ['model'],
      });
    }
    if (data.provider === 'local-hash' && data.truncateDim && data.truncateDim > data.dims) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `embeddings.truncateDim (${data.truncateDim}) exceeds embeddings.dims (${data.dims})`,
        path: ['truncateDim'],
      });
    }
  });

export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type EmbeddingsConfigInput = z.input<typeof EmbeddingsConfigSchema>;

/** SQLite's default cap on bound parameters per statement. */
export const SQLITE_MAX_VARIABLES = 32766;
/** One parameter per key */
export const MAX_READ_CHUNK_SIZE = SQLITE_MAX_VARIABLES;
/** Two parameters per row: key and value */
export const MAX_WRITE_PAGE_SIZE = Math.floor(SQLITE_MAX_VARIABLES / 2);

export const StoreConfigSchema = z.object({
  backend: z.enum(STORE_BACKENDS).default('sqlite'),
  path: z.string().default('.embedcache/cache.sqlite'),
  /** Keys per SELECT when reading a large batch */
  readChunkSize: z.number().int().positive().max(MAX_READ_CHUNK_SIZE).default(500),
  /** Rows per INSERT page when writing a large batch */
  writePageSize: z.number().int().positive().max(MAX_WRITE_PAGE_SIZE).default(1000),
});

export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type StoreConfigInput = z.input<typeof StoreConfigSchema>;

export const LoggingConfigSchema = z.object({
  /** Append structured cache events to this JSONL file */
  jsonlPath: z.string().optional(),
  verbose: z.boolean().default(false),
});

export const EmbedCacheConfigSchema = z.object({
  embeddings: EmbeddingsConfigSchema.default({
    provider: 'local-hash',
    dims: 384,
    normalize: false,
    batchSize: 32,
    apiKeyEnv: 'OPENAI_API_KEY',
  }),
  store: StoreConfigSchema.default({
    backend: 'sqlite',
    path: '.embedcache/cache.sqlite',
    readChunkSize: 500,
    writePageSize: 1000,
  }),
  logging: LoggingConfigSchema.default({
    verbose: false,
  }),
});

export type EmbedCacheConfig = z.infer<typeof EmbedCacheConfigSchema>;
export type EmbedCacheConfigInput = z.input<typeof EmbedCacheConfigSchema>;

export const DEFAULT_CONFIG: EmbedCacheConfig = EmbedCacheConfigSchema.parse({});
