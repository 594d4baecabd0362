export * from './embedder';
export * from './postprocess';
export * from './local_hash_embedder';
export * from './openai_embedder';
export * from './factory';
