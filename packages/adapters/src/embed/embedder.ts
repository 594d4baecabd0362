// packages/adapters/src/embed/embedder.ts

export interface EmbedTextsOptions {
  /** L2-normalize each vector after truncation */
  normalize?: boolean;
  /** Keep only the first `truncateDim` components */
  truncateDim?: number;
}

/**
 * A deterministic, batch-capable embedding backend. Output order matches
 * input order and dimensionality is constant for a fixed model and options.
 */
export interface Embedder {
  embedTexts(texts: string[], opts?: EmbedTextsOptions): Promise<number[][]>;
  /** Output dimensionality for the given truncation, or undefined when unknown */
  dims(truncateDim?: number): number | undefined;
  id(): string;
}
