// packages/adapters/src/embed/local_hash_embedder.ts

import { createHash } from 'crypto';
import { Embedder, EmbedTextsOptions } from './embedder';
import { applyOutputOptions } from './postprocess';

/**
 * Offline embedder: each component is one byte of the SHA-256 digest of the
 * trimmed, lowercased text, scaled to [0, 1].
 */
export class LocalHashEmbedder implements Embedder {
  constructor(private readonly dimensions: number = 384) {}

  async embedTexts(texts: string[], opts: EmbedTextsOptions = {}): Promise<number[][]> {
    return texts.map((text) => {
      const normalizedText = text.trim().toLowerCase();
      const hash = createHash('sha256').update(normalizedText).digest();

      const floatArray = new Array<number>(this.dimensions).fill(0);
      for (let i = 0; i < this.dimensions; i++) {
        const hashIndex = i % hash.length;
        floatArray[i] = hash.readUInt8(hashIndex) / 255.0;
      }

      return applyOutputOptions(floatArray, opts);
    });
  }

  dims(truncateDim?: number): number {
    return truncateDim ?? this.dimensions;
  }

  id(): string {
    return `local-hash:${this.dimensions}`;
  }
}
