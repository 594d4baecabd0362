// packages/adapters/src/embed/postprocess.ts

import { ConfigError } from '@embedcache/shared';
import type { EmbedTextsOptions } from './embedder';

export function l2Normalize(arr: number[]): number[] {
  const sumOfSquares = arr.reduce((sum, val) => sum + val * val, 0);
  const norm = Math.sqrt(sumOfSquares);
  if (norm === 0) {
    return arr;
  }
  return arr.map((val) => val / norm);
}

/**
 * Truncates first, then normalizes, so a truncated vector still has unit length.
 */
export function applyOutputOptions(vector: number[], opts: EmbedTextsOptions = {}): number[] {
  let out = vector;
  if (opts.truncateDim !== undefined) {
    if (opts.truncateDim > vector.length) {
      throw new ConfigError(
        `truncateDim ${opts.truncateDim} exceeds embedding dimensionality ${vector.length}`,
      );
    }
    out = out.slice(0, opts.truncateDim);
  }
  return opts.normalize ? l2Normalize(out) : out;
}
