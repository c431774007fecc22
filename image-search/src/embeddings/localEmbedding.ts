import crypto from 'crypto';
import type { EmbeddingEncoder, Vector } from '../types';
import { normalizeVector } from '../utils';

/**
 * Deterministic local text encoder for offline use.
 * - Each token gets a pseudo-random unit vector seeded from its md5.
 * - Token vectors are summed and the sum normalized to unit length.
 *
 * Texts that share words land close together, which is enough for
 * development and tests. Swap in OpenAIAdapter for real semantics.
 */
export const DEFAULT_EMBEDDING_DIM = 384;

function xorshift32(seed: number) {
  // returns PRNG function that yields float in [-1,1)
  let x = seed || 2463534242;
  return function () {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    // convert to 32-bit unsigned, then to float in (-1,1)
    return ((x >>> 0) / 0xffffffff) * 2 - 1;
  };
}

export function md5Hex(s: string) {
  return crypto.createHash('md5').update(s, 'utf8').digest('hex');
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

/** token -> md5 -> seed -> `dim` floats -> normalize */
export function tokenVector(token: string, dim: number): Vector {
  const seed = parseInt(md5Hex(token).slice(0, 8), 16) >>> 0;
  const rnd = xorshift32(seed);
  const vec: Vector = [];
  for (let i = 0; i < dim; i++) vec.push(rnd());
  return normalizeVector(vec);
}

export class LocalEmbeddingEncoder implements EmbeddingEncoder {
  readonly model = 'local-hashed-tokens';
  readonly concurrentInference = true;
  readonly dimension: number;

  constructor(dimension: number = DEFAULT_EMBEDDING_DIM) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError(`embedding dimension must be a positive integer, got ${dimension}`);
    }
    this.dimension = dimension;
  }

  async encode(text: string): Promise<Vector> {
    const sum: Vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokenize(text)) {
      const tv = tokenVector(token, this.dimension);
      for (let i = 0; i < this.dimension; i++) sum[i] += tv[i];
    }
    return normalizeVector(sum);
  }
}
