import type { Vector } from '../types';

export interface Candidate<T> {
  item: T;
  vector: Vector;
}

export interface RankedItem<T> {
  item: T;
  score: number;
}

export interface RankOptions {
  /** Minimum signed cosine similarity; candidates scoring below it are dropped. */
  threshold: number;
  /** Maximum number of results, applied after filtering and sorting. */
  limit: number;
}

/**
 * Scores candidates against a query vector. Callers only depend on this
 * shape, so an approximate nearest-neighbour index can replace the linear scan.
 */
export interface SimilarityRanker {
  rank<T>(query: Vector, candidates: ReadonlyArray<Candidate<T>>, options: RankOptions): RankedItem<T>[];
}

/**
 * Cosine similarity in [-1, 1]. A zero-magnitude vector on either side
 * scores 0 so the candidate stays sortable.
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let magA = 0;
  let magB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(magA) * Math.sqrt(magB);
  if (magnitude === 0) return 0;

  // rounding can push parallel vectors a hair past 1
  return Math.min(1, Math.max(-1, dot / magnitude));
}

export class LinearScanRanker implements SimilarityRanker {
  rank<T>(query: Vector, candidates: ReadonlyArray<Candidate<T>>, options: RankOptions): RankedItem<T>[] {
    const { threshold, limit } = options;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`limit must be an integer >= 1, got ${limit}`);
    }

    const scored: { item: T; score: number; position: number }[] = [];
    candidates.forEach((candidate, position) => {
      const score = cosineSimilarity(query, candidate.vector);
      if (score < threshold) return;
      scored.push({ item: candidate.item, score, position });
    });

    // equal scores keep input order
    scored.sort((a, b) => b.score - a.score || a.position - b.position);

    return scored.slice(0, limit).map(({ item, score }) => ({ item, score }));
  }
}
