import type { VectorCodec } from '../codec/vectorCodec';
import { encodeChecked } from '../embeddings';
import { CorruptVectorError, StorageFailure, ValidationError } from '../errors';
import type { EmbeddingEncoder, RecordStore, SearchResponse, StoredItem } from '../types';
import { roundScore, toSummary } from '../utils';
import { createLogger, Logger } from '../utils/logger';
import type { Candidate, SimilarityRanker } from './ranker';

export interface SearchLimits {
  defaultLimit: number;
  maxLimit: number;
  defaultThreshold: number;
}

export interface RetrievalPipelineDeps {
  records: RecordStore;
  encoder: EmbeddingEncoder;
  codec: VectorCodec;
  ranker: SimilarityRanker;
  limits: SearchLimits;
  logger?: Logger;
}

export interface SearchRequest {
  query: string;
  limit?: number;
  threshold?: number;
}

/**
 * QueryReceived -> Embedded -> Scored -> Ranked -> Returned.
 *
 * Works on one snapshot of the record store. A record whose blob fails to
 * decode is logged and left out; it never fails the whole query.
 */
export class RetrievalPipeline {
  private deps: RetrievalPipelineDeps;
  private log: Logger;

  constructor(deps: RetrievalPipelineDeps) {
    this.deps = deps;
    this.log = deps.logger ?? createLogger('RetrievalPipeline');
  }

  validate(request: SearchRequest): { query: string; limit: number; threshold: number } {
    const { defaultLimit, maxLimit, defaultThreshold } = this.deps.limits;
    const query = request.query.trim();
    if (!query) {
      throw new ValidationError('Search query must not be empty');
    }
    const limit = request.limit ?? defaultLimit;
    if (!Number.isInteger(limit) || limit < 1 || limit > maxLimit) {
      throw new ValidationError(`limit must be an integer between 1 and ${maxLimit}`);
    }
    const threshold = request.threshold ?? defaultThreshold;
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new ValidationError('threshold must be between 0.0 and 1.0');
    }
    return { query, limit, threshold };
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const { records, encoder, codec, ranker } = this.deps;
    const { query, limit, threshold } = this.validate(request);
    this.log.info(`Searching images with query: '${query}'`);

    const queryVector = await encodeChecked(encoder, query);

    let snapshot: StoredItem[];
    try {
      snapshot = await records.listAllRecords();
    } catch (err) {
      throw StorageFailure.wrap('listAllRecords', err);
    }
    if (snapshot.length === 0) {
      return { query: request.query, totalResults: 0, results: [] };
    }

    const candidates: Candidate<StoredItem>[] = [];
    for (const item of snapshot) {
      try {
        candidates.push({ item, vector: codec.decode(item.vectorBlob) });
      } catch (err) {
        if (!(err instanceof CorruptVectorError)) throw err;
        this.log.warn(`Skipping image ${item.id}: ${err.message}`);
      }
    }

    const ranked = ranker.rank(queryVector, candidates, { threshold, limit });
    const results = ranked.map(({ item, score }) => ({ ...toSummary(item), score: roundScore(score) }));

    this.log.info(`Found ${results.length} matching images for query: '${query}'`);
    // totalResults counts what is returned, not every match above the threshold
    return { query: request.query, totalResults: results.length, results };
  }
}
