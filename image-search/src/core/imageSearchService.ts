import { VectorCodec } from '../codec/vectorCodec';
import { ConfigurationError, StorageFailure, ValidationError, errorMessage } from '../errors';
import type {
  BlobStore,
  CaptionEngine,
  EmbeddingEncoder,
  ImageSummary,
  IngestResult,
  ItemId,
  RecordStore,
  SearchResponse,
  StoredItem,
} from '../types';
import { toSummary } from '../utils';
import { createLogger, Logger } from '../utils/logger';
import { guardCaptionEngine, guardEmbeddingEncoder } from './exclusiveSlot';
import { IngestPipeline, IngestStage, UploadLimits } from './ingestPipeline';
import { LinearScanRanker, SimilarityRanker } from './ranker';
import { RetrievalPipeline, SearchLimits } from './retrievalPipeline';

export interface ImageSearchServiceOptions {
  blobs: BlobStore;
  records: RecordStore;
  captioner: CaptionEngine;
  encoder: EmbeddingEncoder;
  /** Defaults to a codec for the encoder's dimension. */
  codec?: VectorCodec;
  ranker?: SimilarityRanker;
  upload: UploadLimits;
  search: SearchLimits;
  history?: { defaultLimit: number; maxLimit: number };
  logger?: Logger;
  onIngestStage?: (stage: IngestStage, filename: string) => void;
}

/**
 * Entry point for transport layers. Model handles are passed in once and
 * shared by every call; backends that cannot serve concurrent inference are
 * wrapped in a single-slot lock here.
 */
export class ImageSearchService {
  readonly dimension: number;
  private readonly ingestPipeline: IngestPipeline;
  private readonly retrievalPipeline: RetrievalPipeline;
  private readonly blobs: BlobStore;
  private readonly records: RecordStore;
  private readonly historyLimits: { defaultLimit: number; maxLimit: number };
  private readonly log: Logger;

  constructor(options: ImageSearchServiceOptions) {
    const codec = options.codec ?? new VectorCodec(options.encoder.dimension);
    if (codec.dimension !== options.encoder.dimension) {
      throw new ConfigurationError(
        `encoder ${options.encoder.model} produces ${options.encoder.dimension}-dimensional vectors but the codec expects ${codec.dimension}`,
      );
    }
    this.dimension = codec.dimension;
    this.blobs = options.blobs;
    this.records = options.records;
    this.historyLimits = options.history ?? { defaultLimit: 50, maxLimit: 100 };
    this.log = options.logger ?? createLogger('ImageSearchService');

    const captioner = guardCaptionEngine(options.captioner);
    const encoder = guardEmbeddingEncoder(options.encoder);

    this.ingestPipeline = new IngestPipeline({
      blobs: options.blobs,
      records: options.records,
      captioner,
      encoder,
      codec,
      limits: options.upload,
      logger: options.logger,
      onStage: options.onIngestStage,
    });
    this.retrievalPipeline = new RetrievalPipeline({
      records: options.records,
      encoder,
      codec,
      ranker: options.ranker ?? new LinearScanRanker(),
      limits: options.search,
      logger: options.logger,
    });
  }

  ingest(bytes: Buffer, contentType: string, filename: string): Promise<IngestResult> {
    return this.ingestPipeline.ingest({ bytes, contentType, filename });
  }

  search(query: string, limit?: number, threshold?: number): Promise<SearchResponse> {
    return this.retrievalPipeline.search({ query, limit, threshold });
  }

  async history(limit?: number, offset = 0): Promise<ImageSummary[]> {
    const { defaultLimit, maxLimit } = this.historyLimits;
    const effective = limit ?? defaultLimit;
    if (!Number.isInteger(effective) || effective < 1 || effective > maxLimit) {
      throw new ValidationError(`limit must be an integer between 1 and ${maxLimit}`);
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ValidationError('offset must be a non-negative integer');
    }
    const items = await this.storage('listRecent', () => this.records.listRecent(effective, offset));
    return items.map(toSummary);
  }

  async getImage(id: ItemId): Promise<ImageSummary | null> {
    const item = await this.storage('getRecord', () => this.records.getRecord(id));
    return item ? toSummary(item) : null;
  }

  /** Null when the record is unknown; `bytes` is null when the record exists but its file is gone. */
  async readImageBytes(id: ItemId): Promise<{ item: ImageSummary; bytes: Buffer | null } | null> {
    const item = await this.storage('getRecord', () => this.records.getRecord(id));
    if (!item) return null;
    const bytes = await this.storage('readBytes', () => this.blobs.readBytes(item.storageRef));
    return { item: toSummary(item), bytes };
  }

  /** Removes the record first so searches stop returning it, then the bytes. */
  async deleteImage(id: ItemId): Promise<boolean> {
    const item: StoredItem | null = await this.storage('getRecord', () => this.records.getRecord(id));
    if (!item) return false;
    const deleted = await this.storage('deleteRecord', () => this.records.deleteRecord(id));
    if (!deleted) return false;
    try {
      await this.blobs.deleteBytes(item.storageRef);
    } catch (err) {
      this.log.warn(`Record ${id} deleted but its file could not be removed: ${errorMessage(err)}`);
    }
    this.log.info(`Image deleted: ${item.filename}`);
    return true;
  }

  private async storage<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      throw StorageFailure.wrap(operation, err);
    }
  }
}
