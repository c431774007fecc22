import { captionChecked } from '../captioning';
import type { VectorCodec } from '../codec/vectorCodec';
import { encodeChecked } from '../embeddings';
import { StorageFailure, ValidationError, errorMessage } from '../errors';
import { verifyImage } from '../imaging/imageDecoder';
import type { BlobStore, CaptionEngine, EmbeddingEncoder, IngestResult, RecordStore, StoredItem } from '../types';
import { fileExtension, generateStoredName, toSummary } from '../utils';
import { createLogger, Logger } from '../utils/logger';

export type IngestStage = 'Received' | 'Validated' | 'Persisted' | 'Captioned' | 'Embedded' | 'Stored';

export interface UploadLimits {
  maxFileSize: number;
  /** Lower-case extensions without the dot. */
  allowedExtensions: string[];
}

export interface IngestPipelineDeps {
  blobs: BlobStore;
  records: RecordStore;
  captioner: CaptionEngine;
  encoder: EmbeddingEncoder;
  codec: VectorCodec;
  limits: UploadLimits;
  logger?: Logger;
  onStage?: (stage: IngestStage, filename: string) => void;
}

export interface Upload {
  bytes: Buffer;
  contentType: string;
  filename: string;
}

/**
 * Received -> Validated -> Persisted -> Captioned -> Embedded -> Stored.
 *
 * Validation runs before any I/O. Once bytes are persisted, every failure
 * deletes them again before the error reaches the caller.
 */
export class IngestPipeline {
  private deps: IngestPipelineDeps;
  private log: Logger;

  constructor(deps: IngestPipelineDeps) {
    this.deps = deps;
    this.log = deps.logger ?? createLogger('IngestPipeline');
  }

  validate(upload: Upload): string {
    const { maxFileSize, allowedExtensions } = this.deps.limits;
    if (upload.bytes.length === 0) {
      throw new ValidationError('File is empty');
    }
    if (!upload.contentType || !upload.contentType.toLowerCase().startsWith('image/')) {
      throw new ValidationError('File must be an image');
    }
    const extension = fileExtension(upload.filename);
    if (!allowedExtensions.includes(extension)) {
      throw new ValidationError(
        `Only ${allowedExtensions.map((e) => e.toUpperCase()).join(', ')} images are supported`,
      );
    }
    if (upload.bytes.length > maxFileSize) {
      throw new ValidationError(`File size exceeds maximum limit of ${maxFileSize} bytes`);
    }
    return extension;
  }

  async ingest(upload: Upload): Promise<IngestResult> {
    const { blobs, records, captioner, encoder, codec } = this.deps;
    this.stage('Received', upload.filename);

    const extension = this.validate(upload);
    this.stage('Validated', upload.filename);

    let storageRef: string;
    try {
      storageRef = await blobs.persistBytes(upload.bytes, extension);
    } catch (err) {
      throw StorageFailure.wrap('persistBytes', err);
    }
    this.stage('Persisted', upload.filename);

    try {
      await verifyImage(upload.bytes);
      const caption = await captionChecked(captioner, upload.bytes);
      this.stage('Captioned', upload.filename);

      const vector = await encodeChecked(encoder, caption);
      this.stage('Embedded', upload.filename);

      const vectorBlob = codec.encode(vector);
      const filename = storedName(storageRef, extension);
      let item: StoredItem;
      try {
        item = await records.createRecord({
          filename,
          caption,
          vectorBlob,
          storageRef,
          sizeBytes: upload.bytes.length,
          contentType: upload.contentType,
        });
      } catch (err) {
        throw StorageFailure.wrap('createRecord', err);
      }
      this.stage('Stored', upload.filename);
      this.log.info(`Image ingested: ${item.filename} (id ${item.id}) caption="${item.caption}"`);

      return toSummary(item);
    } catch (err) {
      await this.discard(storageRef);
      this.log.error(`Ingest of ${upload.filename} failed: ${errorMessage(err)}`);
      throw err;
    }
  }

  private async discard(storageRef: string) {
    try {
      await this.deps.blobs.deleteBytes(storageRef);
    } catch (cleanupErr) {
      this.log.error(`Could not delete orphaned upload ${storageRef}: ${errorMessage(cleanupErr)}`);
    }
  }

  private stage(stage: IngestStage, filename: string) {
    this.log.debug(`${filename}: ${stage}`);
    this.deps.onStage?.(stage, filename);
  }
}

/** The stored file's own name when the ref is a path, else a fresh one. */
function storedName(storageRef: string, extension: string): string {
  const base = storageRef.split(/[\\/]/).pop();
  return base && fileExtension(base) === extension ? base : generateStoredName(extension);
}
