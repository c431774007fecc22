/**
 * Error taxonomy for ingestion and retrieval.
 *
 * User-correctable input problems (ValidationError, InvalidImageError) are
 * raised before any model inference runs. ModelFailure and StorageFailure
 * wrap errors coming out of the model backends and storage collaborators.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_IMAGE'
  | 'MODEL_FAILURE'
  | 'CORRUPT_VECTOR'
  | 'STORAGE_FAILURE'
  | 'CONFIGURATION_ERROR';

export abstract class ImageSearchError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad input shape, size or type. */
export class ValidationError extends ImageSearchError {
  readonly code = 'VALIDATION_ERROR';
}

/** Bytes were accepted by validation but do not decode as an image. */
export class InvalidImageError extends ImageSearchError {
  readonly code = 'INVALID_IMAGE';
}

export type ModelStage = 'caption' | 'embed';

/**
 * Captioning or embedding backend error. May be transient; never retried
 * internally.
 */
export class ModelFailure extends ImageSearchError {
  readonly code = 'MODEL_FAILURE';
  readonly stage: ModelStage;

  constructor(stage: ModelStage, message: string, cause?: unknown) {
    super(`${stage} model failed: ${message}`, { cause });
    this.stage = stage;
  }

  static wrap(stage: ModelStage, err: unknown): ModelFailure {
    if (err instanceof ModelFailure) return err;
    return new ModelFailure(stage, errorMessage(err), err);
  }
}

/** A stored vector blob that cannot be decoded into a D-length vector. */
export class CorruptVectorError extends ImageSearchError {
  readonly code = 'CORRUPT_VECTOR';
  readonly reason: string;

  constructor(reason: string) {
    super(`corrupt vector blob: ${reason}`);
    this.reason = reason;
  }
}

/** I/O error from a storage collaborator. */
export class StorageFailure extends ImageSearchError {
  readonly code = 'STORAGE_FAILURE';
  readonly operation: string;

  constructor(operation: string, message: string, cause?: unknown) {
    super(`${operation} failed: ${message}`, { cause });
    this.operation = operation;
  }

  static wrap(operation: string, err: unknown): StorageFailure {
    if (err instanceof StorageFailure) return err;
    return new StorageFailure(operation, errorMessage(err), err);
  }
}

/** Inconsistent deployment settings, detected at startup. */
export class ConfigurationError extends ImageSearchError {
  readonly code = 'CONFIGURATION_ERROR';
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
