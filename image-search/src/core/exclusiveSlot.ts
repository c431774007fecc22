import type { CaptionEngine, EmbeddingEncoder, Vector } from '../types';

/**
 * Single-slot lock. Tasks passed to run() execute one at a time in the
 * order they were submitted; a failing task releases the slot.
 */
export class ExclusiveSlot {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /** Tasks queued or running. */
  get pending(): number {
    return this.waiting;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.waiting++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.release(),
      () => this.release(),
    );
    return result;
  }

  private release() {
    this.waiting--;
  }
}

/** Routes every caption call through its own slot unless the engine allows concurrent inference. */
export function guardCaptionEngine(engine: CaptionEngine, slot = new ExclusiveSlot()): CaptionEngine {
  if (engine.concurrentInference) return engine;
  return {
    name: engine.name,
    concurrentInference: false,
    caption: (image: Buffer) => slot.run(() => engine.caption(image)),
  };
}

export function guardEmbeddingEncoder(encoder: EmbeddingEncoder, slot = new ExclusiveSlot()): EmbeddingEncoder {
  if (encoder.concurrentInference) return encoder;
  return {
    model: encoder.model,
    dimension: encoder.dimension,
    concurrentInference: false,
    encode: (text: string): Promise<Vector> => slot.run(() => encoder.encode(text)),
  };
}
