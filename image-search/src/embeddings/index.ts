import { ModelFailure } from '../errors';
import type { EmbeddingEncoder, Vector } from '../types';

export { LocalEmbeddingEncoder, DEFAULT_EMBEDDING_DIM } from './localEmbedding';
export { OpenAIAdapter } from './openaiAdapter';

/** Encodes text and checks the result has the encoder's dimension and only finite components. */
export async function encodeChecked(encoder: EmbeddingEncoder, text: string): Promise<Vector> {
    let vector: Vector;
    try {
        vector = await encoder.encode(text);
    } catch (err) {
        throw ModelFailure.wrap('embed', err);
    }
    if (vector.length !== encoder.dimension) {
        throw new ModelFailure('embed', `${encoder.model} returned ${vector.length} components, expected ${encoder.dimension}`);
    }
    if (!vector.every(Number.isFinite)) {
        throw new ModelFailure('embed', `${encoder.model} returned a non-finite component`);
    }
    return vector;
}
