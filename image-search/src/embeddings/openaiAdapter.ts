import { ModelFailure } from '../errors';
import type { EmbeddingEncoder, Vector } from '../types';

export interface OpenAIAdapterOptions {
    apiKey: string;
    model?: string;
    dimension: number;
    baseUrl?: string;
    timeoutMs?: number;
    fetchImpl?: typeof fetch;
}

export class OpenAIAdapter implements EmbeddingEncoder {
    readonly model: string;
    readonly dimension: number;
    readonly concurrentInference = true;
    private apiKey: string;
    private baseUrl: string;
    private timeoutMs: number;
    private fetchImpl: typeof fetch;

    constructor(options: OpenAIAdapterOptions) {
        if (!options.apiKey) {
            throw new Error('OpenAI API key is required for the openai embedding provider');
        }
        this.apiKey = options.apiKey;
        this.model = options.model ?? 'text-embedding-3-small';
        this.dimension = options.dimension;
        this.baseUrl = options.baseUrl ?? 'https://api.openai.com/v1';
        this.timeoutMs = options.timeoutMs ?? 30_000;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    async encode(text: string): Promise<Vector> {
        let response: Response;
        try {
            response = await this.fetchImpl(`${this.baseUrl}/embeddings`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'Authorization': `Bearer ${this.apiKey}`,
                },
                body: JSON.stringify({
                    input: text,
                    model: this.model,
                    dimensions: this.dimension,
                }),
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (err) {
            throw ModelFailure.wrap('embed', err);
        }

        if (!response.ok) {
            const body = await response.text();
            throw new ModelFailure('embed', `OpenAI embedding request failed (${response.status}): ${body}`);
        }

        const data: unknown = await response.json();
        const embedding = extractEmbedding(data);
        if (!embedding) {
            throw new ModelFailure('embed', 'unexpected OpenAI response: missing embedding data');
        }
        return embedding;
    }
}

function extractEmbedding(data: unknown): Vector | null {
    if (typeof data !== 'object' || data === null || !('data' in data)) return null;
    const entries = data.data;
    if (!Array.isArray(entries) || entries.length === 0) return null;
    const first: unknown = entries[0];
    if (typeof first !== 'object' || first === null || !('embedding' in first)) return null;
    const embedding = first.embedding;
    if (!Array.isArray(embedding) || !embedding.every((v): v is number => typeof v === 'number')) return null;
    return embedding;
}
