import axios, { AxiosInstance, isAxiosError } from 'axios';
import { ModelFailure, errorMessage } from '../errors';
import { toRgbJpeg } from '../imaging/imageDecoder';
import type { CaptionEngine } from '../types';

export interface HttpCaptionEngineOptions {
  /** Full URL of an image-to-text inference endpoint. */
  url: string;
  token?: string;
  timeoutMs?: number;
  /** Whether the hosted model serves several requests at once. */
  concurrent?: boolean;
}

/**
 * HttpCaptionEngine
 * - Sends the image as an RGB JPEG body to a hosted image-to-text model
 * - Expects the Hugging Face inference reply: [{ "generated_text": "..." }]
 * - Any transport error, non-2xx status or empty text is a ModelFailure
 */
export class HttpCaptionEngine implements CaptionEngine {
  readonly name: string;
  readonly concurrentInference: boolean;
  private client: AxiosInstance;
  private url: string;

  constructor(options: HttpCaptionEngineOptions) {
    this.url = options.url;
    this.name = `http:${options.url}`;
    this.concurrentInference = options.concurrent ?? false;
    this.client = axios.create({
      timeout: options.timeoutMs ?? 30_000,
      headers: options.token ? { Authorization: `Bearer ${options.token}` } : {},
    });
  }

  async caption(image: Buffer): Promise<string> {
    let body: Buffer;
    try {
      body = await toRgbJpeg(image);
    } catch (err) {
      throw new ModelFailure('caption', `could not normalise image: ${errorMessage(err)}`, err);
    }

    let data: unknown;
    try {
      const res = await this.client.post<unknown>(this.url, body, {
        headers: { 'Content-Type': 'image/jpeg' },
      });
      data = res.data;
    } catch (err) {
      if (isAxiosError(err) && err.response) {
        throw new ModelFailure('caption', `caption backend returned ${err.response.status}`, err);
      }
      throw ModelFailure.wrap('caption', err);
    }

    const text = extractGeneratedText(data);
    if (!text) {
      throw new ModelFailure('caption', 'caption backend returned no generated_text');
    }
    return text;
  }
}

export function extractGeneratedText(data: unknown): string | null {
  const first: unknown = Array.isArray(data) ? data[0] : data;
  if (typeof first !== 'object' || first === null || !('generated_text' in first)) return null;
  const text = first.generated_text;
  if (typeof text !== 'string') return null;
  const trimmed = text.trim();
  return trimmed.length ? trimmed : null;
}
