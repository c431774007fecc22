import { HttpCaptionEngine, LocalCaptionEngine } from './captioning';
import type { AppConfig } from './config';
import { ImageSearchService } from './core/imageSearchService';
import { LocalEmbeddingEncoder, OpenAIAdapter } from './embeddings';
import { ConfigurationError, errorMessage } from './errors';
import FsStore from './storage/fsStore';
import SqliteStore from './storage/sqliteStore';
import type { CaptionEngine, EmbeddingEncoder } from './types';
import type { Logger } from './utils/logger';

export interface Runtime {
  service: ImageSearchService;
  close(): Promise<void>;
}

export function createCaptionEngine(config: AppConfig): CaptionEngine {
  const { caption } = config;
  if (caption.provider === 'http') {
    if (!caption.apiUrl) throw new ConfigurationError('CAPTION_API_URL is required for the http caption provider');
    return new HttpCaptionEngine({
      url: caption.apiUrl,
      token: caption.apiToken,
      timeoutMs: config.modelTimeoutMs,
      concurrent: caption.concurrent,
    });
  }
  return new LocalCaptionEngine();
}

export function createEmbeddingEncoder(config: AppConfig): EmbeddingEncoder {
  const { embedding } = config;
  if (embedding.provider === 'openai') {
    if (!embedding.openaiApiKey) throw new ConfigurationError('OPENAI_API_KEY is required for the openai embedding provider');
    return new OpenAIAdapter({
      apiKey: embedding.openaiApiKey,
      model: embedding.model,
      dimension: embedding.dimension,
      timeoutMs: config.modelTimeoutMs,
    });
  }
  return new LocalEmbeddingEncoder(embedding.dimension);
}

/** Builds the model handles and stores once, for the lifetime of the process. */
export async function createRuntime(config: AppConfig): Promise<Runtime> {
  const encoder = createEmbeddingEncoder(config);
  const records = await SqliteStore.open(config.databasePath, encoder.dimension);
  const service = new ImageSearchService({
    blobs: new FsStore(config.uploadDir),
    records,
    captioner: createCaptionEngine(config),
    encoder,
    upload: { maxFileSize: config.maxFileSize, allowedExtensions: config.allowedExtensions },
    search: config.search,
    history: config.history,
  });
  return { service, close: () => records.close() };
}

/** Signal handler that stops the server, then closes the runtime. Later calls are ignored. */
export function createShutdown(
  runtime: Runtime,
  closeServer: () => Promise<void>,
  exit: (code: number) => void,
  log: Logger,
): () => void {
  let started = false;
  return () => {
    if (started) return;
    started = true;
    log.info('Shutting down');
    closeServer()
      .then(() => runtime.close())
      .then(
        () => exit(0),
        (err: unknown) => {
          log.error(`Error during shutdown: ${errorMessage(err)}`);
          exit(1);
        },
      );
  };
}
