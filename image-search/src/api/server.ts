import express, { Application, NextFunction, Request, Response } from 'express';
import type { ImageSearchService } from '../core/imageSearchService';
import { ImageSearchError, errorMessage } from '../errors';
import { createLogger } from '../utils/logger';
import { requireBearerToken } from './auth';
import { createImagesRouter } from './routes/images';

export interface ServerOptions {
  maxFileSize: number;
  /** When set, /images routes require this bearer token. */
  apiToken?: string;
}

const log = createLogger('Server');

const STATUS_BY_CODE: Record<ImageSearchError['code'], number> = {
  VALIDATION_ERROR: 400,
  INVALID_IMAGE: 400,
  MODEL_FAILURE: 503,
  CORRUPT_VECTOR: 500,
  STORAGE_FAILURE: 500,
  CONFIGURATION_ERROR: 500,
};

function hasStatus(err: unknown): err is { status: number; type?: string } {
  return typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number';
}

export function createServer(service: ImageSearchService, options: ServerOptions, app?: Application) {
  const serverApp = app ?? express();

  serverApp.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  const images = createImagesRouter(service, options.maxFileSize);
  if (options.apiToken) {
    serverApp.use('/images', requireBearerToken(options.apiToken), images);
  } else {
    serverApp.use('/images', images);
  }

  serverApp.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ImageSearchError) {
      const status = STATUS_BY_CODE[err.code];
      if (status === 500) {
        // storage and configuration messages carry server paths
        log.error(err.message);
        res.status(500).json({ error: 'Internal server error occurred' });
        return;
      }
      if (status > 500) log.error(err.message);
      res.status(status).json({ error: err.message });
      return;
    }
    // body-parser errors, e.g. 413 for an oversized upload
    if (hasStatus(err) && err.status >= 400 && err.status < 500) {
      res.status(err.status).json({ error: errorMessage(err) });
      return;
    }
    log.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error occurred' });
  });

  return serverApp;
}

export default createServer;
