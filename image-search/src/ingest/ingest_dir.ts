/**
 * ingest_dir.ts
 *
 * CLI usage:
 *   npx ts-node image-search/src/ingest/ingest_dir.ts /path/to/images
 *
 * Reads configuration from the environment (and .env), then ingests every
 * file in the directory whose extension is accepted, one at a time. Files
 * that fail are reported and skipped; the exit code is 1 if any failed.
 */
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { createRuntime } from '../bootstrap';
import { loadConfig } from '../config';
import type { ImageSearchService } from '../core/imageSearchService';
import { errorMessage } from '../errors';
import type { IngestResult } from '../types';
import { fileExtension } from '../utils';
import { createLogger, Logger, setLogLevel } from '../utils/logger';

const CONTENT_TYPES: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
  tif: 'image/tiff',
  tiff: 'image/tiff',
};

export function contentTypeFor(filename: string): string {
  return CONTENT_TYPES[fileExtension(filename)] ?? 'application/octet-stream';
}

export interface DirectoryIngestReport {
  ingested: IngestResult[];
  failed: { file: string; error: string }[];
  skipped: string[];
}

export async function ingestDirectory(
  service: ImageSearchService,
  directory: string,
  allowedExtensions: string[],
  log: Logger = createLogger('ingest_dir'),
): Promise<DirectoryIngestReport> {
  const report: DirectoryIngestReport = { ingested: [], failed: [], skipped: [] };
  const entries = (await fs.promises.readdir(directory, { withFileTypes: true }))
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  for (const name of entries) {
    if (!allowedExtensions.includes(fileExtension(name))) {
      report.skipped.push(name);
      continue;
    }
    try {
      const bytes = await fs.promises.readFile(path.join(directory, name));
      const result = await service.ingest(bytes, contentTypeFor(name), name);
      report.ingested.push(result);
      log.info(`${name} -> #${result.id} "${result.caption}"`);
    } catch (err) {
      report.failed.push({ file: name, error: errorMessage(err) });
      log.warn(`${name} failed: ${errorMessage(err)}`);
    }
  }
  return report;
}

async function main() {
  const dir = process.argv[2];
  if (!dir) {
    console.error('Usage: npx ts-node image-search/src/ingest/ingest_dir.ts /path/to/images');
    process.exit(2);
  }
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    console.error('Directory not found:', dir);
    process.exit(2);
  }

  dotenv.config();
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);
  const runtime = await createRuntime(config);
  try {
    const report = await ingestDirectory(runtime.service, dir, config.allowedExtensions);
    console.log(
      `Ingest completed: ${report.ingested.length} ingested, ${report.failed.length} failed, ${report.skipped.length} skipped`,
    );
    if (report.failed.length) process.exitCode = 1;
  } finally {
    await runtime.close();
  }
}

if (require.main === module) {
  main().catch((e) => {
    console.error(e);
    process.exit(1);
  });
}
