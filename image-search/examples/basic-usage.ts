import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { LocalCaptionEngine } from '../src/captioning';
import { ImageSearchService } from '../src/core/imageSearchService';
import { LocalEmbeddingEncoder } from '../src/embeddings';
import FsStore from '../src/storage/fsStore';
import { MemoryStore } from '../src/storage/memoryStore';

function solidJpeg(r: number, g: number, b: number, width = 100, height = 100) {
    return sharp({ create: { width, height, channels: 3, background: { r, g, b } } }).jpeg().toBuffer();
}

async function main() {
    // Original bytes go to a scratch directory, records stay in memory
    const service = new ImageSearchService({
        blobs: new FsStore(path.join(os.tmpdir(), 'image-search-example')),
        records: new MemoryStore(),
        captioner: new LocalCaptionEngine(),
        encoder: new LocalEmbeddingEncoder(),
        upload: { maxFileSize: 10 * 1024 * 1024, allowedExtensions: ['jpg', 'jpeg', 'png'] },
        search: { defaultLimit: 3, maxLimit: 20, defaultThreshold: 0 },
    });

    const red = await service.ingest(await solidJpeg(255, 0, 0), 'image/jpeg', 'red.jpg');
    const blue = await service.ingest(await solidJpeg(0, 0, 255, 200, 100), 'image/jpeg', 'blue.jpg');
    console.log('Ingested:', red.caption, '|', blue.caption);

    const response = await service.search('blue', 2);
    console.log('Search results:', JSON.stringify(response, null, 2));
}

main().catch(console.error);
