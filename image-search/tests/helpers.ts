import type { Application } from 'express';
import fs from 'fs/promises';
import type { Server } from 'http';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import type { CaptionEngine, EmbeddingEncoder, Vector } from '../src/types';
import type { Logger } from '../src/utils/logger';

export function solidImage(
    rgb: [number, number, number],
    options: { width?: number; height?: number; format?: 'jpeg' | 'png' } = {},
): Promise<Buffer> {
    const { width = 100, height = 100, format = 'jpeg' } = options;
    const image = sharp({
        create: { width, height, channels: 3, background: { r: rgb[0], g: rgb[1], b: rgb[2] } },
    });
    return format === 'png' ? image.png().toBuffer() : image.jpeg().toBuffer();
}

export function tempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'image-search-test-'));
}

/** Returns captions from the list in order, cycling. */
export class StubCaptionEngine implements CaptionEngine {
    readonly name = 'stub-captions';
    concurrentInference = true;
    calls = 0;
    private captions: string[];

    constructor(...captions: string[]) {
        this.captions = captions.length ? captions : ['a test image'];
    }

    async caption(_image: Buffer): Promise<string> {
        const caption = this.captions[this.calls % this.captions.length];
        this.calls++;
        return caption;
    }
}

/** Looks texts up in a fixed table; unknown texts encode to the zero vector. */
export class TableEncoder implements EmbeddingEncoder {
    readonly model = 'table';
    readonly dimension: number;
    concurrentInference = true;
    encoded: string[] = [];
    private table: Record<string, Vector>;

    constructor(table: Record<string, Vector>, dimension = 3) {
        this.table = table;
        this.dimension = dimension;
    }

    async encode(text: string): Promise<Vector> {
        this.encoded.push(text);
        return this.table[text] ?? new Array<number>(this.dimension).fill(0);
    }
}

export interface RecordingLogger extends Logger {
    lines: { level: string; message: string }[];
}

export function recordingLogger(): RecordingLogger {
    const lines: { level: string; message: string }[] = [];
    return {
        lines,
        debug: (message) => lines.push({ level: 'debug', message }),
        info: (message) => lines.push({ level: 'info', message }),
        warn: (message) => lines.push({ level: 'warn', message }),
        error: (message) => lines.push({ level: 'error', message }),
    };
}

/** Starts the app on an ephemeral port. */
export function listen(app: Application): Promise<{ url: string; close: () => Promise<void> }> {
    return new Promise((resolve, reject) => {
        const server: Server = app.listen(0, '127.0.0.1', () => {
            const address = server.address();
            if (address === null || typeof address === 'string') {
                reject(new Error('server has no TCP address'));
                return;
            }
            resolve({
                url: `http://127.0.0.1:${address.port}`,
                close: () => new Promise<void>((done, fail) => server.close((err) => (err ? fail(err) : done()))),
            });
        });
        server.on('error', reject);
    });
}
