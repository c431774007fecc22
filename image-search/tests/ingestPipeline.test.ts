import fs from 'fs/promises';
import path from 'path';
import { VectorCodec } from '../src/codec/vectorCodec';
import { IngestPipeline, IngestPipelineDeps, IngestStage } from '../src/core/ingestPipeline';
import { InvalidImageError, ModelFailure, StorageFailure, ValidationError } from '../src/errors';
import FsStore from '../src/storage/fsStore';
import { MemoryStore } from '../src/storage/memoryStore';
import type { CaptionEngine, NewRecord, StoredItem } from '../src/types';
import { recordingLogger, solidImage, StubCaptionEngine, TableEncoder, tempDir } from './helpers';

class FailingRecords extends MemoryStore {
    async createRecord(_record: NewRecord): Promise<StoredItem> {
        throw new Error('disk full');
    }
}

describe('IngestPipeline', () => {
    let dir: string;
    let blobs: FsStore;
    let records: MemoryStore;
    let captioner: StubCaptionEngine;
    let encoder: TableEncoder;
    let stages: IngestStage[];
    let png: Buffer;

    const build = (overrides: Partial<IngestPipelineDeps> = {}) =>
        new IngestPipeline({
            blobs,
            records,
            captioner,
            encoder,
            codec: new VectorCodec(3),
            limits: { maxFileSize: 1024 * 1024, allowedExtensions: ['jpg', 'jpeg', 'png'] },
            logger: recordingLogger(),
            onStage: (stage) => stages.push(stage),
            ...overrides,
        });

    beforeAll(async () => {
        png = await solidImage([255, 0, 0], { format: 'png' });
    });

    beforeEach(async () => {
        dir = await tempDir();
        blobs = new FsStore(dir);
        records = new MemoryStore();
        captioner = new StubCaptionEngine('a red square');
        encoder = new TableEncoder({ 'a red square': [1, 0, 0] });
        stages = [];
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    test('should persist, caption, embed and store a valid image', async () => {
        const result = await build().ingest({ bytes: png, contentType: 'image/png', filename: 'red.png' });

        expect(result.id).toBe(1);
        expect(result.caption).toBe('a red square');
        expect(result.sizeBytes).toBe(png.length);
        expect(result.contentType).toBe('image/png');
        expect(result.filename).toMatch(/^[0-9a-f-]{36}\.png$/);
        expect(result).not.toHaveProperty('vectorBlob');

        const stored = await records.getRecord(result.id);
        expect(stored).not.toBeNull();
        expect(new VectorCodec(3).decode(stored?.vectorBlob ?? Buffer.alloc(0))).toEqual([1, 0, 0]);
        expect(await blobs.readBytes(stored?.storageRef ?? '')).toEqual(png);
        expect(await blobs.listFiles()).toEqual([result.filename]);
        expect(encoder.encoded).toEqual(['a red square']);
    });

    test('should pass through the stages in order', async () => {
        await build().ingest({ bytes: png, contentType: 'image/png', filename: 'red.png' });
        expect(stages).toEqual(['Received', 'Validated', 'Persisted', 'Captioned', 'Embedded', 'Stored']);
    });

    test('should trim the caption before embedding it', async () => {
        captioner = new StubCaptionEngine('  a red square \n');
        const result = await build().ingest({ bytes: png, contentType: 'image/png', filename: 'red.png' });
        expect(result.caption).toBe('a red square');
        expect(encoder.encoded).toEqual(['a red square']);
    });

    describe('validation', () => {
        const cases: [string, { bytes?: Buffer; contentType?: string; filename?: string }, string][] = [
            ['empty file', { bytes: Buffer.alloc(0) }, 'File is empty'],
            ['non-image content type', { contentType: 'text/plain' }, 'File must be an image'],
            ['missing content type', { contentType: '' }, 'File must be an image'],
            ['unsupported extension', { filename: 'red.gif' }, 'Only JPG, JPEG, PNG images are supported'],
            ['no extension', { filename: 'red' }, 'Only JPG, JPEG, PNG images are supported'],
        ];

        test.each(cases)('should reject %s before any I/O', async (_name, override, message) => {
            const upload = { bytes: png, contentType: 'image/png', filename: 'red.png', ...override };
            await expect(build().ingest(upload)).rejects.toThrow(new ValidationError(message));
            expect(await blobs.listFiles()).toEqual([]);
            expect(records.size).toBe(0);
            expect(captioner.calls).toBe(0);
            expect(stages).toEqual(['Received']);
        });

        test('should reject a file above the size limit', async () => {
            const pipeline = build({ limits: { maxFileSize: 10, allowedExtensions: ['png'] } });
            await expect(pipeline.ingest({ bytes: png, contentType: 'image/png', filename: 'red.png' })).rejects.toThrow(
                'File size exceeds maximum limit of 10 bytes',
            );
        });

        test('should accept upper-case extensions and content types', () => {
            expect(build().validate({ bytes: png, contentType: 'IMAGE/PNG', filename: 'RED.PNG' })).toBe('png');
        });
    });

    test('should reject undecodable bytes and leave nothing behind', async () => {
        const bytes = Buffer.from('these are the contents of a text file');
        await expect(build().ingest({ bytes, contentType: 'image/jpeg', filename: 'notes.jpg' })).rejects.toBeInstanceOf(
            InvalidImageError,
        );
        expect(await blobs.listFiles()).toEqual([]);
        expect(records.size).toBe(0);
        expect(captioner.calls).toBe(0);
        expect(stages).toEqual(['Received', 'Validated', 'Persisted']);
    });

    test('should delete the bytes when captioning fails', async () => {
        const broken: CaptionEngine = {
            name: 'broken',
            concurrentInference: true,
            caption: async () => {
                throw new Error('model crashed');
            },
        };
        await expect(
            build({ captioner: broken }).ingest({ bytes: png, contentType: 'image/png', filename: 'red.png' }),
        ).rejects.toThrow(new ModelFailure('caption', 'model crashed'));
        expect(await blobs.listFiles()).toEqual([]);
        expect(records.size).toBe(0);
    });

    test('should log a failed cleanup and still raise the caption failure', async () => {
        class UndeletableBlobs extends FsStore {
            async deleteBytes(_storageRef: string): Promise<void> {
                throw new Error('EBUSY: resource busy or locked');
            }
        }
        const logger = recordingLogger();
        const captionFailure = new ModelFailure('caption', 'model crashed');
        const broken: CaptionEngine = {
            name: 'broken',
            concurrentInference: true,
            caption: async () => {
                throw captionFailure;
            },
        };

        const error = await build({ blobs: new UndeletableBlobs(dir), captioner: broken, logger })
            .ingest({ bytes: png, contentType: 'image/png', filename: 'red.png' })
            .catch((err: unknown) => err);

        expect(error).toBe(captionFailure);
        const [orphan] = await blobs.listFiles();
        expect(logger.lines).toContainEqual({
            level: 'error',
            message: `Could not delete orphaned upload ${path.join(dir, orphan)}: EBUSY: resource busy or locked`,
        });
        expect(records.size).toBe(0);
    });

    test('should treat an empty caption as a model failure', async () => {
        captioner = new StubCaptionEngine('   ');
        await expect(build().ingest({ bytes: png, contentType: 'image/png', filename: 'red.png' })).rejects.toThrow(
            'caption model failed: stub-captions returned an empty caption',
        );
        expect(await blobs.listFiles()).toEqual([]);
    });

    test('should delete the bytes when the encoder returns the wrong dimension', async () => {
        encoder = new TableEncoder({ 'a red square': [1, 0] });
        const error = await build()
            .ingest({ bytes: png, contentType: 'image/png', filename: 'red.png' })
            .catch((err: unknown) => err);
        expect(error).toBeInstanceOf(ModelFailure);
        expect(error).toHaveProperty('stage', 'embed');
        expect(await blobs.listFiles()).toEqual([]);
        expect(records.size).toBe(0);
    });

    test('should delete the bytes when the record cannot be written', async () => {
        records = new FailingRecords();
        await expect(build().ingest({ bytes: png, contentType: 'image/png', filename: 'red.png' })).rejects.toThrow(
            new StorageFailure('createRecord', 'disk full'),
        );
        expect(await blobs.listFiles()).toEqual([]);
    });

    test('should report a blob store failure without creating a record', async () => {
        const pipeline = build({
            blobs: {
                persistBytes: async () => {
                    throw new Error('read-only file system');
                },
                readBytes: async () => Buffer.alloc(0),
                deleteBytes: async () => undefined,
            },
        });
        await expect(pipeline.ingest({ bytes: png, contentType: 'image/png', filename: 'red.png' })).rejects.toBeInstanceOf(
            StorageFailure,
        );
        expect(records.size).toBe(0);
        expect(captioner.calls).toBe(0);
    });

    test('should give every ingest of the same bytes its own record', async () => {
        const pipeline = build();
        const first = await pipeline.ingest({ bytes: png, contentType: 'image/png', filename: 'red.png' });
        const second = await pipeline.ingest({ bytes: png, contentType: 'image/png', filename: 'red.png' });
        expect(second.id).toBe(first.id + 1);
        expect(second.filename).not.toBe(first.filename);
        expect(records.size).toBe(2);
    });
});
