import { createShutdown, Runtime } from '../src/bootstrap';
import { ImageSearchService } from '../src/core/imageSearchService';
import FsStore from '../src/storage/fsStore';
import { MemoryStore } from '../src/storage/memoryStore';
import { recordingLogger, StubCaptionEngine, TableEncoder } from './helpers';

describe('createShutdown', () => {
    const service = new ImageSearchService({
        blobs: new FsStore('unused-uploads'),
        records: new MemoryStore(),
        captioner: new StubCaptionEngine(),
        encoder: new TableEncoder({}),
        upload: { maxFileSize: 1024, allowedExtensions: ['png'] },
        search: { defaultLimit: 3, maxLimit: 20, defaultThreshold: 0 },
    });

    const settle = () => new Promise((r) => setImmediate(r));

    test('should close everything once however often the signal arrives', async () => {
        const events: string[] = [];
        const runtime: Runtime = {
            service,
            close: async () => {
                events.push('runtime');
            },
        };
        const exits: number[] = [];
        const shutdown = createShutdown(
            runtime,
            async () => {
                events.push('server');
            },
            (code) => exits.push(code),
            recordingLogger(),
        );

        shutdown();
        shutdown();
        await settle();
        shutdown();
        await settle();

        expect(events).toEqual(['server', 'runtime']);
        expect(exits).toEqual([0]);
    });

    test('should exit with 1 when closing the runtime fails', async () => {
        const logger = recordingLogger();
        const exits: number[] = [];
        const shutdown = createShutdown(
            {
                service,
                close: async () => {
                    throw new Error('SQLITE_MISUSE: Database is closed');
                },
            },
            async () => undefined,
            (code) => exits.push(code),
            logger,
        );

        shutdown();
        await settle();

        expect(exits).toEqual([1]);
        expect(logger.lines).toContainEqual({
            level: 'error',
            message: 'Error during shutdown: SQLITE_MISUSE: Database is closed',
        });
    });
});
