import { ExclusiveSlot, guardCaptionEngine, guardEmbeddingEncoder } from '../src/core/exclusiveSlot';
import type { CaptionEngine } from '../src/types';
import { StubCaptionEngine, TableEncoder } from './helpers';

function deferred() {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => {
        resolve = () => r();
    });
    return { promise, resolve };
}

describe('ExclusiveSlot', () => {
    test('should run one task at a time in submission order', async () => {
        const slot = new ExclusiveSlot();
        const events: string[] = [];
        const gate = deferred();

        const first = slot.run(async () => {
            events.push('first:start');
            await gate.promise;
            events.push('first:end');
            return 1;
        });
        const second = slot.run(async () => {
            events.push('second:start');
            return 2;
        });

        await new Promise((r) => setImmediate(r));
        expect(events).toEqual(['first:start']);
        expect(slot.pending).toBe(2);

        gate.resolve();
        expect(await Promise.all([first, second])).toEqual([1, 2]);
        expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    });

    test('should release the slot when a task fails', async () => {
        const slot = new ExclusiveSlot();
        const failing = slot.run(async () => {
            throw new Error('backend down');
        });
        const next = slot.run(async () => 'ok');

        await expect(failing).rejects.toThrow('backend down');
        await expect(next).resolves.toBe('ok');
        await new Promise((r) => setImmediate(r));
        expect(slot.pending).toBe(0);
    });
});

describe('guardCaptionEngine', () => {
    test('should return engines that allow concurrency unchanged', () => {
        const engine = new StubCaptionEngine('a');
        expect(guardCaptionEngine(engine)).toBe(engine);
    });

    test('should never overlap calls to a single-slot engine', async () => {
        let active = 0;
        let maxActive = 0;
        const engine: CaptionEngine = {
            name: 'slow',
            concurrentInference: false,
            caption: async () => {
                active++;
                maxActive = Math.max(maxActive, active);
                await new Promise((r) => setTimeout(r, 5));
                active--;
                return 'caption';
            },
        };
        const guarded = guardCaptionEngine(engine);
        const captions = await Promise.all([1, 2, 3, 4].map(() => guarded.caption(Buffer.from('x'))));

        expect(captions).toEqual(['caption', 'caption', 'caption', 'caption']);
        expect(maxActive).toBe(1);
        expect(guarded.name).toBe('slow');
    });
});

describe('guardEmbeddingEncoder', () => {
    test('should keep model and dimension of the wrapped encoder', async () => {
        const encoder = new TableEncoder({ red: [1, 0, 0] });
        encoder.concurrentInference = false;
        const guarded = guardEmbeddingEncoder(encoder);

        expect(guarded).not.toBe(encoder);
        expect(guarded.model).toBe('table');
        expect(guarded.dimension).toBe(3);
        expect(await guarded.encode('red')).toEqual([1, 0, 0]);
    });
});
