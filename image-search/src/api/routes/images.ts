import express, { NextFunction, Request, Response, Router } from 'express';
import type { ImageSearchService } from '../../core/imageSearchService';
import { ValidationError } from '../../errors';
import { cleanFilename } from '../../utils';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const wrap = (handler: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
};

function queryString(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
    return undefined;
}

function queryNumber(value: unknown, name: string): number | undefined {
    const raw = queryString(value);
    if (raw === undefined || raw === '') return undefined;
    const parsed = Number(raw);
    if (Number.isNaN(parsed)) throw new ValidationError(`${name} must be a number`);
    return parsed;
}

function parseId(raw: string): number {
    const id = Number(raw);
    if (!Number.isInteger(id) || id < 1) throw new ValidationError('image id must be a positive integer');
    return id;
}

export function createImagesRouter(service: ImageSearchService, maxFileSize: number): Router {
    const router = Router();

    // Upload: raw image body, filename in the query string
    router.post(
        '/',
        express.raw({ type: () => true, limit: maxFileSize }),
        wrap(async (req, res) => {
            const bytes = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
            const contentType = req.headers['content-type'] ?? '';
            const filename = queryString(req.query.filename) ?? '';
            const result = await service.ingest(bytes, contentType, filename);
            res.status(201).json({ ...result, message: 'Image uploaded and processed successfully' });
        }),
    );

    router.get(
        '/search',
        wrap(async (req, res) => {
            const query = queryString(req.query.query) ?? '';
            const limit = queryNumber(req.query.limit, 'limit');
            const threshold = queryNumber(req.query.threshold, 'threshold');
            res.json(await service.search(query, limit, threshold));
        }),
    );

    router.get(
        '/history',
        wrap(async (req, res) => {
            const limit = queryNumber(req.query.limit, 'limit');
            const offset = queryNumber(req.query.offset, 'offset');
            res.json(await service.history(limit, offset));
        }),
    );

    router.get(
        '/:id',
        wrap(async (req, res) => {
            const image = await service.getImage(parseId(req.params.id));
            if (!image) {
                res.status(404).json({ error: 'Image not found' });
                return;
            }
            res.json(image);
        }),
    );

    router.get(
        '/:id/download',
        wrap(async (req, res) => {
            const found = await service.readImageBytes(parseId(req.params.id));
            if (!found) {
                res.status(404).json({ error: 'Image not found' });
                return;
            }
            if (!found.bytes) {
                res.status(404).json({ error: 'Image file not found on disk' });
                return;
            }
            res.setHeader('Content-Type', found.item.contentType);
            res.setHeader('Content-Disposition', `attachment; filename="${cleanFilename(found.item.filename)}"`);
            res.send(found.bytes);
        }),
    );

    router.delete(
        '/:id',
        wrap(async (req, res) => {
            const deleted = await service.deleteImage(parseId(req.params.id));
            if (!deleted) {
                res.status(404).json({ error: 'Image not found' });
                return;
            }
            res.json({ message: 'Image deleted successfully' });
        }),
    );

    return router;
}

export default createImagesRouter;
