import crypto from 'crypto';
import type { ImageSummary, StoredItem } from '../types';

export const generateStoredName = (extension: string): string => {
    return `${crypto.randomUUID()}.${extension}`;
};

/** Lower-cased extension without the dot, or '' when the name has none. */
export const fileExtension = (filename: string): string => {
    const base = filename.split(/[\\/]/).pop() ?? '';
    const dot = base.lastIndexOf('.');
    if (dot <= 0 || dot === base.length - 1) return '';
    return base.slice(dot + 1).toLowerCase();
};

export const cleanFilename = (filename: string): string => {
    return filename.replace(/[^\w\-.]/g, '_');
};

export const normalizeVector = (vector: number[]): number[] => {
    const length = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
    return length ? vector.map(val => val / length) : vector;
};

export const roundScore = (score: number, digits = 4): number => {
    const factor = 10 ** digits;
    return Math.round(score * factor) / factor;
};

export const toSummary = (item: StoredItem): ImageSummary => ({
    id: item.id,
    filename: item.filename,
    caption: item.caption,
    createdAt: item.createdAt,
    sizeBytes: item.sizeBytes,
    contentType: item.contentType,
});
