import fs from 'fs/promises';
import path from 'path';
import { errorMessage } from '../errors';
import type { BlobStore } from '../types';
import { generateStoredName } from '../utils';

/**
 * Stores upload bytes as files under one directory.
 * The storage reference handed out is the file's path.
 */
class FsStore implements BlobStore {
    private storagePath: string;
    private ready: Promise<void> | null = null;

    constructor(storagePath: string) {
        this.storagePath = path.resolve(storagePath);
    }

    private initializeStorage(): Promise<void> {
        if (!this.ready) {
            this.ready = fs.mkdir(this.storagePath, { recursive: true }).then(() => undefined);
        }
        return this.ready;
    }

    public async persistBytes(bytes: Buffer, extension: string): Promise<string> {
        await this.initializeStorage();
        const target = path.join(this.storagePath, generateStoredName(extension));
        try {
            // 'wx' refuses to overwrite an existing file
            await fs.writeFile(target, bytes, { flag: 'wx' });
        } catch (err) {
            if (!(isNodeError(err) && err.code === 'EEXIST')) {
                await this.removePartial(target, err);
            }
            throw err;
        }
        return target;
    }

    public async readBytes(storageRef: string): Promise<Buffer | null> {
        try {
            return await fs.readFile(this.resolveRef(storageRef));
        } catch (err) {
            if (isNodeError(err) && err.code === 'ENOENT') return null;
            throw err;
        }
    }

    public async deleteBytes(storageRef: string): Promise<void> {
        try {
            await fs.unlink(this.resolveRef(storageRef));
        } catch (err) {
            if (isNodeError(err) && err.code === 'ENOENT') return;
            throw err;
        }
    }

    public async listFiles(): Promise<string[]> {
        await this.initializeStorage();
        return fs.readdir(this.storagePath);
    }

    private async removePartial(target: string, writeErr: unknown) {
        try {
            await fs.rm(target, { force: true });
        } catch (cleanupErr) {
            throw new Error(
                `${errorMessage(writeErr)}; partial file ${target} could not be removed: ${errorMessage(cleanupErr)}`,
                { cause: writeErr },
            );
        }
    }

    private resolveRef(storageRef: string): string {
        const resolved = path.resolve(storageRef);
        if (path.dirname(resolved) !== this.storagePath) {
            throw new Error(`storage reference outside ${this.storagePath}: ${storageRef}`);
        }
        return resolved;
    }
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}

export default FsStore;
