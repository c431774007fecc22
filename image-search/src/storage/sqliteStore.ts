import { Database, RunResult } from 'sqlite3';
import { ConfigurationError } from '../errors';
import type { ItemId, NewRecord, RecordStore, StoredItem } from '../types';

interface ImageRow {
    id: number;
    filename: string;
    caption: string;
    embedding: Buffer;
    storage_ref: string;
    file_size: number;
    content_type: string;
    upload_time: string;
}

const COLUMNS = 'id, filename, caption, embedding, storage_ref, file_size, content_type, upload_time';

/**
 * Image records in SQLite. Vector blobs go into a BLOB column untouched.
 * The vector dimension is recorded on first open; reopening the file with a
 * different dimension is refused.
 */
class SqliteStore implements RecordStore {
    private db: Database;
    private now: () => Date;

    private constructor(db: Database, now: () => Date) {
        this.db = db;
        this.now = now;
    }

    static async open(databasePath: string, dimension: number, now: () => Date = () => new Date()): Promise<SqliteStore> {
        const db = await new Promise<Database>((resolve, reject) => {
            const handle = new Database(databasePath, (err) => (err ? reject(err) : resolve(handle)));
        });
        const store = new SqliteStore(db, now);
        try {
            await store.initialize(dimension);
        } catch (err) {
            await store.close();
            throw err;
        }
        return store;
    }

    private async initialize(dimension: number) {
        await this.run(`CREATE TABLE IF NOT EXISTS images (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            filename TEXT NOT NULL UNIQUE,
            caption TEXT NOT NULL,
            embedding BLOB NOT NULL,
            storage_ref TEXT NOT NULL,
            file_size INTEGER NOT NULL,
            content_type TEXT NOT NULL,
            upload_time TEXT NOT NULL
        )`);
        await this.run('CREATE INDEX IF NOT EXISTS idx_images_upload_time ON images (upload_time)');
        await this.run(`CREATE TABLE IF NOT EXISTS settings (
            key TEXT PRIMARY KEY,
            value TEXT NOT NULL
        )`);

        const row = await this.get("SELECT value FROM settings WHERE key = 'vector_dim'");
        if (!row) {
            await this.run("INSERT INTO settings (key, value) VALUES ('vector_dim', ?)", [String(dimension)]);
            return;
        }
        const recorded = typeof row === 'object' && row !== null && 'value' in row ? Number(row.value) : NaN;
        if (recorded !== dimension) {
            throw new ConfigurationError(
                `database holds ${recorded}-dimensional vectors, encoder produces ${dimension}; use a separate database per dimension`,
            );
        }
    }

    public async createRecord(record: NewRecord): Promise<StoredItem> {
        const createdAt = this.now().toISOString();
        const result = await this.run(
            `INSERT INTO images (filename, caption, embedding, storage_ref, file_size, content_type, upload_time)
             VALUES (?, ?, ?, ?, ?, ?, ?)`,
            [
                record.filename,
                record.caption,
                record.vectorBlob,
                record.storageRef,
                record.sizeBytes,
                record.contentType,
                createdAt,
            ],
        );
        return { ...record, id: result.lastID, createdAt };
    }

    public async listAllRecords(): Promise<StoredItem[]> {
        const rows = await this.all(`SELECT ${COLUMNS} FROM images ORDER BY id ASC`);
        return rows.map(toItem);
    }

    public async listRecent(limit: number, offset: number): Promise<StoredItem[]> {
        const rows = await this.all(
            `SELECT ${COLUMNS} FROM images ORDER BY upload_time DESC, id DESC LIMIT ? OFFSET ?`,
            [limit, offset],
        );
        return rows.map(toItem);
    }

    public async getRecord(id: ItemId): Promise<StoredItem | null> {
        const row = await this.get(`SELECT ${COLUMNS} FROM images WHERE id = ?`, [id]);
        return row ? toItem(row) : null;
    }

    public async deleteRecord(id: ItemId): Promise<boolean> {
        const result = await this.run('DELETE FROM images WHERE id = ?', [id]);
        return result.changes > 0;
    }

    /** Raw blob overwrite, for repair tooling and corruption tests. */
    public async replaceBlob(id: ItemId, blob: Buffer): Promise<void> {
        await this.run('UPDATE images SET embedding = ? WHERE id = ?', [blob, id]);
    }

    public close(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.db.close((err) => (err ? reject(err) : resolve()));
        });
    }

    private run(sql: string, params: unknown[] = []): Promise<RunResult> {
        return new Promise((resolve, reject) => {
            this.db.run(sql, params, function (this: RunResult, err: Error | null) {
                if (err) reject(err);
                else resolve(this);
            });
        });
    }

    private get(sql: string, params: unknown[] = []): Promise<unknown> {
        return new Promise((resolve, reject) => {
            this.db.get(sql, params, (err: Error | null, row: unknown) => (err ? reject(err) : resolve(row)));
        });
    }

    private all(sql: string, params: unknown[] = []): Promise<unknown[]> {
        return new Promise((resolve, reject) => {
            this.db.all(sql, params, (err: Error | null, rows: unknown[]) => (err ? reject(err) : resolve(rows)));
        });
    }
}

function isImageRow(row: unknown): row is ImageRow {
    return (
        typeof row === 'object' &&
        row !== null &&
        'id' in row && typeof row.id === 'number' &&
        'filename' in row && typeof row.filename === 'string' &&
        'caption' in row && typeof row.caption === 'string' &&
        'embedding' in row && Buffer.isBuffer(row.embedding) &&
        'storage_ref' in row && typeof row.storage_ref === 'string' &&
        'file_size' in row && typeof row.file_size === 'number' &&
        'content_type' in row && typeof row.content_type === 'string' &&
        'upload_time' in row && typeof row.upload_time === 'string'
    );
}

function toItem(row: unknown): StoredItem {
    if (!isImageRow(row)) {
        throw new Error('unexpected row shape in images table');
    }
    return {
        id: row.id,
        filename: row.filename,
        caption: row.caption,
        vectorBlob: row.embedding,
        storageRef: row.storage_ref,
        sizeBytes: row.file_size,
        contentType: row.content_type,
        createdAt: row.upload_time,
    };
}

export default SqliteStore;
