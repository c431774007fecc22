export type Vector = number[];

export type ItemId = number;

/** A persisted image record. The vector itself is only ever stored as its blob. */
export interface StoredItem {
    id: ItemId;
    filename: string;
    caption: string;
    vectorBlob: Buffer;
    storageRef: string;
    sizeBytes: number;
    contentType: string;
    createdAt: string;
}

export type NewRecord = Omit<StoredItem, 'id' | 'createdAt'>;

export interface CaptionEngine {
    readonly name: string;
    /** False when each call needs exclusive access to the backend. */
    readonly concurrentInference: boolean;
    caption(image: Buffer): Promise<string>;
}

export interface EmbeddingEncoder {
    readonly model: string;
    readonly dimension: number;
    readonly concurrentInference: boolean;
    encode(text: string): Promise<Vector>;
}

/** Durable storage for original upload bytes. */
export interface BlobStore {
    persistBytes(bytes: Buffer, extension: string): Promise<string>;
    /** Null when nothing is stored under the reference any more. */
    readBytes(storageRef: string): Promise<Buffer | null>;
    deleteBytes(storageRef: string): Promise<void>;
}

export interface RecordStore {
    createRecord(record: NewRecord): Promise<StoredItem>;
    /** Point-in-time snapshot of every record, oldest first. */
    listAllRecords(): Promise<StoredItem[]>;
    /** Newest first. */
    listRecent(limit: number, offset: number): Promise<StoredItem[]>;
    getRecord(id: ItemId): Promise<StoredItem | null>;
    deleteRecord(id: ItemId): Promise<boolean>;
}

/** Image metadata as returned to callers; never carries the vector blob. */
export interface ImageSummary {
    id: ItemId;
    filename: string;
    caption: string;
    createdAt: string;
    sizeBytes: number;
    contentType: string;
}

export type IngestResult = ImageSummary;

export interface SearchHit extends ImageSummary {
    score: number;
}

export interface SearchResponse {
    query: string;
    totalResults: number;
    results: SearchHit[];
}
