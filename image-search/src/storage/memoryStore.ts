import type { ItemId, NewRecord, RecordStore, StoredItem } from '../types';

// Simple in-memory RecordStore (implements create, get, delete, list)
export class MemoryStore implements RecordStore {
  private store: Map<ItemId, StoredItem>;
  private nextId = 1;
  private now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.store = new Map();
    this.now = now;
  }

  get size() {
    return this.store.size;
  }

  async createRecord(record: NewRecord): Promise<StoredItem> {
    const item: StoredItem = {
      ...record,
      vectorBlob: Buffer.from(record.vectorBlob),
      id: this.nextId++,
      createdAt: this.now().toISOString(),
    };
    this.store.set(item.id, item);
    return copy(item);
  }

  async listAllRecords(): Promise<StoredItem[]> {
    return Array.from(this.store.values(), copy);
  }

  async listRecent(limit: number, offset: number): Promise<StoredItem[]> {
    return Array.from(this.store.values())
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.id - a.id)
      .slice(offset, offset + limit)
      .map(copy);
  }

  async getRecord(id: ItemId): Promise<StoredItem | null> {
    const item = this.store.get(id);
    return item ? copy(item) : null;
  }

  async deleteRecord(id: ItemId): Promise<boolean> {
    return this.store.delete(id);
  }

  /** Test hook for simulating storage-level corruption. */
  replaceBlob(id: ItemId, blob: Buffer): void {
    const item = this.store.get(id);
    if (!item) throw new Error(`no record ${id}`);
    item.vectorBlob = Buffer.from(blob);
  }
}

function copy(item: StoredItem): StoredItem {
  return { ...item, vectorBlob: Buffer.from(item.vectorBlob) };
}
