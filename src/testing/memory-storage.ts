import type { IFileStorage } from '../services/file-storage.js';

/** In-memory blob store for tests. */
export class MemoryFileStorage implements IFileStorage {
  readonly blobs = new Map<string, Buffer>();

  async save(key: string, data: Buffer, _contentType: string): Promise<string> {
    this.blobs.set(key, data);
    return `/files/${key}`;
  }

  async delete(key: string): Promise<void> {
    this.blobs.delete(key);
  }

  async read(key: string): Promise<Buffer> {
    const data = this.blobs.get(key);
    if (!data) throw new Error(`No blob stored under ${key}`);
    return data;
  }
}
