import fs from 'node:fs';
import path from 'node:path';
import { config } from '../config/index.js';

/**
 * Where attachment bytes live. Metadata is kept in the `files` table; this
 * interface only moves blobs.
 */
export interface IFileStorage {
  /**
   * Save a file and return its public-facing URL.
   * @param key - storage key, e.g. "0190c3e2-....png"
   */
  save(key: string, data: Buffer, contentType: string): Promise<string>;

  /** Delete a file by its storage key. Deleting a missing key is not an error. */
  delete(key: string): Promise<void>;

  read(key: string): Promise<Buffer>;
}

/**
 * Default implementation: writes files to local disk under UPLOAD_DIR.
 * Files are served by http/file-serve.ts under UPLOAD_BASE_URL.
 */
export class LocalFileStorage implements IFileStorage {
  constructor(
    private readonly root: string = config.UPLOAD_DIR,
    private readonly baseUrl: string = config.UPLOAD_BASE_URL,
  ) {}

  private resolve(key: string): string {
    const filePath = path.resolve(this.root, key);
    if (!filePath.startsWith(path.resolve(this.root) + path.sep)) {
      throw new Error(`Storage key escapes upload directory: ${key}`);
    }
    return filePath;
  }

  async save(key: string, data: Buffer, _contentType: string): Promise<string> {
    const filePath = this.resolve(key);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, data);
    return `${this.baseUrl.replace(/\/$/, '')}/${key}`;
  }

  async delete(key: string): Promise<void> {
    try {
      await fs.promises.unlink(this.resolve(key));
    } catch (err) {
      if (Reflect.get(Object(err), 'code') !== 'ENOENT') throw err;
    }
  }

  read(key: string): Promise<Buffer> {
    return fs.promises.readFile(this.resolve(key));
  }
}
