import type { ServerResponse } from 'node:http';
import { db } from '../db/index.js';
import { findFileByName } from '../services/files.js';
import type { IFileStorage } from '../services/file-storage.js';
import { sendJson } from './upload.js';

/**
 * Filename addressed by a path under `prefix`, percent-decoded. Null when the
 * path is outside the prefix or carries a malformed escape.
 */
export function fileNameFromPath(pathname: string, prefix: string): string | null {
  if (!pathname.startsWith(prefix)) return null;
  try {
    return decodeURIComponent(pathname.slice(prefix.length));
  } catch (err) {
    if (err instanceof URIError) return null;
    throw err;
  }
}

/** GET {UPLOAD_BASE_URL}/{filename} */
export async function handleFileServe(
  res: ServerResponse,
  filename: string,
  storage: IFileStorage,
): Promise<void> {
  try {
    const file = await findFileByName(db(), filename);
    if (!file) {
      sendJson(res, 404, { error: 'File not found' });
      return;
    }

    const data = await storage.read(file.storagePath);
    res.writeHead(200, {
      'Content-Type': file.mimeType,
      'Content-Length': data.length.toString(),
      'Content-Disposition': `inline; filename="${encodeURIComponent(file.originalFilename)}"`,
      'Cache-Control': 'public, max-age=86400',
    });
    res.end(data);
  } catch (err) {
    console.error('[files] serve failed:', err);
    if (!res.headersSent) {
      sendJson(res, 500, { error: 'Server error' });
    }
  }
}
