import type { IncomingMessage, ServerResponse } from 'node:http';
import { bearerToken, verifyToken, type AuthUser } from '../middleware/auth.js';
import { db } from '../db/index.js';
import { config } from '../config/index.js';
import { uploadFile } from '../services/files.js';
import type { IFileStorage } from '../services/file-storage.js';
import { StoreError } from '../utils/errors.js';
import { formatFile } from '../utils/format.js';
import { BodyTooLargeError, multipartBoundary, parseMultipart } from './multipart.js';

const HTTP_STATUS: Record<StoreError['kind'], number> = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  authorization: 403,
};

// Multipart framing on top of the file itself.
const MULTIPART_OVERHEAD = 64 * 1024;

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

async function authenticate(req: IncomingMessage): Promise<AuthUser | null> {
  const token = bearerToken(req.headers.authorization);
  if (!token) return null;
  try {
    return await verifyToken(token);
  } catch {
    return null;
  }
}

/** POST /upload: a multipart body with one `file` part. */
export async function handleUpload(
  req: IncomingMessage,
  res: ServerResponse,
  storage: IFileStorage,
): Promise<void> {
  try {
    const user = await authenticate(req);
    if (!user) {
      sendJson(res, 401, { error: 'Unauthorized' });
      return;
    }

    const boundary = multipartBoundary(req.headers['content-type']);
    if (!boundary) {
      sendJson(res, 400, { error: 'Expected multipart/form-data' });
      return;
    }

    const { file } = await parseMultipart(req, boundary, config.MAX_UPLOAD_SIZE_BYTES + MULTIPART_OVERHEAD);
    if (!file) {
      sendJson(res, 400, { error: 'No file provided' });
      return;
    }

    const { file: row, url } = await uploadFile(db(), storage, {
      originalFilename: file.filename,
      mimeType: file.contentType,
      data: file.data,
      uploadedBy: user.id,
    });
    console.log(`[upload] ${row.filename} (${row.fileSize} bytes) by ${user.id}`);
    sendJson(res, 200, formatFile(row, url));
  } catch (err) {
    if (err instanceof BodyTooLargeError) {
      sendJson(res, 413, { error: 'File too large' });
      return;
    }
    if (err instanceof StoreError) {
      sendJson(res, HTTP_STATUS[err.kind], { error: err.message, app_code: err.code });
      return;
    }
    console.error('[upload] failed:', err);
    sendJson(res, 500, { error: 'Upload failed' });
  }
}
