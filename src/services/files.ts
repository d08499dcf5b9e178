import path from 'node:path';
import { and, eq, desc } from 'drizzle-orm';
import type { Db } from '../db/index.js';
import { files } from '../db/schema/index.js';
import { config } from '../config/index.js';
import { generateUUIDv7 } from '../utils/id.js';
import {
  AuthorizationError,
  NotFoundError,
  ValidationError,
  translated,
} from '../utils/errors.js';
import { requireLiveUsers } from './users.js';
import type { IFileStorage } from './file-storage.js';

export type FileRow = typeof files.$inferSelect;

export interface RecordFileInput {
  filename: string;
  originalFilename: string;
  mimeType: string;
  fileSize: number;
  storagePath: string;
  uploadedBy: string;
}

export interface UploadFileInput {
  originalFilename: string;
  mimeType: string;
  data: Buffer;
  uploadedBy: string;
}

function checkUpload(fileSize: number, mimeType: string): void {
  if (!Number.isInteger(fileSize) || fileSize <= 0) {
    throw new ValidationError('File is empty', 5001);
  }
  if (fileSize > config.MAX_UPLOAD_SIZE_BYTES) {
    throw new ValidationError('File too large', 5002);
  }
  if (!config.ALLOWED_MIME_TYPES.includes(mimeType.toLowerCase())) {
    throw new ValidationError(`File type ${mimeType} is not allowed`, 5003);
  }
}

/** Extension of the stored name: lowercase alphanumerics from the original, else "bin". */
export function storedExtension(originalFilename: string): string {
  const ext = path.extname(originalFilename).slice(1).toLowerCase();
  return /^[a-z0-9]{1,10}$/.test(ext) ? ext : 'bin';
}

export async function recordFile(d: Db, input: RecordFileInput): Promise<FileRow> {
  checkUpload(input.fileSize, input.mimeType);
  if (input.originalFilename.trim().length === 0) {
    throw new ValidationError('Filename cannot be empty', 5004);
  }
  await requireLiveUsers(d, [input.uploadedBy]);

  const [row] = await translated(() =>
    d
      .insert(files)
      .values({
        id: generateUUIDv7(),
        filename: input.filename,
        originalFilename: input.originalFilename,
        mimeType: input.mimeType.toLowerCase(),
        fileSize: input.fileSize,
        storagePath: input.storagePath,
        uploadedBy: input.uploadedBy.toLowerCase(),
        createdAt: new Date(),
      })
      .returning(),
  );
  if (!row) throw new Error('File insert returned no row');
  return row;
}

/**
 * Store the bytes, then the metadata. A blob whose metadata could not be
 * recorded is removed again.
 */
export async function uploadFile(
  d: Db,
  storage: IFileStorage,
  input: UploadFileInput,
): Promise<{ file: FileRow; url: string }> {
  checkUpload(input.data.length, input.mimeType);

  const filename = `${generateUUIDv7()}.${storedExtension(input.originalFilename)}`;
  const url = await storage.save(filename, input.data, input.mimeType);

  try {
    const file = await recordFile(d, {
      filename,
      originalFilename: input.originalFilename,
      mimeType: input.mimeType,
      fileSize: input.data.length,
      storagePath: filename,
      uploadedBy: input.uploadedBy,
    });
    return { file, url };
  } catch (err) {
    await storage.delete(filename).catch((cleanupErr: unknown) => {
      console.error(`[files] failed to remove orphaned blob ${filename}:`, cleanupErr);
    });
    throw err;
  }
}

export async function getFile(d: Db, id: string): Promise<FileRow> {
  const [row] = await d.select().from(files).where(eq(files.id, id)).limit(1);
  if (!row) throw new NotFoundError('File not found', 5101);
  return row;
}

export async function findFileByName(d: Db, filename: string): Promise<FileRow | null> {
  const [row] = await d.select().from(files).where(eq(files.filename, filename)).limit(1);
  return row ?? null;
}

export function listFilesByUploader(d: Db, userId: string): Promise<FileRow[]> {
  return d
    .select()
    .from(files)
    .where(eq(files.uploadedBy, userId.toLowerCase()))
    .orderBy(desc(files.createdAt), desc(files.id));
}

/** Only the uploader may delete. Metadata goes first, then the blob. */
export async function deleteFile(
  d: Db,
  storage: IFileStorage,
  id: string,
  actingUserId: string,
): Promise<void> {
  const file = await getFile(d, id);
  if (file.uploadedBy !== actingUserId.toLowerCase()) {
    throw new AuthorizationError('Only the uploader can delete this file', 5201);
  }
  const rows = await d
    .delete(files)
    .where(and(eq(files.id, id), eq(files.uploadedBy, file.uploadedBy)))
    .returning({ id: files.id });
  if (rows.length === 0) throw new NotFoundError('File not found', 5101);

  await storage.delete(file.storagePath);
}
