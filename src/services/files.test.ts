import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { createTestDb, makeUser, type TestDb } from '../testing/db.js';
import { MemoryFileStorage } from '../testing/memory-storage.js';
import {
  deleteFile,
  getFile,
  listFilesByUploader,
  recordFile,
  storedExtension,
  uploadFile,
} from './files.js';
import { deleteUser } from './users.js';

// vitest.config.ts caps uploads at 1024 bytes.

describe('storedExtension', () => {
  it('keeps a simple extension and lowercases it', () => {
    expect(storedExtension('Photo.JPG')).toBe('jpg');
    expect(storedExtension('archive.tar.gz')).toBe('gz');
  });

  it('falls back to bin', () => {
    expect(storedExtension('README')).toBe('bin');
    expect(storedExtension('weird.$$$')).toBe('bin');
  });
});

describe('files', () => {
  let t: TestDb;

  beforeAll(async () => {
    t = await createTestDb();
  });

  afterAll(async () => {
    await t.close();
  });

  it('stores the blob under a generated name and records metadata', async () => {
    const storage = new MemoryFileStorage();
    const user = await makeUser(t.db, 'up');
    const { file, url } = await uploadFile(t.db, storage, {
      originalFilename: 'notes.txt',
      mimeType: 'text/plain',
      data: Buffer.from('hello'),
      uploadedBy: user.id,
    });

    expect(file.filename).toMatch(/^[0-9a-f-]{36}\.txt$/);
    expect(file.storagePath).toBe(file.filename);
    expect(file.originalFilename).toBe('notes.txt');
    expect(file.fileSize).toBe(5);
    expect(url).toBe(`/files/${file.filename}`);
    expect(storage.blobs.get(file.filename)?.toString()).toBe('hello');
    expect((await getFile(t.db, file.id)).id).toBe(file.id);
  });

  it('validates size and type before storing anything', async () => {
    const storage = new MemoryFileStorage();
    const user = await makeUser(t.db, 'up');
    const base = { originalFilename: 'a.txt', mimeType: 'text/plain', uploadedBy: user.id };

    await expect(uploadFile(t.db, storage, { ...base, data: Buffer.alloc(0) })).rejects.toMatchObject({
      code: 5001,
    });
    await expect(uploadFile(t.db, storage, { ...base, data: Buffer.alloc(1025) })).rejects.toMatchObject({
      code: 5002,
    });
    await expect(
      uploadFile(t.db, storage, { ...base, mimeType: 'application/x-msdownload', data: Buffer.from('MZ') }),
    ).rejects.toMatchObject({ kind: 'validation', code: 5003 });
    expect(storage.blobs.size).toBe(0);
  });

  it('removes the blob again when metadata cannot be recorded', async () => {
    const storage = new MemoryFileStorage();
    const user = await makeUser(t.db, 'gone');
    await deleteUser(t.db, user.id);

    await expect(
      uploadFile(t.db, storage, {
        originalFilename: 'a.png',
        mimeType: 'image/png',
        data: Buffer.from('png'),
        uploadedBy: user.id,
      }),
    ).rejects.toMatchObject({ kind: 'not_found', code: 1201 });
    expect(storage.blobs.size).toBe(0);
  });

  it('records metadata for blobs stored elsewhere', async () => {
    const user = await makeUser(t.db, 'rec');
    const row = await recordFile(t.db, {
      filename: 'x.pdf',
      originalFilename: 'report.pdf',
      mimeType: 'Application/PDF',
      fileSize: 10,
      storagePath: 'x.pdf',
      uploadedBy: user.id,
    });
    expect(row.mimeType).toBe('application/pdf');
  });

  it('lists a user\'s uploads newest first', async () => {
    const storage = new MemoryFileStorage();
    const user = await makeUser(t.db, 'lister');
    const upload = (name: string) =>
      uploadFile(t.db, storage, {
        originalFilename: name,
        mimeType: 'text/plain',
        data: Buffer.from(name),
        uploadedBy: user.id,
      });
    const first = await upload('1.txt');
    const second = await upload('2.txt');

    const list = await listFilesByUploader(t.db, user.id);
    expect(list.map((f) => f.id)).toEqual([second.file.id, first.file.id]);
  });

  it('lets only the uploader delete, metadata and blob', async () => {
    const storage = new MemoryFileStorage();
    const owner = await makeUser(t.db, 'owner');
    const other = await makeUser(t.db, 'other');
    const { file } = await uploadFile(t.db, storage, {
      originalFilename: 'a.gif',
      mimeType: 'image/gif',
      data: Buffer.from('GIF89a'),
      uploadedBy: owner.id,
    });

    await expect(deleteFile(t.db, storage, file.id, other.id)).rejects.toMatchObject({
      kind: 'authorization',
      code: 5201,
    });
    await deleteFile(t.db, storage, file.id, owner.id);

    expect(storage.blobs.has(file.filename)).toBe(false);
    await expect(getFile(t.db, file.id)).rejects.toMatchObject({ kind: 'not_found', code: 5101 });
  });
});
