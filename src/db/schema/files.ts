import { pgTable, uuid, text, bigint, timestamp, index, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { users } from './users.js';

export const files = pgTable(
  'files',
  {
    id: uuid('id').primaryKey(),
    filename: text('filename').notNull(),
    originalFilename: text('original_filename').notNull(),
    mimeType: text('mime_type').notNull(),
    fileSize: bigint('file_size', { mode: 'number' }).notNull(),
    storagePath: text('storage_path').notNull(),
    uploadedBy: uuid('uploaded_by')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    check('files_size_positive', sql`${table.fileSize} > 0`),
    index('idx_files_uploaded_by').on(table.uploadedBy),
    index('idx_files_created_at').on(table.createdAt),
  ],
);
