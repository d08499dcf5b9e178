import { pgTable, pgEnum, uuid, varchar, text, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

export const userRole = pgEnum('user_role', ['USER', 'ADMIN']);

export const users = pgTable(
  'users',
  {
    id: uuid('id').primaryKey(),
    username: varchar('username', { length: 255 }).notNull(),
    passwordHash: text('password_hash').notNull(),
    email: varchar('email', { length: 255 }).notNull(),
    role: userRole('role').notNull().default('USER'),
    displayName: varchar('display_name', { length: 255 }).notNull(),
    avatarUrl: text('avatar_url'),
    avatarId: uuid('avatar_id'),
    bio: varchar('bio', { length: 300 }),
    phone: varchar('phone', { length: 20 }),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    // Uniqueness only among live rows: a soft-deleted user frees its handles.
    uniqueIndex('idx_user_username')
      .on(sql`lower(${table.username})`)
      .where(sql`${table.deletedAt} is null`),
    uniqueIndex('idx_user_email')
      .on(sql`lower(${table.email})`)
      .where(sql`${table.deletedAt} is null`),
    uniqueIndex('idx_user_phone')
      .on(table.phone)
      .where(sql`${table.phone} is not null and ${table.deletedAt} is null`),
    index('idx_user_created_desc').on(table.createdAt.desc()),
  ],
);
