import argon2 from 'argon2';
import { z } from 'zod/v4';
import { and, eq, inArray, isNull, sql } from 'drizzle-orm';
import type { Db } from '../db/index.js';
import { users } from '../db/schema/index.js';
import { generateUUIDv7 } from '../utils/id.js';
import { NotFoundError, ValidationError, translated } from '../utils/errors.js';

export type UserRow = typeof users.$inferSelect;

export const createUserInput = z.object({
  username: z.string().trim().min(3, 'Username must be at least 3 characters long').max(255),
  email: z.email('Invalid email format').max(255),
  password: z.string().min(6, 'Password must be at least 6 characters long'),
  displayName: z.string().trim().min(1, 'Display name cannot be empty').max(255),
  phone: z.string().trim().min(10, 'Phone number must be at least 10 digits long').max(20).optional(),
});

export type CreateUserInput = z.input<typeof createUserInput>;

export const updateUserInput = z.object({
  username: createUserInput.shape.username.optional(),
  email: createUserInput.shape.email.optional(),
  displayName: createUserInput.shape.displayName.optional(),
  avatarUrl: z.string().max(2048).nullable().optional(),
  avatarId: z.uuid().nullable().optional(),
  bio: z.string().max(300).nullable().optional(),
  phone: z.string().trim().min(10).max(20).nullable().optional(),
});

export type UpdateUserInput = z.input<typeof updateUserInput>;

/** Parse with zod and surface the first issue as a ValidationError. */
export function parseInput<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue?.message ?? 'Invalid input', 1001);
  }
  return result.data;
}

const liveUser = (id: string) => and(eq(users.id, id), isNull(users.deletedAt));

export async function createUser(d: Db, input: CreateUserInput): Promise<UserRow> {
  const data = parseInput(createUserInput, input);
  const passwordHash = await argon2.hash(data.password);

  const [row] = await translated(() =>
    d
      .insert(users)
      .values({
        id: generateUUIDv7(),
        username: data.username,
        email: data.email,
        passwordHash,
        displayName: data.displayName,
        phone: data.phone ?? null,
      })
      .returning(),
  );
  if (!row) throw new Error('User insert returned no row');
  return row;
}

export async function verifyCredentials(
  d: Db,
  username: string,
  password: string,
): Promise<UserRow | null> {
  const [user] = await d
    .select()
    .from(users)
    .where(and(sql`lower(${users.username}) = lower(${username})`, isNull(users.deletedAt)))
    .limit(1);
  if (!user) return null;

  const valid = await argon2.verify(user.passwordHash, password);
  return valid ? user : null;
}

export async function findUser(d: Db, id: string): Promise<UserRow | null> {
  const [user] = await d.select().from(users).where(liveUser(id)).limit(1);
  return user ?? null;
}

export async function getUser(d: Db, id: string): Promise<UserRow> {
  const user = await findUser(d, id);
  if (!user) throw new NotFoundError('User not found', 1201);
  return user;
}

export async function requireLiveUsers(d: Db, ids: string[]): Promise<void> {
  const unique = [...new Set(ids.map((id) => id.toLowerCase()))];
  if (unique.length === 0) return;
  const rows = await d
    .select({ id: users.id })
    .from(users)
    .where(and(inArray(users.id, unique), isNull(users.deletedAt)));
  if (rows.length !== unique.length) {
    throw new NotFoundError('User not found', 1201);
  }
}

export async function updateUser(d: Db, id: string, patch: UpdateUserInput): Promise<UserRow> {
  const data = parseInput(updateUserInput, patch);
  if (Object.values(data).every((value) => value === undefined)) {
    throw new ValidationError('No fields to update', 1002);
  }

  // drizzle leaves undefined keys out of the SET list
  const [row] = await translated(() =>
    d
      .update(users)
      .set({ ...data, updatedAt: new Date() })
      .where(liveUser(id))
      .returning(),
  );
  if (!row) throw new NotFoundError('User not found', 1201);
  return row;
}

/** Soft delete. The username, email and phone become available again. */
export async function deleteUser(d: Db, id: string): Promise<void> {
  const now = new Date();
  const rows = await d
    .update(users)
    .set({ deletedAt: now, updatedAt: now })
    .where(liveUser(id))
    .returning({ id: users.id });
  if (rows.length === 0) throw new NotFoundError('User not found', 1201);
}
