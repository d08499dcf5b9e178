import { TRPCError } from '@trpc/server';
import type { TRPC_ERROR_CODE_KEY } from '@trpc/server/unstable-core-do-not-import';

export type StoreErrorKind = 'validation' | 'not_found' | 'conflict' | 'authorization';

/**
 * Failure raised by the data layer. Every invariant violation, whether caught
 * by a pre-check or by a database constraint, ends up as one of the four kinds.
 */
export abstract class StoreError extends Error {
  abstract readonly kind: StoreErrorKind;

  constructor(
    message: string,
    readonly code: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends StoreError {
  readonly kind = 'validation';
}

export class NotFoundError extends StoreError {
  readonly kind = 'not_found';
}

export class ConflictError extends StoreError {
  readonly kind = 'conflict';
}

export class AuthorizationError extends StoreError {
  readonly kind = 'authorization';
}

const TRPC_CODES: Record<StoreErrorKind, TRPC_ERROR_CODE_KEY> = {
  validation: 'BAD_REQUEST',
  not_found: 'NOT_FOUND',
  conflict: 'CONFLICT',
  authorization: 'FORBIDDEN',
};

export function apiError(
  trpcCode: TRPC_ERROR_CODE_KEY,
  appCode: number,
  message: string,
): TRPCError {
  return new TRPCError({
    code: trpcCode,
    message,
    cause: { app_code: appCode, app_error: message },
  });
}

export function toTRPCError(err: StoreError): TRPCError {
  return apiError(TRPC_CODES[err.kind], err.code, err.message);
}

// --- PostgreSQL constraint translation ---

interface PgErrorFields {
  code: string;
  constraint?: string;
}

const SQLSTATE = /^[0-9A-Z]{5}$/;

/**
 * Find the PostgreSQL error on an error's cause chain. Drivers and drizzle
 * wrap the server error differently, so walk until a SQLSTATE shows up.
 */
export function findPgError(err: unknown): PgErrorFields | null {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Object; depth++) {
    const code: unknown = Reflect.get(current, 'code');
    if (typeof code === 'string' && SQLSTATE.test(code)) {
      const constraint: unknown = Reflect.get(current, 'constraint');
      return { code, constraint: typeof constraint === 'string' ? constraint : undefined };
    }
    current = Reflect.get(current, 'cause');
  }
  return null;
}

const UNIQUE_MESSAGES: Record<string, [number, string]> = {
  idx_user_username: [1101, 'Username already taken'],
  idx_user_email: [1102, 'Email already registered'],
  idx_user_phone: [1103, 'Phone number already registered'],
  idx_friend_requests_from_user_to_user: [2103, 'Friend request already exists'],
  friends_user_a_user_b_pk: [2104, 'Users are already friends'],
  participants_conversation_id_user_id_pk: [3105, 'User is already a participant'],
  last_messages_conversation_id_unique: [4105, 'Conversation already has a last message'],
};

/**
 * Translate a constraint violation into a StoreError. Errors that are not
 * constraint violations are returned unchanged so callers can rethrow them.
 */
export function translateDbError(err: unknown): unknown {
  if (err instanceof StoreError) return err;
  const pg = findPgError(err);
  if (!pg) return err;

  switch (pg.code) {
    case '23505': {
      const [code, message] = (pg.constraint ? UNIQUE_MESSAGES[pg.constraint] : undefined) ?? [
        9001,
        'Resource already exists',
      ];
      return new ConflictError(message, code);
    }
    case '23503':
      return new NotFoundError('Referenced resource not found', 9002);
    case '23514':
      return new ValidationError('Value violates a data constraint', 9003);
    case '22P02':
      return new ValidationError('Malformed identifier', 9004);
    default:
      return err;
  }
}

/** Run a write and rethrow any constraint violation as a StoreError. */
export async function translated<T>(op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    throw translateDbError(err);
  }
}
