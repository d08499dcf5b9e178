import type { CreateHTTPContextOptions } from '@trpc/server/adapters/standalone';
import { bearerToken, verifyToken, type AuthUser } from '../middleware/auth.js';
import { db, type Db } from '../db/index.js';
import type { IFileStorage } from '../services/file-storage.js';

export interface Context {
  user: AuthUser | null;
  db: Db;
  storage: IFileStorage;
}

export function contextFactory(storage: IFileStorage) {
  return async function createContext(opts: CreateHTTPContextOptions): Promise<Context> {
    let user: AuthUser | null = null;

    const token = bearerToken(opts.req.headers.authorization);
    if (token) {
      try {
        user = await verifyToken(token);
      } catch {
        // Invalid token: proceed as unauthenticated
      }
    }

    return { user, db: db(), storage };
  };
}
