import { verifyAccessToken, type UserRole } from '../utils/jwt.js';

export interface AuthUser {
  id: string;
  role: UserRole;
}

/** Resolve a bearer token to the acting user. Throws when the token is invalid or expired. */
export async function verifyToken(token: string): Promise<AuthUser> {
  const payload = await verifyAccessToken(token);
  return { id: payload.sub, role: payload.role };
}

/** The token of an `Authorization: Bearer ...` header, if there is one. */
export function bearerToken(header: string | undefined): string | null {
  return header?.startsWith('Bearer ') ? header.slice(7) : null;
}
