import { SignJWT, jwtVerify } from 'jose';
import { config } from '../config/index.js';

const AUDIENCE = 'chat-store';

export type UserRole = 'USER' | 'ADMIN';

export interface AccessTokenPayload {
  sub: string;
  role: UserRole;
}

function secretKey(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

export async function signAccessToken(
  payload: AccessTokenPayload,
  secret: string = config.JWT_SECRET,
): Promise<string> {
  return new SignJWT({ role: payload.role })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(payload.sub)
    .setIssuedAt()
    .setAudience(AUDIENCE)
    .setExpirationTime(config.ACCESS_TOKEN_TTL)
    .sign(secretKey(secret));
}

export async function verifyAccessToken(
  token: string,
  secret: string = config.JWT_SECRET,
): Promise<AccessTokenPayload> {
  const { payload } = await jwtVerify(token, secretKey(secret), {
    audience: AUDIENCE,
    algorithms: ['HS256'],
  });
  if (typeof payload.sub !== 'string') {
    throw new Error('Token has no subject');
  }
  return { sub: payload.sub, role: payload.role === 'ADMIN' ? 'ADMIN' : 'USER' };
}
