import argon2 from 'argon2';
import { SignJWT, jwtVerify } from 'jose';
import { getConfig } from './config/app.js';

export interface AccessTokenClaims {
  sub: string;
  email: string;
}

/**
 * Hash a password using argon2id
 */
export async function hashPassword(password: string): Promise<string> {
  return argon2.hash(password, {
    type: argon2.argon2id,
    memoryCost: 65536, // 64 MB
    timeCost: 3,
    parallelism: 4,
  });
}

/**
 * Verify a password against a hash
 */
export async function verifyPassword(
  password: string,
  hash: string
): Promise<boolean> {
  return argon2.verify(hash, password);
}

function signingKey(): Uint8Array {
  return new TextEncoder().encode(getConfig().jwtSecret);
}

/**
 * Issue an HS256 access token for a local user.
 */
export async function signAccessToken(claims: AccessTokenClaims): Promise<string> {
  return new SignJWT({ email: claims.email })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(claims.sub)
    .setIssuedAt()
    .setExpirationTime(getConfig().accessTokenTtl)
    .sign(signingKey());
}

/**
 * Verify an access token. Throws when the signature, algorithm or expiry is wrong.
 */
export async function verifyAccessToken(token: string): Promise<AccessTokenClaims> {
  const { payload } = await jwtVerify(token, signingKey(), {
    algorithms: ['HS256'],
  });

  if (!payload.sub || typeof payload.email !== 'string') {
    throw new Error('Access token is missing required claims');
  }

  return { sub: payload.sub, email: payload.email };
}

/**
 * Calculate expiry date for tokens
 */
export function getTokenExpiry(duration: string, from = new Date()): Date {
  const match = duration.match(/^(\d+)([smhd])$/);
  if (!match) {
    throw new Error(`Invalid duration format: ${duration}`);
  }

  const value = parseInt(match[1], 10);
  const unit = match[2];

  switch (unit) {
    case 's':
      return new Date(from.getTime() + value * 1000);
    case 'm':
      return new Date(from.getTime() + value * 60 * 1000);
    case 'h':
      return new Date(from.getTime() + value * 60 * 60 * 1000);
    case 'd':
      return new Date(from.getTime() + value * 24 * 60 * 60 * 1000);
    default:
      throw new Error(`Invalid duration unit: ${unit}`);
  }
}
