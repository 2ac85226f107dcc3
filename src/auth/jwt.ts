/**
 * JWT Utilities
 *
 * Access tokens (short-lived) carry the user's id, email and username.
 * Refresh tokens are tied to a persisted session id.
 */

import jwt, { type JwtPayload } from 'jsonwebtoken';
import { getAuthConfig } from './config';

// Token payload types
export interface AccessTokenPayload {
  sub: string;          // user ID
  email: string;
  username: string;
  type: 'access';
  iat: number;
  exp: number;
}

export interface RefreshTokenPayload {
  sub: string;          // user ID
  sid: string;          // session ID
  type: 'refresh';
  iat: number;
  exp: number;
}

export type TokenPayload = AccessTokenPayload | RefreshTokenPayload;

export interface TokenUser {
  id: number;
  email: string;
  username: string;
}

// Returned by register, login and refresh
export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
  expiresIn: number;      // seconds until access token expires
}

export function signAccessToken(user: TokenUser): string {
  const config = getAuthConfig();

  const payload: Omit<AccessTokenPayload, 'iat' | 'exp'> = {
    sub: String(user.id),
    email: user.email,
    username: user.username,
    type: 'access',
  };

  return jwt.sign(payload, config.jwtSecret, {
    expiresIn: config.accessTokenExpiry,
  });
}

export function signRefreshToken(userId: number, sessionId: string): string {
  const config = getAuthConfig();

  const payload: Omit<RefreshTokenPayload, 'iat' | 'exp'> = {
    sub: String(userId),
    sid: sessionId,
    type: 'refresh',
  };

  return jwt.sign(payload, config.jwtSecret, {
    expiresIn: config.refreshTokenExpiry,
  });
}

export function createTokenPair(user: TokenUser, sessionId: string): TokenPair {
  const config = getAuthConfig();

  return {
    accessToken: signAccessToken(user),
    refreshToken: signRefreshToken(user.id, sessionId),
    tokenType: 'bearer',
    expiresIn: config.accessTokenExpiry,
  };
}

/* ---------- Verification ---------- */

function isNumericDate(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function toTokenPayload(decoded: JwtPayload): TokenPayload | null {
  const { sub, iat, exp } = decoded;
  if (typeof sub !== 'string' || !isNumericDate(iat) || !isNumericDate(exp)) {
    return null;
  }

  if (decoded.type === 'access') {
    const { email, username } = decoded;
    if (typeof email !== 'string' || typeof username !== 'string') return null;
    return { sub, email, username, type: 'access', iat, exp };
  }

  if (decoded.type === 'refresh') {
    const { sid } = decoded;
    if (typeof sid !== 'string') return null;
    return { sub, sid, type: 'refresh', iat, exp };
  }

  return null;
}

/**
 * Verify signature and expiry, then check the payload shape.
 * Returns null if invalid, expired or malformed.
 */
export function verifyToken(token: string): TokenPayload | null {
  const config = getAuthConfig();

  try {
    const decoded = jwt.verify(token, config.jwtSecret);
    if (typeof decoded === 'string') return null;
    return toTokenPayload(decoded);
  } catch {
    return null;
  }
}

/**
 * Extract token from Authorization header
 * Expects: "Bearer <token>"
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) return null;

  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }

  return parts[1];
}

export function isAccessToken(payload: TokenPayload): payload is AccessTokenPayload {
  return payload.type === 'access';
}

export function isRefreshToken(payload: TokenPayload): payload is RefreshTokenPayload {
  return payload.type === 'refresh';
}

/** Parse the numeric user id carried in `sub`. */
export function subjectToUserId(sub: string): number | null {
  if (!/^\d+$/.test(sub)) return null;
  const id = Number(sub);
  return Number.isSafeInteger(id) ? id : null;
}
