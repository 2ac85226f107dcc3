import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import {
  createTokenPair,
  extractBearerToken,
  isAccessToken,
  isRefreshToken,
  signAccessToken,
  subjectToUserId,
  verifyToken,
} from '../jwt';

const user = { id: 42, email: 'ada@example.test', username: 'ada' };

describe('tokens', () => {
  it('round-trips an access token', () => {
    const payload = verifyToken(signAccessToken(user));

    expect(payload && isAccessToken(payload)).toBe(true);
    expect(payload?.sub).toBe('42');
  });

  it('pairs an access token with a session-bound refresh token', () => {
    const pair = createTokenPair(user, 'session-1');
    const refresh = verifyToken(pair.refreshToken);

    expect(pair.tokenType).toBe('bearer');
    expect(refresh && isRefreshToken(refresh) ? refresh.sid : null).toBe('session-1');
  });

  it('rejects a token signed with another secret', () => {
    const forged = jwt.sign({ sub: '42', email: 'a', username: 'a', type: 'access' }, 'other-secret');
    expect(verifyToken(forged)).toBeNull();
  });

  it('rejects an expired token', () => {
    const expired = jwt.sign(
      { sub: '42', email: 'a', username: 'a', type: 'access', exp: Math.floor(Date.now() / 1000) - 60 },
      'test-secret'
    );
    expect(verifyToken(expired)).toBeNull();
  });

  it('rejects payloads of an unknown shape', () => {
    expect(verifyToken(jwt.sign({ sub: '42', type: 'access' }, 'test-secret'))).toBeNull();
    expect(verifyToken(jwt.sign({ sub: '42', type: 'api' }, 'test-secret'))).toBeNull();
    expect(verifyToken('not.a.token')).toBeNull();
  });
});

describe('extractBearerToken', () => {
  it('reads "Bearer <token>" case-insensitively', () => {
    expect(extractBearerToken('Bearer abc')).toBe('abc');
    expect(extractBearerToken('bearer abc')).toBe('abc');
  });

  it('rejects other schemes and shapes', () => {
    expect(extractBearerToken(undefined)).toBeNull();
    expect(extractBearerToken('Basic abc')).toBeNull();
    expect(extractBearerToken('Bearer')).toBeNull();
  });
});

describe('subjectToUserId', () => {
  it('accepts decimal ids only', () => {
    expect(subjectToUserId('17')).toBe(17);
    expect(subjectToUserId('-1')).toBeNull();
    expect(subjectToUserId('abc')).toBeNull();
  });
});
