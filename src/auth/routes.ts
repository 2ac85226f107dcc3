/**
 * Auth Routes (mounted under `${API_PREFIX}/auth`)
 *
 * - POST /register - Create account, returns tokens
 * - POST /login    - Email or username + password
 * - POST /refresh  - Rotate refresh session
 * - POST /logout   - Revoke refresh session
 * - GET  /me       - Current user
 */

import type { FastifyInstance } from 'fastify';
import type { UserStore, User } from './users';
import { DuplicateUserError } from './users';
import type { SessionStore } from './sessions';
import { createTokenPair, verifyToken, isRefreshToken, subjectToUserId } from './jwt';
import { validatePasswordStrength } from './passwords';
import { requireUser } from './middleware';
import { authRateLimit } from '../middleware/rateLimit';
import { bodyOf, readString, readText, badRequest, conflict } from '../routes/validation';
import { createLogger } from '../observability/logger';

const log = createLogger('auth/routes');

const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
export const USERNAME_RE = /^[A-Za-z0-9_.-]{3,50}$/;

export interface AuthRoutesDeps {
  users: UserStore;
  sessions: SessionStore;
}

export function createAuthRoutes({ users, sessions }: AuthRoutesDeps) {
  // Create session, sign tokens with its id, then store the refresh token hash
  async function issueTokens(user: User) {
    const session = await sessions.create(user.id, '');
    const tokens = createTokenPair(user, session.id);
    await sessions.updateTokenHash(session.id, tokens.refreshToken);
    return tokens;
  }

  return async function authRoutes(app: FastifyInstance) {
    app.post<{ Body: { email?: string; username?: string; password?: string } }>(
      '/register',
      authRateLimit(),
      async (req, reply) => {
        const body = bodyOf(req.body);
        const email = readText(body.email)?.toLowerCase();
        const username = readText(body.username);
        const password = readString(body.password);

        if (!email || !username || !password) {
          return badRequest(reply, 'Email, username and password are required');
        }
        if (!EMAIL_RE.test(email)) {
          return badRequest(reply, 'Invalid email format');
        }
        if (!USERNAME_RE.test(username)) {
          return badRequest(reply, 'Username must be 3-50 letters, digits, dots, dashes or underscores');
        }
        const passwordError = validatePasswordStrength(password);
        if (passwordError) {
          return badRequest(reply, passwordError);
        }

        try {
          const user = await users.create({ email, username, password });
          log.info({ userId: user.id }, 'User registered');
          const tokens = await issueTokens(user);
          return reply.code(201).send({ user: users.toPublic(user), ...tokens });
        } catch (err) {
          if (err instanceof DuplicateUserError) {
            return conflict(reply, err.message);
          }
          throw err;
        }
      }
    );

    app.post<{ Body: { email?: string; username?: string; password?: string } }>(
      '/login',
      authRateLimit(),
      async (req, reply) => {
        const body = bodyOf(req.body);
        const login = readText(body.email) ?? readText(body.username);
        const password = readString(body.password);

        if (!login || !password) {
          return badRequest(reply, 'Email or username and password are required');
        }

        const user = await users.validateCredentials(login, password);
        if (!user) {
          return reply.code(401).send({
            error: 'unauthorized',
            message: 'Incorrect email/username or password',
          });
        }

        return { user: users.toPublic(user), ...(await issueTokens(user)) };
      }
    );

    app.post<{ Body: { refreshToken?: string } }>('/refresh', async (req, reply) => {
      const refreshToken = readString(bodyOf(req.body).refreshToken);
      if (!refreshToken) {
        return badRequest(reply, 'Refresh token is required');
      }

      const payload = verifyToken(refreshToken);
      if (!payload || !isRefreshToken(payload)) {
        return reply.code(401).send({ error: 'unauthorized', message: 'Invalid refresh token' });
      }

      if (!(await sessions.isValid(payload.sid))) {
        return reply.code(401).send({
          error: 'unauthorized',
          message: 'Session has been revoked or expired',
        });
      }

      const userId = subjectToUserId(payload.sub);
      const user = userId === null ? undefined : await users.findById(userId);
      if (!user || !user.isActive) {
        return reply.code(401).send({ error: 'unauthorized', message: 'User not found or inactive' });
      }

      // Rotate
      await sessions.revoke(payload.sid);
      return issueTokens(user);
    });

    app.post<{ Body: { refreshToken?: string } }>('/logout', async (req, reply) => {
      const user = requireUser(req, reply);
      if (!user) return;

      const refreshToken = readString(bodyOf(req.body).refreshToken);
      if (refreshToken) {
        const payload = verifyToken(refreshToken);
        if (payload && isRefreshToken(payload) && subjectToUserId(payload.sub) === user.id) {
          await sessions.revoke(payload.sid);
        }
      } else {
        await sessions.revokeAllForUser(user.id);
      }

      return { success: true };
    });

    app.get('/me', async (req, reply) => {
      const current = requireUser(req, reply);
      if (!current) return;

      const user = await users.findById(current.id);
      if (!user) {
        return reply.code(401).send({ error: 'unauthorized', message: 'User not found' });
      }
      return { user: users.toPublic(user) };
    });
  };
}
