/**
 * Auth Module - Barrel Export
 */

// Config
export { getAuthConfig, loadAuthConfig, resetAuthConfig } from './config';
export type { AuthConfig } from './config';

// JWT
export {
  signAccessToken,
  signRefreshToken,
  createTokenPair,
  verifyToken,
  extractBearerToken,
  isAccessToken,
  isRefreshToken,
  subjectToUserId,
} from './jwt';
export type {
  AccessTokenPayload,
  RefreshTokenPayload,
  TokenPayload,
  TokenUser,
  TokenPair,
} from './jwt';

// Passwords
export { hashPassword, comparePassword, validatePasswordStrength } from './passwords';

// Sessions
export { createSessionStore, hashToken, generateSessionId } from './sessions';
export type { Session, SessionStore } from './sessions';

// Users
export { createUserStore, DuplicateUserError } from './users';
export type { User, PublicUser, CreateUserInput, UserStore } from './users';

// Identity
export { createIdentityVerifier } from './identity';
export type { AuthUser, IdentityVerifier } from './identity';

// Middleware
export { createAuthMiddleware, registerAuthMiddleware, requireUser, isPublicRoute } from './middleware';

// Routes
export { createAuthRoutes } from './routes';
