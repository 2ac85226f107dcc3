/**
 * Auth Configuration
 *
 * Token lifetimes, hashing cost and session limits, read once from env.
 */

export interface AuthConfig {
  production: boolean;

  // JWT settings
  jwtSecret: string;
  accessTokenExpiry: number;  // seconds
  refreshTokenExpiry: number; // seconds

  // Password settings
  bcryptRounds: number;

  // Session settings
  maxSessionsPerUser: number;
}

function env(name: string, fallback?: string): string {
  return (process.env[name] ?? fallback ?? '').toString();
}

function envInt(name: string, fallback: number): number {
  const val = parseInt(env(name, ''), 10);
  return Number.isNaN(val) ? fallback : val;
}

function resolveJwtSecret(production: boolean): string {
  const secret = env('JWT_SECRET', '');

  if (production && !secret) {
    throw new Error('JWT_SECRET is required in production mode');
  }

  return secret || 'dev-jwt-secret-do-not-use-in-production';
}

export function loadAuthConfig(): AuthConfig {
  const production = env('NODE_ENV', 'development') === 'production';

  return {
    production,

    // JWT
    jwtSecret: resolveJwtSecret(production),
    accessTokenExpiry: envInt('JWT_ACCESS_EXPIRY', 18000),       // 5 hours
    refreshTokenExpiry: envInt('JWT_REFRESH_EXPIRY', 604800),    // 7 days

    // Password
    bcryptRounds: envInt('BCRYPT_ROUNDS', 12),

    // Sessions
    maxSessionsPerUser: envInt('MAX_SESSIONS_PER_USER', 10),
  };
}

// Singleton instance
let _config: AuthConfig | null = null;

export function getAuthConfig(): AuthConfig {
  if (!_config) {
    _config = loadAuthConfig();
  }
  return _config;
}

// For testing: reset config
export function resetAuthConfig(): void {
  _config = null;
}
