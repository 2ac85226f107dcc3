/* src/config.ts
   Centralized server config */
import 'dotenv/config';

const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

const envBool = (name: string, fallback: boolean): boolean => {
  const val = env(name).toLowerCase();
  if (val === 'true' || val === '1') return true;
  if (val === 'false' || val === '0') return false;
  return fallback;
};

const envInt = (name: string, fallback: number): number => {
  const val = parseInt(env(name), 10);
  return Number.isNaN(val) ? fallback : val;
};

export type DatabaseDriver = 'sqlite' | 'postgresql';

export interface ServerConfig {
  nodeEnv: string;
  port: number;
  host: string;
  apiPrefix: string;
  database: {
    url: string;
    driver: DatabaseDriver;
    sqlitePath: string;
  };
  cors: {
    origins: string[] | true;
  };
  rateLimit: {
    authMax: number;
    authWindow: string;
  };
  realtime: {
    /** Drop cached board access and subscriptions when membership is revoked over REST. */
    eagerAccessRevocation: boolean;
  };
}

function normalizePrefix(raw: string): string {
  const trimmed = raw.trim().replace(/\/+$/, '');
  if (!trimmed) return '';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

export function loadConfig(): ServerConfig {
  // Driver follows the DATABASE_URL scheme
  const databaseUrl = env('DATABASE_URL', 'sqlite://local');
  const driver: DatabaseDriver = databaseUrl.startsWith('postgres') ? 'postgresql' : 'sqlite';

  const origins = env('CORS_ORIGINS', '*')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);

  return {
    nodeEnv: env('NODE_ENV', 'development'),
    port: envInt('PORT', 8000),
    host: env('HOST', '0.0.0.0'),
    apiPrefix: normalizePrefix(env('API_PREFIX', '/api/v1')),
    database: {
      url: databaseUrl,
      driver,
      sqlitePath: env('SQLITE_PATH', 'data/kanban.db'),
    },
    cors: {
      origins: origins.length === 0 || origins.includes('*') ? true : origins,
    },
    rateLimit: {
      authMax: envInt('AUTH_RATE_LIMIT_MAX', 20),
      authWindow: env('AUTH_RATE_LIMIT_WINDOW', '1 minute'),
    },
    realtime: {
      eagerAccessRevocation: envBool('WS_EAGER_ACCESS_REVOCATION', false),
    },
  };
}

let _config: ServerConfig | null = null;

export function getConfig(): ServerConfig {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

// For testing
export function resetConfig(): void {
  _config = null;
}
