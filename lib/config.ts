import dotenv from 'dotenv';

dotenv.config();

/**
 * Application configuration
 */
export interface AppConfig {
  port: number;
  upstream: {
    baseUrl: string;
    timeoutMs: number;
  };
  cache: {
    directory: string;
    redisUrl: string | null;
  };
  logging: {
    level: string;
    format: 'pretty' | 'json';
  };
}

export const DEFAULT_FPL_BASE_URL = 'https://fantasy.premierleague.com/api';

function clean(v: string | undefined): string {
  if (!v) return '';
  return v.trim().replace(/^"+|"+$/g, '').replace(/^'+|'+$/g, '');
}

function intFromEnv(raw: string | undefined, fallback: number): number {
  const v = clean(raw);
  return v ? parseInt(v, 10) : fallback;
}

/**
 * Build configuration from environment variables
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const format = clean(env.LOG_FORMAT);
  return {
    port: intFromEnv(env.PORT, 3001),
    upstream: {
      baseUrl: clean(env.FPL_BASE_URL) || DEFAULT_FPL_BASE_URL,
      timeoutMs: intFromEnv(env.UPSTREAM_TIMEOUT_MS, 15_000),
    },
    cache: {
      directory: clean(env.CACHE_DIR) || '.cache',
      redisUrl: clean(env.REDIS_URL) || null,
    },
    logging: {
      level: clean(env.LOG_LEVEL) || 'info',
      format: format === 'json' ? 'json' : 'pretty',
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): void {
  if (!Number.isInteger(config.port) || config.port <= 0 || config.port > 65535) {
    throw new Error(`Configuration error: invalid PORT ${config.port}`);
  }

  if (!/^https?:\/\//.test(config.upstream.baseUrl)) {
    throw new Error(
      `Configuration error: FPL_BASE_URL must start with http:// or https://, got "${config.upstream.baseUrl}"`
    );
  }

  if (!Number.isInteger(config.upstream.timeoutMs) || config.upstream.timeoutMs <= 0) {
    throw new Error('Configuration error: UPSTREAM_TIMEOUT_MS must be a positive integer');
  }

  if (!['error', 'warn', 'info', 'debug'].includes(config.logging.level)) {
    throw new Error(`Configuration error: unknown LOG_LEVEL "${config.logging.level}"`);
  }
}

let configInstance: AppConfig | null = null;

/**
 * Get or create the config instance
 */
export function loadConfig(): AppConfig {
  if (!configInstance) {
    configInstance = getConfig();
    validateConfig(configInstance);
  }
  return configInstance;
}
