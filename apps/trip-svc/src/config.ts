/**
 * Trip service configuration, read once from the environment at startup.
 */

export interface AnthropicConfig {
  apiKey?: string;
  model: string;
  baseUrl: string;
}

export interface AppConfig {
  port: number;
  publicBaseUrl: string;
  jwtSecret: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  databaseUrl?: string;
  sqlitePath: string;
  redisUrl?: string;
  searchResultTtlSeconds: number;
  bcryptRounds: number;
  anthropic: AnthropicConfig;
}

export const ACCESS_TOKEN_TTL_SECONDS = 30 * 60;
export const REFRESH_TOKEN_TTL_SECONDS = 7 * 24 * 60 * 60;

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function positiveInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = optional(env[name]);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const jwtSecret = optional(env.JWT_SECRET);
  if (!jwtSecret) {
    throw new Error('JWT_SECRET environment variable is required');
  }
  const port = positiveInteger(env, 'PORT', 8002);

  return {
    port,
    publicBaseUrl: (optional(env.PUBLIC_BASE_URL) ?? `http://localhost:${port}`).replace(/\/+$/, ''),
    jwtSecret,
    accessTokenTtlSeconds: ACCESS_TOKEN_TTL_SECONDS,
    refreshTokenTtlSeconds: REFRESH_TOKEN_TTL_SECONDS,
    databaseUrl: optional(env.DATABASE_URL),
    sqlitePath: optional(env.SQLITE_PATH) ?? 'travel_app.db',
    redisUrl: optional(env.REDIS_URL),
    searchResultTtlSeconds: positiveInteger(env, 'SEARCH_RESULT_TTL_SECONDS', 86400),
    bcryptRounds: positiveInteger(env, 'BCRYPT_ROUNDS', 10),
    anthropic: {
      apiKey: optional(env.ANTHROPIC_API_KEY),
      model: optional(env.ANTHROPIC_MODEL) ?? 'claude-3-haiku-20240307',
      baseUrl: optional(env.ANTHROPIC_BASE_URL) ?? 'https://api.anthropic.com'
    }
  };
}
