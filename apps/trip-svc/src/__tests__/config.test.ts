import { describe, it, expect } from '@jest/globals';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({ JWT_SECRET: 'test-secret' })).toEqual({
      port: 8002,
      publicBaseUrl: 'http://localhost:8002',
      jwtSecret: 'test-secret',
      accessTokenTtlSeconds: 1800,
      refreshTokenTtlSeconds: 604800,
      databaseUrl: undefined,
      sqlitePath: 'travel_app.db',
      redisUrl: undefined,
      searchResultTtlSeconds: 86400,
      bcryptRounds: 10,
      anthropic: { apiKey: undefined, model: 'claude-3-haiku-20240307', baseUrl: 'https://api.anthropic.com' }
    });
  });

  it('should read overrides', () => {
    const config = loadConfig({
      JWT_SECRET: 'test-secret',
      PORT: '9000',
      PUBLIC_BASE_URL: 'https://trips.example.com/',
      REDIS_URL: 'redis://cache:6379',
      DATABASE_URL: 'mysql://user:test-secret@db/trips',
      SEARCH_RESULT_TTL_SECONDS: '600',
      SQLITE_PATH: '/var/lib/trips/users.db',
      ANTHROPIC_API_KEY: 'test-key'
    });
    expect(config.port).toBe(9000);
    expect(config.publicBaseUrl).toBe('https://trips.example.com');
    expect(config.redisUrl).toBe('redis://cache:6379');
    expect(config.databaseUrl).toBe('mysql://user:test-secret@db/trips');
    expect(config.searchResultTtlSeconds).toBe(600);
    expect(config.sqlitePath).toBe('/var/lib/trips/users.db');
    expect(config.anthropic.apiKey).toBe('test-key');
  });

  it('should require a signing secret', () => {
    expect(() => loadConfig({})).toThrow('JWT_SECRET environment variable is required');
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({ JWT_SECRET: 'test-secret', BCRYPT_ROUNDS: 'ten' })).toThrow(
      'BCRYPT_ROUNDS must be a positive integer, got "ten"'
    );
  });
});
