import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getConfig, resetConfigCache } from '../lib/config/app.js';
import { ValidationError } from '../lib/errors.js';

const MANAGED_KEYS = [
  'NODE_ENV',
  'PORT',
  'JWT_SECRET',
  'ACCESS_TOKEN_TTL',
  'SEED_ADMIN_EMAIL',
  'SEED_ADMIN_PASSWORD',
] as const;

describe('App Config', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of MANAGED_KEYS) saved.set(key, process.env[key]);
    resetConfigCache();
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    resetConfigCache();
  });

  it('reads the test environment', () => {
    const config = getConfig();
    expect(config.env).toBe('test');
    expect(config.databasePath).toBe(':memory:');
    expect(config.jwtSecret).toBe('test-secret');
    expect(config.seedAdmin).toBeNull();
  });

  it('caches until reset', () => {
    const first = getConfig();
    process.env.PORT = '4100';
    expect(getConfig()).toBe(first);

    resetConfigCache();
    expect(getConfig().port).toBe(4100);
  });

  it('falls back to the development secret outside production', () => {
    delete process.env.JWT_SECRET;
    process.env.NODE_ENV = 'development';
    expect(getConfig().jwtSecret).toBe('dev-only-secret');
  });

  it('requires JWT_SECRET in production', () => {
    delete process.env.JWT_SECRET;
    process.env.NODE_ENV = 'production';
    expect(() => getConfig()).toThrow(
      'JWT_SECRET environment variable is required in production',
    );
  });

  it('rejects a malformed token lifetime', () => {
    process.env.ACCESS_TOKEN_TTL = 'forever';
    expect(() => getConfig()).toThrow(ValidationError);
  });

  it('needs both halves of the seed admin', () => {
    process.env.SEED_ADMIN_EMAIL = 'admin@example.com';
    delete process.env.SEED_ADMIN_PASSWORD;
    expect(() => getConfig()).toThrow('SEED_ADMIN_EMAIL and SEED_ADMIN_PASSWORD must be set together');

    process.env.SEED_ADMIN_PASSWORD = 'test-secret';
    resetConfigCache();
    expect(getConfig().seedAdmin).toEqual({ email: 'admin@example.com', password: 'test-secret' });
  });
});
