import { z } from 'zod';
import { ValidationError } from '../errors.js';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  DATABASE_PATH: z.string().min(1).default('./data/teamhub.db'),
  JWT_SECRET: z.string().min(1).optional(),
  ACCESS_TOKEN_TTL: z
    .string()
    .regex(/^\d+[smhd]$/, 'ACCESS_TOKEN_TTL must look like 15m, 1h or 7d')
    .default('1h'),
  FRONTEND_URL: z.string().default('http://localhost:5173'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  SEED_ADMIN_EMAIL: z.string().email().optional(),
  SEED_ADMIN_PASSWORD: z.string().min(8).optional(),
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  host: string;
  databasePath: string;
  jwtSecret: string;
  accessTokenTtl: string;
  frontendUrl: string;
  logLevel: string;
  seedAdmin: { email: string; password: string } | null;
}

const DEV_JWT_SECRET = 'dev-only-secret';

let cachedConfig: AppConfig | undefined;

/**
 * Parse and validate the process environment.
 * The result is cached; call resetConfigCache() after changing process.env in tests.
 */
export function getConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const result = EnvSchema.safeParse(process.env);
  if (!result.success) {
    throw new ValidationError('Invalid environment configuration', {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  const env = result.data;

  if (!env.JWT_SECRET && env.NODE_ENV === 'production') {
    throw new ValidationError('JWT_SECRET environment variable is required in production');
  }

  // Both halves of the seed account must be given together
  if (Boolean(env.SEED_ADMIN_EMAIL) !== Boolean(env.SEED_ADMIN_PASSWORD)) {
    throw new ValidationError(
      'SEED_ADMIN_EMAIL and SEED_ADMIN_PASSWORD must be set together',
    );
  }

  cachedConfig = {
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    databasePath: env.DATABASE_PATH,
    jwtSecret: env.JWT_SECRET ?? DEV_JWT_SECRET,
    accessTokenTtl: env.ACCESS_TOKEN_TTL,
    frontendUrl: env.FRONTEND_URL,
    logLevel: env.LOG_LEVEL,
    seedAdmin:
      env.SEED_ADMIN_EMAIL && env.SEED_ADMIN_PASSWORD
        ? { email: env.SEED_ADMIN_EMAIL, password: env.SEED_ADMIN_PASSWORD }
        : null,
  };

  return cachedConfig;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetConfigCache(): void {
  cachedConfig = undefined;
}
