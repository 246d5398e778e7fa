/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Signing secret + algorithm are read ONCE here and handed to the token codec.
 *   Nothing mutates them afterwards; rotating the secret means restarting the
 *   process, which invalidates every token issued before.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   Invalid values ('prod', 'staging') are caught at startup by Zod.
 */

import 'dotenv/config';
import { z } from 'zod';
import { generateSecureToken } from '../shared/security/token';
import { TOKEN_ALGORITHMS } from '../shared/security/token-codec';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

// Comma separated list of origins, trailing slashes stripped.
const OriginList = z
  .string()
  .transform((raw) =>
    raw
      .split(',')
      .map((o) => o.trim().replace(/\/+$/, ''))
      .filter((o) => o.length > 0),
  );

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().default(8000),
  API_PREFIX: z
    .string()
    .regex(/^(\/[A-Za-z0-9._-]+)*$/, 'API_PREFIX must look like /api/v1 (or be empty)')
    .default('/api/v1'),

  DATABASE_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('scopegate-api'),
  SERVICE_VERSION: z.string().default('v0.1.1'),

  // Access tokens
  ACCESS_TOKEN_SECRET_KEY: z.string().min(16).optional(),
  ACCESS_TOKEN_ALGORITHM: z.enum(TOKEN_ALGORITHMS).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce
    .number()
    .int()
    .min(1)
    .default(60 * 24),

  BCRYPT_COST: z.coerce.number().int().min(4).max(15).default(12),

  // Superuser bootstrap (idempotent)
  SEED_ON_START: BooleanFlag.default('true'),
  SUPERUSER: z.string().min(1).default('admin'),
  SUPERUSER_PASSWORD: z.string().min(1).default('admin'),

  // CORS
  CORS_ORIGINS: OriginList.default('http://localhost:8000'),
  FRONTEND_HOST: z.string().url().default('http://localhost:5173'),
});

type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  apiPrefix: string;
  databaseUrl: string;

  logLevel: string;
  serviceName: string;
  serviceVersion: string;

  accessToken: {
    secretKey: string;
    algorithm: (typeof TOKEN_ALGORITHMS)[number];
    expireMinutes: number;
  };

  bcryptCost: number;

  seed: {
    enabled: boolean;
    superuserId: string;
    superuserPassword: string;
  };

  corsOrigins: string[];
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  // A per-process random secret is fine for dev: tokens just stop working on restart.
  // In production it would silently log everybody out on every deploy.
  if (parsed.NODE_ENV === 'production' && !parsed.ACCESS_TOKEN_SECRET_KEY) {
    throw new Error('ACCESS_TOKEN_SECRET_KEY must be set in production');
  }

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    apiPrefix: parsed.API_PREFIX,
    databaseUrl: parsed.DATABASE_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,
    serviceVersion: parsed.SERVICE_VERSION,

    accessToken: {
      secretKey: parsed.ACCESS_TOKEN_SECRET_KEY ?? generateSecureToken(32),
      algorithm: parsed.ACCESS_TOKEN_ALGORITHM,
      expireMinutes: parsed.ACCESS_TOKEN_EXPIRE_MINUTES,
    },

    bcryptCost: parsed.BCRYPT_COST,

    seed: {
      enabled: parsed.SEED_ON_START,
      superuserId: parsed.SUPERUSER,
      superuserPassword: parsed.SUPERUSER_PASSWORD,
    },

    corsOrigins: Array.from(new Set([...parsed.CORS_ORIGINS, parsed.FRONTEND_HOST.replace(/\/+$/, '')])),
  };
}
