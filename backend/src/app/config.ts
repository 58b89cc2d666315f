/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - The parsed AppConfig is built ONCE at start-up and passed down explicitly.
 *   Nothing reads process.env after this point (except the logger bootstrap).
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv / storage driver are unions, so invalid values ('prod', 'sqlite')
 *   are caught at startup by Zod rather than silently falling through.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');
const StorageDriverSchema = z.enum(['postgres', 'memory']).default('postgres');

const BooleanStringSchema = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().default(3000),

    STORAGE_DRIVER: StorageDriverSchema,
    DATABASE_URL: z.string().min(1).optional(),
    REDIS_URL: z.string().min(1).optional(),

    // Logging / service identity
    LOG_LEVEL: z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),
    SERVICE_NAME: z.string().default('chapterhouse-backend'),

    BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

    // Session
    SESSION_TTL_SECONDS: z.coerce.number().int().min(300).max(604800).default(86400),

    // Compliance / invitations
    COMPLIANCE_GRACE_DAYS: z.coerce.number().int().min(1).max(365).default(90),
    INVITATION_TTL_DAYS: z.coerce.number().int().min(1).max(365).optional(),

    // Mail
    SMTP_URL: z.string().min(1).optional(),
    MAIL_FROM: z.string().min(1).default('Chapter Portal <no-reply@example.com>'),
    SITE_URL: z.string().url().default('http://localhost:3000'),
    CHAPTER_NAME: z.string().min(1).default('Chapter Portal'),

    // DEV seed bootstrap (idempotent)
    SEED_ON_START: BooleanStringSchema,
    SEED_ADMIN_USERNAME: z.string().min(3).default('admin'),
    SEED_ADMIN_EMAIL: z.string().email().default('admin@example.com'),
    SEED_ADMIN_PASSWORD: z.string().min(8).default('change-me-please'),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when STORAGE_DRIVER=postgres',
      });
    }
    if (env.NODE_ENV === 'production' && !env.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['REDIS_URL'],
        message: 'REDIS_URL is required in production',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type StorageDriver = z.infer<typeof StorageDriverSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  storage: {
    driver: StorageDriver;
    databaseUrl: string | null;
  };
  redisUrl: string | null;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  sessionTtlSeconds: number;

  compliance: {
    graceDays: number;
  };

  invitations: {
    /** Default lifetime of a new invitation. null = codes never expire unless an expiry is given. */
    defaultTtlDays: number | null;
  };

  mail: {
    smtpUrl: string | null;
    from: string;
    siteUrl: string;
    chapterName: string;
  };

  seed: {
    enabled: boolean;
    adminUsername: string;
    adminEmail: string;
    adminPassword: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    storage: {
      driver: parsed.STORAGE_DRIVER,
      databaseUrl: parsed.DATABASE_URL ?? null,
    },
    redisUrl: parsed.REDIS_URL ?? null,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,

    compliance: {
      graceDays: parsed.COMPLIANCE_GRACE_DAYS,
    },

    invitations: {
      defaultTtlDays: parsed.INVITATION_TTL_DAYS ?? null,
    },

    mail: {
      smtpUrl: parsed.SMTP_URL ?? null,
      from: parsed.MAIL_FROM,
      siteUrl: parsed.SITE_URL,
      chapterName: parsed.CHAPTER_NAME,
    },

    seed: {
      enabled: parsed.SEED_ON_START,
      adminUsername: parsed.SEED_ADMIN_USERNAME,
      adminEmail: parsed.SEED_ADMIN_EMAIL,
      adminPassword: parsed.SEED_ADMIN_PASSWORD,
    },
  };
}
