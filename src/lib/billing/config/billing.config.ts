// src/lib/billing/config/billing.config.ts
import dotenv from 'dotenv';
import { PoolConfig } from 'pg';
import { z } from 'zod';
import { GatewayConfig } from '../gateway/types';
import { RateLimitOptions } from '../rate-limit/types';
import { ConfigurationError } from '../utils/error';
import { LogLevel } from '../utils/logger';
import { DecimalAmount, normalizeAmount, toCents } from '../utils/money';
import { DEFAULT_MAX_AMOUNT, currencySchema, formatZodIssues } from '../utils/validation';

export type StorageDriver = 'postgres' | 'memory';

export interface BillingConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  logLevel: LogLevel;
  storage: StorageDriver;
  gateway: {
    provider: string;
    config: GatewayConfig;
  };
  database: PoolConfig;
  rateLimit: RateLimitOptions;
  jobs: {
    enabled: boolean;
    billingIntervalMs: number;
    cleanupIntervalMs: number;
  };
}

// Blank variables (KEY= in .env) count as unset
function fromEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (value === '' ? undefined : value), schema);
}

const positiveInt = (fallback: number) => fromEnv(z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  NODE_ENV: fromEnv(z.enum(['development', 'test', 'production']).default('development')),
  PORT: positiveInt(3001),
  LOG_LEVEL: fromEnv(z.enum(['debug', 'info', 'warn', 'error']).default('info')),
  STORAGE: fromEnv(z.enum(['postgres', 'memory']).default('postgres')),

  GATEWAY_PROVIDER: fromEnv(z.string().default('stripe')),
  GATEWAY_API_KEY: fromEnv(z.string({ required_error: 'GATEWAY_API_KEY is required' })),
  GATEWAY_ENVIRONMENT: fromEnv(z.enum(['sandbox', 'production']).default('sandbox')),
  GATEWAY_TIMEOUT_MS: positiveInt(30000),
  DEFAULT_CURRENCY: fromEnv(currencySchema.default('USD')),
  MAX_CHARGE_AMOUNT: fromEnv(
    z
      .string()
      .default(DEFAULT_MAX_AMOUNT)
      .transform((value, ctx): DecimalAmount => {
        const amount = normalizeAmount(value);
        if (amount === null || toCents(amount) <= 0) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'MAX_CHARGE_AMOUNT must be a positive decimal' });
          return z.NEVER;
        }
        return amount;
      })
  ),

  DB_HOST: fromEnv(z.string().default('localhost')),
  DB_PORT: positiveInt(5432),
  DB_NAME: fromEnv(z.string().default('billing')),
  DB_USER: fromEnv(z.string().default('postgres')),
  DB_PASSWORD: z.string().default(''),
  DB_POOL_SIZE: positiveInt(10),

  RATE_LIMIT_MAX: positiveInt(100),
  RATE_LIMIT_WINDOW_MS: positiveInt(3600 * 1000),

  JOBS_ENABLED: fromEnv(z.enum(['true', 'false']).default('true')),
  BILLING_INTERVAL_MS: positiveInt(60 * 60 * 1000),
  VAULT_CLEANUP_INTERVAL_MS: positiveInt(24 * 60 * 60 * 1000)
});

/**
 * Parses the environment into a typed configuration. Every problem is
 * reported at once in the thrown ConfigurationError.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): BillingConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const fields = formatZodIssues(result.error);
    throw new ConfigurationError(`Invalid configuration: ${Object.keys(fields).join(', ')}`, { fields });
  }

  const env = result.data;

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    storage: env.STORAGE,
    gateway: {
      provider: env.GATEWAY_PROVIDER,
      config: {
        apiKey: env.GATEWAY_API_KEY,
        environment: env.GATEWAY_ENVIRONMENT,
        timeoutMs: env.GATEWAY_TIMEOUT_MS,
        defaultCurrency: env.DEFAULT_CURRENCY,
        maxAmount: env.MAX_CHARGE_AMOUNT
      }
    },
    database: {
      host: env.DB_HOST,
      port: env.DB_PORT,
      database: env.DB_NAME,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      max: env.DB_POOL_SIZE,
      idleTimeoutMillis: 30000
    },
    rateLimit: {
      limit: env.RATE_LIMIT_MAX,
      windowMs: env.RATE_LIMIT_WINDOW_MS
    },
    jobs: {
      enabled: env.JOBS_ENABLED === 'true',
      billingIntervalMs: env.BILLING_INTERVAL_MS,
      cleanupIntervalMs: env.VAULT_CLEANUP_INTERVAL_MS
    }
  };
}

/** Loads `.env` into the process environment, then parses it. */
export function loadConfigFromEnvironment(): BillingConfig {
  dotenv.config();
  return loadConfig(process.env);
}
