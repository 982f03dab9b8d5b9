import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const secondsList = z
  .string()
  .regex(/^\s*\d+(\s*,\s*\d+)*\s*$/, 'expected comma-separated seconds')
  .transform((value) => value.split(',').map((part) => Number(part.trim())));

export const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'staging', 'production'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace'])
    .default('info'),

  DATABASE_URL: z.string().url().optional(),
  DB_SYNCHRONIZE: booleanFlag.default('false'),

  REDIS_HOST: z.string().min(1).default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),

  DELIVERY_CONCURRENCY: z.coerce.number().int().min(1).max(500).default(10),
  DELIVERY_MAX_RETRIES: z.coerce.number().int().min(1).max(20).default(3),
  DELIVERY_RETRY_DELAYS: secondsList.default('0,5,15'),
  DELIVERY_DEFAULT_PRIORITY: z.coerce.number().int().min(1).default(5),
  DELIVERY_VISIBILITY_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(1000)
    .default(30000),
  DEAD_LETTER_RETENTION_DAYS: z.coerce.number().int().min(1).default(30),
  QUEUE_PURGE_MAX_AGE_HOURS: z.coerce.number().positive().default(24),

  WEBHOOK_TIMEOUT_MS: z.coerce.number().int().min(100).default(10000),
  WEBHOOK_USER_AGENT: z.string().min(1).default('lead-exchange-delivery/1.0'),

  EMAIL_PROVIDER: z.enum(['log', 'http']).default('log'),
  EMAIL_GATEWAY_URL: z.string().url().optional(),
  SMS_PROVIDER: z.enum(['log', 'http']).default('log'),
  SMS_GATEWAY_URL: z.string().url().optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Passed to `ConfigModule.forRoot({ validate })`; throws on invalid input.
 */
export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const env = parsed.data;
  if (env.EMAIL_PROVIDER === 'http' && !env.EMAIL_GATEWAY_URL) {
    throw new Error('EMAIL_GATEWAY_URL is required when EMAIL_PROVIDER=http');
  }
  if (env.SMS_PROVIDER === 'http' && !env.SMS_GATEWAY_URL) {
    throw new Error('SMS_GATEWAY_URL is required when SMS_PROVIDER=http');
  }
  return env;
}
