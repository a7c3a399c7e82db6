import { z } from 'zod';

const booleanFlag = z.enum(['true', 'false']).optional();

const baseSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().optional(),
  API_PREFIX: z
    .string()
    .regex(/^[a-z0-9-]+$/, 'API_PREFIX must be a single lowercase path segment')
    .default('api'),
  LOG_LEVEL: z.string().optional(),

  DATABASE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
  DATABASE_URL: z.string().url({ message: 'DATABASE_URL must be a valid URL' }).optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),

  JWT_ACCESS_SECRET: z.string().min(10, 'JWT_ACCESS_SECRET is required'),
  JWT_REFRESH_SECRET: z.string().min(10, 'JWT_REFRESH_SECRET is required'),
  JWT_ACCESS_TTL: z.coerce.number().int().positive().default(900),
  JWT_REFRESH_TTL: z.coerce.number().int().positive().default(1209600),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),

  RATE_LIMIT_TTL: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),

  REDIS_ENABLED: booleanFlag,
  REDIS_URL: z.string().url().optional(),

  LOYALTY_EARN_PERCENT: z.coerce.number().int().nonnegative().default(10),
  LOYALTY_EXPIRY_DAYS: z.coerce.number().int().positive().default(365),
  LOYALTY_EXPIRING_SOON_DAYS: z.coerce.number().int().positive().default(30),
  ORDER_NUMBER_PREFIX: z
    .string()
    .regex(/^[A-Z]{2,8}$/, 'ORDER_NUMBER_PREFIX must be 2-8 uppercase letters')
    .default('ORD'),
  ORDER_MAX_ITEM_QUANTITY: z.coerce.number().int().positive().max(100_000).default(1000),

  ALLOWED_ORIGINS: z.string().optional(),
  SWAGGER_ENABLED: booleanFlag,
  SENTRY_DSN: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).optional(),
});

export type EnvShape = z.infer<typeof baseSchema>;

export function validateEnv(config: Record<string, unknown>) {
  const parsed = baseSchema
    .superRefine((env, ctx) => {
      if (env.DATABASE_DRIVER === 'postgres' && !env.DATABASE_URL) {
        ctx.addIssue({ code: 'custom', message: 'DATABASE_URL is required when DATABASE_DRIVER is postgres' });
      }
      if (env.REDIS_ENABLED === 'true' && !env.REDIS_URL) {
        ctx.addIssue({ code: 'custom', message: 'REDIS_URL is required when REDIS_ENABLED is true' });
      }
      if (env.LOYALTY_EXPIRING_SOON_DAYS > env.LOYALTY_EXPIRY_DAYS) {
        ctx.addIssue({
          code: 'custom',
          path: ['LOYALTY_EXPIRING_SOON_DAYS'],
          message: 'must not exceed LOYALTY_EXPIRY_DAYS',
        });
      }
      if (env.NODE_ENV === 'production' && env.DATABASE_DRIVER === 'memory') {
        ctx.addIssue({ code: 'custom', message: 'DATABASE_DRIVER=memory is not allowed in production' });
      }
    })
    .safeParse(config);

  if (!parsed.success) {
    const formatted = parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${formatted}`);
  }

  return parsed.data;
}
