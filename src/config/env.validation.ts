import { z } from 'zod';

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === '') return fallback;
      const normalized = value.trim().toLowerCase();
      return normalized === '1' || normalized === 'true';
    });

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z
  .object({
    PORT: z.coerce
      .number({ invalid_type_error: 'port must be a number' })
      .int('port must be an integer')
      .min(1, 'port must be between 1 and 65535')
      .max(65535, 'port must be between 1 and 65535')
      .default(8080),

    STORAGE_BUCKET: z.string({ required_error: 'bucket is required' }).trim().min(1, 'bucket is required'),
    STORAGE_ACCESS_KEY: z
      .string({ required_error: 'access key is required' })
      .trim()
      .min(1, 'access key is required'),
    STORAGE_SECRET_KEY: z
      .string({ required_error: 'secret key is required' })
      .trim()
      .min(1, 'secret key is required'),
    STORAGE_URL: optionalString.pipe(z.string().url('storage URL must be a valid URL').optional()),
    STORAGE_ENDPOINT: z.string().trim().min(1).default('s3.amazonaws.com'),
    STORAGE_PORT: z.coerce.number().int().min(1).max(65535).default(443),
    STORAGE_USE_SSL: booleanFlag(true),
    STORAGE_REGION: z.string().trim().min(1).default('us-west-1'),
    STORAGE_CREATE_BUCKET: booleanFlag(false),

    CDN_URL: optionalString.pipe(
      z
        .string()
        .url('CDN URL must be a valid URL')
        .refine((value) => /^https?:\/\//i.test(value), 'CDN URL must use http or https')
        .transform((value) => value.replace(/\/+$/, ''))
        .optional()
    ),

    AUTH_USERNAME: optionalString,
    AUTH_PASSWORD: optionalString,
    PLAUSIBLE_DOMAIN: optionalString,

    TOKEN_LENGTH: z.coerce.number().int().min(1).max(43).default(5),
    CACHE_SIZE: positiveInt(128),
    SIGNED_URL_TTL_SECONDS: positiveInt(900),
    STORE_TIMEOUT_MS: positiveInt(30_000),

    RATE_LIMIT_TTL: positiveInt(60_000),
    RATE_LIMIT_MAX: positiveInt(100),
    TRUST_PROXY: z.coerce
      .number({ invalid_type_error: 'trusted proxy hops must be a number' })
      .int('trusted proxy hops must be an integer')
      .min(0, 'trusted proxy hops cannot be negative')
      .default(0)
  })
  .superRefine((env, ctx) => {
    if (Boolean(env.AUTH_USERNAME) !== Boolean(env.AUTH_PASSWORD)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AUTH_USERNAME'],
        message: 'username and password must be provided together'
      });
    }
  });

export type AppConfig = z.infer<typeof envSchema>;

/** `validate` hook for `ConfigModule.forRoot`. Lists every problem at once. */
export function validateEnv(raw: Record<string, unknown>): AppConfig {
  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }
  return parsed.data;
}
