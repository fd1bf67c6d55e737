import { z } from 'zod';

// Environment values arrive as strings; parse them into bounded integers
const integer = (fallback: number) =>
  z
    .string()
    .default(String(fallback))
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int());

const decimal = (fallback: number) =>
  z
    .string()
    .default(String(fallback))
    .transform((val) => Number(val))
    .pipe(z.number());

/**
 * Environment variables schema using Zod.
 *
 * This schema validates and transforms environment variables at startup,
 * ensuring all required values are present and correctly typed.
 */
export const envSchema = z
  .object({
    // Application
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: integer(3000).pipe(z.number().positive().max(65535)),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    // Persistence
    PERSISTENCE_DRIVER: z.enum(['memory', 'mongodb']).default('memory'),
    MONGO_URI: z.url({ message: 'MONGO_URI must be a valid URL' }).optional(),

    // AI tutor (Anthropic)
    ANTHROPIC_API_KEY: z.string().optional(),
    TUTOR_MODEL: z.string().nonempty().default('claude-sonnet-4-20250514'),
    TUTOR_MAX_TOKENS: integer(1024).pipe(z.number().positive()),
    TUTOR_TIMEOUT_MS: integer(30000).pipe(z.number().positive()),
    TUTOR_MAX_RETRIES: integer(3).pipe(z.number().min(1)),
    TUTOR_RETRY_BASE_DELAY_MS: integer(1000).pipe(z.number().min(0)),
    TUTOR_CONTEXT_WINDOW: integer(20).pipe(z.number().positive()),

    // Spaced repetition
    REVIEW_MIN_INTERVAL_HOURS: decimal(24).pipe(z.number().positive()),
    REVIEW_GROWTH_FACTOR: decimal(2).pipe(z.number().min(1)),
    REVIEW_MAX_INTERVAL_DAYS: decimal(120).pipe(z.number().positive()),
    REVIEW_MASTERY_STREAK: integer(4).pipe(z.number().positive()),

    // Rate limiting
    THROTTLE_TTL_MS: integer(60000).pipe(z.number().positive()),
    THROTTLE_LIMIT: integer(100).pipe(z.number().positive()),
  })
  .superRefine((env, ctx) => {
    if (env.PERSISTENCE_DRIVER === 'mongodb' && !env.MONGO_URI) {
      ctx.addIssue({
        code: 'custom',
        path: ['MONGO_URI'],
        message: 'MONGO_URI is required when PERSISTENCE_DRIVER is mongodb',
      });
    }
    if (env.REVIEW_MAX_INTERVAL_DAYS * 24 < env.REVIEW_MIN_INTERVAL_HOURS) {
      ctx.addIssue({
        code: 'custom',
        path: ['REVIEW_MAX_INTERVAL_DAYS'],
        message: 'REVIEW_MAX_INTERVAL_DAYS must not be shorter than REVIEW_MIN_INTERVAL_HOURS',
      });
    }
  });

/**
 * Inferred TypeScript type from the env schema.
 * Use this for type-safe access to environment variables.
 */
export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates environment variables using Zod schema.
 *
 * Used by NestJS ConfigModule.forRoot() to validate and transform
 * environment variables at application startup.
 *
 * @param config - Raw environment variables from process.env
 * @returns Validated and transformed configuration
 * @throws Error listing every invalid variable
 */
export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    throw new Error(
      `\nEnvironment validation failed:\n${errors}\n\nPlease check your .env file or environment variables.`,
    );
  }

  return result.data;
}
