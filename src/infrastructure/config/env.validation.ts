import { z } from 'zod';

/**
 * Process environment, parsed once at startup. Numeric settings arrive as
 * strings and leave as numbers.
 */
export const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z
    .string()
    .default('3000')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive().max(65535)),

  // MongoDB (orders, tracking, food catalog)
  MONGO_URI: z.url({ message: 'MONGO_URI must be a valid URL' }),

  // Rate limiting for the webhook and order endpoints
  THROTTLE_TTL_MS: z
    .string()
    .default('60000')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive()),
  THROTTLE_LIMIT: z
    .string()
    .default('120')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive()),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * `validate` hook for ConfigModule.forRoot(). Lists every failing variable
 * in one error so a misconfigured deployment fails on the first boot.
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
