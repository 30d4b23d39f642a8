// Import zod for runtime validation of the process environment
import { z } from 'zod';

const booleanish = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : value.trim().toLowerCase() !== 'false'));

/**
 * Environment variable schema
 * Defaults live here so every consumer of ConfigService sees the same values
 */
const envSchema = z.object({
  // Node environment (development, production, test)
  NODE_ENV: z.string().optional(),
  // HTTP server port
  PORT: z.coerce.number().int().positive().default(3000),
  SWAGGER_ENABLED: booleanish.default(true),

  // Backing store: MySQL in production, process-owned maps for local runs
  DATA_STORE: z.enum(['mysql', 'memory']).default('mysql'),
  DB_HOST: z.string().min(1).optional(),
  DB_PORT: z.coerce.number().int().positive().default(3306),
  DB_USER: z.string().min(1).optional(),
  DB_PASSWORD: z.string().optional(),
  DB_NAME: z.string().min(1).optional(),
  DB_SSL: booleanish.default(true),
  DB_SSL_REJECT_UNAUTHORIZED: booleanish.default(true),
  DB_SSL_CA_PATH: z.string().min(1).optional(),
  // JSON file with users/exams loaded into the memory store at startup
  MEMORY_SEED_PATH: z.string().min(1).optional(),

  // Session tokens (HS256)
  TOKEN_SECRET: z.string().min(32),
  TOKEN_ISSUER: z.string().min(1).default('exam-results-api'),
  TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(1800),
  TOKEN_CLOCK_LEEWAY_SECONDS: z.coerce.number().int().nonnegative().default(5),
  TOKEN_REFRESH_GRACE_SECONDS: z.coerce.number().int().nonnegative().default(0),

  // bcrypt cost factor
  PASSWORD_HASH_ROUNDS: z.coerce.number().int().min(4).max(15).default(12)
});

// Export inferred TypeScript type from the schema
export type AppEnv = z.infer<typeof envSchema>;

/**
 * Validate environment variables at application startup
 * @param config - Raw environment variable object from process.env
 * @returns Validated configuration with defaults applied
 * @throws Error naming the offending keys (never their values)
 */
export function validateEnv(config: Record<string, unknown>): AppEnv {
  try {
    const parsed = envSchema.parse(config);

    if (parsed.DATA_STORE === 'mysql') {
      const missing: string[] = [];
      if (!parsed.DB_HOST) missing.push('DB_HOST');
      if (!parsed.DB_USER) missing.push('DB_USER');
      if (!parsed.DB_NAME) missing.push('DB_NAME');

      if (missing.length > 0) {
        throw new Error(`Invalid environment configuration. Missing/invalid: ${missing.join(', ')}.`);
      }
    }

    return parsed;
  } catch (err: unknown) {
    if (err instanceof z.ZodError) {
      const keys = Array.from(
        new Set(
          err.issues
            .map((issue) => issue.path[0])
            .filter((k): k is string => typeof k === 'string' && k.length > 0)
        )
      );

      const keyList = keys.length > 0 ? keys.join(', ') : 'unknown keys';
      throw new Error(
        `Invalid environment configuration. Missing/invalid: ${keyList}. ` +
          `Create apps/exam-api/.env.local from apps/exam-api/.env.example.`
      );
    }
    throw err;
  }
}
