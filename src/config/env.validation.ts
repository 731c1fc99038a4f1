import { z } from 'zod';

/**
 * Environment schema
 *
 * Validated once at startup by ConfigModule. Services read the parsed values
 * through ConfigService, so defaults live here and nowhere else.
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGIN: z.string().min(1).default('http://localhost:5173'),

  /** 'file' writes one CSV per peer, 'memory' keeps records in-process */
  BALANCE_STORE: z.enum(['file', 'memory']).default('file'),
  BALANCE_DATA_DIR: z.string().min(1).default('./data'),

  PRICE_API_URL: z
    .string()
    .url()
    .default('https://api.coingecko.com/api/v3/simple/price'),
  PRICE_ASSET_ID: z.string().min(1).default('wrapped-quil'),
  PRICE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  PRICE_RETRIES: z.coerce.number().int().min(0).max(3).default(1),
});

export type Env = z.infer<typeof envSchema>;

/**
 * ConfigModule `validate` hook
 *
 * Throws with every offending variable listed so a bad deployment fails
 * before the HTTP server binds.
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}
