import 'dotenv/config';
import { z } from 'zod';

/**
 * Environment configuration, validated once at start-up
 */
const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3003),
  FRONTEND_URL: z.string().url().optional(),
  MAX_UPLOAD_MB: z.coerce.number().positive().max(10).default(5),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_INTENT_MODEL: z.string().default('gpt-4o-mini'),
  INTENT_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  INTENT_CLASSIFIER: z.enum(['auto', 'keyword']).default('auto'),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank entries in .env count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const details = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return result.data;
}

export function isOracleConfigured(config: AppConfig): boolean {
  return Boolean(config.OPENAI_API_KEY) && config.INTENT_CLASSIFIER === 'auto';
}

export const config = loadConfig();
