import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const flag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => parseFlag(value, defaultValue));

/**
 * Truthy flags accept 1/true/yes/on, falsy ones 0/false/no/off.
 * Anything else (or unset) keeps the default.
 */
export function parseFlag(value: string | undefined, defaultValue: boolean): boolean {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) return defaultValue;
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return defaultValue;
}

export const envSchema = z.object({
  // LLM transport (OPTIONAL - without a key every collaborator takes its fallback)
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  GRYFFIN_MODEL: z.string().min(1).default('claude-sonnet-4-20250514'),

  // Final verification
  GRYFFIN_AUTO_RUN: flag(true),
  GRYFFIN_PERSIST_SERVERS: flag(false),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  LOG_DIR: z.string().optional(),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    result.error.errors.forEach((err) => {
      console.error(`  - ${err.path.join('.')}: ${err.message}`);
    });
    process.exit(1);
  }
  return result.data;
}

export const env = validateEnv();
