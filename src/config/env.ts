import 'dotenv/config';
import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

/** Boolean flag; unset, empty or unrecognised values fall back to the default */
function envBoolean(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined) return defaultValue;
      if (TRUE_VALUES.has(value)) return true;
      if (FALSE_VALUES.has(value)) return false;
      return defaultValue;
    });
}

/** Optional string where an empty value counts as unset */
function envOptional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema.optional());
}

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace'])
    .default('info'),
  // Flat-file audit trail
  SAVE_TO_FILE: envBoolean(true),
  DATA_DIR: envOptional(z.string()).transform((value) => value ?? './data'),
  // Loki push endpoint
  LOKI_ENABLED: envBoolean(false),
  LOKI_PUSH_URL: envOptional(z.string().url()),
  LOKI_USERNAME: envOptional(z.string()),
  LOKI_PASSWORD: envOptional(z.string()),
  LOKI_JOB: z.string().default(''),
  LOKI_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    console.error(
      'Invalid environment variables:',
      result.error.flatten().fieldErrors,
    );
    process.exit(1);
  }
  return result.data;
}
