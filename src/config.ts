import { z } from 'zod';

const isTestRun = Boolean(process.env.VITEST) || process.env.NODE_ENV === 'test';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default(isTestRun ? 'warn' : 'info'),
  OPTIMIZER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  SAMPLE_DATA_SEED: z.coerce.number().int().default(42),
  TOP_N_DEFAULT: z.coerce.number().int().positive().default(5),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment: ${detail}`);
  }
  return parsed.data;
}

export const config = loadConfig();
export const isTest = isTestRun;
