/**
 * Environment configuration
 *
 * Entry points load `.env` through `dotenv/config`; this module only
 * validates what ended up in `process.env`.
 */

import { z } from 'zod';
import { ConfigError } from '../common/errors.js';

const booleanFlag = z
  .string()
  .optional()
  .transform(v => v === 'true' || v === '1');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  DATA_MODE: z.enum(['STRICT', 'LENIENT']).default('STRICT'),

  EGRESS_MODE: z.enum(['direct', 'proxy']).default('direct'),
  PROXY_URL: z.string().url().optional(),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  STRATEGY_CONFIG_PATH: z.string().min(1).optional(),

  // CI runners have no local proxy
  CI: booleanFlag,
  GITHUB_ACTIONS: booleanFlag,
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }

  const env = parsed.data;
  if (env.EGRESS_MODE === 'proxy' && !env.PROXY_URL) {
    throw new ConfigError('EGRESS_MODE=proxy requires PROXY_URL');
  }
  return env;
}

export const env: Env = loadEnv();
