import dotenv from 'dotenv';
import { ConfigError } from '../core/errors.js';
import { configSchema } from './schema.js';
import type { AppConfig } from './types.js';

dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || '.env' });

/** Validates `env`, which defaults to `process.env` with `.env` already applied. */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Config validation failed: ${details}`, { issues: parsed.error.issues.length });
  }
  return parsed.data;
};
