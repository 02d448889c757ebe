/**
 * Environment Configuration
 *
 * Parsed once at import time. `.env` is loaded by the entrypoint
 * (`import 'dotenv/config'`) before this module evaluates.
 */

import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  MONGO_URI: z.string().min(1).default('mongodb://localhost:27017'),
  MONGO_DB: z.string().min(1).default('wildvision'),
  MONGO_COLLECTION: z.string().min(1).default('observations'),
  MONGO_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // Unset means every protected route answers 401
  API_KEY: z.string().min(1).optional(),

  CORS_ORIGINS: z.string().default('https://www.wildvisionhunt.com'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export type Env = z.infer<typeof EnvSchema>;

export class EnvConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid environment configuration: ${issues.join('; ')}`);
    this.name = 'EnvConfigError';
    this.issues = issues;
  }
}

/**
 * Validate a raw environment map. Empty strings count as unset so that
 * `PORT=` in a .env file falls back to the default.
 */
export function loadEnv(source: NodeJS.ProcessEnv): Env {
  const raw: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== '') raw[key] = value;
  }

  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EnvConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/**
 * `*` allows any origin, otherwise a comma-separated allow-list.
 */
export function parseCorsOrigins(value: string): true | string[] {
  if (value.trim() === '*') return true;
  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

export const env: Env = loadEnv(process.env);
