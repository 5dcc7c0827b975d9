import { z } from 'zod';
import type { LogLevel } from '../observability/logger.js';
import { RcqueryError } from './errors.js';

const envSchema = z.object({
  RCQUERY_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['debug', 'info', 'warn', 'error']))
    .optional()
});

export interface EnvConfig {
  logLevel: LogLevel;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new RcqueryError({ code: 'CONFIG_ERROR', message: `Invalid environment: ${issues.join('; ')}` });
  }
  return { logLevel: parsed.data.RCQUERY_LOG_LEVEL ?? 'warn' };
}
