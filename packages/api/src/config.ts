import { z } from 'zod';
import { ValidationError } from '@ignis/core';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const ApiEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  RULES_PATH: z.string().min(1).default('rules/fire-risk.yaml'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ApiConfig {
  port: number;
  host: string;
  rulesPath: string;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = ApiEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new ValidationError(`Invalid environment: ${field} ${issue.message}`, field, {
      issues: parsed.error.flatten().fieldErrors,
    });
  }

  return {
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    rulesPath: parsed.data.RULES_PATH,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
