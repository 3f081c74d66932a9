import dotenv from 'dotenv';
import { z } from 'zod';
import { InvalidArgumentError } from './errors.js';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .default('warn'),
  NODE_ENV: z.string().optional(),
});

export interface AppConfig {
  logLevel: LogLevel;
  production: boolean;
}

let dotenvLoaded = false;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env && !dotenvLoaded) {
    dotenv.config();
    dotenvLoaded = true;
  }
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') || 'environment';
    throw new InvalidArgumentError(
      `Invalid ${variable}: ${issue?.message ?? 'unrecognised value'}. Expected one of: ${LOG_LEVELS.join(', ')}.`,
      variable,
    );
  }
  return {
    logLevel: parsed.data.LOG_LEVEL,
    production: parsed.data.NODE_ENV === 'production',
  };
}
