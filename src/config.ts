import { z } from 'zod';
import dotenv from 'dotenv';
import type { LogLevel } from './infra/logging/logger.js';
import { DEFAULT_PASSWORD_MIN_LENGTH } from './domain/auth/validation.js';

export interface AppConfig {
  apiBaseUrl: string;
  requestTimeoutMs: number;
  passwordMinLength: number;
  sessionFile: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const envSchema = z.object({
  AUTH_API_BASE_URL: z.string().url().default('http://localhost:3005/api'),
  AUTH_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  AUTH_PASSWORD_MIN_LENGTH: z.coerce.number().int().min(1).default(DEFAULT_PASSWORD_MIN_LENGTH),
  AUTH_SESSION_FILE: z.string().min(1).default('.session/session.json'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

/**
 * Read configuration from the environment (and .env when present).
 * Pass an explicit env to skip .env loading.
 */
export function loadConfig(env?: NodeJS.ProcessEnv): AppConfig {
  if (!env) {
    dotenv.config();
  }
  const source = env ?? process.env;

  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  const parsed = result.data;
  return {
    apiBaseUrl: parsed.AUTH_API_BASE_URL.replace(/\/+$/, ''),
    requestTimeoutMs: parsed.AUTH_REQUEST_TIMEOUT_MS,
    passwordMinLength: parsed.AUTH_PASSWORD_MIN_LENGTH,
    sessionFile: parsed.AUTH_SESSION_FILE,
    logLevel: parsed.LOG_LEVEL,
  };
}
