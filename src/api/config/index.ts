/**
 * Auth Configuration
 *
 * Values come from environment variables (a local .env file is loaded first).
 * This configuration contains no secrets: OAuth client IDs are public and
 * access tokens are obtained at runtime.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { API_DEFAULTS } from '../../shared/constants';

export interface AuthConfig {
  apiBaseUrl: string;
  timeoutMs: number;
  storageDir: string;
  oauthClientId: string | null;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
}

const envSchema = z.object({
  AUTH_API_URL: z.string().url().default(API_DEFAULTS.BASE_URL),
  AUTH_API_TIMEOUT_MS: z.coerce.number().int().positive().default(API_DEFAULTS.TIMEOUT_MS),
  AUTH_STORAGE_DIR: z.string().min(1).default(API_DEFAULTS.STORAGE_DIR),
  OAUTH_CLIENT_ID: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

/**
 * Load .env into process.env (existing variables win)
 */
export function loadEnvFile(path?: string): void {
  dotenv.config(path ? { path } : undefined);
}

/**
 * Build the auth configuration from an environment map.
 * Throws when a variable is present but invalid.
 */
export function loadAuthConfig(env: NodeJS.ProcessEnv = process.env): AuthConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`[AuthConfig] Invalid environment: ${issues}`);
  }

  const vars = parsed.data;
  return {
    apiBaseUrl: vars.AUTH_API_URL.replace(/\/+$/, ''),
    timeoutMs: vars.AUTH_API_TIMEOUT_MS,
    storageDir: vars.AUTH_STORAGE_DIR,
    oauthClientId: vars.OAUTH_CLIENT_ID || null,
    logLevel: vars.LOG_LEVEL,
  };
}
