/**
 * Environment variable validation
 *
 * Validates required environment variables at startup and fails fast
 * if any are missing. This prevents silent failures later in the app.
 */

import { logError, logInfo, logWarn } from "../utils/logger";

export interface EnvConfig {
  // Required
  JWT_SECRET: string;

  // Optional with defaults
  PORT: number;
  NODE_ENV: 'development' | 'production' | 'test';

  // Optional features
  DATABASE_URL?: string;
  PORTAL_ADMIN_USERNAME?: string;
  PORTAL_ADMIN_PASSWORD?: string;
}

const REQUIRED_VARS = [
  'JWT_SECRET',
] as const;

const OPTIONAL_VARS_WITH_DEFAULTS = {
  PORT: '5000',
  NODE_ENV: 'development',
} as const;

const NODE_ENVS: ReadonlyArray<EnvConfig['NODE_ENV']> = ['development', 'production', 'test'];

/**
 * Validates that all required environment variables are set.
 * Call this at app startup before any other initialization.
 *
 * @throws Error if any required variables are missing
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): void {
  const missing: string[] = [];
  const warnings: string[] = [];

  for (const varName of REQUIRED_VARS) {
    const value = env[varName];
    if (!value || value.trim() === '') {
      missing.push(varName);
    }
  }

  // Check for weak JWT secret in production
  if (env.NODE_ENV === 'production') {
    const jwtSecret = env.JWT_SECRET || '';
    if (jwtSecret.length < 32) {
      warnings.push('JWT_SECRET should be at least 32 characters in production');
    }
  }

  if (!env.PORTAL_ADMIN_USERNAME || !env.PORTAL_ADMIN_PASSWORD) {
    warnings.push('PORTAL_ADMIN_USERNAME and PORTAL_ADMIN_PASSWORD not set - admin account will not be auto-created');
  }

  if (!env.DATABASE_URL) {
    warnings.push('DATABASE_URL not set - chat history, feedback and concerns are kept in memory');
  }

  for (const warning of warnings) {
    logWarn("env_warning", { warning });
  }

  if (missing.length > 0) {
    const message = `Missing required environment variables:\n${missing.map(v => `  - ${v}`).join('\n')}`;
    logError("startup_failed", { missing });
    throw new Error(message);
  }

  logInfo("env_validated");
}

function parseNodeEnv(raw: string | undefined): EnvConfig['NODE_ENV'] {
  return NODE_ENVS.find((candidate) => candidate === raw) ?? OPTIONAL_VARS_WITH_DEFAULTS.NODE_ENV;
}

/**
 * Get a validated environment configuration object.
 * Only call after validateEnv() has succeeded.
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    JWT_SECRET: requireEnvVar('JWT_SECRET', env),
    PORT: parseInt(env.PORT || OPTIONAL_VARS_WITH_DEFAULTS.PORT, 10),
    NODE_ENV: parseNodeEnv(env.NODE_ENV),
    DATABASE_URL: env.DATABASE_URL || undefined,
    PORTAL_ADMIN_USERNAME: env.PORTAL_ADMIN_USERNAME || undefined,
    PORTAL_ADMIN_PASSWORD: env.PORTAL_ADMIN_PASSWORD || undefined,
  };
}

/**
 * Type-safe required environment variable getter.
 * Throws if the variable is not set. Use after validateEnv().
 */
export function requireEnvVar(name: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[name];
  if (!value || value.trim() === '') {
    throw new Error(`Required environment variable ${name} is not set`);
  }
  return value;
}
