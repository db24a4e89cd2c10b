/**
 * Environment Variable Validation
 *
 * Validates and types all environment variables at startup using Zod.
 * This ensures invalid config values are caught early with clear error messages.
 */

import { z } from 'zod';
import { ACTION_TIMEOUT_MS, DEFAULT_SESSION_DURATION_MS } from '../constants.js';

/**
 * Input backend types
 */
const InputBackendSchema = z.enum(['vnc', 'mock']);

const portString = z
  .string()
  .regex(/^\d+$/)
  .transform(Number)
  .refine((port) => port > 0 && port < 65536, { message: 'Port must be between 1 and 65535' });

const positiveIntString = z
  .string()
  .regex(/^\d+$/)
  .transform(Number)
  .refine((value) => value > 0, { message: 'Must be greater than 0' });

/**
 * Environment variable schema with defaults and validation
 */
const envSchema = z.object({
  // Server
  PORT: portString.default('8255'),
  BIND_ADDRESS: z.string().min(1).default('0.0.0.0'),
  ALLOWED_ORIGINS: z.string().default(''),

  // Actions & sessions
  SESSION_DURATION_SECS: positiveIntString.default(String(DEFAULT_SESSION_DURATION_MS / 1000)),
  ACTION_TIMEOUT_MS: positiveIntString.default(String(ACTION_TIMEOUT_MS)),

  // Input backend
  INPUT_BACKEND: InputBackendSchema.default('vnc'),

  // VNC
  VNC_HOST: z.string().min(1).default('127.0.0.1'),
  VNC_PORT: portString.default('5900'),
  VNC_PASSWORD: z.string().optional(),
  VNC_CONNECT_TIMEOUT_MS: positiveIntString.default('30000'),
});

/**
 * Parsed and validated environment type
 */
export type ValidatedEnv = z.infer<typeof envSchema>;

export type InputBackend = z.infer<typeof InputBackendSchema>;

/**
 * Validate environment variables at startup.
 * Throws with detailed messages logged if validation fails.
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): ValidatedEnv {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error('[Config] Environment variable validation failed:');
    for (const issue of result.error.issues) {
      console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
    }
    throw new Error('Invalid environment configuration. See errors above.');
  }

  return result.data;
}

/**
 * Build the CONFIG object from validated environment variables.
 */
export function buildConfig(env: ValidatedEnv) {
  return {
    port: env.PORT,
    bindAddress: env.BIND_ADDRESS,
    allowedOrigins: env.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),

    sessionDurationMs: env.SESSION_DURATION_SECS * 1000,
    actionTimeoutMs: env.ACTION_TIMEOUT_MS,

    inputBackend: env.INPUT_BACKEND,

    vnc: {
      host: env.VNC_HOST,
      port: env.VNC_PORT,
      password: env.VNC_PASSWORD || undefined,
      connectTimeout: env.VNC_CONNECT_TIMEOUT_MS,
    },
  };
}

export type AppConfig = ReturnType<typeof buildConfig>;
