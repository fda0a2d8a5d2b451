/**
 * Environment Variable Schema and Validation
 *
 * Defines the Zod schema for every environment variable the engine reads
 * and validates them into a typed object.
 */

import { z } from 'zod';
import { isJestRuntime } from '../utils/envFlags';

/**
 * Node environment schema - supports development, staging, production, and test.
 */
export const NodeEnvSchema = z.enum(['development', 'staging', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const EnvSchema = z.object({
  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Minimum level written by the engine logger */
  QUORUM_LOG_LEVEL: LogLevelSchema.default('info'),

  /** Console output format: structured JSON or coloured single lines */
  QUORUM_LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Include effect squares in applied-play log entries (see envFlags) */
  QUORUM_EFFECT_TRACE: z.string().optional(),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Under Jest the effective environment is always 'test', whatever NODE_ENV
 * a .env file supplied.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
