// Centralized engine configuration. Parses and validates process.env once
// on first import and exposes a typed, runtime-validated config object.

import dotenv from 'dotenv';
import {
  EnvSchema,
  LogFormat,
  LogLevel,
  NodeEnv,
  RawEnv,
  getEffectiveNodeEnv,
  isTest,
  parseEnv,
} from './env';

export interface EngineConfig {
  nodeEnv: NodeEnv;
  isTest: boolean;
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
}

function toEngineConfig(data: RawEnv): EngineConfig {
  const nodeEnv = getEffectiveNodeEnv(data);

  return {
    nodeEnv,
    isTest: isTest(nodeEnv),
    logging: {
      level: data.QUORUM_LOG_LEVEL,
      format: data.QUORUM_LOG_FORMAT,
    },
  };
}

function formatEnvErrors(errors: Array<{ path: string; message: string }> = []): string {
  return errors.map((error) => `  - ${error.path || 'root'}: ${error.message}`).join('\n');
}

/**
 * Build a config object from a raw environment. Throws with one line per
 * invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): EngineConfig {
  const envResult = parseEnv(env);
  if (!envResult.success || !envResult.data) {
    throw new Error(`Invalid environment configuration:\n${formatEnvErrors(envResult.errors)}`);
  }

  return toEngineConfig(envResult.data);
}

/**
 * Like {@link loadConfig}, but invalid variables are reported on stderr and
 * replaced by their defaults. Used for the process-wide config.
 */
export function loadConfigWithDefaults(
  env: Record<string, string | undefined> = process.env
): EngineConfig {
  const envResult = parseEnv(env);
  if (envResult.success && envResult.data) {
    return toEngineConfig(envResult.data);
  }

  console.warn(
    `Invalid environment configuration, using defaults:\n${formatEnvErrors(envResult.errors)}`
  );
  const invalid = new Set((envResult.errors ?? []).map((error) => error.path));
  const valid = Object.fromEntries(Object.entries(env).filter(([name]) => !invalid.has(name)));
  return toEngineConfig(EnvSchema.parse(valid));
}

// Load .env into process.env before we read anything from it.
dotenv.config();

export const config: EngineConfig = loadConfigWithDefaults();
