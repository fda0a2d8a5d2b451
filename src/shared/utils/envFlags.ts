// Shared helpers for reading environment flags. Centralised so the engine
// and its hosts agree on what counts as "enabled".

type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * says otherwise.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

/**
 * When QUORUM_EFFECT_TRACE is set, applied-play log entries also list the
 * suffocated and converted squares, not just their counts.
 */
export function isEffectTraceEnabled(): boolean {
  return flagEnabled('QUORUM_EFFECT_TRACE');
}
