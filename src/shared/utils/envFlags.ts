// Shared helpers for reading environment flags from both the Node host and
// any bundle that shims process.env. The engine core never reads the
// environment itself; hosts use these to decide what to pass in.

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
 * Returns true if running in a test environment (NODE_ENV === 'test').
 */
export function isTestEnvironment(): boolean {
  return readEnv('NODE_ENV') === 'test';
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * has been set to something else.
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
 * Turn-level engine tracing. When BG_ENGINE_TRACE=1 the host hands the
 * engine a logger at debug level even if LOG_LEVEL is higher.
 */
export function isEngineTraceEnabled(): boolean {
  return flagEnabled('BG_ENGINE_TRACE');
}
