// Helpers for reading environment flags without touching process.env
// directly at every call site.

export function readEnv(name: string): string | undefined {
  const value = process.env[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Returns true if running inside a Jest worker process.
 * This catches the test runtime even when NODE_ENV was set to something
 * else by a local .env file.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}
