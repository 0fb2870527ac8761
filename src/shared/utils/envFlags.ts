// Shared helpers for reading environment flags.

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
 * Returns true if running inside a Jest worker process.
 * This is useful for detecting test runtime even when NODE_ENV might be
 * configured differently (e.g., NODE_ENV=development in Jest).
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

/**
 * Parse a live/test mode switch.
 *
 * - YES/TRUE/1/ON → true (test mode)
 * - NO/FALSE/0/OFF → false (live mode)
 * - anything else, including unset → null (legacy, unsuffixed names)
 */
export function parseModeFlag(raw: string | undefined): boolean | null {
  const value = (raw ?? '').trim().toUpperCase();
  if (['YES', 'TRUE', '1', 'ON'].includes(value)) {
    return true;
  }
  if (['NO', 'FALSE', '0', 'OFF'].includes(value)) {
    return false;
  }
  return null;
}
