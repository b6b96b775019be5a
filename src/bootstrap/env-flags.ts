/**
 * Debug log switch
 *
 * Debug lines are printed only when DEVSHELL_DEBUG (or DEBUG) is truthy.
 */

function resolveBoolFromEnv(value: unknown, fallback: boolean): boolean {
  if (typeof value !== 'string') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

function isDebugLogEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return resolveBoolFromEnv(env.DEVSHELL_DEBUG ?? env.DEBUG, false);
}

function resolveProfileFromEnv(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const raw = env.DEVSHELL_PROFILE;
  return typeof raw === 'string' && raw.trim() ? raw.trim() : undefined;
}

export { isDebugLogEnabled, resolveBoolFromEnv, resolveProfileFromEnv };
