/**
 * Bootstrap Module
 *
 * Environment switches read once at process start.
 */

export { isDebugLogEnabled, resolveBoolFromEnv, resolveProfileFromEnv } from './env-flags.js';
