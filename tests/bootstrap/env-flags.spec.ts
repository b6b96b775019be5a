import { describe, expect, it } from '@jest/globals';

import { isDebugLogEnabled, resolveBoolFromEnv, resolveProfileFromEnv } from '../../src/bootstrap/index.js';

describe('environment switches', () => {
  it('reads boolean flags with a fallback', () => {
    expect(resolveBoolFromEnv(' Yes ', false)).toBe(true);
    expect(resolveBoolFromEnv('off', true)).toBe(false);
    expect(resolveBoolFromEnv('maybe', true)).toBe(true);
    expect(resolveBoolFromEnv(undefined, false)).toBe(false);
  });

  it('prefers DEVSHELL_DEBUG over DEBUG', () => {
    expect(isDebugLogEnabled({ DEBUG: '1' })).toBe(true);
    expect(isDebugLogEnabled({ DEVSHELL_DEBUG: '0', DEBUG: '1' })).toBe(false);
    expect(isDebugLogEnabled({})).toBe(false);
  });

  it('reads the profile override', () => {
    expect(resolveProfileFromEnv({ DEVSHELL_PROFILE: ' test ' })).toBe('test');
    expect(resolveProfileFromEnv({ DEVSHELL_PROFILE: '  ' })).toBeUndefined();
  });
});
