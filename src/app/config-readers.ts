/**
 * Config Readers
 *
 * Utility functions for reading config values.
 */

function readString(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }
  return undefined;
}

export { readString };
