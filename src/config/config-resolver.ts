/**
 * Config Resolver
 *
 * Ordered fallback lookup: sources are asked in order and the first one with a
 * value wins. Sources never throw; they answer NO_VALUE instead.
 */

export const NO_VALUE: unique symbol = Symbol('no_value');

export type NoValue = typeof NO_VALUE;

export type Lookup<T> = T | NoValue;

export interface ConfigSource<T> {
  readonly name: string;
  lookup(key: string): Lookup<T>;
}

export type ResolvedConfig<T> = {
  value: T;
  source: string;
};

export type ResolutionDiagnostics = (message: string) => void;

export function hasValue<T>(result: Lookup<T>): result is T {
  return result !== NO_VALUE;
}

/**
 * Returns the first value found, with the name of the source that produced it.
 */
export function firstValue<T>(
  sources: ReadonlyArray<ConfigSource<T>>,
  key: string,
  diagnostics?: ResolutionDiagnostics
): ResolvedConfig<T> | undefined {
  for (const source of sources) {
    const result = source.lookup(key);
    if (hasValue(result)) {
      diagnostics?.(`Found ${key} from ${source.name}.`);
      return { value: result, source: source.name };
    }
  }
  return undefined;
}

export function resolveOr<T>(
  sources: ReadonlyArray<ConfigSource<T>>,
  key: string,
  fallback: T,
  diagnostics?: ResolutionDiagnostics
): T {
  const resolved = firstValue(sources, key, diagnostics);
  return resolved ? resolved.value : fallback;
}

/**
 * A source backed by a plain record. `read` converts the raw entry, or returns undefined to pass.
 */
export function recordSource<T>(
  name: string,
  record: Record<string, unknown> | undefined,
  read: (raw: unknown) => T | undefined
): ConfigSource<T> {
  return {
    name,
    lookup: (key) => {
      if (!record || !Object.prototype.hasOwnProperty.call(record, key)) {
        return NO_VALUE;
      }
      const value = read(record[key]);
      return value === undefined ? NO_VALUE : value;
    }
  };
}

/**
 * A source holding a single value, given for any key.
 */
export function fixedSource<T>(name: string, value: T | undefined): ConfigSource<T> {
  return {
    name,
    lookup: () => (value === undefined ? NO_VALUE : value)
  };
}
