/**
 * Loadable units
 *
 * Compiles a CommonJS payload into a module object without touching the module
 * cache, then invokes one of its exports.
 */

import { createRequire } from 'node:module';
import path from 'node:path';
import vm from 'node:vm';

export type LoadableUnitHandle = {
  readonly filename: string;
  readonly exports: Record<string, unknown>;
};

type ModuleShim = {
  exports: unknown;
};

const WRAPPER_PARAMS = ['exports', 'require', 'module', '__filename', '__dirname'];

function asExports(value: unknown): Record<string, unknown> {
  if (value && (typeof value === 'object' || typeof value === 'function')) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

export function loadUnit(payload: string | Buffer, filename: string): LoadableUnitHandle {
  const source = typeof payload === 'string' ? payload : payload.toString('utf8');
  const compiled = vm.compileFunction(source, WRAPPER_PARAMS, { filename });
  const shim: ModuleShim = { exports: {} };
  const localRequire = createRequire(filename);
  compiled.call(shim.exports, shim.exports, localRequire, shim, filename, path.dirname(filename));
  return { filename, exports: asExports(shim.exports) };
}

export async function invokeEntry(handle: LoadableUnitHandle, entry: string, args: unknown[] = []): Promise<unknown> {
  const fn = handle.exports[entry];
  if (typeof fn !== 'function') {
    throw new TypeError(`${path.basename(handle.filename)} does not export a function named ${entry}`);
  }
  return await fn.apply(handle.exports, args);
}
