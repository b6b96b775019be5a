/**
 * Script Runner
 *
 * Runs the optional script bundle before components boot. A bundle is a
 * CommonJS file; a leading `#!` line and the `//!` directive lines after it are
 * its header, the rest is the payload. The payload's `main` export is called
 * with no arguments. Any failure aborts the bootstrap.
 */

import fs from 'node:fs';
import path from 'node:path';

import type { CliLogger } from '../cli/logger.js';
import { findScriptPath, type ShellInputs } from '../config/shell-config.js';
import { SCRIPT_DISABLED } from '../constants/index.js';
import { ScriptExecutionError, type ScriptFailureCategory } from '../error-handling/shell-errors.js';
import { invokeEntry, loadUnit, type LoadableUnitHandle } from '../platform/loadable-unit.js';
import { formatValueForConsole } from '../utils/logger.js';

export const SCRIPT_ENTRY_POINT = 'main';

export type ScriptBundle = {
  header: string[];
  payload: string;
};

export type ScriptRunResult =
  | { status: 'skipped'; reason: 'not_configured' | 'disabled' }
  | { status: 'ran'; file: string; result: unknown };

export function extractBundle(content: string): ScriptBundle {
  const lines = content.split(/\r?\n/);
  const header: string[] = [];
  if (lines[0]?.startsWith('#!')) {
    header.push(lines.shift() ?? '');
    while (lines.length > 0 && lines[0].startsWith('//!')) {
      header.push(lines.shift() ?? '');
    }
  }
  // keep line numbers in stack traces pointing at the original file
  const padding = header.map(() => '').join('\n');
  return { header, payload: header.length ? `${padding}\n${lines.join('\n')}` : lines.join('\n') };
}

async function step<T>(file: string, category: ScriptFailureCategory, fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new ScriptExecutionError(file, category, error);
  }
}

export async function runScriptFile(file: string, logger: Pick<CliLogger, 'debug'>): Promise<unknown> {
  logger.debug(`Extracting script bundle from ${file}`);
  const bundle = await step(file, 'extract', () => extractBundle(fs.readFileSync(file, 'utf8')));
  const handle: LoadableUnitHandle = await step(file, 'load', () => loadUnit(bundle.payload, file));
  logger.debug(`Evaluating ${path.basename(file)}:${SCRIPT_ENTRY_POINT}([])`);
  const result = await step(file, 'invoke', () => invokeEntry(handle, SCRIPT_ENTRY_POINT, [[]]));
  logger.debug(`Result: ${formatValueForConsole(result)}`);
  return result;
}

export async function maybeRunScript(
  inputs: ShellInputs,
  options: { cwd: string; logger: Pick<CliLogger, 'debug'> }
): Promise<ScriptRunResult> {
  const resolved = findScriptPath(inputs, options.logger.debug);
  if (!resolved) {
    options.logger.debug('No script file specified.');
    return { status: 'skipped', reason: 'not_configured' };
  }
  if (resolved.value === SCRIPT_DISABLED) {
    options.logger.debug(`Shell script execution skipped (--script ${SCRIPT_DISABLED}).`);
    return { status: 'skipped', reason: 'disabled' };
  }
  const file = path.resolve(options.cwd, resolved.value);
  const result = await runScriptFile(file, options.logger);
  return { status: 'ran', file, result };
}
