/**
 * Component settings from the shell configuration file.
 *
 * The file holds one top-level list of `{component, [{key, value}]}` pairs. An
 * absent, unreadable, malformed or empty file means "no configuration".
 */

import fs from 'node:fs';
import path from 'node:path';

import { getErrorMessage } from '../utils/error-handling-utils.js';
import { isTuple, readTerms, type Term } from './term-reader.js';
import { findConfigPath, type ShellInputs } from './shell-config.js';

export type ComponentSettings = {
  component: string;
  settings: Array<[key: string, value: Term]>;
};

export interface SettingsTarget {
  setEnv(component: string, key: string, value: unknown): void;
}

type Debug = (message: string) => void;

function pair(term: Term): [string, Term] | undefined {
  if (!isTuple(term) || term.elements.length !== 2) {
    return undefined;
  }
  const [key, value] = term.elements;
  return typeof key === 'string' ? [key, value] : undefined;
}

function toComponentSettings(term: Term): ComponentSettings | undefined {
  const entry = pair(term);
  if (!entry || !Array.isArray(entry[1])) {
    return undefined;
  }
  const settings: Array<[string, Term]> = [];
  for (const item of entry[1]) {
    const setting = pair(item);
    if (setting) {
      settings.push(setting);
    }
  }
  return { component: entry[0], settings };
}

/**
 * Parses configuration text. Only the first term is honored.
 */
export function parseConfigTerms(text: string): ComponentSettings[] | undefined {
  const [first] = readTerms(text);
  if (first === undefined || !Array.isArray(first) || first.length === 0) {
    return undefined;
  }
  const result: ComponentSettings[] = [];
  for (const item of first) {
    const settings = toComponentSettings(item);
    if (settings) {
      result.push(settings);
    }
  }
  return result;
}

export function consultConfig(fullPath: string, debug: Debug = () => {}): ComponentSettings[] | undefined {
  debug(`Loading configuration from ${fullPath}`);
  let text: string;
  try {
    text = fs.readFileSync(fullPath, 'utf8');
  } catch (error) {
    debug(`No configuration read from ${fullPath}: ${getErrorMessage(error)}`);
    return undefined;
  }
  try {
    return parseConfigTerms(text);
  } catch (error) {
    debug(`Ignoring malformed configuration ${fullPath}: ${getErrorMessage(error)}`);
    return undefined;
  }
}

export function findConfig(inputs: ShellInputs, rootDir: string, debug: Debug = () => {}): ComponentSettings[] | undefined {
  const resolved = findConfigPath(inputs, debug);
  if (!resolved) {
    return undefined;
  }
  return consultConfig(path.resolve(rootDir, resolved.value), debug);
}

export function applyConfig(target: SettingsTarget, config: ComponentSettings[]): number {
  let applied = 0;
  for (const { component, settings } of config) {
    for (const [key, value] of settings) {
      target.setEnv(component, key, value);
      applied++;
    }
  }
  return applied;
}

/**
 * Returns the number of settings applied, or undefined when there was no configuration.
 */
export function rereadConfig(
  target: SettingsTarget,
  inputs: ShellInputs,
  rootDir: string,
  debug: Debug = () => {}
): number | undefined {
  const config = findConfig(inputs, rootDir, debug);
  if (!config) {
    return undefined;
  }
  return applyConfig(target, config);
}
