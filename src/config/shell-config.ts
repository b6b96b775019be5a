/**
 * Lookup chains for the shell's configuration-file path, script bundle path and
 * component set, all built on the ordered fallback resolver.
 */

import { z } from 'zod';

import { readString } from '../app/config-readers.js';
import { APPS_SEPARATORS } from '../constants/index.js';
import type { OptionMapping } from '../shell/types.js';
import {
  firstValue,
  fixedSource,
  recordSource,
  type ConfigSource,
  type ResolutionDiagnostics,
  type ResolvedConfig
} from './config-resolver.js';
import { componentSpecInputSchema, type ComponentSpecInput, type ProjectConfig } from './project-config.js';

export type ShellInputs = {
  options: OptionMapping;
  project: ProjectConfig;
};

export const SOURCE_NAMES = {
  COMMAND_LINE: 'command line option',
  PROJECT_CONFIG: 'project config',
  RELEASE_CONFIG: 'release config'
} as const;

const componentListSchema = z.array(componentSpecInputSchema);

export function splitAppsOption(raw: string): string[] {
  return raw.split(APPS_SEPARATORS).filter((token) => token.length > 0);
}

function readAppsOption(raw: unknown): ComponentSpecInput[] | undefined {
  if (typeof raw !== 'string') {
    return undefined;
  }
  const names = splitAppsOption(raw);
  return names.length ? names : undefined;
}

function readComponentList(raw: unknown): ComponentSpecInput[] | undefined {
  const parsed = componentListSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export function configPathSources(inputs: ShellInputs): Array<ConfigSource<string>> {
  return [
    recordSource(SOURCE_NAMES.COMMAND_LINE, inputs.options, readString),
    recordSource(SOURCE_NAMES.PROJECT_CONFIG, inputs.project.shell, readString),
    fixedSource(SOURCE_NAMES.RELEASE_CONFIG, inputs.project.release?.sysConfig)
  ];
}

export function scriptPathSources(inputs: ShellInputs): Array<ConfigSource<string>> {
  return [
    recordSource(SOURCE_NAMES.COMMAND_LINE, inputs.options, readString),
    recordSource(SOURCE_NAMES.PROJECT_CONFIG, inputs.project.shell, readString)
  ];
}

export function appsSources(inputs: ShellInputs): Array<ConfigSource<ComponentSpecInput[]>> {
  return [
    recordSource(SOURCE_NAMES.COMMAND_LINE, inputs.options, readAppsOption),
    recordSource(SOURCE_NAMES.PROJECT_CONFIG, inputs.project.shell, readComponentList),
    fixedSource(SOURCE_NAMES.RELEASE_CONFIG, inputs.project.release?.apps)
  ];
}

export function findConfigPath(inputs: ShellInputs, diagnostics?: ResolutionDiagnostics): ResolvedConfig<string> | undefined {
  return firstValue(configPathSources(inputs), 'config', diagnostics);
}

export function findScriptPath(inputs: ShellInputs, diagnostics?: ResolutionDiagnostics): ResolvedConfig<string> | undefined {
  return firstValue(scriptPathSources(inputs), 'script', diagnostics);
}

export function findAppsToBoot(
  inputs: ShellInputs,
  diagnostics?: ResolutionDiagnostics
): ResolvedConfig<ComponentSpecInput[]> | undefined {
  return firstValue(appsSources(inputs), 'apps', diagnostics);
}
