/**
 * Project configuration (`devshell.config.json`) and the project state the shell
 * is started against.
 */

import fs from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import { PROJECT_FILES } from '../constants/index.js';
import { ConfigurationError } from '../error-handling/shell-errors.js';

export const componentSpecInputSchema = z.union([
  z.string().min(1),
  z.tuple([z.string().min(1), z.literal('load')]),
  z.tuple([z.string().min(1), z.string().min(1)]),
  z.tuple([z.string().min(1), z.string().min(1), z.literal('load')]),
  z.object({
    name: z.string().min(1),
    version: z.string().min(1).optional(),
    loadOnly: z.boolean().optional()
  })
]);

export type ComponentSpecInput = z.infer<typeof componentSpecInputSchema>;

const shellSectionSchema = z.object({
  config: z.string().min(1).optional(),
  script: z.string().min(1).optional(),
  apps: z.array(componentSpecInputSchema).optional()
});

const releaseSectionSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  apps: z.array(componentSpecInputSchema).default([]),
  sysConfig: z.string().min(1).optional()
});

export const projectConfigSchema = z.object({
  profile: z.string().min(1).optional(),
  shell: shellSectionSchema.optional(),
  release: releaseSectionSchema.optional(),
  apps: z.array(z.string().min(1)).default([])
});

export type ShellSection = z.infer<typeof shellSectionSchema>;
export type ReleaseSection = z.infer<typeof releaseSectionSchema>;
export type ProjectConfig = z.infer<typeof projectConfigSchema>;

export type ProjectApp = {
  name: string;
  outDir: string;
};

export type ProjectState = {
  rootDir: string;
  profile: string;
  baseDir: string;
  config: ProjectConfig;
  projectApps: ProjectApp[];
  /** Output directories of everything built that is not a project app. */
  depDirs: string[];
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseProjectConfig(raw: unknown, source: string): ProjectConfig {
  const parsed = projectConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid project config ${source}: ${formatIssues(parsed.error)}`, { source });
  }
  return parsed.data;
}

/**
 * A missing file is an empty project config; an unreadable or invalid one is a ConfigurationError.
 */
export function loadProjectConfig(rootDir: string): ProjectConfig {
  const file = path.join(rootDir, PROJECT_FILES.PROJECT_CONFIG);
  if (!fs.existsSync(file)) {
    return parseProjectConfig({}, file);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read project config ${file}`, { source: file }, error);
  }
  return parseProjectConfig(raw, file);
}

function listDirectories(dir: string): string[] {
  try {
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch {
    return [];
  }
}

export function resolveProjectState(
  rootDir: string,
  options: { profile?: string; config?: ProjectConfig } = {}
): ProjectState {
  const root = path.resolve(rootDir);
  const config = options.config ?? loadProjectConfig(root);
  const profile = options.profile ?? config.profile ?? PROJECT_FILES.DEFAULT_PROFILE;
  const baseDir = path.join(root, PROJECT_FILES.BUILD_DIR, profile);
  const libDir = path.join(baseDir, 'lib');
  const projectApps = config.apps.map((name) => ({ name, outDir: path.join(libDir, name) }));
  const depDirs = listDirectories(libDir)
    .filter((name) => !config.apps.includes(name))
    .map((name) => path.join(libDir, name));
  return { rootDir: root, profile, baseDir, config, projectApps, depDirs };
}
