/**
 * Puts built dependencies and project components on the code path, followed by
 * the project's test directories when they exist.
 */

import path from 'node:path';

import type { CodePaths } from '../components/code-paths.js';
import type { ProjectState } from '../config/project-config.js';

export type CodePathSetupResult = {
  added: string[];
  testPaths: string[];
};

export function setupPaths(state: ProjectState, codePaths: CodePaths): CodePathSetupResult {
  const added = [...state.depDirs, ...state.projectApps.map((app) => app.outDir)];
  codePaths.addPathsA(added);
  const candidates = [
    ...state.projectApps.map((app) => path.join(app.outDir, 'test')),
    path.join(state.baseDir, 'test')
  ];
  const testPaths = candidates.filter((dir) => codePaths.addPath(dir));
  return { added, testPaths };
}
