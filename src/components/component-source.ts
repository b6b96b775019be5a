/**
 * Finds component manifests on the code path.
 */

import path from 'node:path';

import { PROJECT_FILES } from '../constants/index.js';
import { safeReadJson } from '../utils/safe-read-json.js';
import type { CodePaths } from './code-paths.js';
import { componentManifestSchema, type ComponentLocation } from './component-manifest.js';

export interface ComponentSource {
  find(name: string): ComponentLocation | undefined;
}

export class CodePathComponentSource implements ComponentSource {
  constructor(private readonly codePaths: CodePaths) {}

  find(name: string): ComponentLocation | undefined {
    for (const dir of this.codePaths.list()) {
      const raw = safeReadJson(path.join(dir, PROJECT_FILES.COMPONENT_MANIFEST));
      if (raw === null) {
        continue;
      }
      const parsed = componentManifestSchema.safeParse(raw);
      if (parsed.success && parsed.data.name === name) {
        return { manifest: parsed.data, dir };
      }
    }
    return undefined;
  }
}
