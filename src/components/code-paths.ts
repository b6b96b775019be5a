/**
 * Ordered list of directories searched for components.
 */

import fs from 'node:fs';
import path from 'node:path';

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

export class CodePaths {
  private paths: string[] = [];

  constructor(initial: string[] = []) {
    this.addPathsA(initial);
  }

  /**
   * Puts the directories in front of the current path, keeping their order.
   */
  addPathsA(dirs: string[]): void {
    const resolved = dirs.map((dir) => path.resolve(dir));
    const rest = this.paths.filter((p) => !resolved.includes(p));
    this.paths = [...new Set(resolved), ...rest];
  }

  /**
   * Appends a directory; returns false when it does not exist.
   */
  addPath(dir: string): boolean {
    const resolved = path.resolve(dir);
    if (!isDirectory(resolved)) {
      return false;
    }
    if (!this.paths.includes(resolved)) {
      this.paths.push(resolved);
    }
    return true;
  }

  list(): readonly string[] {
    return this.paths;
  }
}
