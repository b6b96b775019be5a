#!/usr/bin/env node

/**
 * devshell CLI entry point
 */

import fs from 'node:fs';
import path from 'node:path';

import { runCli } from './cli/main.js';
import { createNodeRuntime } from './cli/runtime.js';

// Resolve version from package.json at runtime to avoid hardcoding mismatches
const pkgVersion: string = (() => {
  try {
    const pkgPath = path.resolve(__dirname, '..', '..', 'package.json');
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
})();

runCli(process.argv, { pkgName: 'devshell', cliVersion: pkgVersion, runtime: createNodeRuntime() })
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
