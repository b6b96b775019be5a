import type { Command } from 'commander';

import { resolveBoolFromEnv, isDebugLogEnabled, resolveProfileFromEnv } from '../../bootstrap/index.js';
import { resolveProjectState } from '../../config/project-config.js';
import { createPlatform } from '../../shell/bootstrap.js';
import { createShellCommand, type ShellCommandContext } from '../commands/shell.js';
import { createCliLogger } from '../logger.js';
import type { CliRuntime } from '../runtime.js';
import { createSpinner } from '../spinner.js';

export function createDefaultShellContext(runtime: CliRuntime): ShellCommandContext {
  const debug = isDebugLogEnabled(runtime.env);
  const showSpinner = resolveBoolFromEnv(runtime.env.DEVSHELL_SPINNER, true);
  return {
    cwd: runtime.cwd,
    createPlatform: () => createPlatform({ streams: { input: runtime.input, output: runtime.output } }),
    createLogger: (router) => createCliLogger(router, { debug }),
    loadProjectState: (rootDir) => resolveProjectState(rootDir, { profile: resolveProfileFromEnv(runtime.env) }),
    createSpinner: showSpinner ? (text) => createSpinner(text, { log: (line) => runtime.writeErr(`${line}\n`) }) : undefined,
    exit: runtime.exit
  };
}

export function registerShellCommands(program: Command, deps: { shell: ShellCommandContext }): void {
  createShellCommand(program, deps.shell);
}
