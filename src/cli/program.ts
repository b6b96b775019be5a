import { Command } from 'commander';

import type { ShellCommandContext } from './commands/shell.js';
import { createDefaultShellContext, registerShellCommands } from './register/shell-command.js';
import type { CliRuntime } from './runtime.js';

export type CliProgramContext = {
  pkgName: string;
  cliVersion: string;
  runtime: CliRuntime;
  shell?: ShellCommandContext;
};

export function createCliProgram(ctx: CliProgramContext): Command {
  const program = new Command();

  program.configureOutput({
    writeOut: (str) => ctx.runtime.writeOut(str),
    writeErr: (str) => ctx.runtime.writeErr(str)
  });

  program
    .name(ctx.pkgName)
    .description('devshell - interactive development shell with project components preloaded')
    .version(ctx.cliVersion);

  registerShellCommands(program, { shell: ctx.shell ?? createDefaultShellContext(ctx.runtime) });

  return program;
}
