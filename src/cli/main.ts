import type { ShellCommandContext } from './commands/shell.js';
import type { CliRuntime } from './runtime.js';
import { createCliProgram } from './program.js';

function readExitCode(err: unknown): number {
  if (err && typeof err === 'object' && 'exitCode' in err) {
    const exitCode = err.exitCode;
    return typeof exitCode === 'number' ? exitCode : 1;
  }
  return 1;
}

export async function runCli(
  argv: string[],
  ctx: { pkgName: string; cliVersion: string; runtime: CliRuntime; shell?: ShellCommandContext }
): Promise<number> {
  const program = createCliProgram(ctx);

  program.exitOverride((err) => {
    throw err;
  });

  try {
    await program.parseAsync(argv, { from: 'node' });
    return 0;
  } catch (err) {
    return readExitCode(err);
  }
}
