import type { Command } from 'commander';

import type { ProjectState } from '../../config/project-config.js';
import { ScriptExecutionError } from '../../error-handling/shell-errors.js';
import type { LogRouter } from '../../platform/log-router.js';
import { summarizeBootReport } from '../../shell/boot-sequencer.js';
import { bootstrapShell, type ShellBootstrapDeps, type ShellPlatform, type ShellSession } from '../../shell/bootstrap.js';
import type { OptionMapping } from '../../shell/types.js';
import { describeError, getErrorStack } from '../../utils/error-handling-utils.js';
import type { CliLogger } from '../logger.js';
import type { Spinner } from '../spinner.js';

interface ShellCommandOptions {
  config?: string;
  name?: string;
  sname?: string;
  script?: string;
  apps?: string;
  root?: string;
}

export type ShellCommandContext = {
  cwd: () => string;
  createPlatform: () => ShellPlatform;
  createLogger: (router: LogRouter) => CliLogger;
  loadProjectState: (rootDir: string) => ProjectState;
  createSpinner?: (text: string) => Promise<Spinner>;
  moduleLoader?: ShellBootstrapDeps['moduleLoader'];
  takeover?: ShellBootstrapDeps['takeover'];
  /** Runs the interactive session; defaults to the shell agent's command loop. */
  runSession?: (session: ShellSession) => Promise<void>;
  exit: (code: number) => never;
};

export function toOptionMapping(options: ShellCommandOptions): OptionMapping {
  return Object.freeze({
    config: options.config,
    name: options.name,
    sname: options.sname,
    script: options.script,
    apps: options.apps
  });
}

export function createShellCommand(program: Command, ctx: ShellCommandContext): void {
  program
    .command('shell')
    .description('Run an interactive shell with project components and dependencies on the code path')
    .option('--config <file>', 'Configuration file to apply; defaults to shell.config, then the release sysConfig')
    .option('--name <name>', 'Give the node a long name')
    .option('--sname <name>', 'Give the node a short name')
    .option('--script <file>', 'Script bundle to run before components boot; "none" disables shell.script')
    .option('--apps <list>', 'Components to boot (e.g. --apps app1,app2); defaults to shell.apps, then the release apps')
    .option('--root <dir>', 'Project root directory')
    .action(async (options: ShellCommandOptions) => {
      const platform = ctx.createPlatform();
      const logger = ctx.createLogger(platform.logRouter);
      let session: ShellSession;
      try {
        const cwd = ctx.cwd();
        const state = ctx.loadProjectState(options.root ?? cwd);
        session = await bootstrapShell({
          options: toOptionMapping(options),
          state,
          platform,
          logger,
          cwd,
          moduleLoader: ctx.moduleLoader,
          createSpinner: ctx.createSpinner,
          takeover: ctx.takeover
        });
      } catch (error) {
        logger.error(describeError(error));
        logger.debug(getErrorStack(error) ?? 'no stack');
        if (error instanceof ScriptExecutionError) {
          logger.error(`Stack: ${error.causeStack ?? 'unavailable'}`);
        }
        ctx.exit(1);
      }

      const { started, failed } = summarizeBootReport(session.report);
      logger.info(`Shell ready on ${session.node}: ${started} started, ${failed} failed`);

      try {
        await (ctx.runSession ? ctx.runSession(session) : session.agent.run());
      } catch (error) {
        logger.error(describeError(error));
        session.agent.release();
        ctx.exit(1);
      }
    });
}
