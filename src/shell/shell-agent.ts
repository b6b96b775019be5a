/**
 * Shell Agent
 *
 * The resident interactive command loop. It is registered once per process under
 * `shell_agent`; registering a second agent is a naming conflict, whichever unit
 * registry it is given.
 */

import repl from 'node:repl';
import type { REPLServer } from 'node:repl';

import type { CliLogger } from '../cli/logger.js';
import type { ComponentController } from '../components/component-controller.js';
import { UNIT_NAMES, UNIT_ROLES } from '../constants/index.js';
import { EnvironmentTakeoverError, NamingConflictError } from '../error-handling/shell-errors.js';
import type { FrontEndSession } from '../platform/front-end.js';
import type { UnitId, UnitRegistry } from '../platform/unit-registry.js';
import { formatValueForConsole } from '../utils/logger.js';
import type { BootReport } from './types.js';

export type ShellAgentDeps = {
  registry: UnitRegistry;
  controller: ComponentController;
  session: () => FrontEndSession | undefined;
  logger: Pick<CliLogger, 'warning' | 'debug'>;
  node: string;
  report: BootReport;
};

let processAgent: ShellAgent | undefined;

export function activeShellAgent(): ShellAgent | undefined {
  return processAgent;
}

export function formatBootReport(report: BootReport): string[] {
  if (report.outcomes.length === 0) {
    return ['No components booted.'];
  }
  return report.outcomes.map((outcome) =>
    outcome.status === 'started'
      ? `${outcome.component}: started`
      : `${outcome.component}: ${outcome.status.replace('_', ' ')} (${outcome.reason})`
  );
}

export function formatComponentTable(controller: ComponentController): string[] {
  const names = controller.loadedComponents();
  if (names.length === 0) {
    return ['No components loaded.'];
  }
  return names.map((name) => {
    const component = controller.describe(name);
    const version = component ? component.version : '?';
    const state = controller.isStarted(name) ? 'started' : 'loaded';
    return `${name} ${version} [${state}]`;
  });
}

export class ShellAgent {
  private unit: UnitId | undefined;
  private server: REPLServer | undefined;

  constructor(private readonly deps: ShellAgentDeps) {}

  get registeredUnit(): UnitId | undefined {
    return this.unit;
  }

  /**
   * Throws NamingConflictError when an agent is already registered.
   */
  register(): UnitId {
    if (processAgent !== undefined && processAgent !== this) {
      throw new NamingConflictError(UNIT_NAMES.SHELL_AGENT, processAgent.registeredUnit ?? -1);
    }
    const { registry } = this.deps;
    const unit = registry.spawn({ initialRole: UNIT_ROLES.SHELL_AGENT });
    try {
      registry.register(UNIT_NAMES.SHELL_AGENT, unit);
    } catch (error) {
      registry.terminate(unit);
      throw error;
    }
    this.unit = unit;
    processAgent = this;
    return unit;
  }

  /**
   * Drops the registration so another agent may take the name.
   */
  release(): void {
    if (this.unit !== undefined) {
      this.deps.registry.terminate(this.unit);
      this.unit = undefined;
    }
    if (processAgent === this) {
      processAgent = undefined;
    }
  }

  /**
   * Runs the command loop until the user leaves it, then stops started components.
   */
  async run(): Promise<void> {
    const session = this.deps.session();
    if (!session) {
      throw new EnvironmentTakeoverError('No interactive front-end is available for the shell');
    }
    if (this.unit === undefined) {
      this.register();
    }
    const server = this.startServer(session);
    this.server = server;
    await new Promise<void>((resolve) => {
      server.once('exit', () => resolve());
    });
    this.server = undefined;
    await this.shutdown();
  }

  close(): void {
    this.server?.close();
  }

  private startServer(session: FrontEndSession): REPLServer {
    const { controller, node, report } = this.deps;
    const output = session.output;
    const server = repl.start({
      prompt: `(${node})> `,
      input: session.input,
      output,
      terminal: 'isTTY' in output && output.isTTY === true,
      useGlobal: false
    });
    server.context.components = controller;
    server.context.report = report;
    server.context.env = (component: string, key?: string) =>
      key === undefined ? controller.getAllKeys(component)?.env : controller.getEnv(component, key);

    const writeLines = (lines: string[]) => {
      output.write(`${lines.join('\n')}\n`);
    };
    server.defineCommand('components', {
      help: 'List loaded components and their state',
      action(this: REPLServer) {
        writeLines(formatComponentTable(controller));
        this.displayPrompt();
      }
    });
    server.defineCommand('report', {
      help: 'Show the boot report',
      action(this: REPLServer) {
        writeLines(formatBootReport(report));
        this.displayPrompt();
      }
    });
    server.defineCommand('env', {
      help: 'Show the settings of a component: .env <component>',
      action(this: REPLServer, name: string) {
        const keys = controller.getAllKeys(name.trim());
        writeLines([keys ? formatValueForConsole(keys.env) : `Component ${name.trim()} is not loaded`]);
        this.displayPrompt();
      }
    });
    return server;
  }

  private async shutdown(): Promise<void> {
    const failures = await this.deps.controller.stopAll();
    for (const failure of failures) {
      this.deps.logger.warning(`Component ${failure.component} did not stop cleanly: ${failure.reason}`);
    }
    this.release();
    this.deps.logger.debug('Shell agent stopped');
  }
}
