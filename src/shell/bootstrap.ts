/**
 * Shell bootstrap
 *
 * Runs the startup steps strictly in order: node name, code paths, front-end
 * takeover, script, component boot, agent registration. Components are booted
 * after the takeover so their master units bind to the new front-end.
 */

import type { CliLogger } from '../cli/logger.js';
import type { Spinner } from '../cli/spinner.js';
import { CodePaths } from '../components/code-paths.js';
import { ComponentController, type ComponentModuleLoader } from '../components/component-controller.js';
import { CodePathComponentSource } from '../components/component-source.js';
import { rereadConfig } from '../config/app-config.js';
import type { ProjectState } from '../config/project-config.js';
import { findAppsToBoot, type ShellInputs } from '../config/shell-config.js';
import { LOG_HANDLERS } from '../constants/index.js';
import { PortMapperDistribution, type DistributionService } from '../platform/distribution.js';
import { TerminalFrontEnd, type FrontEndStreams } from '../platform/front-end.js';
import { createStreamHandler, LogRouter } from '../platform/log-router.js';
import { InProcessUnitRegistry, type UnitRegistry } from '../platform/unit-registry.js';
import { AppBootSequencer } from './boot-sequencer.js';
import { setupPaths } from './code-path-setup.js';
import { ShellEnvironmentManager, type MigrationSummary } from './environment-manager.js';
import { resolveNodeIdentity, setupName } from './node-namer.js';
import { maybeRunScript, type ScriptRunResult } from './script-runner.js';
import { ShellAgent } from './shell-agent.js';
import type { BootReport, OptionMapping } from './types.js';

export type ShellPlatform = {
  registry: UnitRegistry;
  frontEnd: TerminalFrontEnd;
  logRouter: LogRouter;
  distribution: DistributionService;
};

export type PlatformOptions = {
  streams: FrontEndStreams;
  distribution?: DistributionService;
  registrationDelayMs?: number;
};

/**
 * The process as it starts: an output-only front-end and the simple log handler.
 */
export function createPlatform(options: PlatformOptions): ShellPlatform {
  const registry = new InProcessUnitRegistry();
  const frontEnd = new TerminalFrontEnd(registry, options.streams, { registrationDelayMs: options.registrationDelayMs });
  frontEnd.startNoShell();
  const logRouter = new LogRouter();
  const output = options.streams.output;
  logRouter.addHandler(createStreamHandler(LOG_HANDLERS.SIMPLE, (text) => { output.write(text); }));
  return {
    registry,
    frontEnd,
    logRouter,
    distribution: options.distribution ?? new PortMapperDistribution()
  };
}

export type TakeoverTuning = {
  pollIntervalMs?: number;
  registrationTimeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

export type ShellBootstrapDeps = {
  options: OptionMapping;
  state: ProjectState;
  platform: ShellPlatform;
  logger: CliLogger;
  cwd: string;
  moduleLoader?: ComponentModuleLoader;
  createSpinner?: (text: string) => Promise<Spinner>;
  takeover?: TakeoverTuning;
};

export type ShellSession = {
  node: string;
  codePaths: CodePaths;
  controller: ComponentController;
  migration: MigrationSummary;
  script: ScriptRunResult;
  report: BootReport;
  agent: ShellAgent;
};

export async function bootstrapShell(deps: ShellBootstrapDeps): Promise<ShellSession> {
  const { options, state, platform, logger } = deps;
  const inputs: ShellInputs = { options, project: state.config };
  resolveNodeIdentity(options);

  const node = await setupName(options, platform.distribution, logger);

  const codePaths = new CodePaths();
  const paths = setupPaths(state, codePaths);
  logger.debug(`Code path: ${paths.added.length} component dirs, ${paths.testPaths.length} test dirs`);

  const environment = new ShellEnvironmentManager({
    registry: platform.registry,
    frontEnd: platform.frontEnd,
    logRouter: platform.logRouter,
    logger,
    ...deps.takeover
  });
  const migration = await environment.takeOver();

  const script = await maybeRunScript(inputs, { cwd: deps.cwd, logger });

  const controller = new ComponentController({
    source: new CodePathComponentSource(codePaths),
    registry: platform.registry,
    moduleLoader: deps.moduleLoader
  });
  const sequencer = new AppBootSequencer({
    controller,
    logger,
    applyConfig: () => rereadConfig(controller, inputs, state.rootDir, logger.debug),
    createSpinner: deps.createSpinner
  });
  const apps = findAppsToBoot(inputs, logger.debug);
  const report = await sequencer.boot(apps?.value);

  const agent = new ShellAgent({
    registry: platform.registry,
    controller,
    session: () => platform.frontEnd.session(),
    logger,
    node,
    report
  });
  agent.register();

  return { node, codePaths, controller, migration, script, report, agent };
}
