/**
 * devshell library entry
 */

export { bootstrapShell, createPlatform } from './shell/bootstrap.js';
export type { ShellBootstrapDeps, ShellPlatform, ShellSession, TakeoverTuning } from './shell/bootstrap.js';
export { AppBootSequencer, normalizeComponentSpec, normalizeComponentSpecs } from './shell/boot-sequencer.js';
export { ShellEnvironmentManager } from './shell/environment-manager.js';
export type { MigrationSummary } from './shell/environment-manager.js';
export { maybeRunScript, runScriptFile, extractBundle } from './shell/script-runner.js';
export { resolveNodeIdentity, setupName } from './shell/node-namer.js';
export { ShellAgent } from './shell/shell-agent.js';
export type { BootOutcome, BootReport, ComponentSpec, OptionMapping } from './shell/types.js';

export { firstValue, resolveOr, recordSource, fixedSource, NO_VALUE } from './config/config-resolver.js';
export type { ConfigSource, ResolvedConfig } from './config/config-resolver.js';
export { findConfigPath, findScriptPath, findAppsToBoot } from './config/shell-config.js';
export { consultConfig, rereadConfig } from './config/app-config.js';
export { readTerms } from './config/term-reader.js';
export type { Term, TermTuple } from './config/term-reader.js';
export { loadProjectConfig, resolveProjectState } from './config/project-config.js';
export type { ProjectConfig, ProjectState } from './config/project-config.js';

export { ComponentController } from './components/component-controller.js';
export { CodePaths } from './components/code-paths.js';
export { InProcessUnitRegistry } from './platform/unit-registry.js';
export type { UnitId, UnitRegistry } from './platform/unit-registry.js';

export * from './error-handling/shell-errors.js';
