/**
 * App Boot Sequencer
 *
 * Loads the requested components with their dependencies (depth first,
 * dependencies before dependents), applies the configuration file, then starts
 * every component that is not load-only. Failures are collected per component
 * and never stop the sequence.
 */

import type { CliLogger } from '../cli/logger.js';
import type { Spinner } from '../cli/spinner.js';
import type { ComponentController } from '../components/component-controller.js';
import type { ComponentSpecInput } from '../config/project-config.js';
import type { BootOutcome, BootReport, ComponentSpec } from './types.js';

export function normalizeComponentSpec(input: ComponentSpecInput): ComponentSpec {
  if (typeof input === 'string') {
    return { name: input, loadOnly: false };
  }
  if (Array.isArray(input)) {
    if (input.length === 3) {
      return { name: input[0], version: input[1], loadOnly: true };
    }
    if (input[1] === 'load') {
      return { name: input[0], loadOnly: true };
    }
    return { name: input[0], version: input[1], loadOnly: false };
  }
  return { name: input.name, version: input.version, loadOnly: input.loadOnly ?? false };
}

export function normalizeComponentSpecs(inputs: ComponentSpecInput[]): ComponentSpec[] {
  return inputs.map(normalizeComponentSpec);
}

export type AppBootSequencerDeps = {
  controller: ComponentController;
  logger: Pick<CliLogger, 'info' | 'warning' | 'error' | 'debug'>;
  /** Applies the configuration file; returns undefined when there is none. */
  applyConfig: () => number | undefined;
  createSpinner?: (text: string) => Promise<Spinner>;
};

export class AppBootSequencer {
  constructor(private readonly deps: AppBootSequencerDeps) {}

  async boot(components: ComponentSpecInput[] | undefined): Promise<BootReport> {
    if (components === undefined) {
      return { outcomes: [], configApplied: this.deps.applyConfig() };
    }
    const specs = normalizeComponentSpecs(components);
    const outcomes: BootOutcome[] = [];
    const failedLoads = this.loadComponents(specs, outcomes);
    const configApplied = this.deps.applyConfig();
    await this.startComponents(specs, failedLoads, outcomes);
    return { outcomes, configApplied };
  }

  private loadComponents(specs: ComponentSpec[], outcomes: BootOutcome[]): Set<string> {
    const { controller, logger } = this.deps;
    const failed = new Set<string>();

    const load = (name: string, version?: string): void => {
      const result = controller.load(name, version);
      if (!result.ok) {
        if (result.reason !== 'already_loaded') {
          failed.add(name);
          outcomes.push({ component: name, status: 'load_failed', reason: result.reason });
          logger.error(`Failed to load ${name}: ${result.reason}`);
        }
        return;
      }
      logger.debug(`Loaded ${name}`);
      for (const dep of controller.getAllKeys(name)?.dependencies ?? []) {
        if (!controller.isLoaded(dep) && !failed.has(dep)) {
          load(dep);
        }
      }
    };

    for (const spec of specs) {
      if (!controller.isLoaded(spec.name) && !failed.has(spec.name)) {
        load(spec.name, spec.version);
      }
    }
    return failed;
  }

  private async startComponents(specs: ComponentSpec[], failedLoads: Set<string>, outcomes: BootOutcome[]): Promise<void> {
    const { controller, logger } = this.deps;
    const bootable = specs.filter((spec) => !spec.loadOnly && !failedLoads.has(spec.name));
    if (bootable.length === 0) {
      return;
    }
    logger.warning(
      'The shell is a development tool; to deploy components in production, build a release instead'
    );
    const spinner = this.deps.createSpinner ? await this.deps.createSpinner('Booting components') : undefined;
    const reported = new Set<string>();
    let index = 0;
    for (const spec of bootable) {
      index++;
      if (spinner) {
        spinner.text = `Booting ${spec.name} (${index}/${bootable.length})`;
      }
      const result = await controller.ensureAllStarted(spec.name);
      for (const name of result.started) {
        outcomes.push({ component: name, status: 'started' });
        logger.info(`Booted ${name}`);
      }
      if (result.ok) {
        continue;
      }
      for (const failure of result.failures) {
        if (reported.has(failure.component)) {
          continue;
        }
        reported.add(failure.component);
        outcomes.push({ component: failure.component, status: 'start_failed', reason: failure.reason });
        logger.error(`Failed to boot ${failure.component} for reason ${failure.reason}`);
      }
    }
    spinner?.stop();
  }
}

export function summarizeBootReport(report: BootReport): { started: number; failed: number } {
  const started = report.outcomes.filter((o) => o.status === 'started').length;
  return { started, failed: report.outcomes.length - started };
}
