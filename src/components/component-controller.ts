/**
 * Component Controller
 *
 * Keeps the table of loaded components and their settings, and starts them in
 * dependency order. Each started component gets a master unit bound to the
 * current front-end and a component unit whose output is bound to its master.
 */

import { createRequire } from 'node:module';
import path from 'node:path';

import { UNIT_ROLES } from '../constants/index.js';
import type { UnitId, UnitRegistry } from '../platform/unit-registry.js';
import { describeError } from '../utils/error-handling-utils.js';
import type { ComponentLocation, ComponentManifest } from './component-manifest.js';
import type { ComponentSource } from './component-source.js';

export type ComponentContext = {
  name: string;
  getEnv: (key: string) => unknown;
  env: () => Record<string, unknown>;
  log: (text: string) => void;
};

export type ComponentModule = {
  start?: (context: ComponentContext) => unknown;
  stop?: () => unknown;
};

export interface ComponentModuleLoader {
  loadModule(location: ComponentLocation): ComponentModule;
}

export type ComponentState = 'loaded' | 'started';

export type LoadedComponent = {
  name: string;
  version: string;
  description?: string;
  dependencies: string[];
  dir: string;
  main?: string;
  state: ComponentState;
  masterUnit?: UnitId;
  unit?: UnitId;
  module?: ComponentModule;
};

export type ComponentKeys = {
  version: string;
  description?: string;
  dependencies: string[];
  env: Record<string, unknown>;
};

export type LoadResult = { ok: true } | { ok: false; reason: string };

export type StartFailure = { component: string; reason: string };

/**
 * `started` lists the components this call started, also on failure: a failing
 * dependent does not stop the dependencies that already came up.
 */
export type StartResult =
  | { ok: true; started: string[] }
  | { ok: false; started: string[]; failures: StartFailure[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object';
}

function toComponentModule(value: unknown): ComponentModule {
  if (!isRecord(value)) {
    return {};
  }
  const start = value.start;
  const stop = value.stop;
  return {
    start: typeof start === 'function' ? (context) => start.call(value, context) : undefined,
    stop: typeof stop === 'function' ? () => stop.call(value) : undefined
  };
}

/**
 * Loads a component's `main` module with Node's CommonJS loader.
 */
export class RequireModuleLoader implements ComponentModuleLoader {
  loadModule(location: ComponentLocation): ComponentModule {
    const main = location.manifest.main;
    if (!main) {
      return {};
    }
    const localRequire = createRequire(path.join(location.dir, 'index.js'));
    const loaded: unknown = localRequire(path.resolve(location.dir, main));
    return toComponentModule(loaded);
  }
}

export type ComponentControllerDeps = {
  source: ComponentSource;
  registry: UnitRegistry;
  moduleLoader?: ComponentModuleLoader;
};

export class ComponentController {
  private readonly components = new Map<string, LoadedComponent>();
  private readonly env = new Map<string, Map<string, unknown>>();
  private readonly startOrder: string[] = [];
  private readonly failedStarts = new Map<string, string>();
  private readonly moduleLoader: ComponentModuleLoader;

  constructor(private readonly deps: ComponentControllerDeps) {
    this.moduleLoader = deps.moduleLoader ?? new RequireModuleLoader();
  }

  isLoaded(name: string): boolean {
    return this.components.has(name);
  }

  isStarted(name: string): boolean {
    return this.components.get(name)?.state === 'started';
  }

  loadedComponents(): string[] {
    return Array.from(this.components.keys());
  }

  startedComponents(): string[] {
    return [...this.startOrder];
  }

  describe(name: string): LoadedComponent | undefined {
    const component = this.components.get(name);
    return component ? { ...component, dependencies: [...component.dependencies] } : undefined;
  }

  load(name: string, version?: string): LoadResult {
    if (this.components.has(name)) {
      return { ok: false, reason: 'already_loaded' };
    }
    const location = this.deps.source.find(name);
    if (!location) {
      return { ok: false, reason: 'not found on the code path' };
    }
    const { manifest, dir } = location;
    if (version !== undefined && manifest.version !== version) {
      return { ok: false, reason: `version ${manifest.version} does not match ${version}` };
    }
    this.components.set(name, this.toLoaded(manifest, dir));
    const settings = this.envFor(name);
    for (const [key, value] of Object.entries(manifest.env)) {
      if (!settings.has(key)) {
        settings.set(key, value);
      }
    }
    return { ok: true };
  }

  getAllKeys(name: string): ComponentKeys | undefined {
    const component = this.components.get(name);
    if (!component) {
      return undefined;
    }
    return {
      version: component.version,
      description: component.description,
      dependencies: [...component.dependencies],
      env: Object.fromEntries(this.envFor(name))
    };
  }

  /**
   * Settings may be written before the component is loaded; loading keeps them over manifest defaults.
   */
  setEnv(name: string, key: string, value: unknown): void {
    this.envFor(name).set(key, value);
  }

  getEnv(name: string, key: string): unknown {
    return this.env.get(name)?.get(key);
  }

  /**
   * A component whose start failed stays failed until `stopAll`; its start hook
   * is not run again for later dependents.
   */
  async ensureAllStarted(name: string): Promise<StartResult> {
    const started: string[] = [];
    const visiting = new Set<string>();

    const startWithDeps = async (current: string): Promise<StartFailure | undefined> => {
      const component = this.components.get(current);
      if (!component) {
        return { component: current, reason: 'not loaded' };
      }
      if (component.state === 'started') {
        return undefined;
      }
      const earlier = this.failedStarts.get(current);
      if (earlier !== undefined) {
        return { component: current, reason: earlier };
      }
      if (visiting.has(current)) {
        return { component: current, reason: 'circular dependency' };
      }
      visiting.add(current);
      for (const dep of component.dependencies) {
        if (!this.components.has(dep)) {
          return { component: current, reason: `missing dependency ${dep}` };
        }
        if (this.failedStarts.has(dep)) {
          return { component: current, reason: `dependency ${dep} failed to start` };
        }
        const failure = await startWithDeps(dep);
        if (failure) {
          return failure;
        }
      }
      try {
        await this.startComponent(component);
      } catch (error) {
        return { component: current, reason: describeError(error) };
      }
      started.push(current);
      return undefined;
    };

    const failure = await startWithDeps(name);
    if (!failure) {
      return { ok: true, started };
    }
    const failures = [failure];
    if (failure.component !== name) {
      failures.push({ component: name, reason: `dependency ${failure.component} failed to start` });
    }
    for (const { component, reason } of failures) {
      if (this.components.has(component) && !this.failedStarts.has(component)) {
        this.failedStarts.set(component, reason);
      }
    }
    return { ok: false, started, failures };
  }

  /**
   * Stops started components in reverse start order and returns the ones whose stop hook failed.
   */
  async stopAll(): Promise<Array<{ component: string; reason: string }>> {
    const failures: Array<{ component: string; reason: string }> = [];
    for (const name of [...this.startOrder].reverse()) {
      const component = this.components.get(name);
      if (!component) {
        continue;
      }
      try {
        await component.module?.stop?.();
      } catch (error) {
        failures.push({ component: name, reason: describeError(error) });
      }
      this.releaseUnits(component);
      component.state = 'loaded';
    }
    this.startOrder.length = 0;
    this.failedStarts.clear();
    return failures;
  }

  private async startComponent(component: LoadedComponent): Promise<void> {
    const registry = this.deps.registry;
    const masterUnit = registry.spawn({ initialRole: UNIT_ROLES.COMPONENT_MASTER });
    const unit = registry.spawn({ initialRole: UNIT_ROLES.COMPONENT, outputBinding: masterUnit });
    component.masterUnit = masterUnit;
    component.unit = unit;
    const context: ComponentContext = {
      name: component.name,
      getEnv: (key) => this.getEnv(component.name, key),
      env: () => Object.fromEntries(this.envFor(component.name)),
      log: (text) => {
        registry.write(unit, text.endsWith('\n') ? text : `${text}\n`);
      }
    };
    try {
      const module = this.moduleLoader.loadModule({ manifest: this.toManifest(component), dir: component.dir });
      await module.start?.(context);
      component.module = module;
    } catch (error) {
      this.releaseUnits(component);
      throw error;
    }
    component.state = 'started';
    this.startOrder.push(component.name);
  }

  private releaseUnits(component: LoadedComponent): void {
    if (component.unit !== undefined) {
      this.deps.registry.terminate(component.unit);
    }
    if (component.masterUnit !== undefined) {
      this.deps.registry.terminate(component.masterUnit);
    }
    component.unit = undefined;
    component.masterUnit = undefined;
  }

  private envFor(name: string): Map<string, unknown> {
    let settings = this.env.get(name);
    if (!settings) {
      settings = new Map();
      this.env.set(name, settings);
    }
    return settings;
  }

  private toLoaded(manifest: ComponentManifest, dir: string): LoadedComponent {
    return {
      name: manifest.name,
      version: manifest.version,
      description: manifest.description,
      dependencies: [...manifest.dependencies],
      dir,
      main: manifest.main,
      state: 'loaded'
    };
  }

  private toManifest(component: LoadedComponent): ComponentManifest {
    return {
      name: component.name,
      version: component.version,
      description: component.description,
      dependencies: [...component.dependencies],
      main: component.main,
      env: Object.fromEntries(this.envFor(component.name))
    };
  }
}
