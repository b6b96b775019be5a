import { describe, expect, it, jest } from '@jest/globals';

import { ComponentController, type ComponentContext } from '../../src/components/component-controller.js';
import { InProcessUnitRegistry } from '../../src/platform/unit-registry.js';
import { manifest, MemoryComponentSource, MemoryModuleLoader } from '../helpers/memory-components.js';

function setup(
  manifests = [manifest('base'), manifest('web', { dependencies: ['base'] })],
  modules: ConstructorParameters<typeof MemoryModuleLoader>[0] = {}
) {
  const registry = new InProcessUnitRegistry();
  const output: string[] = [];
  const frontEnd = registry.spawn({ sink: { write: (text) => output.push(text) } });
  registry.register('user', frontEnd);
  const source = new MemoryComponentSource(manifests);
  const controller = new ComponentController({ source, registry, moduleLoader: new MemoryModuleLoader(modules) });
  return { registry, controller, source, output, frontEnd };
}

describe('ComponentController', () => {
  describe('load', () => {
    it('loads a component once', () => {
      const { controller } = setup();
      expect(controller.load('base')).toEqual({ ok: true });
      expect(controller.load('base')).toEqual({ ok: false, reason: 'already_loaded' });
      expect(controller.loadedComponents()).toEqual(['base']);
    });

    it('reports components missing from the code path', () => {
      const { controller } = setup();
      expect(controller.load('ghost')).toEqual({ ok: false, reason: 'not found on the code path' });
      expect(controller.isLoaded('ghost')).toBe(false);
    });

    it('requires the exact requested version', () => {
      const { controller } = setup();
      expect(controller.load('base', '2.0.0')).toEqual({ ok: false, reason: 'version 1.0.0 does not match 2.0.0' });
      expect(controller.load('base', '1.0.0')).toEqual({ ok: true });
    });

    it('keeps settings written before the load over manifest defaults', () => {
      const { controller } = setup([manifest('myapp', { env: { key: 0, mode: 'dev' } })]);
      controller.setEnv('myapp', 'key', 1);
      controller.load('myapp');
      expect(controller.getAllKeys('myapp')).toEqual({
        version: '1.0.0',
        description: undefined,
        dependencies: [],
        env: { key: 1, mode: 'dev' }
      });
      expect(controller.getAllKeys('ghost')).toBeUndefined();
    });
  });

  describe('ensureAllStarted', () => {
    it('starts dependencies first and only once', async () => {
      const startBase = jest.fn();
      const startWeb = jest.fn();
      const { controller } = setup(undefined, { base: { start: startBase }, web: { start: startWeb } });
      controller.load('base');
      controller.load('web');

      await expect(controller.ensureAllStarted('web')).resolves.toEqual({ ok: true, started: ['base', 'web'] });
      await expect(controller.ensureAllStarted('web')).resolves.toEqual({ ok: true, started: [] });
      expect(startBase).toHaveBeenCalledTimes(1);
      expect(controller.startedComponents()).toEqual(['base', 'web']);
    });

    it('fails the dependent of a component that was never loaded', async () => {
      const { controller } = setup();
      controller.load('web');
      await expect(controller.ensureAllStarted('web')).resolves.toEqual({
        ok: false,
        started: [],
        failures: [{ component: 'web', reason: 'missing dependency base' }]
      });
      await expect(controller.ensureAllStarted('nothing')).resolves.toEqual({
        ok: false,
        started: [],
        failures: [{ component: 'nothing', reason: 'not loaded' }]
      });
    });

    it('detects dependency cycles', async () => {
      const { controller } = setup([manifest('a', { dependencies: ['b'] }), manifest('b', { dependencies: ['a'] })]);
      controller.load('a');
      controller.load('b');
      await expect(controller.ensureAllStarted('a')).resolves.toEqual({
        ok: false,
        started: [],
        failures: [{ component: 'a', reason: 'circular dependency' }]
      });
    });

    it('releases the units of a component whose start hook throws', async () => {
      const { controller, registry } = setup([manifest('bad')], {
        bad: {
          start: () => {
            throw new Error('port in use');
          }
        }
      });
      controller.load('bad');
      const before = registry.list();

      await expect(controller.ensureAllStarted('bad')).resolves.toEqual({
        ok: false,
        started: [],
        failures: [{ component: 'bad', reason: 'Error: port in use' }]
      });
      expect(registry.list()).toEqual(before);
      expect(controller.isStarted('bad')).toBe(false);
    });

    it('returns the dependencies it started before a later dependency was missing', async () => {
      const startD1 = jest.fn();
      const { controller } = setup([manifest('d1'), manifest('x', { dependencies: ['d1', 'y'] })], { d1: { start: startD1 } });
      controller.load('d1');
      controller.load('x');

      await expect(controller.ensureAllStarted('x')).resolves.toEqual({
        ok: false,
        started: ['d1'],
        failures: [{ component: 'x', reason: 'missing dependency y' }]
      });
      expect(startD1).toHaveBeenCalledTimes(1);
      expect(controller.isStarted('d1')).toBe(true);
    });

    it('fails dependents of a failed start without running its hook again', async () => {
      const startBad = jest.fn(() => {
        throw new Error('nope');
      });
      const { controller } = setup(
        [manifest('bad'), manifest('mid', { dependencies: ['bad'] }), manifest('app', { dependencies: ['mid'] })],
        { bad: { start: startBad } }
      );
      controller.load('bad');
      controller.load('mid');
      controller.load('app');

      await expect(controller.ensureAllStarted('app')).resolves.toEqual({
        ok: false,
        started: [],
        failures: [
          { component: 'bad', reason: 'Error: nope' },
          { component: 'app', reason: 'dependency bad failed to start' }
        ]
      });
      await expect(controller.ensureAllStarted('mid')).resolves.toEqual({
        ok: false,
        started: [],
        failures: [{ component: 'mid', reason: 'dependency bad failed to start' }]
      });
      await expect(controller.ensureAllStarted('bad')).resolves.toEqual({
        ok: false,
        started: [],
        failures: [{ component: 'bad', reason: 'Error: nope' }]
      });
      expect(startBad).toHaveBeenCalledTimes(1);
    });

    it('gives a started component a master unit bound to the front-end', async () => {
      let context: ComponentContext | undefined;
      const { controller, registry, output, frontEnd } = setup([manifest('myapp', { env: { key: 1 } })], {
        myapp: {
          start: (ctx) => {
            context = ctx;
            ctx.log(`myapp key=${String(ctx.getEnv('key'))}`);
          }
        }
      });
      controller.load('myapp');
      await controller.ensureAllStarted('myapp');

      const started = controller.describe('myapp');
      expect(started?.state).toBe('started');
      expect(started?.masterUnit).toBeDefined();
      expect(registry.info(started?.masterUnit ?? -1)).toMatchObject({ initialRole: 'component_master', outputBinding: frontEnd });
      expect(registry.outputBinding(started?.unit ?? -1)).toBe(started?.masterUnit);
      expect(output).toEqual(['myapp key=1\n']);
      expect(context?.env()).toEqual({ key: 1 });
    });
  });

  it('stops components in reverse start order and reports failed stops', async () => {
    const stopped: string[] = [];
    const { controller, registry } = setup(undefined, {
      base: { stop: () => { stopped.push('base'); } },
      web: {
        stop: () => {
          stopped.push('web');
          throw new Error('still busy');
        }
      }
    });
    controller.load('base');
    controller.load('web');
    await controller.ensureAllStarted('web');

    await expect(controller.stopAll()).resolves.toEqual([{ component: 'web', reason: 'Error: still busy' }]);
    expect(stopped).toEqual(['web', 'base']);
    expect(controller.startedComponents()).toEqual([]);
    expect(controller.isStarted('web')).toBe(false);
    expect(registry.list()).toHaveLength(1);
  });
});
