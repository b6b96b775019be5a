/**
 * Terminal front-end
 *
 * Owns the unit registered as `user`: the unit that reads interactive input and
 * delivers the process's text output to the terminal.
 */

import { UNIT_NAMES, UNIT_ROLES } from '../constants/index.js';
import type { UnitId, UnitRegistry } from './unit-registry.js';

export interface FrontEndSupervisor {
  terminateFrontEnd(): Promise<void>;
  /** Starts a new front-end; it registers itself asynchronously. */
  startFrontEnd(): Promise<void>;
}

export type FrontEndStreams = {
  input?: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
};

export type FrontEndSession = {
  unit: UnitId;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
};

export type TerminalFrontEndOptions = {
  /** Delay between spawning the driver and the front-end registering itself. */
  registrationDelayMs?: number;
};

export class TerminalFrontEnd implements FrontEndSupervisor {
  private readonly registrationDelayMs: number;
  private interactiveUnit: UnitId | undefined;
  private driverUnit: UnitId | undefined;

  constructor(
    private readonly registry: UnitRegistry,
    private readonly streams: FrontEndStreams,
    options: TerminalFrontEndOptions = {}
  ) {
    this.registrationDelayMs = options.registrationDelayMs ?? 10;
  }

  /**
   * Registers the output-only front-end the process starts with.
   */
  startNoShell(): UnitId {
    const unit = this.spawnFrontEndUnit();
    this.registry.register(UNIT_NAMES.FRONT_END, unit);
    return unit;
  }

  async terminateFrontEnd(): Promise<void> {
    const current = this.registry.whereis(UNIT_NAMES.FRONT_END);
    if (current === undefined) {
      return;
    }
    this.registry.terminate(current);
    if (current === this.interactiveUnit) {
      this.interactiveUnit = undefined;
    }
  }

  async startFrontEnd(): Promise<void> {
    if (this.driverUnit !== undefined) {
      this.registry.terminate(this.driverUnit);
    }
    this.driverUnit = this.registry.spawn({ initialRole: UNIT_ROLES.FRONT_END });
    const timer = setTimeout(() => {
      if (this.registry.whereis(UNIT_NAMES.FRONT_END) !== undefined) {
        return;
      }
      const unit = this.spawnFrontEndUnit();
      this.registry.register(UNIT_NAMES.FRONT_END, unit);
      if (this.streams.input) {
        this.interactiveUnit = unit;
      }
    }, this.registrationDelayMs);
    timer.unref();
  }

  /**
   * The interactive session, once a front-end with input has registered.
   */
  session(): FrontEndSession | undefined {
    const unit = this.interactiveUnit;
    if (unit === undefined || !this.registry.isAlive(unit) || !this.streams.input) {
      return undefined;
    }
    return { unit, input: this.streams.input, output: this.streams.output };
  }

  private spawnFrontEndUnit(): UnitId {
    const output = this.streams.output;
    return this.registry.spawn({
      initialRole: UNIT_ROLES.FRONT_END,
      sink: { write: (text) => { output.write(text); } }
    });
  }
}
