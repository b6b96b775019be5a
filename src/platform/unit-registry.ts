/**
 * Unit Registry
 *
 * Process-wide table of live units, their registered names and output bindings.
 * A unit's output binding points at the unit that receives its text output; text
 * follows the chain of bindings until it reaches a unit that owns a sink.
 */

import { UNIT_NAMES } from '../constants/index.js';
import { NamingConflictError, UnitNotAliveError } from '../error-handling/shell-errors.js';

export type UnitId = number;

export type OutputSink = {
  write: (text: string) => void;
};

export interface UnitInfo {
  readonly id: UnitId;
  readonly name?: string;
  readonly initialRole?: string;
  readonly outputBinding?: UnitId;
}

export interface SpawnOptions {
  initialRole?: string;
  /** Defaults to the unit registered as the front-end at spawn time. */
  outputBinding?: UnitId;
  sink?: OutputSink;
}

export interface UnitRegistry {
  spawn(options?: SpawnOptions): UnitId;
  terminate(id: UnitId): boolean;
  isAlive(id: UnitId): boolean;
  info(id: UnitId): UnitInfo | undefined;
  /** Snapshot of live unit ids in spawn order. */
  list(): UnitId[];
  register(name: string, id: UnitId): void;
  unregister(name: string): boolean;
  whereis(name: string): UnitId | undefined;
  outputBinding(id: UnitId): UnitId | undefined;
  setOutputBinding(id: UnitId, target: UnitId): void;
  write(id: UnitId, text: string): boolean;
}

type UnitRecord = {
  id: UnitId;
  name?: string;
  initialRole?: string;
  outputBinding?: UnitId;
  sink?: OutputSink;
};

const MAX_FORWARD_HOPS = 32;

export class InProcessUnitRegistry implements UnitRegistry {
  private nextId: UnitId = 1;
  private readonly units = new Map<UnitId, UnitRecord>();
  private readonly names = new Map<string, UnitId>();

  spawn(options: SpawnOptions = {}): UnitId {
    const id = this.nextId++;
    this.units.set(id, {
      id,
      initialRole: options.initialRole,
      outputBinding: options.outputBinding ?? this.whereis(UNIT_NAMES.FRONT_END),
      sink: options.sink
    });
    return id;
  }

  terminate(id: UnitId): boolean {
    const unit = this.units.get(id);
    if (!unit) {
      return false;
    }
    this.units.delete(id);
    if (unit.name !== undefined) {
      this.names.delete(unit.name);
    }
    return true;
  }

  isAlive(id: UnitId): boolean {
    return this.units.has(id);
  }

  info(id: UnitId): UnitInfo | undefined {
    const unit = this.units.get(id);
    if (!unit) {
      return undefined;
    }
    return {
      id: unit.id,
      name: unit.name,
      initialRole: unit.initialRole,
      outputBinding: unit.outputBinding
    };
  }

  list(): UnitId[] {
    return Array.from(this.units.keys());
  }

  register(name: string, id: UnitId): void {
    const existing = this.names.get(name);
    if (existing !== undefined) {
      throw new NamingConflictError(name, existing);
    }
    const unit = this.requireUnit(id);
    if (unit.name !== undefined) {
      throw new NamingConflictError(unit.name, id);
    }
    unit.name = name;
    this.names.set(name, id);
  }

  unregister(name: string): boolean {
    const id = this.names.get(name);
    if (id === undefined) {
      return false;
    }
    this.names.delete(name);
    const unit = this.units.get(id);
    if (unit) {
      unit.name = undefined;
    }
    return true;
  }

  whereis(name: string): UnitId | undefined {
    return this.names.get(name);
  }

  outputBinding(id: UnitId): UnitId | undefined {
    return this.units.get(id)?.outputBinding;
  }

  setOutputBinding(id: UnitId, target: UnitId): void {
    const unit = this.requireUnit(id);
    unit.outputBinding = target;
  }

  write(id: UnitId, text: string): boolean {
    let current = this.units.get(id);
    for (let hops = 0; current && hops < MAX_FORWARD_HOPS; hops++) {
      if (current.sink) {
        current.sink.write(text);
        return true;
      }
      if (current.outputBinding === undefined) {
        return false;
      }
      current = this.units.get(current.outputBinding);
    }
    return false;
  }

  private requireUnit(id: UnitId): UnitRecord {
    const unit = this.units.get(id);
    if (!unit) {
      throw new UnitNotAliveError(id);
    }
    return unit;
  }
}
