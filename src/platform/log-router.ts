/**
 * Log Router
 *
 * Fans formatted log lines out to registered handlers. The same handler id may be
 * registered more than once; deletion removes one registration at a time.
 */

import type { UnitId, UnitRegistry } from './unit-registry.js';

export type LogLevel = 'debug' | 'info' | 'success' | 'warning' | 'error';

export type LogEvent = {
  level: LogLevel;
  line: string;
};

export interface LogHandler {
  readonly id: string;
  handle(event: LogEvent): void;
  terminate?(): void;
}

export type HandlerRemoval = 'removed' | 'not_found';

export class LogRouter {
  private handlers: LogHandler[] = [];

  addHandler(handler: LogHandler): void {
    this.handlers.push(handler);
  }

  /**
   * Removes the first registration of `id`. A handler's terminate hook may throw.
   */
  deleteHandler(id: string): HandlerRemoval {
    const index = this.handlers.findIndex((h) => h.id === id);
    if (index < 0) {
      return 'not_found';
    }
    const [removed] = this.handlers.splice(index, 1);
    removed.terminate?.();
    return 'removed';
  }

  /**
   * Replaces every registration of the handler's id with the given handler. The
   * new handler is in place before any old one is terminated.
   */
  swapHandler(handler: LogHandler): void {
    const previous = this.handlers.filter((h) => h.id === handler.id);
    this.handlers = this.handlers.filter((h) => h.id !== handler.id);
    this.addHandler(handler);
    for (const old of previous) {
      old.terminate?.();
    }
  }

  hasHandler(id: string): boolean {
    return this.handlers.some((h) => h.id === id);
  }

  handlerIds(): string[] {
    return this.handlers.map((h) => h.id);
  }

  emit(event: LogEvent): void {
    for (const handler of [...this.handlers]) {
      try {
        handler.handle(event);
      } catch {
        // a crashing handler is dropped, the others keep receiving events
        this.handlers = this.handlers.filter((h) => h !== handler);
      }
    }
  }
}

export function createStreamHandler(id: string, write: (text: string) => void): LogHandler {
  return {
    id,
    handle: (event) => write(`${event.line}\n`)
  };
}

/**
 * Delivers lines to a unit's output, following its binding chain.
 */
export function createUnitHandler(id: string, registry: UnitRegistry, unit: UnitId): LogHandler {
  return {
    id,
    handle: (event) => {
      registry.write(unit, `${event.line}\n`);
    }
  };
}
