/**
 * Shell Environment Manager
 *
 * Replaces the unit registered as the front-end and moves every live output
 * binding that still points at the old one. Capture, terminate, start and
 * registration are fatal when they fail. Migration and the log switch are best
 * effort: a unit that exits mid-migration is skipped, and units spawned while
 * the migration runs keep their binding to the old front-end.
 */

import type { CliLogger } from '../cli/logger.js';
import { LOG_HANDLERS, TAKEOVER, UNIT_NAMES, UNIT_ROLES } from '../constants/index.js';
import { EnvironmentTakeoverError, UnitNotAliveError } from '../error-handling/shell-errors.js';
import type { FrontEndSupervisor } from '../platform/front-end.js';
import { createUnitHandler, type LogRouter } from '../platform/log-router.js';
import type { UnitId, UnitRegistry } from '../platform/unit-registry.js';
import { describeError, getErrorStack } from '../utils/error-handling-utils.js';

export type MigrationSummary = {
  oldFrontEnd?: UnitId;
  newFrontEnd: UnitId;
  /** Units rebound directly from the old front-end. */
  rebound: UnitId[];
  /** Units rebound from an owner that predates the new front-end. */
  ownedRebound: UnitId[];
  /** Units that exited before they could be rebound. */
  skipped: UnitId[];
  logSinkSwitched: boolean;
};

export type ShellEnvironmentManagerDeps = {
  registry: UnitRegistry;
  frontEnd: FrontEndSupervisor;
  logRouter: LogRouter;
  logger: Pick<CliLogger, 'warning' | 'debug'>;
  pollIntervalMs?: number;
  registrationTimeoutMs?: number;
  handlerRemovalAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
};

type RebindOutcome = 'rebound' | 'gone';

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class ShellEnvironmentManager {
  private readonly registry: UnitRegistry;
  private readonly pollIntervalMs: number;
  private readonly registrationTimeoutMs: number;
  private readonly handlerRemovalAttempts: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly deps: ShellEnvironmentManagerDeps) {
    this.registry = deps.registry;
    this.pollIntervalMs = deps.pollIntervalMs ?? TAKEOVER.POLL_INTERVAL_MS;
    this.registrationTimeoutMs = deps.registrationTimeoutMs ?? TAKEOVER.REGISTRATION_TIMEOUT_MS;
    this.handlerRemovalAttempts = deps.handlerRemovalAttempts ?? TAKEOVER.HANDLER_REMOVAL_ATTEMPTS;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async takeOver(): Promise<MigrationSummary> {
    const oldFrontEnd = this.registry.whereis(UNIT_NAMES.FRONT_END);

    try {
      await this.deps.frontEnd.terminateFrontEnd();
      await this.deps.frontEnd.startFrontEnd();
    } catch (error) {
      throw new EnvironmentTakeoverError(`Could not replace the front-end: ${describeError(error)}`, { oldFrontEnd }, error);
    }

    const newFrontEnd = await this.awaitRegistration();
    const summary: MigrationSummary = {
      oldFrontEnd,
      newFrontEnd,
      rebound: [],
      ownedRebound: [],
      skipped: [],
      logSinkSwitched: false
    };

    if (oldFrontEnd !== undefined) {
      this.migrateDirect(oldFrontEnd, newFrontEnd, summary);
    }
    this.migrateOwned(newFrontEnd, summary);
    summary.logSinkSwitched = this.switchLogSink(newFrontEnd);
    this.deps.logger.debug(
      `Front-end <${oldFrontEnd ?? 'none'}> replaced by <${newFrontEnd}>: ` +
        `${summary.rebound.length} rebound, ${summary.ownedRebound.length} owned, ${summary.skipped.length} gone`
    );
    return summary;
  }

  private async awaitRegistration(): Promise<UnitId> {
    for (let remaining = this.registrationTimeoutMs; remaining > 0; remaining -= this.pollIntervalMs) {
      const current = this.registry.whereis(UNIT_NAMES.FRONT_END);
      if (current !== undefined) {
        return current;
      }
      await this.sleep(this.pollIntervalMs);
    }
    const current = this.registry.whereis(UNIT_NAMES.FRONT_END);
    if (current !== undefined) {
      return current;
    }
    throw new EnvironmentTakeoverError(
      `Timeout exceeded waiting for \`${UNIT_NAMES.FRONT_END}\` to register itself`,
      { timeoutMs: this.registrationTimeoutMs }
    );
  }

  private migrateDirect(oldFrontEnd: UnitId, newFrontEnd: UnitId, summary: MigrationSummary): void {
    for (const unit of this.registry.list()) {
      if (unit === newFrontEnd || this.registry.outputBinding(unit) !== oldFrontEnd || !this.registry.isAlive(unit)) {
        continue;
      }
      const outcome = this.rebind(unit, newFrontEnd);
      if (outcome === 'rebound') {
        summary.rebound.push(unit);
      } else if (outcome === 'gone') {
        summary.skipped.push(unit);
      }
    }
  }

  /**
   * Component masters hold the front-end they were started under; the units bound to them are moved instead.
   */
  private migrateOwned(newFrontEnd: UnitId, summary: MigrationSummary): void {
    const owners = new Set<UnitId>();
    for (const unit of this.registry.list()) {
      if (unit < newFrontEnd && this.registry.info(unit)?.initialRole === UNIT_ROLES.COMPONENT_MASTER) {
        owners.add(unit);
      }
    }
    if (owners.size === 0) {
      return;
    }
    for (const unit of this.registry.list()) {
      const binding = this.registry.outputBinding(unit);
      if (binding === undefined || !owners.has(binding)) {
        continue;
      }
      const outcome = this.rebind(unit, newFrontEnd);
      if (outcome === 'rebound') {
        summary.ownedRebound.push(unit);
      } else if (outcome === 'gone') {
        summary.skipped.push(unit);
      }
    }
  }

  private rebind(unit: UnitId, target: UnitId): RebindOutcome | undefined {
    try {
      this.registry.setOutputBinding(unit, target);
      return 'rebound';
    } catch (error) {
      if (error instanceof UnitNotAliveError) {
        return 'gone';
      }
      this.deps.logger.debug(`Could not rebind <${unit}>: ${describeError(error)}`);
      return undefined;
    }
  }

  private switchLogSink(newFrontEnd: UnitId): boolean {
    const router = this.deps.logRouter;
    try {
      router.swapHandler(createUnitHandler(LOG_HANDLERS.TTY, this.registry, newFrontEnd));
    } catch (error) {
      this.deps.logger.debug(`Logger changes failed for ${describeError(error)} (${getErrorStack(error) ?? 'no stack'})`);
    }
    if (!router.hasHandler(LOG_HANDLERS.TTY)) {
      return false;
    }
    try {
      this.removeFallbackHandler(this.handlerRemovalAttempts);
    } catch (error) {
      this.deps.logger.debug(`Logger changes failed for ${describeError(error)} (${getErrorStack(error) ?? 'no stack'})`);
    }
    return true;
  }

  private removeFallbackHandler(attempts: number): void {
    for (let left = attempts; left > 0; left--) {
      if (this.deps.logRouter.deleteHandler(LOG_HANDLERS.SIMPLE) === 'not_found') {
        return;
      }
    }
    if (this.deps.logRouter.hasHandler(LOG_HANDLERS.SIMPLE)) {
      this.deps.logger.warning('Unable to remove simple log handler');
    }
  }
}
