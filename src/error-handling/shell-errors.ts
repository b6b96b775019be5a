/**
 * Shell error types
 */

import { describeError, getErrorStack } from '../utils/error-handling-utils.js';

export type ShellErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'ENVIRONMENT_TAKEOVER_ERROR'
  | 'SCRIPT_EXECUTION_ERROR'
  | 'NAMING_CONFLICT'
  | 'UNIT_NOT_ALIVE';

export class ShellError extends Error {
  public readonly code: ShellErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ShellErrorCode, context?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ShellError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Contradictory or invalid options; raised before any bootstrap step has side effects.
 */
export class ConfigurationError extends ShellError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'CONFIGURATION_ERROR', context, cause);
    this.name = 'ConfigurationError';
  }
}

export class EnvironmentTakeoverError extends ShellError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'ENVIRONMENT_TAKEOVER_ERROR', context, cause);
    this.name = 'EnvironmentTakeoverError';
  }
}

export type ScriptFailureCategory = 'extract' | 'load' | 'invoke';

export class ScriptExecutionError extends ShellError {
  public readonly file: string;
  public readonly category: ScriptFailureCategory;
  public readonly causeStack?: string;

  constructor(file: string, category: ScriptFailureCategory, cause: unknown) {
    const reason = describeError(cause);
    super(`Couldn't run shell script ${file} - ${category}: ${reason}`, 'SCRIPT_EXECUTION_ERROR', { file, category }, cause);
    this.name = 'ScriptExecutionError';
    this.file = file;
    this.category = category;
    this.causeStack = getErrorStack(cause);
  }
}

export class NamingConflictError extends ShellError {
  public readonly unitName: string;

  constructor(unitName: string, existing: number) {
    super(`Name ${unitName} is already registered to unit <${existing}>`, 'NAMING_CONFLICT', { unitName, existing });
    this.name = 'NamingConflictError';
    this.unitName = unitName;
  }
}

/**
 * Raised when a unit terminated before an operation on it; the migration treats it as a race.
 */
export class UnitNotAliveError extends ShellError {
  public readonly unitId: number;

  constructor(unitId: number) {
    super(`Unit <${unitId}> is not alive`, 'UNIT_NOT_ALIVE', { unitId });
    this.name = 'UnitNotAliveError';
    this.unitId = unitId;
  }
}
