/**
 * Error Handling Utilities
 */

type ErrorLike = {
  name: string;
  message: string;
  stack?: string;
};

/**
 * Errors thrown by script bundles come from a separate vm realm, so `instanceof Error` is not enough.
 */
export function isErrorLike(value: unknown): value is ErrorLike {
  if (value instanceof Error) {
    return true;
  }
  if (!value || typeof value !== 'object') {
    return false;
  }
  return 'message' in value && typeof value.message === 'string' && 'name' in value && typeof value.name === 'string';
}

export function getErrorMessage(error: unknown): string {
  if (isErrorLike(error)) {
    return error.message;
  }
  return String(error);
}

export function getErrorStack(error: unknown): string | undefined {
  if (isErrorLike(error) && typeof error.stack === 'string') {
    return error.stack;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  if (isErrorLike(error)) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
