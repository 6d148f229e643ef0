/**
 * Helpers for reading fields off thrown values of unknown type.
 */

export interface ErrorLike {
  message?: unknown;
  code?: unknown;
  status?: unknown;
  cause?: unknown;
  [key: string]: unknown;
}

export function isErrorLike(value: unknown): value is ErrorLike {
  return typeof value === 'object' && value !== null;
}

export function getErrorMessage(error: unknown): string {
  if (isErrorLike(error) && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function getErrorCode(error: unknown): string | undefined {
  if (isErrorLike(error) && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Message of the error followed by the messages of its `cause` chain,
 * joined with ": ".
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  let depth = 0;

  while (current !== undefined && current !== null && depth < 5) {
    parts.push(getErrorMessage(current));
    current = isErrorLike(current) ? current.cause : undefined;
    depth++;
  }

  return parts.join(': ');
}

/** Reads a property off an unknown value, or undefined when it is not an object. */
export function safeGetProperty(obj: unknown, key: string): unknown {
  if (isErrorLike(obj) && key in obj) {
    return obj[key];
  }
  return undefined;
}
