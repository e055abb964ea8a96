/**
 * Inspection error utilities.
 *
 * Faults are reserved for conditions that stop a specific call: an
 * unreadable required location or a path outside the naming convention.
 * Structural violations are never raised; see types/checks.
 */

/**
 * Fault codes surfaced to callers.
 */
export type InspectionErrorCode =
  | 'AccessFault'
  | 'NotARepo'
  | 'MalformedIdentifier'
  | 'Timeout';

/**
 * Plain shape of an inspection error (for JSON output and logs).
 */
export interface InspectionErrorShape {
  code: InspectionErrorCode;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
}

/**
 * Error raised by the inspectors and the path scheme.
 */
export class CacheInspectionError extends Error implements InspectionErrorShape {
  public readonly code: InspectionErrorCode;
  public readonly path?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: InspectionErrorCode,
    message: string,
    options: { path?: string; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CacheInspectionError';
    this.code = code;
    this.path = options.path;
    this.details = options.details;
  }

  /**
   * Serialize error into plain shape.
   */
  public toObject(): InspectionErrorShape {
    return {
      code: this.code,
      message: this.message,
      ...(this.path !== undefined ? { path: this.path } : {}),
      ...(this.details !== undefined ? { details: this.details } : {}),
    };
  }
}

/**
 * Narrow an unknown error to a Node errno error.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * True when the error means the path does not exist.
 */
export function isNotFound(error: unknown): boolean {
  return isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * True for an abort raised through an AbortSignal.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Convenience helper to create access faults.
 */
export function createAccessFault(path: string, cause?: unknown): CacheInspectionError {
  const reason = isErrnoException(cause) ? ` (${cause.code})` : '';
  return new CacheInspectionError('AccessFault', `Cannot read ${path}${reason}`, {
    path,
    cause,
  });
}

/**
 * Map unknown errors raised while reading `path` into CacheInspectionError
 * instances.
 *
 * @param error - Error thrown by the filesystem or an abort signal
 * @param path - Location being read when the error occurred
 */
export function toInspectionError(error: unknown, path: string): CacheInspectionError {
  if (error instanceof CacheInspectionError) {
    return error;
  }

  if (isAbortError(error)) {
    return new CacheInspectionError('Timeout', `Inspection of ${path} was cut short`, {
      path,
      cause: error,
    });
  }

  return createAccessFault(path, error);
}
