/**
 * Control errors
 */

/** Out-of-range control input, rejected before anything is written */
export class ControlValidationError extends Error {
  override readonly name = 'ControlValidationError';

  constructor(message: string) {
    super(message);
  }
}

/**
 * A privileged write or helper run that failed. `reason` carries the errno
 * code or the helper's stderr. Never retried.
 */
export class ControlWriteError extends Error {
  override readonly name = 'ControlWriteError';

  constructor(
    message: string,
    readonly reason: string,
  ) {
    super(`${message}: ${reason}`);
  }
}

export function isControlError(error: unknown): error is ControlValidationError | ControlWriteError {
  return error instanceof ControlValidationError || error instanceof ControlWriteError;
}

/** errno code, trimmed stderr, or the message of a failed write or helper */
export function failureReason(error: unknown): string {
  if (typeof error === 'object' && error !== null) {
    if ('stderr' in error) {
      const stderr = String(error.stderr ?? '').trim();
      if (stderr !== '') return stderr;
    }
    if ('code' in error && typeof error.code === 'string') {
      return error.code;
    }
  }
  return error instanceof Error ? error.message : String(error);
}
