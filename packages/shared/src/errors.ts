/**
 * Error class carrying a perception error code.
 */
import { ERROR_RECOVERY } from './types/errors.js';
import type { ErrorCode } from './types/errors.js';

export class PerceptionError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'PerceptionError';
    this.code = code;
  }

  /** Recovery suggestion for this error's code */
  get hint(): string {
    return ERROR_RECOVERY[this.code];
  }
}

/** Type guard for perception errors, optionally of one code */
export function isPerceptionError(err: unknown, code?: ErrorCode): err is PerceptionError {
  if (!(err instanceof PerceptionError)) return false;
  return code === undefined || err.code === code;
}
