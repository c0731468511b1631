/**
 * Execution errors. Every failure that can end a transaction is one of these;
 * anything else thrown during dispatch is a defect and propagates as-is.
 */

import type { ExecutionFailure } from './types.js';

export const EXECUTION_ERROR_CODES = [
  'INVALID_PROOF',
  'UNAUTHORIZED',
  'DISPATCH_FAILURE',
  'INVALID_ARGUMENT',
] as const;

export type ExecutionErrorCode = typeof EXECUTION_ERROR_CODES[number];

export abstract class ExecutionError extends Error {
  abstract readonly code: ExecutionErrorCode;

  /** Serializable form stored on receipts. */
  toFailure(): ExecutionFailure {
    return { code: this.code, reason: this.message };
  }
}

/** An attach proof did not verify. */
export class InvalidProofError extends ExecutionError {
  readonly code = 'INVALID_PROOF';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidProofError';
  }
}

/** The authorization gate denied the caller. */
export class UnauthorizedError extends ExecutionError {
  readonly code = 'UNAUTHORIZED';

  constructor(message: string) {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

/** A call's target rejected it. */
export class DispatchFailureError extends ExecutionError {
  readonly code = 'DISPATCH_FAILURE';

  constructor(readonly reason: string) {
    super(reason);
    this.name = 'DispatchFailureError';
  }
}

/** Zero amounts, identical token pairs, duplicate registrations and the like. */
export class InvalidArgumentError extends ExecutionError {
  readonly code = 'INVALID_ARGUMENT';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export function isExecutionError(err: unknown): err is ExecutionError {
  return err instanceof ExecutionError;
}
