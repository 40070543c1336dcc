/**
 * Type guards and predicates for errors.
 *
 * @packageDocumentation
 */

import {
  HopError,
  InsufficientBalanceError,
  SubmissionError,
  ConfirmationFailedError,
  ConfirmationTimeoutError,
  BalanceTimeoutError,
  StepExhaustedError,
  LedgerRpcError,
  HopConfigError,
} from './errors.js';

/**
 * Check if error derives from {@link HopError}. This includes errors defined
 * outside this package, so the guard does not narrow to {@link HopErrorType}.
 */
export function isHopError(error: unknown): error is HopError {
  return error instanceof HopError;
}

export function isInsufficientBalanceError(error: unknown): error is InsufficientBalanceError {
  return error instanceof InsufficientBalanceError;
}

export function isSubmissionError(error: unknown): error is SubmissionError {
  return error instanceof SubmissionError;
}

export function isConfirmationFailedError(error: unknown): error is ConfirmationFailedError {
  return error instanceof ConfirmationFailedError;
}

export function isConfirmationTimeoutError(error: unknown): error is ConfirmationTimeoutError {
  return error instanceof ConfirmationTimeoutError;
}

export function isBalanceTimeoutError(error: unknown): error is BalanceTimeoutError {
  return error instanceof BalanceTimeoutError;
}

export function isStepExhaustedError(error: unknown): error is StepExhaustedError {
  return error instanceof StepExhaustedError;
}

export function isLedgerRpcError(error: unknown): error is LedgerRpcError {
  return error instanceof LedgerRpcError;
}

export function isHopConfigError(error: unknown): error is HopConfigError {
  return error instanceof HopConfigError;
}

/**
 * Default retry predicate for submit+confirm attempts.
 * Balance shortfalls and bad configuration won't change on a second try.
 */
export function isRetryableError(error: unknown): boolean {
  return !isInsufficientBalanceError(error) && !isHopConfigError(error);
}
