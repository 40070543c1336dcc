/**
 * Types for submit-and-confirm retries.
 *
 * @packageDocumentation
 */

import type { Signature } from '@solana/kit';
import type {
  ConfirmationFailedError,
  ConfirmationTimeoutError,
  SubmissionError,
} from '../errors/errors.js';
import type { Logger } from '../logging/logger.js';

/**
 * Terminal result of waiting on one transaction.
 * - `confirmed`: the ledger reports it without error
 * - `failed`: it landed and the ledger reports an error
 * - `unknown`: the status never became available
 */
export type ConfirmationStatus = 'confirmed' | 'failed' | 'unknown';

/**
 * What one submit+confirm attempt produced. Failed attempts carry the error
 * describing them.
 */
export type TransferOutcome =
  | { status: 'submitted'; signature: Signature }
  | { status: 'confirmed'; signature: Signature }
  | { status: 'confirmation-failed'; signature: Signature; error: ConfirmationFailedError }
  | { status: 'confirmation-timeout'; signature: Signature; error: ConfirmationTimeoutError }
  | { status: 'submission-error'; error: SubmissionError };

/**
 * One logical step that can be retried as a whole: each attempt submits a new
 * transaction and waits on it.
 */
export interface RetryableStep {
  /**
   * Human-readable description, used in logs and in `StepExhaustedError`.
   */
  readonly description: string;

  /**
   * Perform one network submission.
   */
  submit(): Promise<Signature>;

  /**
   * Wait until the ledger reports a terminal status for `signature`.
   */
  confirm(signature: Signature): Promise<ConfirmationStatus>;
}

/**
 * Options for {@link retryConfirm}.
 */
export interface RetryConfirmOptions {
  /**
   * Maximum submit+confirm cycles.
   */
  maxAttempts: number;

  /**
   * Fixed delay between attempts in milliseconds.
   */
  delayMs: number;

  /**
   * Whether a submit error may be retried. Errors failing this predicate
   * propagate immediately.
   */
  isRetryable?: (error: unknown) => boolean;

  /**
   * Called for every outcome, including `submitted`.
   */
  onOutcome?: (attempt: number, outcome: TransferOutcome) => void;

  logger?: Logger;
}

/**
 * Result of a step that confirmed.
 */
export interface RetryConfirmResult {
  signature: Signature;
  /**
   * Attempts used, including the successful one.
   */
  attempts: number;
  /**
   * Final outcome of every attempt, in order.
   */
  outcomes: TransferOutcome[];
}
