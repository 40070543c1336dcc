/**
 * Typed error definitions for hop transfers.
 *
 * @packageDocumentation
 */

import type { Address, Signature } from '@solana/kit';
import type { TransferOutcome } from '../retry/types.js';

/**
 * Base error class for all hop-transfer errors.
 */
export class HopError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HopError';
    Object.setPrototypeOf(this, HopError.prototype);
  }
}

/**
 * Error thrown when an account cannot cover the amount a step needs.
 * Detected before anything is submitted.
 */
export class InsufficientBalanceError extends HopError {
  constructor(
    public readonly account: Address,
    public readonly required: bigint,
    public readonly available: bigint
  ) {
    super(
      `Insufficient balance in ${account}: required ${required.toString()}, available ${available.toString()}`,
      'INSUFFICIENT_BALANCE',
      { account, required, available }
    );
    this.name = 'InsufficientBalanceError';
    Object.setPrototypeOf(this, InsufficientBalanceError.prototype);
  }
}

/**
 * Error thrown when the ledger rejects or fails to broadcast a transaction.
 */
export class SubmissionError extends HopError {
  constructor(
    public readonly description: string,
    public readonly cause?: unknown
  ) {
    super(
      `Submission failed: ${description}${cause instanceof Error ? ` (${cause.message})` : ''}`,
      'SUBMISSION_FAILED',
      { description, cause }
    );
    this.name = 'SubmissionError';
    Object.setPrototypeOf(this, SubmissionError.prototype);
  }
}

/**
 * Error describing a transaction that landed but failed on-chain.
 */
export class ConfirmationFailedError extends HopError {
  constructor(
    public readonly signature: Signature,
    public readonly reason: string
  ) {
    super(`Transaction ${signature} failed: ${reason}`, 'CONFIRMATION_FAILED', {
      signature,
      reason,
    });
    this.name = 'ConfirmationFailedError';
    Object.setPrototypeOf(this, ConfirmationFailedError.prototype);
  }
}

/**
 * Error describing a transaction whose status never resolved.
 */
export class ConfirmationTimeoutError extends HopError {
  constructor(
    public readonly signature: Signature,
    public readonly polls?: number
  ) {
    super(
      polls === undefined
        ? `Transaction ${signature} was not confirmed in time`
        : `Transaction ${signature} not confirmed after ${polls} status polls`,
      'CONFIRMATION_TIMEOUT',
      { signature, polls }
    );
    this.name = 'ConfirmationTimeoutError';
    Object.setPrototypeOf(this, ConfirmationTimeoutError.prototype);
  }
}

/**
 * Error thrown when an account never reaches the expected balance.
 */
export class BalanceTimeoutError extends HopError {
  constructor(
    public readonly account: Address,
    public readonly polls: number,
    public readonly lastObserved?: bigint
  ) {
    super(
      `Balance of ${account} not satisfied after ${polls} polls` +
        (lastObserved === undefined ? '' : ` (last observed ${lastObserved.toString()} lamports)`),
      'BALANCE_TIMEOUT',
      { account, polls, lastObserved }
    );
    this.name = 'BalanceTimeoutError';
    Object.setPrototypeOf(this, BalanceTimeoutError.prototype);
  }
}

/**
 * Error thrown when a step used up its whole retry budget.
 */
export class StepExhaustedError extends HopError {
  constructor(
    public readonly description: string,
    public readonly attempts: number,
    public readonly outcomes: readonly TransferOutcome[]
  ) {
    super(`${description} failed after ${attempts} attempts.`, 'STEP_EXHAUSTED', {
      description,
      attempts,
    });
    this.name = 'StepExhaustedError';
    Object.setPrototypeOf(this, StepExhaustedError.prototype);
  }
}

/**
 * Error thrown when an RPC call to the ledger fails.
 */
export class LedgerRpcError extends HopError {
  constructor(
    public readonly method: string,
    public readonly cause?: unknown
  ) {
    super(
      `Ledger RPC ${method} failed${cause instanceof Error ? `: ${cause.message}` : ''}`,
      'LEDGER_RPC_ERROR',
      { method, cause }
    );
    this.name = 'LedgerRpcError';
    Object.setPrototypeOf(this, LedgerRpcError.prototype);
  }
}

/**
 * Error thrown when configuration or call arguments are invalid.
 */
export class HopConfigError extends HopError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, 'INVALID_CONFIG', { field });
    this.name = 'HopConfigError';
    Object.setPrototypeOf(this, HopConfigError.prototype);
  }
}

/**
 * Union type of all hop-transfer errors raised by this package.
 */
export type HopErrorType =
  | InsufficientBalanceError
  | SubmissionError
  | ConfirmationFailedError
  | ConfirmationTimeoutError
  | BalanceTimeoutError
  | StepExhaustedError
  | LedgerRpcError
  | HopConfigError;
