/**
 * Bounded submit-and-confirm retries.
 *
 * @packageDocumentation
 */

import type { Signature } from '@solana/kit';
import {
  ConfirmationFailedError,
  ConfirmationTimeoutError,
  StepExhaustedError,
  SubmissionError,
} from '../errors/errors.js';
import { isRetryableError } from '../errors/predicates.js';
import { silentLogger } from '../logging/logger.js';
import { sleep } from '../utils/sleep.js';
import type {
  ConfirmationStatus,
  RetryableStep,
  RetryConfirmOptions,
  RetryConfirmResult,
  TransferOutcome,
} from './types.js';

function toOutcome(signature: Signature, status: ConfirmationStatus): TransferOutcome {
  switch (status) {
    case 'confirmed':
      return { status: 'confirmed', signature };
    case 'failed':
      return {
        status: 'confirmation-failed',
        signature,
        error: new ConfirmationFailedError(signature, 'transaction failed on-chain'),
      };
    case 'unknown':
      return { status: 'confirmation-timeout', signature, error: new ConfirmationTimeoutError(signature) };
  }
}

function toSubmissionError(description: string, error: unknown): SubmissionError {
  return error instanceof SubmissionError ? error : new SubmissionError(description, error);
}

/**
 * Run `step` until one of its transactions confirms, at most `maxAttempts`
 * times, sleeping `delayMs` between attempts.
 *
 * Every attempt submits a new transaction. A transaction that landed and
 * failed is never re-checked; the next attempt sends a fresh one. No
 * deduplication happens across attempts.
 *
 * @throws {StepExhaustedError} when every attempt failed
 * @throws the submit error itself when `isRetryable` rejects it
 *
 * @example
 * ```ts
 * const { signature } = await retryConfirm(fundStep, { maxAttempts: 3, delayMs: 1000 });
 * ```
 */
export async function retryConfirm(
  step: RetryableStep,
  options: RetryConfirmOptions
): Promise<RetryConfirmResult> {
  const { maxAttempts, delayMs, isRetryable = isRetryableError, onOutcome, logger = silentLogger } = options;
  const outcomes: TransferOutcome[] = [];

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    logger.info(`Attempt ${attempt}/${maxAttempts}: ${step.description}`);

    let outcome: TransferOutcome;
    try {
      const signature = await step.submit();
      onOutcome?.(attempt, { status: 'submitted', signature });
      logger.debug('Submitted', { signature, attempt });

      outcome = toOutcome(signature, await step.confirm(signature));
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      outcome = { status: 'submission-error', error: toSubmissionError(step.description, error) };
    }

    outcomes.push(outcome);
    onOutcome?.(attempt, outcome);

    if (outcome.status === 'confirmed') {
      return { signature: outcome.signature, attempts: attempt, outcomes };
    }

    switch (outcome.status) {
      case 'confirmation-failed':
        logger.warn('Confirmation failed', { signature: outcome.signature, reason: outcome.error.reason });
        break;
      case 'confirmation-timeout':
        logger.warn('Confirmation timed out', { signature: outcome.signature });
        break;
      case 'submission-error':
        logger.warn(outcome.error.message);
        break;
    }

    if (attempt < maxAttempts) {
      await sleep(delayMs);
    }
  }

  throw new StepExhaustedError(step.description, maxAttempts, outcomes);
}
