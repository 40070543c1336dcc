/**
 * Confirmation by polling the ledger for a transaction's status.
 *
 * @packageDocumentation
 */

import type { Signature } from '@solana/kit';
import type { LedgerClient } from '../ledger/types.js';
import { silentLogger } from '../logging/logger.js';
import type { ConfirmationStatus } from '../retry/types.js';
import { sleep } from '../utils/sleep.js';
import type { PollTransactionStatusOptions } from './types.js';

export const DEFAULT_CONFIRMATION_COMMITMENT = 'finalized';
export const DEFAULT_CONFIRMATION_MAX_POLLS = 20;
export const DEFAULT_CONFIRMATION_INTERVAL_MS = 3_000;

/**
 * Poll until the ledger reports a terminal status for `signature`.
 *
 * Fetch errors and missing statuses both mean "not available yet" and are
 * polled again. Returns `'unknown'` when `maxPolls` fetches never produced a
 * status; callers treat that as a failed attempt, never as success.
 */
export async function pollTransactionStatus(
  ledger: LedgerClient,
  signature: Signature,
  options: PollTransactionStatusOptions = {}
): Promise<ConfirmationStatus> {
  const {
    commitment = DEFAULT_CONFIRMATION_COMMITMENT,
    maxPolls = DEFAULT_CONFIRMATION_MAX_POLLS,
    intervalMs = DEFAULT_CONFIRMATION_INTERVAL_MS,
    logger = silentLogger,
  } = options;

  for (let poll = 1; poll <= maxPolls; poll++) {
    try {
      const status = await ledger.getTransactionStatus(signature, commitment);
      if (status) {
        if (status.err === null || status.err === undefined) {
          logger.info(`Transaction confirmed (poll ${poll})`, { signature });
          return 'confirmed';
        }
        logger.warn('Transaction failed', { signature, err: status.err });
        return 'failed';
      }
      logger.debug(`Awaiting confirmation (poll ${poll}/${maxPolls})`, { signature });
    } catch (error) {
      logger.debug(`Status not available (poll ${poll}/${maxPolls})`, {
        signature,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (poll < maxPolls) {
      await sleep(intervalMs);
    }
  }

  logger.warn('Max polls reached, confirmation unknown', { signature, polls: maxPolls });
  return 'unknown';
}

/**
 * Bind {@link pollTransactionStatus} to a ledger and options, giving the
 * `confirm` half of a retryable step.
 */
export function createConfirmer(
  ledger: LedgerClient,
  options: PollTransactionStatusOptions = {}
): (signature: Signature) => Promise<ConfirmationStatus> {
  return (signature) => pollTransactionStatus(ledger, signature, options);
}
