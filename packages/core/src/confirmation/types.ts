/**
 * Types for transaction status polling.
 *
 * @packageDocumentation
 */

import type { Commitment } from '@solana/kit';
import type { Logger } from '../logging/logger.js';

/**
 * Options for polling a transaction's status.
 */
export interface PollTransactionStatusOptions {
  /**
   * Commitment the transaction must reach.
   * @default 'finalized'
   */
  commitment?: Commitment;

  /**
   * Maximum number of status fetches.
   * @default 20
   */
  maxPolls?: number;

  /**
   * Delay between fetches in milliseconds.
   * @default 3000
   */
  intervalMs?: number;

  logger?: Logger;
}
