/**
 * Transaction confirmation by status polling.
 *
 * @packageDocumentation
 */

export type { PollTransactionStatusOptions } from './types.js';
export {
  DEFAULT_CONFIRMATION_COMMITMENT,
  DEFAULT_CONFIRMATION_MAX_POLLS,
  DEFAULT_CONFIRMATION_INTERVAL_MS,
  pollTransactionStatus,
  createConfirmer,
} from './poll.js';
