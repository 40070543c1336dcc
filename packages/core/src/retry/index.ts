/**
 * Submit-and-confirm retries.
 *
 * @packageDocumentation
 */

export type {
  ConfirmationStatus,
  TransferOutcome,
  RetryableStep,
  RetryConfirmOptions,
  RetryConfirmResult,
} from './types.js';
export { retryConfirm } from './retry-confirm.js';
