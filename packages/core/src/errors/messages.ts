/**
 * Human-readable error messages for hop-transfer errors.
 *
 * @packageDocumentation
 */

import { lamportsToSol } from '../utils/amounts.js';
import { InsufficientBalanceError, type HopError } from './errors.js';

/**
 * Get a human-readable error message for a hop-transfer error.
 */
export function getHopErrorMessage(error: HopError): string {
  if (error instanceof InsufficientBalanceError) {
    return `Not enough SOL in ${error.account}. Required: ${formatLamports(error.required)}, Available: ${formatLamports(error.available)}`;
  }
  switch (error.code) {
    case 'BALANCE_TIMEOUT':
      return `Funds never showed up in the hop account: ${error.message}`;
    case 'STEP_EXHAUSTED':
      return `Gave up: ${error.message}`;
    case 'CONFIRMATION_FAILED':
      return `Transaction landed but failed: ${error.message}`;
    case 'CONFIRMATION_TIMEOUT':
      return `Transaction was not confirmed in time: ${error.message}`;
    case 'SUBMISSION_FAILED':
    case 'LEDGER_RPC_ERROR':
      return `Network error: ${error.message}`;
    case 'INVALID_CONFIG':
      return `Invalid configuration: ${error.message}`;
    default:
      return error.message;
  }
}

/**
 * Get user-friendly error title.
 */
export function getHopErrorTitle(error: HopError): string {
  switch (error.code) {
    case 'INSUFFICIENT_BALANCE':
      return 'Insufficient Balance';
    case 'BALANCE_TIMEOUT':
      return 'Balance Timeout';
    case 'STEP_EXHAUSTED':
      return 'Retries Exhausted';
    case 'CONFIRMATION_FAILED':
      return 'Transaction Failed';
    case 'CONFIRMATION_TIMEOUT':
      return 'Confirmation Timeout';
    case 'SUBMISSION_FAILED':
      return 'Submission Failed';
    case 'LEDGER_RPC_ERROR':
      return 'Network Error';
    case 'INVALID_CONFIG':
      return 'Invalid Configuration';
    default:
      return 'Hop Transfer Error';
  }
}

function formatLamports(lamports: bigint): string {
  return `${lamportsToSol(lamports).toFixed(9)} SOL`;
}
