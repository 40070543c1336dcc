/**
 * Errors raised by the orchestrator.
 *
 * @packageDocumentation
 */

import { HopError } from '@hopline/core';
import type { HopPhase, HopTransferResult } from './types.js';

/**
 * Terminal failure of a hop transfer run before recovery.
 * Carries the partial result so completed steps stay visible.
 */
export class HopTransferFailedError extends HopError {
  constructor(
    public readonly step: HopPhase,
    public readonly attempts: number,
    public readonly cause: unknown,
    public readonly result: HopTransferResult
  ) {
    super(
      `Hop transfer failed at ${step} after ${attempts} attempt${attempts === 1 ? '' : 's'}` +
        (cause instanceof Error ? `: ${cause.message}` : ''),
      'HOP_TRANSFER_FAILED',
      { step, attempts, hopAddress: result.hopAddress, keyFile: result.keyFile }
    );
    this.name = 'HopTransferFailedError';
    Object.setPrototypeOf(this, HopTransferFailedError.prototype);
  }
}

/**
 * Raised inside a recovery attempt when the hop holds nothing worth sweeping.
 * The orchestrator turns it into a skipped step.
 */
export class NothingToRecoverError extends HopError {
  constructor(
    public readonly balance: bigint,
    reason: string
  ) {
    super(reason, 'NOTHING_TO_RECOVER', { balance });
    this.name = 'NothingToRecoverError';
    Object.setPrototypeOf(this, NothingToRecoverError.prototype);
  }
}

export function isHopTransferFailedError(error: unknown): error is HopTransferFailedError {
  return error instanceof HopTransferFailedError;
}

export function isNothingToRecoverError(error: unknown): error is NothingToRecoverError {
  return error instanceof NothingToRecoverError;
}
