/**
 * Recovery strategies: how leftover hop funds are swept after forwarding.
 *
 * @packageDocumentation
 */

import type { Address, Signature, TransactionSigner } from '@solana/kit';
import {
  TOKEN_ACCOUNT_RENT_LAMPORTS,
  estimateTransactionFee,
  isRetryableError,
  type ConfirmationStatus,
  type PriorityFeeParams,
  type RetryableStep,
} from '@hopline/core';
import { NothingToRecoverError, isNothingToRecoverError } from './errors.js';
import type { StepContext } from './steps.js';
import type { RecoveryStrategyName } from './types.js';

/**
 * Everything a strategy may need to build its step.
 */
export interface RecoveryContext extends StepContext {
  hop: TransactionSigner;
  sender: TransactionSigner;
  receiver: Address;
  wrapComputeUnitLimit: number;
}

export interface RecoveryStrategy {
  readonly name: RecoveryStrategyName;

  /**
   * Lamports the hop must hold beyond the forwarded amount for this
   * strategy's own transaction.
   */
  hopReserve(context: RecoveryContext): bigint;

  /**
   * Build the sweep step. Its `submit` reads the hop balance and throws
   * {@link NothingToRecoverError} when there is nothing to sweep.
   */
  createStep(context: RecoveryContext): RetryableStep;
}

/**
 * Retry predicate for recovery attempts: an empty hop is final.
 */
export function isRecoveryRetryable(error: unknown): boolean {
  return isRetryableError(error) && !isNothingToRecoverError(error);
}

class DirectTransferStep implements RetryableStep {
  readonly description: string;

  constructor(private readonly context: RecoveryContext) {
    this.description = `Recover hop balance to sender ${context.sender.address}`;
  }

  async submit(): Promise<Signature> {
    const { ledger, hop, sender, priorityFee } = this.context;
    const balance = await ledger.getBalance(hop.address);
    if (balance === 0n) {
      throw new NothingToRecoverError(balance, 'Hop account is empty');
    }

    return ledger.submit({
      kind: 'transfer',
      source: hop,
      destination: sender.address,
      amount: balance,
      priorityFee,
      feePayer: sender,
      skipPreflight: true,
    });
  }

  confirm(signature: Signature): Promise<ConfirmationStatus> {
    return this.context.confirm(signature);
  }
}

/**
 * Sweep the whole hop balance back to the sender. The sender co-signs and
 * pays the fee, so nothing is left behind in the hop.
 */
export const directTransferRecovery: RecoveryStrategy = {
  name: 'direct-transfer',
  hopReserve: () => 0n,
  createStep: (context) => new DirectTransferStep(context),
};

function wrapPriorityFee(context: RecoveryContext): PriorityFeeParams {
  return { computeUnitPrice: context.priorityFee.computeUnitPrice, computeUnitLimit: context.wrapComputeUnitLimit };
}

class WrapAndCloseStep implements RetryableStep {
  readonly description: string;

  constructor(private readonly context: RecoveryContext) {
    this.description = `Wrap and close hop balance to receiver ${context.receiver}`;
  }

  async submit(): Promise<Signature> {
    const { ledger, hop, receiver } = this.context;
    const priorityFee = wrapPriorityFee(this.context);
    const balance = await ledger.getBalance(hop.address);
    const amount = balance - estimateTransactionFee(1, priorityFee) - TOKEN_ACCOUNT_RENT_LAMPORTS;
    if (amount <= 0n) {
      throw new NothingToRecoverError(balance, `Hop balance of ${balance} lamports does not cover wrap fee and rent`);
    }

    return ledger.submit({
      kind: 'wrap-and-close',
      owner: hop,
      destination: receiver,
      amount,
      priorityFee,
    });
  }

  confirm(signature: Signature): Promise<ConfirmationStatus> {
    return this.context.confirm(signature);
  }
}

/**
 * Wrap what is left into the hop's wSOL account and close it to the
 * receiver. The hop pays the fee and the rent comes back with the close.
 */
export const wrapAndCloseRecovery: RecoveryStrategy = {
  name: 'wrap-and-close',
  hopReserve: (context) => estimateTransactionFee(1, wrapPriorityFee(context)) + TOKEN_ACCOUNT_RENT_LAMPORTS,
  createStep: (context) => new WrapAndCloseStep(context),
};

/**
 * Look up a strategy by name.
 */
export function getRecoveryStrategy(name: RecoveryStrategyName): RecoveryStrategy {
  switch (name) {
    case 'direct-transfer':
      return directTransferRecovery;
    case 'wrap-and-close':
      return wrapAndCloseRecovery;
  }
}
