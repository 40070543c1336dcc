/**
 * The fund and forward steps, each one submit+confirm unit for `retryConfirm`.
 *
 * @packageDocumentation
 */

import type { Address, Signature, TransactionSigner } from '@solana/kit';
import {
  InsufficientBalanceError,
  estimateTransactionFee,
  lamportsToSol,
  type ConfirmationStatus,
  type LedgerClient,
  type PriorityFeeParams,
  type RetryableStep,
} from '@hopline/core';

/**
 * What every step needs from the run.
 */
export interface StepContext {
  ledger: LedgerClient;
  priorityFee: PriorityFeeParams;
  confirm: (signature: Signature) => Promise<ConfirmationStatus>;
}

/**
 * Sender → hop, for `amount + hopFee`.
 *
 * Every attempt reads the sender balance first and refuses to submit when it
 * cannot cover the transfer and its fee. The required balance is therefore
 * `amount + hopFee + fee`, not just `amount + hopFee`: the funding
 * transaction's own fee comes out of the sender on top of what the hop
 * receives.
 */
export class FundHopStep implements RetryableStep {
  readonly description: string;

  constructor(
    private readonly context: StepContext,
    private readonly sender: TransactionSigner,
    private readonly hop: Address,
    private readonly lamports: bigint
  ) {
    this.description = `Fund hop account ${hop} with ${lamportsToSol(lamports)} SOL`;
  }

  async submit(): Promise<Signature> {
    const { ledger, priorityFee } = this.context;
    const required = this.lamports + estimateTransactionFee(1, priorityFee);
    const available = await ledger.getBalance(this.sender.address);
    if (available < required) {
      throw new InsufficientBalanceError(this.sender.address, required, available);
    }

    return ledger.submit({
      kind: 'transfer',
      source: this.sender,
      destination: this.hop,
      amount: this.lamports,
      priorityFee,
    });
  }

  confirm(signature: Signature): Promise<ConfirmationStatus> {
    return this.context.confirm(signature);
  }
}

/**
 * Hop → receiver, for a fixed amount. The hop pays its own fee.
 */
export class ForwardStep implements RetryableStep {
  readonly description: string;

  constructor(
    private readonly context: StepContext,
    private readonly hop: TransactionSigner,
    private readonly receiver: Address,
    private readonly lamports: bigint
  ) {
    this.description = `Forward ${lamportsToSol(lamports)} SOL to receiver ${receiver}`;
  }

  async submit(): Promise<Signature> {
    const { ledger, priorityFee } = this.context;
    const required = this.lamports + estimateTransactionFee(1, priorityFee);
    const available = await ledger.getBalance(this.hop.address);
    if (available < required) {
      throw new InsufficientBalanceError(this.hop.address, required, available);
    }

    return ledger.submit({
      kind: 'transfer',
      source: this.hop,
      destination: this.receiver,
      amount: this.lamports,
      priorityFee,
    });
  }

  confirm(signature: Signature): Promise<ConfirmationStatus> {
    return this.context.confirm(signature);
  }
}
