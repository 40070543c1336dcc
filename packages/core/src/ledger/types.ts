/**
 * Ledger client contract.
 *
 * Everything above this layer talks to the ledger through {@link LedgerClient};
 * the Kit-backed implementation lives in `kit-client.ts`.
 *
 * @packageDocumentation
 */

import type {
  AccountMeta,
  AccountSignerMeta,
  Address,
  Commitment,
  Signature,
  TransactionSigner,
} from '@solana/kit';
import type { PriorityFeeParams } from '../compute-budget/types.js';

/**
 * Instruction whose signer accounts carry their signer, so that
 * `signTransactionMessageWithSigners` can find every key it needs.
 */
export interface LedgerInstruction {
  programAddress: Address;
  accounts: readonly (AccountMeta | AccountSignerMeta)[];
  data: Uint8Array;
}

/**
 * Move `amount` lamports from `source` to `destination`.
 */
export interface TransferIntent {
  kind: 'transfer';
  source: TransactionSigner;
  destination: Address;
  /** Lamports. */
  amount: bigint;
  priorityFee: PriorityFeeParams;
  /**
   * Account paying the transaction fee. Defaults to `source`.
   */
  feePayer?: TransactionSigner;
  skipPreflight?: boolean;
}

/**
 * Wrap `amount` lamports of the owner's SOL into its wSOL associated token
 * account, then close that account to `destination` in the same transaction.
 * The destination receives the wrapped amount plus the token account rent.
 */
export interface WrapAndCloseIntent {
  kind: 'wrap-and-close';
  owner: TransactionSigner;
  destination: Address;
  /** Lamports. */
  amount: bigint;
  priorityFee: PriorityFeeParams;
  skipPreflight?: boolean;
}

/**
 * Everything a hop transfer ever submits.
 */
export type TransactionIntent = TransferIntent | WrapAndCloseIntent;

/**
 * Status of a submitted transaction as reported by the ledger.
 */
export interface TransactionStatus {
  /**
   * On-chain error, or null when the transaction succeeded.
   */
  err: unknown;
  confirmationStatus: Commitment | null;
}

/**
 * The three ledger capabilities a hop transfer needs.
 */
export interface LedgerClient {
  /**
   * Current balance in lamports.
   */
  getBalance(account: Address, commitment?: Commitment): Promise<bigint>;

  /**
   * Build, sign and broadcast one transaction. Resolves once the ledger has
   * accepted it, not once it is confirmed.
   */
  submit(intent: TransactionIntent): Promise<Signature>;

  /**
   * Status of a transaction at the given commitment, or `null` when it is not
   * (yet) available at that commitment. A landed transaction that failed is
   * reported as soon as it is seen.
   */
  getTransactionStatus(signature: Signature, commitment: Commitment): Promise<TransactionStatus | null>;
}

/**
 * Account that pays the fee for an intent.
 */
export function getIntentFeePayer(intent: TransactionIntent): TransactionSigner {
  switch (intent.kind) {
    case 'transfer':
      return intent.feePayer ?? intent.source;
    case 'wrap-and-close':
      return intent.owner;
  }
}

/**
 * Number of signatures the transaction for an intent carries.
 */
export function getIntentSignatureCount(intent: TransactionIntent): number {
  if (intent.kind === 'transfer' && intent.feePayer && intent.feePayer.address !== intent.source.address) {
    return 2;
  }
  return 1;
}
