/**
 * In-process ledger for tests: balances, fees, scripted delays and failures.
 *
 * @packageDocumentation
 */

import {
  getBase58Decoder,
  signature as toSignature,
  type Address,
  type Commitment,
  type Signature,
} from '@solana/kit';
import type { LedgerClient, TransactionIntent, TransactionStatus } from '../ledger/types.js';

/**
 * Ledger fee model used by the in-memory ledger.
 */
export const IN_MEMORY_SIGNATURE_FEE = 5_000n;
export const IN_MEMORY_TOKEN_ACCOUNT_RENT = 2_039_280n;

export interface SubmittedTransaction {
  signature: Signature;
  intent: TransactionIntent;
  fee: bigint;
  /**
   * Whether the transaction landed with an on-chain error.
   */
  failed: boolean;
}

/**
 * Deterministic, valid transaction signature for tests.
 */
export function createTestSignature(seed: number): Signature {
  const bytes = new Uint8Array(64).fill(1 + (seed % 250));
  bytes[63] = 1 + Math.floor(seed / 250);
  return toSignature(getBase58Decoder().decode(bytes));
}

/**
 * Ledger that lives in memory. Transactions apply instantly; confirmation
 * can be delayed with {@link InMemoryLedger.setPendingPolls}.
 */
export class InMemoryLedger implements LedgerClient {
  readonly submissions: SubmittedTransaction[] = [];
  submitCalls = 0;
  balanceReads = 0;
  statusReads = 0;

  private readonly balances = new Map<string, bigint>();
  private readonly hiddenBalanceReads = new Map<string, number>();
  private readonly pollsBySignature = new Map<string, number>();
  private readonly outcomes = new Map<string, unknown>();
  private pendingPolls = 0;
  private submitFailure: { remaining: number; error: unknown } | undefined;
  private failingTransactions = 0;
  private failingBalanceReads = 0;

  constructor(balances: Record<string, bigint> = {}) {
    for (const [account, lamports] of Object.entries(balances)) {
      this.balances.set(account, lamports);
    }
  }

  setBalance(account: Address, lamports: bigint): void {
    this.balances.set(account, lamports);
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  /**
   * The next `count` submits throw `error` without touching any balance.
   */
  failNextSubmissions(count: number, error: unknown = new Error('RPC unavailable')): void {
    this.submitFailure = { remaining: count, error };
  }

  /**
   * Every submit throws from now on.
   */
  failAllSubmissions(error: unknown = new Error('RPC unavailable')): void {
    this.submitFailure = { remaining: Number.POSITIVE_INFINITY, error };
  }

  /**
   * The next `count` transactions land but fail on-chain: the fee is charged,
   * nothing else moves.
   */
  failNextTransactions(count: number): void {
    this.failingTransactions = count;
  }

  /**
   * Status polls return "not available" this many times per transaction
   * before the status shows up.
   */
  setPendingPolls(polls: number): void {
    this.pendingPolls = polls;
  }

  /**
   * The next `count` balance reads throw.
   */
  failNextBalanceReads(count: number): void {
    this.failingBalanceReads = count;
  }

  /**
   * The next `reads` balance reads of `account` report zero.
   */
  hideBalance(account: Address, reads: number): void {
    this.hiddenBalanceReads.set(account, reads);
  }

  async getBalance(account: Address, _commitment?: Commitment): Promise<bigint> {
    this.balanceReads++;
    if (this.failingBalanceReads > 0) {
      this.failingBalanceReads--;
      throw new Error('getBalance: connection reset');
    }
    const hidden = this.hiddenBalanceReads.get(account) ?? 0;
    if (hidden > 0) {
      this.hiddenBalanceReads.set(account, hidden - 1);
      return 0n;
    }
    return this.balanceOf(account);
  }

  async submit(intent: TransactionIntent): Promise<Signature> {
    this.submitCalls++;
    if (this.submitFailure && this.submitFailure.remaining > 0) {
      this.submitFailure.remaining--;
      throw this.submitFailure.error;
    }

    const fee = this.feeFor(intent);
    const payer = intent.kind === 'transfer' ? (intent.feePayer ?? intent.source) : intent.owner;
    const debit = this.debitFor(intent);
    const debtor = intent.kind === 'transfer' ? intent.source.address : intent.owner.address;

    if (this.balanceOf(payer.address) < fee) {
      throw new Error(`Attempt to debit an account but found no record of a prior credit: ${payer.address}`);
    }
    const needed = payer.address === debtor ? fee + debit : debit;
    if (this.balanceOf(debtor) < needed) {
      throw new Error(`Transaction simulation failed: insufficient lamports in ${debtor}`);
    }

    const signature = createTestSignature(this.submissions.length + 1);
    const failed = this.failingTransactions > 0;
    if (failed) {
      this.failingTransactions--;
    }

    this.credit(payer.address, -fee);
    if (!failed) {
      this.apply(intent);
    }

    this.outcomes.set(signature, failed ? { InstructionError: [2, { Custom: 1 }] } : null);
    this.submissions.push({ signature, intent, fee, failed });
    return signature;
  }

  async getTransactionStatus(signature: Signature, _commitment: Commitment): Promise<TransactionStatus | null> {
    this.statusReads++;
    if (!this.outcomes.has(signature)) {
      return null;
    }
    const polls = (this.pollsBySignature.get(signature) ?? 0) + 1;
    this.pollsBySignature.set(signature, polls);
    if (polls <= this.pendingPolls) {
      return null;
    }
    return { err: this.outcomes.get(signature) ?? null, confirmationStatus: 'finalized' };
  }

  private feeFor(intent: TransactionIntent): bigint {
    const { computeUnitPrice, computeUnitLimit } = intent.priorityFee;
    const priority = (BigInt(computeUnitPrice) * BigInt(computeUnitLimit) + 999_999n) / 1_000_000n;
    const twoSigners =
      intent.kind === 'transfer' && intent.feePayer !== undefined && intent.feePayer.address !== intent.source.address;
    return IN_MEMORY_SIGNATURE_FEE * (twoSigners ? 2n : 1n) + priority;
  }

  private debitFor(intent: TransactionIntent): bigint {
    return intent.kind === 'transfer' ? intent.amount : intent.amount + IN_MEMORY_TOKEN_ACCOUNT_RENT;
  }

  private apply(intent: TransactionIntent): void {
    if (intent.kind === 'transfer') {
      this.credit(intent.source.address, -intent.amount);
      this.credit(intent.destination, intent.amount);
      return;
    }
    // Rent goes into the token account and comes back out on close.
    const moved = intent.amount + IN_MEMORY_TOKEN_ACCOUNT_RENT;
    this.credit(intent.owner.address, -moved);
    this.credit(intent.destination, moved);
  }

  private credit(account: Address, delta: bigint): void {
    this.balances.set(account, this.balanceOf(account) + delta);
  }
}
