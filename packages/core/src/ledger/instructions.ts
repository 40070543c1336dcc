/**
 * Instruction builders for the transactions a hop transfer sends:
 * plain SOL transfers and the wrap-into-wSOL-then-close sweep.
 *
 * @packageDocumentation
 */

import {
  AccountRole,
  address,
  getAddressEncoder,
  getProgramDerivedAddress,
  type Address,
  type TransactionSigner,
} from '@solana/kit';
import { createPriorityFeeInstructions } from '../compute-budget/compute-budget.js';
import type { LedgerInstruction, TransactionIntent, WrapAndCloseIntent } from './types.js';

/**
 * Well-known program and sysvar addresses.
 */
export const WELL_KNOWN_PROGRAMS = {
  systemProgram: address('11111111111111111111111111111111'),
  tokenProgram: address('TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA'),
  associatedTokenProgram: address('ATokenGPvbdGVxr1b2hvZbsiqW5xWH25efTNsLJA8knL'),
  rent: address('SysvarRent111111111111111111111111111111111'),
} as const;

/**
 * Native SOL mint address (wrapped SOL).
 */
export const SOL_MINT = address('So11111111111111111111111111111111111111112');

/**
 * System Program Transfer.
 */
export function createTransferSolInstruction(
  source: TransactionSigner,
  destination: Address,
  lamports: bigint
): LedgerInstruction {
  // [2 as u32 LE, lamports as u64 LE]
  const data = new Uint8Array(12);
  const view = new DataView(data.buffer);
  view.setUint32(0, 2, true);
  view.setBigUint64(4, lamports, true);

  return {
    programAddress: WELL_KNOWN_PROGRAMS.systemProgram,
    accounts: [
      { address: source.address, role: AccountRole.WRITABLE_SIGNER, signer: source },
      { address: destination, role: AccountRole.WRITABLE },
    ],
    data,
  };
}

/**
 * Derive the wSOL associated token account of an owner.
 */
export async function deriveWsolAta(owner: Address): Promise<Address> {
  const encoder = getAddressEncoder();
  const [ata] = await getProgramDerivedAddress({
    programAddress: WELL_KNOWN_PROGRAMS.associatedTokenProgram,
    seeds: [encoder.encode(owner), encoder.encode(WELL_KNOWN_PROGRAMS.tokenProgram), encoder.encode(SOL_MINT)],
  });
  return ata;
}

/**
 * Associated Token Program CreateIdempotent for the owner's wSOL account.
 * Safe to send when the account already exists.
 */
export async function createWsolAtaInstruction(
  payer: TransactionSigner,
  owner: Address
): Promise<LedgerInstruction> {
  const ata = await deriveWsolAta(owner);

  return {
    programAddress: WELL_KNOWN_PROGRAMS.associatedTokenProgram,
    accounts: [
      { address: payer.address, role: AccountRole.WRITABLE_SIGNER, signer: payer },
      { address: ata, role: AccountRole.WRITABLE },
      { address: owner, role: AccountRole.READONLY },
      { address: SOL_MINT, role: AccountRole.READONLY },
      { address: WELL_KNOWN_PROGRAMS.systemProgram, role: AccountRole.READONLY },
      { address: WELL_KNOWN_PROGRAMS.tokenProgram, role: AccountRole.READONLY },
      { address: WELL_KNOWN_PROGRAMS.rent, role: AccountRole.READONLY },
    ],
    // CreateIdempotent discriminator
    data: new Uint8Array([1]),
  };
}

/**
 * SPL Token SyncNative: credit lamports sent to a wSOL account as tokens.
 */
export function createSyncNativeInstruction(tokenAccount: Address): LedgerInstruction {
  return {
    programAddress: WELL_KNOWN_PROGRAMS.tokenProgram,
    accounts: [{ address: tokenAccount, role: AccountRole.WRITABLE }],
    data: new Uint8Array([17]),
  };
}

/**
 * SPL Token CloseAccount: all lamports of the token account go to `destination`.
 */
export function createCloseAccountInstruction(
  tokenAccount: Address,
  destination: Address,
  authority: TransactionSigner
): LedgerInstruction {
  return {
    programAddress: WELL_KNOWN_PROGRAMS.tokenProgram,
    accounts: [
      { address: tokenAccount, role: AccountRole.WRITABLE },
      { address: destination, role: AccountRole.WRITABLE },
      { address: authority.address, role: AccountRole.READONLY_SIGNER, signer: authority },
    ],
    data: new Uint8Array([9]),
  };
}

/**
 * Create ATA, fund it, sync, close to the destination.
 */
export async function wrapAndCloseInstructions(intent: WrapAndCloseIntent): Promise<LedgerInstruction[]> {
  const { owner, destination, amount } = intent;
  const ata = await deriveWsolAta(owner.address);

  return [
    await createWsolAtaInstruction(owner, owner.address),
    createTransferSolInstruction(owner, ata, amount),
    createSyncNativeInstruction(ata),
    createCloseAccountInstruction(ata, destination, owner),
  ];
}

/**
 * Full instruction list for an intent, compute budget instructions first.
 */
export async function buildIntentInstructions(intent: TransactionIntent): Promise<LedgerInstruction[]> {
  const budget = createPriorityFeeInstructions(intent.priorityFee);

  switch (intent.kind) {
    case 'transfer':
      return [...budget, createTransferSolInstruction(intent.source, intent.destination, intent.amount)];
    case 'wrap-and-close':
      return [...budget, ...(await wrapAndCloseInstructions(intent))];
  }
}
