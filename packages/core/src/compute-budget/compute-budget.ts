/**
 * Compute Budget instructions and transaction fee arithmetic.
 *
 * @packageDocumentation
 */

import { address } from '@solana/kit';
import type { LedgerInstruction } from '../ledger/types.js';
import type { PriorityFeeParams } from './types.js';

/**
 * Compute Budget program address.
 */
export const COMPUTE_BUDGET_PROGRAM = address('ComputeBudget111111111111111111111111111111');

/**
 * Maximum compute unit limit per transaction.
 */
export const MAX_COMPUTE_UNIT_LIMIT = 1_400_000;

/**
 * Signature fee charged by the network, per signature.
 */
export const BASE_FEE_LAMPORTS_PER_SIGNATURE = 5_000n;

/**
 * Rent-exempt minimum of a 165-byte SPL token account.
 */
export const TOKEN_ACCOUNT_RENT_LAMPORTS = 2_039_280n;

/**
 * Priority fee used when nothing else is configured: 0.1 lamports per CU,
 * 10k CU, which leaves room for a system transfer and the budget instructions.
 */
export const DEFAULT_PRIORITY_FEE: PriorityFeeParams = {
  computeUnitPrice: 100_000,
  computeUnitLimit: 10_000,
};

/**
 * Create SetComputeUnitPrice instruction.
 *
 * @param microLamports - Fee in micro-lamports per compute unit
 */
export function createSetComputeUnitPriceInstruction(microLamports: number): LedgerInstruction {
  // [3, microLamports as u64 LE]
  const data = new Uint8Array(9);
  data[0] = 3;
  new DataView(data.buffer).setBigUint64(1, BigInt(microLamports), true);

  return {
    programAddress: COMPUTE_BUDGET_PROGRAM,
    accounts: [],
    data,
  };
}

/**
 * Create SetComputeUnitLimit instruction, clamped to the network maximum.
 */
export function createSetComputeUnitLimitInstruction(units: number): LedgerInstruction {
  const clampedUnits = Math.min(units, MAX_COMPUTE_UNIT_LIMIT);

  // [2, units as u32 LE]
  const data = new Uint8Array(5);
  data[0] = 2;
  new DataView(data.buffer).setUint32(1, clampedUnits, true);

  return {
    programAddress: COMPUTE_BUDGET_PROGRAM,
    accounts: [],
    data,
  };
}

/**
 * Both compute budget instructions for a priority fee, price first.
 */
export function createPriorityFeeInstructions(params: PriorityFeeParams): LedgerInstruction[] {
  return [
    createSetComputeUnitPriceInstruction(params.computeUnitPrice),
    createSetComputeUnitLimitInstruction(params.computeUnitLimit),
  ];
}

/**
 * Priority fee in lamports, rounded up.
 *
 * @example
 * ```ts
 * calculatePriorityFeeLamports({ computeUnitPrice: 100_000, computeUnitLimit: 10_000 });
 * // 100_000 * 10_000 / 1_000_000 = 1000n
 * ```
 */
export function calculatePriorityFeeLamports(params: PriorityFeeParams): bigint {
  const microLamports = BigInt(params.computeUnitPrice) * BigInt(params.computeUnitLimit);
  return (microLamports + 999_999n) / 1_000_000n;
}

/**
 * Upper bound of what the fee payer is charged for one transaction.
 */
export function estimateTransactionFee(signatureCount: number, params: PriorityFeeParams): bigint {
  return BASE_FEE_LAMPORTS_PER_SIGNATURE * BigInt(signatureCount) + calculatePriorityFeeLamports(params);
}
