/**
 * SOL / lamport conversion.
 *
 * @packageDocumentation
 */

import { HopConfigError } from '../errors/errors.js';

/**
 * Lamports per SOL.
 */
export const LAMPORTS_PER_SOL = 1_000_000_000n;

/**
 * Convert a SOL amount to lamports.
 * Scales by 1e9 and truncates; anything below one lamport is dropped.
 *
 * @example
 * ```ts
 * solToLamports(0.1); // 100_000_000n
 * solToLamports(1e-10); // 0n
 * ```
 */
export function solToLamports(sol: number, field = 'amount'): bigint {
  if (!Number.isFinite(sol) || sol < 0) {
    throw new HopConfigError(`${field} must be a finite, non-negative SOL amount (got ${sol})`, field);
  }
  return BigInt(Math.trunc(sol * Number(LAMPORTS_PER_SOL)));
}

/**
 * Convert lamports to SOL for display.
 */
export function lamportsToSol(lamports: bigint): number {
  return Number(lamports) / Number(LAMPORTS_PER_SOL);
}
