/**
 * Balance polling.
 *
 * @packageDocumentation
 */

import type { Address, Commitment } from '@solana/kit';
import { BalanceTimeoutError } from '../errors/errors.js';
import type { LedgerClient } from '../ledger/types.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { lamportsToSol } from '../utils/amounts.js';
import { sleep } from '../utils/sleep.js';

export const DEFAULT_BALANCE_MAX_POLLS = 5;
export const DEFAULT_BALANCE_INTERVAL_MS = 1_000;

/**
 * Condition an observed balance (lamports) must satisfy.
 */
export type BalanceCondition = (lamports: bigint) => boolean;

export interface WaitForBalanceOptions {
  /**
   * Condition to wait for.
   */
  until: BalanceCondition;

  /**
   * Maximum number of balance fetches.
   * @default 5
   */
  maxPolls?: number;

  /**
   * Delay between fetches in milliseconds.
   * @default 1000
   */
  intervalMs?: number;

  commitment?: Commitment;

  logger?: Logger;
}

export interface ObservedBalance {
  lamports: bigint;
  sol: number;
}

/**
 * Balance of at least `lamports`.
 */
export function atLeast(lamports: bigint): BalanceCondition {
  return (balance) => balance >= lamports;
}

/**
 * Any positive balance.
 */
export const nonZero: BalanceCondition = (balance) => balance > 0n;

/**
 * Poll `account` until its balance satisfies `until`.
 *
 * A failed fetch is logged and uses up one poll. Never fetches more than
 * `maxPolls` times.
 *
 * @throws {BalanceTimeoutError} when no poll satisfied the condition
 */
export async function waitForBalance(
  ledger: LedgerClient,
  account: Address,
  options: WaitForBalanceOptions
): Promise<ObservedBalance> {
  const {
    until,
    maxPolls = DEFAULT_BALANCE_MAX_POLLS,
    intervalMs = DEFAULT_BALANCE_INTERVAL_MS,
    commitment,
    logger = silentLogger,
  } = options;

  let lastObserved: bigint | undefined;

  for (let poll = 1; poll <= maxPolls; poll++) {
    try {
      const lamports = await ledger.getBalance(account, commitment);
      lastObserved = lamports;
      if (until(lamports)) {
        logger.debug(`Balance observed (poll ${poll})`, { account, lamports });
        return { lamports, sol: lamportsToSol(lamports) };
      }
      logger.debug(`Balance not there yet (poll ${poll}/${maxPolls})`, { account, lamports });
    } catch (error) {
      logger.warn(`Balance check ${poll}/${maxPolls} failed: ${error instanceof Error ? error.message : String(error)}`, {
        account,
      });
    }

    if (poll < maxPolls) {
      await sleep(intervalMs);
    }
  }

  throw new BalanceTimeoutError(account, maxPolls, lastObserved);
}
