/**
 * Types for hop transfers: states, step results, hooks.
 *
 * @packageDocumentation
 */

import type { Address, Signature } from '@solana/kit';
import type { TransferOutcome } from '@hopline/core';

/**
 * Where a hop transfer is in its lifecycle.
 *
 * `init → hop-funded → hop-balance-observed → forwarded-to-receiver →
 * leftover-recovered → done`, with `failed` reachable from any transition.
 */
export type HopTransferState =
  | 'init'
  | 'hop-funded'
  | 'hop-balance-observed'
  | 'forwarded-to-receiver'
  | 'leftover-recovered'
  | 'done'
  | 'failed';

/**
 * The three transactions of a hop transfer, keyed as in the result.
 */
export type HopStepName = 'toHop' | 'toReceiver' | 'recoverHop';

/**
 * Any point a run can fail at: a transaction step or the balance wait between them.
 */
export type HopPhase = HopStepName | 'awaitHopBalance';

/**
 * How leftover hop funds are swept.
 * - `direct-transfer`: everything back to the sender, sender pays the fee
 * - `wrap-and-close`: wrapped into wSOL and closed to the receiver
 */
export type RecoveryStrategyName = 'direct-transfer' | 'wrap-and-close';

/**
 * What the forward step sends.
 * - `amount`: exactly the requested amount
 * - `balance`: the observed hop balance minus the forward fee
 */
export type ForwardMode = 'amount' | 'balance';

/**
 * Whether a failure before recovery is thrown or returned.
 */
export type FailureMode = 'throw' | 'report';

/**
 * Record of one logical step after its retries.
 */
export type StepResult =
  | { status: 'succeeded'; signature: Signature; attempts: number; outcomes: TransferOutcome[] }
  | { status: 'failed'; reason: string; error: unknown; attempts: number }
  | { status: 'skipped'; reason: string };

export interface HopTransferSteps {
  toHop: StepResult;
  toReceiver: StepResult;
  recoverHop: StepResult;
}

/**
 * Result of {@link HopTransfer.execute}.
 */
export interface HopTransferResult {
  hopAddress: Address;
  recovery: RecoveryStrategyName;
  state: HopTransferState;
  /**
   * True only when every step succeeded, or recovery found nothing to sweep.
   */
  complete: boolean;
  steps: HopTransferSteps;
  /**
   * Set when the run stopped at a failure.
   */
  failure?: { phase: HopPhase; error: unknown };
  /**
   * Hop balance seen by the balance wait, in lamports.
   */
  observedHopBalance?: bigint;
  /**
   * Lamports the forward step sent to the receiver.
   */
  forwardedLamports?: bigint;
  /**
   * Where the hop key material was saved.
   */
  keyFile: string;
  elapsedMs: number;
}

/**
 * Hooks for monitoring a run. Errors thrown by a hook are logged and do not
 * affect the run.
 */
export interface HopTransferHooks {
  /**
   * Called when a step starts.
   */
  onStepStart?: (step: HopStepName) => void;

  /**
   * Called when a step succeeds or is skipped.
   */
  onStepComplete?: (step: HopStepName, result: StepResult) => void;

  /**
   * Called when a step fails.
   */
  onStepError?: (step: HopStepName, error: unknown) => void;

  /**
   * Called on every state transition.
   */
  onStateChange?: (state: HopTransferState) => void;
}
