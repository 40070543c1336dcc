/**
 * Hop transfer orchestration: sender → hop → receiver, then sweep the hop.
 *
 * @packageDocumentation
 */

import type { Address } from '@solana/kit';
import {
  BalanceTimeoutError,
  HopConfigError,
  StepExhaustedError,
  atLeast,
  createConfirmer,
  estimateTransactionFee,
  isInsufficientBalanceError,
  lamportsToSol,
  nonZero,
  retryConfirm,
  sleep,
  solToLamports,
  waitForBalance,
  InsufficientBalanceError,
  type ObservedBalance,
  type RetryableStep,
} from '@hopline/core';
import {
  resolveHopTransferConfig,
  validateAmount,
  type HopTransferConfig,
  type ResolvedHopTransferConfig,
} from './config.js';
import { HopTransferFailedError, isNothingToRecoverError } from './errors.js';
import { generateHopAccount, type HopAccount } from './hop-account.js';
import { getRecoveryStrategy, isRecoveryRetryable, type RecoveryContext, type RecoveryStrategy } from './recovery.js';
import { FundHopStep, ForwardStep } from './steps.js';
import type {
  HopPhase,
  HopStepName,
  HopTransferHooks,
  HopTransferResult,
  HopTransferState,
  HopTransferSteps,
  StepResult,
} from './types.js';

/**
 * Injectable collaborators.
 */
export interface HopTransferDeps {
  generateHopAccount?: () => Promise<HopAccount>;
}

interface AmountPlan {
  amount: bigint;
  hopFee: bigint;
  forwardFee: bigint;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function notRun(reason: string): StepResult {
  return { status: 'skipped', reason };
}

/**
 * One hop transfer run, bound to a freshly generated hop account.
 *
 * Create with {@link createHopTransfer}; `execute` may be called once.
 */
export class HopTransfer {
  #state: HopTransferState = 'init';
  #executed = false;
  private readonly recovery: RecoveryStrategy;
  private readonly context: RecoveryContext;

  constructor(
    private readonly config: ResolvedHopTransferConfig,
    readonly hop: HopAccount,
    readonly keyFile: string
  ) {
    this.recovery = getRecoveryStrategy(config.recovery);
    const { ledger, priorityFee, confirmation, logger, sender, receiver, wrapComputeUnitLimit } = config;
    this.context = {
      ledger,
      priorityFee,
      confirm: createConfirmer(ledger, { ...confirmation, logger }),
      hop: hop.signer,
      sender,
      receiver,
      wrapComputeUnitLimit,
    };
  }

  get state(): HopTransferState {
    return this.#state;
  }

  get hopAddress(): Address {
    return this.hop.address;
  }

  /**
   * Run the transfer.
   *
   * @param amount - SOL to deliver; defaults to the configured amount
   * @param hopFee - SOL added to the hop funding for its own fees; defaults to the configured fee
   * @throws {HopConfigError} for invalid amounts or a second call
   * @throws {HopTransferFailedError} when funding, the balance wait or forwarding fails in `'throw'` mode
   *
   * @example
   * ```ts
   * const hopTransfer = await createHopTransfer({ rpcUrl, senderPrivateKey, receiverAddress });
   * const result = await hopTransfer.execute(0.1);
   * console.log(result.steps.toReceiver);
   * ```
   */
  async execute(amount?: number, hopFee?: number): Promise<HopTransferResult> {
    if (this.#executed) {
      throw new HopConfigError('execute() can only be called once per HopTransfer', 'execute');
    }
    const plan = this.planAmounts(amount, hopFee);
    this.#executed = true;

    const { config, hop } = this;
    const { logger } = config;
    const startedAt = Date.now();
    const steps: HopTransferSteps = {
      toHop: notRun('not started'),
      toReceiver: notRun('not started'),
      recoverHop: notRun('not started'),
    };
    const result = (): HopTransferResult => ({
      hopAddress: hop.address,
      recovery: config.recovery,
      state: this.#state,
      complete: false,
      steps: { ...steps },
      keyFile: this.keyFile,
      elapsedMs: Date.now() - startedAt,
    });

    logger.info(`Hop transfer of ${lamportsToSol(plan.amount)} SOL via ${hop.address}`, {
      receiver: config.receiver,
      hopFee: plan.hopFee,
      recovery: config.recovery,
    });

    // 1. Fund the hop
    steps.toHop = await this.runStep(
      'toHop',
      new FundHopStep(this.context, config.sender, hop.address, plan.amount + plan.hopFee)
    );
    if (steps.toHop.status !== 'succeeded') {
      steps.toReceiver = notRun('hop account was not funded');
      steps.recoverHop = notRun('hop account was not funded');
      return this.fail('toHop', steps.toHop, result);
    }
    this.transition('hop-funded');

    // 2. Wait until the funding is visible
    let observed: ObservedBalance;
    try {
      observed = await waitForBalance(config.ledger, hop.address, {
        until: config.forward === 'amount' ? atLeast(plan.amount) : nonZero,
        ...config.balance,
        logger,
      });
    } catch (error) {
      steps.toReceiver = notRun('hop balance was never observed');
      steps.recoverHop = notRun('hop balance was never observed');
      const polls = error instanceof BalanceTimeoutError ? error.polls : config.balance.maxPolls;
      return this.fail('awaitHopBalance', { status: 'failed', reason: describeError(error), error, attempts: polls }, result);
    }
    this.transition('hop-balance-observed');
    logger.info(`Hop balance: ${observed.sol} SOL`);

    // 3. Forward to the receiver
    const forwardLamports = config.forward === 'amount' ? plan.amount : observed.lamports - plan.forwardFee;
    if (forwardLamports <= 0n) {
      const error = new InsufficientBalanceError(hop.address, plan.forwardFee + 1n, observed.lamports);
      steps.toReceiver = { status: 'failed', reason: error.message, error, attempts: 0 };
      steps.recoverHop = notRun('nothing was forwarded');
      return this.fail('toReceiver', steps.toReceiver, () => ({ ...result(), observedHopBalance: observed.lamports }));
    }
    steps.toReceiver = await this.runStep(
      'toReceiver',
      new ForwardStep(this.context, hop.signer, config.receiver, forwardLamports)
    );
    if (steps.toReceiver.status !== 'succeeded') {
      steps.recoverHop = notRun('forward to receiver failed');
      return this.fail('toReceiver', steps.toReceiver, () => ({ ...result(), observedHopBalance: observed.lamports }));
    }
    this.transition('forwarded-to-receiver');

    // 4. Sweep what is left
    await sleep(config.recoveryCooldownMs);
    steps.recoverHop = await this.runStep('recoverHop', this.recovery.createStep(this.context), isRecoveryRetryable);

    const final = (): HopTransferResult => ({
      ...result(),
      observedHopBalance: observed.lamports,
      forwardedLamports: forwardLamports,
    });

    if (steps.recoverHop.status === 'failed') {
      logger.warn(`Leftover recovery failed; hop key material is in ${this.keyFile}`, {
        hop: hop.address,
        reason: steps.recoverHop.reason,
      });
      this.transition('failed');
      return { ...final(), failure: { phase: 'recoverHop', error: steps.recoverHop.error } };
    }
    this.transition('leftover-recovered');
    this.transition('done');

    logger.info('Hop transfer complete');
    return { ...final(), complete: true };
  }

  /**
   * Resolve and check amounts before anything is sent.
   */
  private planAmounts(amountSol: number | undefined, hopFeeSol: number | undefined): AmountPlan {
    const requested = amountSol ?? this.config.amount;
    if (requested === undefined) {
      throw new HopConfigError('amount is required', 'amount');
    }
    const amount = solToLamports(validateAmount(requested));
    if (amount === 0n) {
      throw new HopConfigError(`amount is below one lamport (got ${requested})`, 'amount');
    }
    const hopFee = solToLamports(hopFeeSol ?? this.config.hopFee, 'hopFee');

    const forwardFee = estimateTransactionFee(1, this.config.priorityFee);
    const reserve = forwardFee + this.recovery.hopReserve(this.context);
    if (hopFee < reserve) {
      throw new HopConfigError(
        `hopFee of ${lamportsToSol(hopFee)} SOL does not cover the hop's own fees (${lamportsToSol(reserve)} SOL)`,
        'hopFee'
      );
    }
    return { amount, hopFee, forwardFee };
  }

  private async runStep(
    name: HopStepName,
    step: RetryableStep,
    isRetryable?: (error: unknown) => boolean
  ): Promise<StepResult> {
    const { hooks, logger, retry } = this.config;
    this.notify('onStepStart', () => hooks.onStepStart?.(name));
    let finishedAttempts = 0;

    try {
      const { signature, attempts, outcomes } = await retryConfirm(step, {
        ...retry,
        isRetryable,
        logger,
        onOutcome: (attempt, outcome) => {
          if (outcome.status !== 'submitted') finishedAttempts = attempt;
        },
      });
      const result: StepResult = { status: 'succeeded', signature, attempts, outcomes };
      logger.info(`${step.description}: confirmed`, { signature });
      this.notify('onStepComplete', () => hooks.onStepComplete?.(name, result));
      return result;
    } catch (error) {
      if (isNothingToRecoverError(error)) {
        const result: StepResult = { status: 'skipped', reason: error.message };
        logger.info(`${step.description}: skipped (${error.message})`);
        this.notify('onStepComplete', () => hooks.onStepComplete?.(name, result));
        return result;
      }
      this.notify('onStepError', () => hooks.onStepError?.(name, error));
      return {
        status: 'failed',
        reason: describeError(error),
        error,
        attempts: error instanceof StepExhaustedError ? error.attempts : finishedAttempts + 1,
      };
    }
  }

  private fail(
    phase: HopPhase,
    failed: StepResult,
    result: () => HopTransferResult
  ): HopTransferResult {
    this.transition('failed');
    const error = failed.status === 'failed' ? failed.error : undefined;
    const attempts = failed.status === 'failed' ? failed.attempts : 0;
    const partial: HopTransferResult = { ...result(), failure: { phase, error } };

    this.config.logger.warn(`Hop transfer failed at ${phase}; hop key material is in ${this.keyFile}`, {
      hop: this.hop.address,
      insufficientBalance: isInsufficientBalanceError(error),
    });

    if (this.config.failureMode === 'throw') {
      throw new HopTransferFailedError(phase, attempts, error, partial);
    }
    return partial;
  }

  private transition(state: HopTransferState): void {
    this.#state = state;
    this.config.logger.debug(`State: ${state}`);
    this.notify('onStateChange', () => this.config.hooks.onStateChange?.(state));
  }

  /**
   * Hooks observe the run; an error thrown by one is logged and the run goes on.
   */
  private notify(hook: keyof HopTransferHooks, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.config.logger.warn(`${hook} hook threw: ${describeError(error)}`);
    }
  }
}

/**
 * Resolve the configuration, generate the hop account and save its key
 * material before anything touches the ledger.
 *
 * @example
 * ```ts
 * const hopTransfer = await createHopTransfer({
 *   rpcUrl: 'https://api.devnet.solana.com',
 *   senderPrivateKey,
 *   receiverAddress,
 *   recovery: 'wrap-and-close',
 * });
 * const result = await hopTransfer.execute(0.1, 0.01);
 * ```
 */
export async function createHopTransfer(config: HopTransferConfig, deps: HopTransferDeps = {}): Promise<HopTransfer> {
  const resolved = await resolveHopTransferConfig(config);
  const hop = await (deps.generateHopAccount ?? generateHopAccount)();
  const keyFile = await resolved.keyStore.save(hop);
  resolved.logger.info(`Hop account ${hop.address} generated, key saved to ${keyFile}`);
  return new HopTransfer(resolved, hop, keyFile);
}

/**
 * Whether a run delivered the funds and cleaned up after itself.
 */
export function isHopTransferComplete(result: HopTransferResult): boolean {
  return result.complete;
}
