/**
 * Configuration for hop transfers: defaults, validation, environment loading.
 *
 * @packageDocumentation
 */

import { address, isAddress, type Address, type Commitment, type KeyPairSigner } from '@solana/kit';
import {
  DEFAULT_BALANCE_INTERVAL_MS,
  DEFAULT_BALANCE_MAX_POLLS,
  DEFAULT_CONFIRMATION_COMMITMENT,
  DEFAULT_CONFIRMATION_INTERVAL_MS,
  DEFAULT_CONFIRMATION_MAX_POLLS,
  DEFAULT_PRIORITY_FEE,
  HopConfigError,
  createKitLedgerClient,
  createLogger,
  type LedgerClient,
  type Logger,
  type LogLevel,
  type PriorityFeeParams,
} from '@hopline/core';
import { signerFromSecretKey } from './hop-account.js';
import { createFileKeyStore, type HopKeyStore } from './key-store.js';
import type { FailureMode, ForwardMode, HopTransferHooks, RecoveryStrategyName } from './types.js';

export const DEFAULT_HOP_FEE_SOL = 0.01;
export const DEFAULT_RETRY_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 1_000;
export const DEFAULT_RECOVERY_COOLDOWN_MS = 5_000;
export const DEFAULT_WRAP_COMPUTE_UNIT_LIMIT = 80_000;

export interface RetrySettings {
  maxAttempts: number;
  delayMs: number;
}

export interface ConfirmationSettings {
  commitment: Commitment;
  maxPolls: number;
  intervalMs: number;
}

export interface BalanceSettings {
  maxPolls: number;
  intervalMs: number;
}

/**
 * Caller-facing configuration.
 *
 * @example
 * ```ts
 * const config: HopTransferConfig = {
 *   rpcUrl: 'https://api.devnet.solana.com',
 *   senderPrivateKey: process.env.SENDER_KEY ?? '',
 *   receiverAddress: 'Receiver1111111111111111111111111111111111',
 *   amount: 0.1,
 *   recovery: 'wrap-and-close',
 * };
 * ```
 */
export interface HopTransferConfig {
  /**
   * Ledger client. Takes precedence over `rpcUrl`.
   */
  ledger?: LedgerClient;
  /**
   * RPC endpoint used to build a ledger client when no `ledger` is given.
   */
  rpcUrl?: string;
  /**
   * Base58 64-byte secret key of the sender.
   */
  senderPrivateKey: string;
  receiverAddress: string;
  /**
   * SOL to deliver. May instead be passed to `execute`.
   */
  amount?: number;
  /**
   * SOL sent to the hop on top of `amount` to pay for its own transactions.
   * @default 0.01
   */
  hopFee?: number;
  /**
   * @default 'direct-transfer'
   */
  recovery?: RecoveryStrategyName;
  /**
   * @default 'amount'
   */
  forward?: ForwardMode;
  /**
   * @default 'throw'
   */
  failureMode?: FailureMode;
  retry?: Partial<RetrySettings>;
  confirmation?: Partial<ConfirmationSettings>;
  balance?: Partial<BalanceSettings>;
  /**
   * Pause between forwarding and recovery.
   * @default 5000
   */
  recoveryCooldownMs?: number;
  priorityFee?: Partial<PriorityFeeParams>;
  /**
   * Compute unit limit of the wrap-and-close transaction.
   * @default 80000
   */
  wrapComputeUnitLimit?: number;
  /**
   * Directory for the key file. Ignored when `keyStore` is given.
   * @default '.'
   */
  keyDirectory?: string;
  keyStore?: HopKeyStore;
  /**
   * Ignored when `logger` is given.
   * @default 'minimal'
   */
  logLevel?: LogLevel;
  logger?: Logger;
  hooks?: HopTransferHooks;
}

/**
 * Configuration with defaults applied and every value validated.
 */
export interface ResolvedHopTransferConfig {
  ledger: LedgerClient;
  sender: KeyPairSigner;
  receiver: Address;
  amount?: number;
  hopFee: number;
  recovery: RecoveryStrategyName;
  forward: ForwardMode;
  failureMode: FailureMode;
  retry: RetrySettings;
  confirmation: ConfirmationSettings;
  balance: BalanceSettings;
  recoveryCooldownMs: number;
  priorityFee: PriorityFeeParams;
  wrapComputeUnitLimit: number;
  keyStore: HopKeyStore;
  logger: Logger;
  hooks: HopTransferHooks;
}

const RECOVERY_STRATEGIES = ['direct-transfer', 'wrap-and-close'] as const satisfies readonly RecoveryStrategyName[];
const FORWARD_MODES = ['amount', 'balance'] as const satisfies readonly ForwardMode[];
const FAILURE_MODES = ['throw', 'report'] as const satisfies readonly FailureMode[];
const LOG_LEVELS = ['silent', 'minimal', 'verbose'] as const satisfies readonly LogLevel[];
const COMMITMENTS = ['processed', 'confirmed', 'finalized'] as const satisfies readonly Commitment[];

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

function requireOneOf<T extends string>(values: readonly T[], value: string, field: string): T {
  if (!isOneOf(values, value)) {
    throw new HopConfigError(`${field} must be one of ${values.join(', ')} (got ${value})`, field);
  }
  return value;
}

function positiveInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new HopConfigError(`${field} must be a positive integer (got ${value})`, field);
  }
  return value;
}

function nonNegativeInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new HopConfigError(`${field} must be a non-negative integer (got ${value})`, field);
  }
  return value;
}

function nonNegative(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new HopConfigError(`${field} must be a finite, non-negative number (got ${value})`, field);
  }
  return value;
}

/**
 * SOL amount to deliver: finite and above zero.
 */
export function validateAmount(value: number, field = 'amount'): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new HopConfigError(`${field} must be a positive SOL amount (got ${value})`, field);
  }
  return value;
}

/**
 * Parse a receiver address, rejecting anything that is not base58 of 32 bytes.
 */
export function parseReceiverAddress(value: string, field = 'receiverAddress'): Address {
  const trimmed = value.trim();
  if (!isAddress(trimmed)) {
    throw new HopConfigError(`${field} is not a valid address (got ${value})`, field);
  }
  return address(trimmed);
}

function resolveLedger(config: HopTransferConfig): LedgerClient {
  if (config.ledger) {
    return config.ledger;
  }
  if (!config.rpcUrl) {
    throw new HopConfigError('Either ledger or rpcUrl is required', 'rpcUrl');
  }
  return createKitLedgerClient({ rpcUrl: config.rpcUrl });
}

/**
 * Apply defaults and validate a configuration.
 *
 * @throws {HopConfigError} naming the first invalid field
 */
export async function resolveHopTransferConfig(config: HopTransferConfig): Promise<ResolvedHopTransferConfig> {
  const ledger = resolveLedger(config);
  const sender = await signerFromSecretKey(config.senderPrivateKey);
  const receiver = parseReceiverAddress(config.receiverAddress);

  const retry: RetrySettings = {
    maxAttempts: positiveInteger(config.retry?.maxAttempts ?? DEFAULT_RETRY_MAX_ATTEMPTS, 'retry.maxAttempts'),
    delayMs: nonNegative(config.retry?.delayMs ?? DEFAULT_RETRY_DELAY_MS, 'retry.delayMs'),
  };

  const confirmation: ConfirmationSettings = {
    commitment: requireOneOf(
      COMMITMENTS,
      config.confirmation?.commitment ?? DEFAULT_CONFIRMATION_COMMITMENT,
      'confirmation.commitment'
    ),
    maxPolls: positiveInteger(
      config.confirmation?.maxPolls ?? DEFAULT_CONFIRMATION_MAX_POLLS,
      'confirmation.maxPolls'
    ),
    intervalMs: nonNegative(
      config.confirmation?.intervalMs ?? DEFAULT_CONFIRMATION_INTERVAL_MS,
      'confirmation.intervalMs'
    ),
  };

  const balance: BalanceSettings = {
    maxPolls: positiveInteger(config.balance?.maxPolls ?? DEFAULT_BALANCE_MAX_POLLS, 'balance.maxPolls'),
    intervalMs: nonNegative(config.balance?.intervalMs ?? DEFAULT_BALANCE_INTERVAL_MS, 'balance.intervalMs'),
  };

  const priorityFee: PriorityFeeParams = {
    computeUnitPrice: nonNegativeInteger(
      config.priorityFee?.computeUnitPrice ?? DEFAULT_PRIORITY_FEE.computeUnitPrice,
      'priorityFee.computeUnitPrice'
    ),
    computeUnitLimit: positiveInteger(
      config.priorityFee?.computeUnitLimit ?? DEFAULT_PRIORITY_FEE.computeUnitLimit,
      'priorityFee.computeUnitLimit'
    ),
  };

  return {
    ledger,
    sender,
    receiver,
    amount: config.amount === undefined ? undefined : validateAmount(config.amount),
    hopFee: nonNegative(config.hopFee ?? DEFAULT_HOP_FEE_SOL, 'hopFee'),
    recovery: requireOneOf(RECOVERY_STRATEGIES, config.recovery ?? 'direct-transfer', 'recovery'),
    forward: requireOneOf(FORWARD_MODES, config.forward ?? 'amount', 'forward'),
    failureMode: requireOneOf(FAILURE_MODES, config.failureMode ?? 'throw', 'failureMode'),
    retry,
    confirmation,
    balance,
    recoveryCooldownMs: nonNegative(config.recoveryCooldownMs ?? DEFAULT_RECOVERY_COOLDOWN_MS, 'recoveryCooldownMs'),
    priorityFee,
    wrapComputeUnitLimit: positiveInteger(
      config.wrapComputeUnitLimit ?? DEFAULT_WRAP_COMPUTE_UNIT_LIMIT,
      'wrapComputeUnitLimit'
    ),
    keyStore: config.keyStore ?? createFileKeyStore({ directory: config.keyDirectory ?? '.' }),
    logger: config.logger ?? createLogger({ level: requireOneOf(LOG_LEVELS, config.logLevel ?? 'minimal', 'logLevel') }),
    hooks: config.hooks ?? {},
  };
}

/**
 * Environment variables read by {@link loadHopTransferConfigFromEnv}.
 */
export const HOPLINE_ENV = {
  rpcUrl: 'HOPLINE_RPC_URL',
  senderPrivateKey: 'HOPLINE_SENDER_PRIVATE_KEY',
  receiverAddress: 'HOPLINE_RECEIVER',
  amount: 'HOPLINE_AMOUNT',
  hopFee: 'HOPLINE_HOP_FEE',
  recovery: 'HOPLINE_RECOVERY',
  keyDirectory: 'HOPLINE_KEY_DIR',
  logLevel: 'HOPLINE_LOG_LEVEL',
} as const;

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function requireEnv(env: Env, name: string): string {
  const value = readEnv(env, name);
  if (value === undefined) {
    throw new HopConfigError(`${name} is required`, name);
  }
  return value;
}

function readNumberEnv(env: Env, name: string): number | undefined {
  const value = readEnv(env, name);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new HopConfigError(`${name} must be a number (got ${value})`, name);
  }
  return parsed;
}

function readEnumEnv<T extends string>(env: Env, name: string, values: readonly T[]): T | undefined {
  const value = readEnv(env, name);
  return value === undefined ? undefined : requireOneOf(values, value, name);
}

/**
 * Build a configuration from `HOPLINE_*` environment variables.
 * Only checks presence and shape; {@link resolveHopTransferConfig} validates the rest.
 *
 * @example
 * ```ts
 * const hopTransfer = await createHopTransfer(loadHopTransferConfigFromEnv());
 * ```
 */
export function loadHopTransferConfigFromEnv(env: Env = process.env): HopTransferConfig {
  return {
    rpcUrl: requireEnv(env, HOPLINE_ENV.rpcUrl),
    senderPrivateKey: requireEnv(env, HOPLINE_ENV.senderPrivateKey),
    receiverAddress: requireEnv(env, HOPLINE_ENV.receiverAddress),
    amount: readNumberEnv(env, HOPLINE_ENV.amount),
    hopFee: readNumberEnv(env, HOPLINE_ENV.hopFee),
    recovery: readEnumEnv(env, HOPLINE_ENV.recovery, RECOVERY_STRATEGIES),
    keyDirectory: readEnv(env, HOPLINE_ENV.keyDirectory),
    logLevel: readEnumEnv(env, HOPLINE_ENV.logLevel, LOG_LEVELS),
  };
}
