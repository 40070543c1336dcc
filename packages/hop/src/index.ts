/**
 * @hopline/hop
 *
 * Send SOL through a one-off hop account.
 *
 * @example
 * ```ts
 * import { createHopTransfer, loadHopTransferConfigFromEnv } from '@hopline/hop';
 *
 * const hopTransfer = await createHopTransfer(loadHopTransferConfigFromEnv());
 * const result = await hopTransfer.execute(0.1);
 * ```
 *
 * @packageDocumentation
 */

// Orchestrator
export {
  HopTransfer,
  createHopTransfer,
  isHopTransferComplete,
  type HopTransferDeps,
} from './hop-transfer.js';

// Configuration
export {
  DEFAULT_HOP_FEE_SOL,
  DEFAULT_RETRY_MAX_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_RECOVERY_COOLDOWN_MS,
  DEFAULT_WRAP_COMPUTE_UNIT_LIMIT,
  HOPLINE_ENV,
  resolveHopTransferConfig,
  loadHopTransferConfigFromEnv,
  validateAmount,
  parseReceiverAddress,
  type HopTransferConfig,
  type ResolvedHopTransferConfig,
  type RetrySettings,
  type ConfirmationSettings,
  type BalanceSettings,
} from './config.js';

// Hop account and key material
export { HopAccount, generateHopAccount, signerFromSecretKey } from './hop-account.js';
export {
  createFileKeyStore,
  formatKeyFile,
  formatKeyFileName,
  type HopKeyStore,
  type FileKeyStoreOptions,
} from './key-store.js';

// Steps and recovery
export { FundHopStep, ForwardStep, type StepContext } from './steps.js';
export {
  directTransferRecovery,
  wrapAndCloseRecovery,
  getRecoveryStrategy,
  isRecoveryRetryable,
  type RecoveryStrategy,
  type RecoveryContext,
} from './recovery.js';

// Errors
export {
  HopTransferFailedError,
  NothingToRecoverError,
  isHopTransferFailedError,
  isNothingToRecoverError,
} from './errors.js';

// Types
export type {
  HopTransferState,
  HopStepName,
  HopPhase,
  RecoveryStrategyName,
  ForwardMode,
  FailureMode,
  StepResult,
  HopTransferSteps,
  HopTransferResult,
  HopTransferHooks,
} from './types.js';
