/**
 * @hopline/core
 *
 * Ledger primitives for hop transfers.
 *
 * Features:
 * - Ledger client contract with a `@solana/kit` implementation
 * - Instruction builders for SOL transfers and wSOL wrap-and-close sweeps
 * - Priority fee instructions and fee arithmetic
 * - Bounded submit-and-confirm retries
 * - Transaction status and balance polling
 * - Typed errors and a level-filtered logger
 *
 * @packageDocumentation
 */

// Ledger access
export * from './ledger/index.js';

// Compute Budget - priority fees and fee estimates
export * from './compute-budget/index.js';

// Retry - submit+confirm cycles
export * from './retry/index.js';

// Confirmation - status polling
export * from './confirmation/index.js';

// Balance - balance polling
export * from './balance/index.js';

// Errors
export * from './errors/index.js';

// Logging
export * from './logging/index.js';

// Utils
export * from './utils/index.js';
