/**
 * Compute budget and fee helpers.
 *
 * @packageDocumentation
 */

export type { PriorityFeeParams } from './types.js';
export {
  COMPUTE_BUDGET_PROGRAM,
  MAX_COMPUTE_UNIT_LIMIT,
  BASE_FEE_LAMPORTS_PER_SIGNATURE,
  TOKEN_ACCOUNT_RENT_LAMPORTS,
  DEFAULT_PRIORITY_FEE,
  createSetComputeUnitPriceInstruction,
  createSetComputeUnitLimitInstruction,
  createPriorityFeeInstructions,
  calculatePriorityFeeLamports,
  estimateTransactionFee,
} from './compute-budget.js';
