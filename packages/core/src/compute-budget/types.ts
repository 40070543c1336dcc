/**
 * Types for compute budget and priority fee configuration.
 *
 * @packageDocumentation
 */

/**
 * Priority fee parameters attached to every transaction a hop transfer sends.
 */
export interface PriorityFeeParams {
  /**
   * Micro-lamports paid per compute unit.
   */
  computeUnitPrice: number;

  /**
   * Maximum compute units the transaction may consume.
   */
  computeUnitLimit: number;
}
