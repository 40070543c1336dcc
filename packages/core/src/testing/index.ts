/**
 * Test doubles for code built on `@hopline/core`.
 *
 * @packageDocumentation
 */

export {
  IN_MEMORY_SIGNATURE_FEE,
  IN_MEMORY_TOKEN_ACCOUNT_RENT,
  type SubmittedTransaction,
  createTestSignature,
  InMemoryLedger,
} from './in-memory-ledger.js';
