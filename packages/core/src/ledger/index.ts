/**
 * Ledger access: the client contract, its Kit implementation and the
 * instruction builders behind it.
 *
 * @packageDocumentation
 */

export type {
  LedgerClient,
  LedgerInstruction,
  TransactionIntent,
  TransferIntent,
  WrapAndCloseIntent,
  TransactionStatus,
} from './types.js';
export { getIntentFeePayer, getIntentSignatureCount } from './types.js';

export {
  WELL_KNOWN_PROGRAMS,
  SOL_MINT,
  createTransferSolInstruction,
  deriveWsolAta,
  createWsolAtaInstruction,
  createSyncNativeInstruction,
  createCloseAccountInstruction,
  wrapAndCloseInstructions,
  buildIntentInstructions,
} from './instructions.js';

export {
  type LedgerRpc,
  type KitLedgerClientConfig,
  createKitLedgerClient,
  meetsCommitment,
} from './kit-client.js';
