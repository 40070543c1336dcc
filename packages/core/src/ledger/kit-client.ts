/**
 * {@link LedgerClient} backed by `@solana/kit`.
 *
 * @packageDocumentation
 */

import {
  appendTransactionMessageInstructions,
  createSolanaRpc,
  createTransactionMessage,
  getBase64EncodedWireTransaction,
  pipe,
  setTransactionMessageFeePayerSigner,
  setTransactionMessageLifetimeUsingBlockhash,
  signTransactionMessageWithSigners,
  type Address,
  type Commitment,
  type GetBalanceApi,
  type GetLatestBlockhashApi,
  type GetSignatureStatusesApi,
  type Rpc,
  type SendTransactionApi,
  type Signature,
} from '@solana/kit';
import { HopConfigError, LedgerRpcError } from '../errors/errors.js';
import { buildIntentInstructions } from './instructions.js';
import {
  getIntentFeePayer,
  type LedgerClient,
  type TransactionIntent,
  type TransactionStatus,
} from './types.js';

/**
 * RPC API the Kit ledger client needs.
 */
export type LedgerRpc = Rpc<GetBalanceApi & GetLatestBlockhashApi & GetSignatureStatusesApi & SendTransactionApi>;

export interface KitLedgerClientConfig {
  /**
   * RPC client. Takes precedence over `rpcUrl`.
   */
  rpc?: LedgerRpc;
  /**
   * HTTP RPC endpoint used when no `rpc` is given.
   */
  rpcUrl?: string;
  /**
   * Commitment used for the blockhash, balance reads and preflight.
   * @default 'confirmed'
   */
  preflightCommitment?: Commitment;
}

const COMMITMENT_RANK: Record<Commitment, number> = {
  processed: 0,
  confirmed: 1,
  finalized: 2,
};

/**
 * Whether a reported confirmation level satisfies the requested one.
 */
export function meetsCommitment(actual: Commitment | null, target: Commitment): boolean {
  if (actual === null) {
    return false;
  }
  return COMMITMENT_RANK[actual] >= COMMITMENT_RANK[target];
}

async function callRpc<T>(method: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw new LedgerRpcError(method, error);
  }
}

/**
 * Create a ledger client on top of a Kit RPC.
 *
 * @example
 * ```ts
 * const ledger = createKitLedgerClient({ rpcUrl: 'https://api.devnet.solana.com' });
 * const lamports = await ledger.getBalance(address('...'));
 * ```
 */
export function createKitLedgerClient(config: KitLedgerClientConfig): LedgerClient {
  const { preflightCommitment = 'confirmed' } = config;
  const rpc: LedgerRpc = resolveRpc(config);

  return {
    async getBalance(account: Address, commitment: Commitment = preflightCommitment): Promise<bigint> {
      const { value } = await callRpc('getBalance', () => rpc.getBalance(account, { commitment }).send());
      return value;
    },

    async submit(intent: TransactionIntent): Promise<Signature> {
      const instructions = await buildIntentInstructions(intent);
      const feePayer = getIntentFeePayer(intent);

      const { value: latestBlockhash } = await callRpc('getLatestBlockhash', () =>
        rpc.getLatestBlockhash({ commitment: preflightCommitment }).send()
      );

      const message = pipe(
        createTransactionMessage({ version: 0 }),
        (msg) => setTransactionMessageFeePayerSigner(feePayer, msg),
        (msg) => setTransactionMessageLifetimeUsingBlockhash(latestBlockhash, msg),
        (msg) => appendTransactionMessageInstructions(instructions, msg)
      );

      const signedTransaction = await signTransactionMessageWithSigners(message);
      const wireTransaction = getBase64EncodedWireTransaction(signedTransaction);

      return callRpc('sendTransaction', () =>
        rpc
          .sendTransaction(wireTransaction, {
            encoding: 'base64',
            skipPreflight: intent.skipPreflight ?? false,
            preflightCommitment,
          })
          .send()
      );
    },

    async getTransactionStatus(signature: Signature, commitment: Commitment): Promise<TransactionStatus | null> {
      const { value: statuses } = await callRpc('getSignatureStatuses', () =>
        rpc.getSignatureStatuses([signature], { searchTransactionHistory: true }).send()
      );

      const status = statuses[0];
      if (!status) {
        return null;
      }
      if (status.err) {
        return { err: status.err, confirmationStatus: status.confirmationStatus };
      }
      if (!meetsCommitment(status.confirmationStatus, commitment)) {
        return null;
      }
      return { err: null, confirmationStatus: status.confirmationStatus };
    },
  };
}

function resolveRpc(config: KitLedgerClientConfig): LedgerRpc {
  if (config.rpc) {
    return config.rpc;
  }
  if (!config.rpcUrl) {
    throw new HopConfigError('Either rpc or rpcUrl is required', 'rpcUrl');
  }
  return createSolanaRpc(config.rpcUrl);
}
