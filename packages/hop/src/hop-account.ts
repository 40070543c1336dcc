/**
 * Ephemeral hop account and sender key decoding.
 *
 * @packageDocumentation
 */

import {
  createKeyPairFromPrivateKeyBytes,
  createKeyPairSignerFromBytes,
  createSignerFromKeyPair,
  getAddressEncoder,
  getBase58Decoder,
  getBase58Encoder,
  type Address,
  type KeyPairSigner,
} from '@solana/kit';
import { HopConfigError } from '@hopline/core';

/**
 * Key pair generated for one hop transfer run.
 *
 * The secret key is only reachable through {@link HopAccount.exportSecretKey};
 * JSON and string conversion give the address.
 */
export class HopAccount {
  readonly #secretKey: string;

  constructor(
    public readonly signer: KeyPairSigner,
    secretKey: string
  ) {
    this.#secretKey = secretKey;
  }

  get address(): Address {
    return this.signer.address;
  }

  /**
   * Base58 64-byte secret key (seed followed by public key), the format
   * Solana CLI wallets import.
   */
  exportSecretKey(): string {
    return this.#secretKey;
  }

  toJSON(): { address: Address } {
    return { address: this.address };
  }

  toString(): string {
    return this.address;
  }
}

/**
 * Generate a fresh hop account from 32 random seed bytes.
 */
export async function generateHopAccount(): Promise<HopAccount> {
  const seed = crypto.getRandomValues(new Uint8Array(32));
  const keyPair = await createKeyPairFromPrivateKeyBytes(seed);
  const signer = await createSignerFromKeyPair(keyPair);

  const secret = new Uint8Array(64);
  secret.set(seed);
  secret.set(getAddressEncoder().encode(signer.address), 32);
  const secretKey = getBase58Decoder().decode(secret);

  seed.fill(0);
  secret.fill(0);
  return new HopAccount(signer, secretKey);
}

/**
 * Decode a base58 64-byte secret key into a signer.
 *
 * @throws {HopConfigError} when the key is not base58, not 64 bytes, or its
 * halves do not belong together
 */
export async function signerFromSecretKey(secretKey: string, field = 'senderPrivateKey'): Promise<KeyPairSigner> {
  const bytes = decodeBase58(secretKey.trim(), field);
  if (bytes.length !== 64) {
    throw new HopConfigError(`${field} must decode to 64 bytes, got ${bytes.length}`, field);
  }
  try {
    return await createKeyPairSignerFromBytes(bytes);
  } catch {
    throw new HopConfigError(`${field} is not a valid Ed25519 key pair`, field);
  }
}

function decodeBase58(value: string, field: string) {
  try {
    return getBase58Encoder().encode(value);
  } catch {
    throw new HopConfigError(`${field} is not valid base58`, field);
  }
}
