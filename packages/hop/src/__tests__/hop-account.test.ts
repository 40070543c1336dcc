import { describe, it, expect } from 'vitest';
import { getAddressEncoder, getBase58Decoder, getBase58Encoder } from '@solana/kit';
import { HopConfigError } from '@hopline/core';
import { generateHopAccount, signerFromSecretKey } from '../hop-account.js';

describe('generateHopAccount', () => {
    it('should export a 64-byte secret that ends with the public key', async () => {
        const hop = await generateHopAccount();

        const secret = getBase58Encoder().encode(hop.exportSecretKey());

        expect(secret).toHaveLength(64);
        expect(Array.from(secret.slice(32))).toEqual(Array.from(getAddressEncoder().encode(hop.address)));
    });

    it('should round-trip through signerFromSecretKey', async () => {
        const hop = await generateHopAccount();

        const signer = await signerFromSecretKey(hop.exportSecretKey());

        expect(signer.address).toBe(hop.address);
    });

    it('should generate a different account every time', async () => {
        const [first, second] = await Promise.all([generateHopAccount(), generateHopAccount()]);

        expect(first.address).not.toBe(second.address);
    });

    it('should expose only the address when serialized', async () => {
        const hop = await generateHopAccount();

        expect(JSON.stringify({ hop })).toBe(`{"hop":{"address":"${hop.address}"}}`);
        expect(`${hop}`).toBe(hop.address);
    });
});

describe('signerFromSecretKey', () => {
    it('should reject a secret whose halves do not belong together', async () => {
        const [first, second] = await Promise.all([generateHopAccount(), generateHopAccount()]);
        const bytes = new Uint8Array(64);
        bytes.set(getBase58Encoder().encode(first.exportSecretKey()).slice(0, 32));
        bytes.set(getAddressEncoder().encode(second.address), 32);

        await expect(signerFromSecretKey(getBase58Decoder().decode(bytes), 'hopKey')).rejects.toThrow(
            new HopConfigError('hopKey is not a valid Ed25519 key pair', 'hopKey')
        );
    });
});
