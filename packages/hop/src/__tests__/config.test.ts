/**
 * Tests for configuration resolution and environment loading.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { HopConfigError, silentLogger } from '@hopline/core';
import { InMemoryLedger } from '@hopline/core/testing';
import { loadHopTransferConfigFromEnv, resolveHopTransferConfig, type HopTransferConfig } from '../config.js';
import { generateHopAccount, type HopAccount } from '../hop-account.js';

describe('resolveHopTransferConfig', () => {
    let sender: HopAccount;
    let receiver: HopAccount;

    beforeAll(async () => {
        sender = await generateHopAccount();
        receiver = await generateHopAccount();
    });

    function baseConfig(overrides: Partial<HopTransferConfig> = {}): HopTransferConfig {
        return {
            ledger: new InMemoryLedger(),
            senderPrivateKey: sender.exportSecretKey(),
            receiverAddress: receiver.address,
            logger: silentLogger,
            ...overrides,
        };
    }

    async function configError(config: HopTransferConfig): Promise<HopConfigError> {
        const error = await resolveHopTransferConfig(config).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(HopConfigError);
        if (!(error instanceof HopConfigError)) {
            throw new Error('expected HopConfigError');
        }
        return error;
    }

    it('should apply defaults', async () => {
        const resolved = await resolveHopTransferConfig(baseConfig());

        expect(resolved.sender.address).toBe(sender.address);
        expect(resolved.receiver).toBe(receiver.address);
        expect(resolved.amount).toBeUndefined();
        expect(resolved.hopFee).toBe(0.01);
        expect(resolved.recovery).toBe('direct-transfer');
        expect(resolved.forward).toBe('amount');
        expect(resolved.failureMode).toBe('throw');
        expect(resolved.retry).toEqual({ maxAttempts: 3, delayMs: 1_000 });
        expect(resolved.confirmation).toEqual({ commitment: 'finalized', maxPolls: 20, intervalMs: 3_000 });
        expect(resolved.balance).toEqual({ maxPolls: 5, intervalMs: 1_000 });
        expect(resolved.recoveryCooldownMs).toBe(5_000);
        expect(resolved.priorityFee).toEqual({ computeUnitPrice: 100_000, computeUnitLimit: 10_000 });
        expect(resolved.wrapComputeUnitLimit).toBe(80_000);
        expect(resolved.hooks).toEqual({});
    });

    it('should merge partial settings', async () => {
        const resolved = await resolveHopTransferConfig(
            baseConfig({ retry: { maxAttempts: 5 }, confirmation: { commitment: 'confirmed' } })
        );

        expect(resolved.retry).toEqual({ maxAttempts: 5, delayMs: 1_000 });
        expect(resolved.confirmation).toEqual({ commitment: 'confirmed', maxPolls: 20, intervalMs: 3_000 });
    });

    it('should build a ledger client from rpcUrl', async () => {
        const resolved = await resolveHopTransferConfig(
            baseConfig({ ledger: undefined, rpcUrl: 'http://127.0.0.1:8899' })
        );

        expect(typeof resolved.ledger.submit).toBe('function');
    });

    it('should require a ledger or rpcUrl', async () => {
        const error = await configError(baseConfig({ ledger: undefined }));

        expect(error.field).toBe('rpcUrl');
    });

    it('should reject a receiver that is not an address', async () => {
        const error = await configError(baseConfig({ receiverAddress: 'receiver' }));

        expect(error.field).toBe('receiverAddress');
        expect(error.message).toBe('receiverAddress is not a valid address (got receiver)');
    });

    it('should reject a sender key that is not base58', async () => {
        const error = await configError(baseConfig({ senderPrivateKey: 'not-base58!' }));

        expect(error.message).toBe('senderPrivateKey is not valid base58');
    });

    it('should reject a sender key of the wrong length', async () => {
        const error = await configError(baseConfig({ senderPrivateKey: receiver.address }));

        expect(error.message).toBe('senderPrivateKey must decode to 64 bytes, got 32');
    });

    it.each([
        [{ retry: { maxAttempts: 0 } }, 'retry.maxAttempts'],
        [{ retry: { maxAttempts: 1.5 } }, 'retry.maxAttempts'],
        [{ retry: { delayMs: -1 } }, 'retry.delayMs'],
        [{ confirmation: { maxPolls: 0 } }, 'confirmation.maxPolls'],
        [{ balance: { intervalMs: Number.NaN } }, 'balance.intervalMs'],
        [{ hopFee: -0.01 }, 'hopFee'],
        [{ amount: 0 }, 'amount'],
        [{ priorityFee: { computeUnitLimit: 0 } }, 'priorityFee.computeUnitLimit'],
        [{ recoveryCooldownMs: -5 }, 'recoveryCooldownMs'],
    ] satisfies Array<[Partial<HopTransferConfig>, string]>)('should reject %o naming %s', async (overrides, field) => {
        const error = await configError(baseConfig(overrides));

        expect(error.field).toBe(field);
    });
});

describe('loadHopTransferConfigFromEnv', () => {
    const env = {
        HOPLINE_RPC_URL: 'http://127.0.0.1:8899',
        HOPLINE_SENDER_PRIVATE_KEY: 'test-secret',
        HOPLINE_RECEIVER: '11111111111111111111111111111111',
    };

    it('should read required and optional variables', () => {
        const config = loadHopTransferConfigFromEnv({
            ...env,
            HOPLINE_AMOUNT: '0.25',
            HOPLINE_HOP_FEE: '0.02',
            HOPLINE_RECOVERY: 'wrap-and-close',
            HOPLINE_KEY_DIR: './keys',
            HOPLINE_LOG_LEVEL: 'verbose',
        });

        expect(config).toEqual({
            rpcUrl: 'http://127.0.0.1:8899',
            senderPrivateKey: 'test-secret',
            receiverAddress: '11111111111111111111111111111111',
            amount: 0.25,
            hopFee: 0.02,
            recovery: 'wrap-and-close',
            keyDirectory: './keys',
            logLevel: 'verbose',
        });
    });

    it('should leave blank optional variables unset', () => {
        const config = loadHopTransferConfigFromEnv({ ...env, HOPLINE_AMOUNT: '  ', HOPLINE_LOG_LEVEL: '' });

        expect(config.amount).toBeUndefined();
        expect(config.logLevel).toBeUndefined();
    });

    it('should require the RPC URL', () => {
        expect(() => loadHopTransferConfigFromEnv({ ...env, HOPLINE_RPC_URL: undefined })).toThrow(
            'HOPLINE_RPC_URL is required'
        );
    });

    it('should reject malformed numbers', () => {
        expect(() => loadHopTransferConfigFromEnv({ ...env, HOPLINE_AMOUNT: 'abc' })).toThrow(
            'HOPLINE_AMOUNT must be a number (got abc)'
        );
    });

    it('should reject unknown recovery strategies', () => {
        expect(() => loadHopTransferConfigFromEnv({ ...env, HOPLINE_RECOVERY: 'sideways' })).toThrow(
            'HOPLINE_RECOVERY must be one of direct-transfer, wrap-and-close (got sideways)'
        );
    });
});
