/**
 * Tests for transaction status polling.
 */

import { describe, it, expect, beforeAll, vi } from 'vitest';
import { generateKeyPairSigner, type Address, type Signature, type TransactionSigner } from '@solana/kit';
import { createConfirmer, pollTransactionStatus } from '../poll.js';
import type { LedgerClient, TransactionStatus } from '../../ledger/types.js';
import { InMemoryLedger, createTestSignature } from '../../testing/in-memory-ledger.js';

const NO_PRIORITY_FEE = { computeUnitPrice: 0, computeUnitLimit: 10_000 };

describe('pollTransactionStatus', () => {
    let sender: TransactionSigner;
    let receiver: Address;

    beforeAll(async () => {
        sender = await generateKeyPairSigner();
        receiver = (await generateKeyPairSigner()).address;
    });

    async function submitTransfer(ledger: InMemoryLedger): Promise<Signature> {
        ledger.setBalance(sender.address, 1_000_000n);
        return ledger.submit({
            kind: 'transfer',
            source: sender,
            destination: receiver,
            amount: 1_000n,
            priorityFee: NO_PRIORITY_FEE,
        });
    }

    it('should confirm on the last allowed poll without resubmitting', async () => {
        const ledger = new InMemoryLedger();
        ledger.setPendingPolls(19);
        const signature = await submitTransfer(ledger);

        const status = await pollTransactionStatus(ledger, signature, { maxPolls: 20, intervalMs: 0 });

        expect(status).toBe('confirmed');
        expect(ledger.statusReads).toBe(20);
        expect(ledger.submitCalls).toBe(1);
    });

    it('should give up with unknown after maxPolls', async () => {
        const ledger = new InMemoryLedger();
        ledger.setPendingPolls(20);
        const signature = await submitTransfer(ledger);

        const status = await pollTransactionStatus(ledger, signature, { maxPolls: 20, intervalMs: 0 });

        expect(status).toBe('unknown');
        expect(ledger.statusReads).toBe(20);
    });

    it('should report a landed transaction that failed', async () => {
        const ledger = new InMemoryLedger();
        ledger.failNextTransactions(1);
        const signature = await submitTransfer(ledger);

        const status = await pollTransactionStatus(ledger, signature, { intervalMs: 0 });

        expect(status).toBe('failed');
        expect(ledger.statusReads).toBe(1);
    });

    it('should return unknown for a signature the ledger never saw', async () => {
        const ledger = new InMemoryLedger();

        const status = await pollTransactionStatus(ledger, createTestSignature(7), { maxPolls: 3, intervalMs: 0 });

        expect(status).toBe('unknown');
        expect(ledger.statusReads).toBe(3);
    });

    it('should count fetch errors as polls', async () => {
        const getTransactionStatus = vi
            .fn<(signature: Signature) => Promise<TransactionStatus | null>>()
            .mockRejectedValueOnce(new Error('503 Service Unavailable'))
            .mockRejectedValueOnce(new Error('503 Service Unavailable'))
            .mockResolvedValue({ err: null, confirmationStatus: 'finalized' });
        const ledger: LedgerClient = {
            getBalance: vi.fn(),
            submit: vi.fn(),
            getTransactionStatus,
        };

        const status = await pollTransactionStatus(ledger, createTestSignature(1), { maxPolls: 3, intervalMs: 0 });

        expect(status).toBe('confirmed');
        expect(getTransactionStatus).toHaveBeenCalledTimes(3);
    });

    it('should ask for the configured commitment', async () => {
        const getTransactionStatus = vi
            .fn<LedgerClient['getTransactionStatus']>()
            .mockResolvedValue({ err: null, confirmationStatus: 'confirmed' });
        const ledger: LedgerClient = { getBalance: vi.fn(), submit: vi.fn(), getTransactionStatus };

        await pollTransactionStatus(ledger, createTestSignature(1), { commitment: 'confirmed' });
        await pollTransactionStatus(ledger, createTestSignature(2));

        expect(getTransactionStatus).toHaveBeenNthCalledWith(1, createTestSignature(1), 'confirmed');
        expect(getTransactionStatus).toHaveBeenNthCalledWith(2, createTestSignature(2), 'finalized');
    });
});

describe('createConfirmer', () => {
    it('should bind the ledger and options', async () => {
        const ledger = new InMemoryLedger();
        const confirm = createConfirmer(ledger, { maxPolls: 2, intervalMs: 0 });

        await expect(confirm(createTestSignature(3))).resolves.toBe('unknown');
        expect(ledger.statusReads).toBe(2);
    });
});
