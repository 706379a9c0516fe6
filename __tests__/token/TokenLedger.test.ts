/**
 * TokenLedger Tests
 *
 * 1. Credit and debit balances correctly
 * 2. Reject debit exceeding balance
 * 3. Record transaction history
 * 4. Transfer between accounts, refusing overdrafts
 */
import { jest } from '@jest/globals';
import { TokenLedger } from '../../src/token/TokenLedger.js';
import type { LedgerEntry } from '../../src/token/TokenLedger.js';
import { MemoryLedgerStore } from '../../src/token/MemoryLedgerStore.js';
import { createLogger } from '../../src/utils/logger.js';

function createMockStore() {
    const data = new Map<string, LedgerEntry>();
    return {
        put: jest.fn(async (entry: LedgerEntry) => { data.set(entry._id, entry); }),
        get: jest.fn(async (id: string) => data.get(id) ?? null),
        del: jest.fn(async (id: string) => { data.delete(id); }),
        all: jest.fn(async () => Array.from(data.entries()).map(([key, value]) => ({ key, value }))),
    };
}

const logger = createLogger('error', 'test');
const A = '0x' + 'a1'.repeat(20);
const B = '0x' + 'b2'.repeat(20);

describe('TokenLedger', () => {

    test('should credit and debit balances correctly', async () => {
        const store = createMockStore();
        const ledger = new TokenLedger(store, logger);

        await ledger.credit('node-1', 100n, 'fund', { block: 0 });
        expect(await ledger.getBalance('node-1')).toBe(100n);

        await ledger.debit('node-1', 30n, 'transfer', { to: 'node-2' });
        expect(await ledger.getBalance('node-1')).toBe(70n);
        expect(store.put).toHaveBeenCalledTimes(2);
    });

    test('should reject debit exceeding balance', async () => {
        const ledger = new TokenLedger(createMockStore(), logger);

        await ledger.credit('node-1', 100n, 'fund', {});

        await expect(
            ledger.debit('node-1', 200n, 'transfer', {})
        ).rejects.toThrow(/Insufficient balance/);
    });

    test('should record transaction history', async () => {
        const ledger = new TokenLedger(createMockStore(), logger);

        await ledger.fund('n1', 50n, { batch: 0 });
        await ledger.fund('n1', 25n, { batch: 1 });
        await ledger.debit('n1', 10n, 'transfer', {});

        const history = await ledger.getTransactionHistory('n1');
        expect(history.length).toBe(3);
        expect(history[0].amount).toBe(50n);
        expect(history[0].type).toBe('fund');
        expect(history[0].metadata).toEqual({ batch: 0 });
        expect(history[1].amount).toBe(25n);
        expect(history[2].amount).toBe(10n);
        expect(history[2].direction).toBe('debit');
        expect(history[2].txId).toMatch(/^tx-/);
    });

    test('should reject non-positive funding', async () => {
        const ledger = new TokenLedger(createMockStore(), logger);
        await expect(ledger.fund('n1', 0n)).rejects.toThrow(/must be positive/);
    });

    test('should transfer between accounts regardless of address case', async () => {
        const ledger = new TokenLedger(new MemoryLedgerStore(), logger);
        await ledger.fund(A, 100n);

        expect(await ledger.transfer(A.toUpperCase().replace('0X', '0x'), B, 40n)).toBe(true);
        expect(await ledger.balanceOf(A)).toBe(60n);
        expect(await ledger.balanceOf(B)).toBe(40n);

        const [received] = await ledger.getTransactionHistory(B);
        expect(received.direction).toBe('credit');
        expect(received.metadata).toEqual({ from: A.toUpperCase().replace('0X', '0x') });
    });

    test('should refuse a transfer the sender cannot cover', async () => {
        const ledger = new TokenLedger(new MemoryLedgerStore(), logger);
        await ledger.fund(A, 10n);

        expect(await ledger.transfer(A, B, 11n)).toBe(false);
        expect(await ledger.transfer(A, B, 0n)).toBe(false);
        expect(await ledger.balanceOf(A)).toBe(10n);
        expect(await ledger.balanceOf(B)).toBe(0n);
    });

    test('should handle concurrent funding of multiple accounts', async () => {
        const ledger = new TokenLedger(new MemoryLedgerStore(), logger);

        await Promise.all([
            ledger.fund('n0', 50n),
            ledger.fund('n1', 50n),
            ledger.fund('n2', 50n),
        ]);

        for (let i = 0; i < 3; i++) {
            expect(await ledger.getBalance(`n${i}`)).toBe(50n);
        }
    });
});
