/**
 * TokenLedger — store-backed balance sheet for the distributed token.
 *
 * Tracks balances and transaction history per account. Stands in for the
 * fungible-token contract the distribution ledger pays out of: it funds the
 * distributor account (`fund`), and moves tokens on `transfer`.
 */
import type winston from 'winston';
import { createLogger } from '../utils/logger.js';
import { now } from '../utils/timestamp.js';
import { generateId } from '../utils/uuid.js';
import type { TokenLedgerPort } from '../types/index.js';

export type TransactionType = 'fund' | 'transfer';

export interface Transaction {
    txId: string;
    account: string;
    amount: bigint;
    type: TransactionType;
    direction: 'credit' | 'debit';
    timestamp: number;
    metadata: Record<string, unknown>;
}

export interface LedgerEntry {
    _id: string;
    balance: bigint;
    transactions: Transaction[];
}

export interface LedgerStore {
    put(entry: LedgerEntry): Promise<void>;
    get(id: string): Promise<LedgerEntry | null>;
    del(id: string): Promise<void>;
    all(): Promise<Array<{ key: string; value: LedgerEntry }>>;
}

const accountKey = (account: string): string => account.toLowerCase();

export class TokenLedger implements TokenLedgerPort {
    constructor(
        private readonly store: LedgerStore,
        private readonly logger: winston.Logger = createLogger('info', 'token-ledger'),
    ) { }

    /**
     * Mint tokens into an account, e.g. pre-funding the distributor.
     */
    async fund(account: string, amount: bigint, metadata: Record<string, unknown> = {}): Promise<Transaction> {
        if (amount <= 0n) {
            throw new Error(`Funding amount must be positive, got ${amount}`);
        }
        return this.credit(account, amount, 'fund', metadata);
    }

    /**
     * Credit tokens to an account's balance.
     */
    async credit(
        account: string,
        amount: bigint,
        type: TransactionType,
        metadata: Record<string, unknown>,
    ): Promise<Transaction> {
        const entry = await this.getOrCreateEntry(account);
        const tx = this.createTransaction(account, amount, type, 'credit', metadata);
        entry.balance += amount;
        entry.transactions.push(tx);
        await this.store.put(entry);
        return tx;
    }

    /**
     * Debit tokens from an account's balance. Throws if insufficient funds.
     */
    async debit(
        account: string,
        amount: bigint,
        type: TransactionType,
        metadata: Record<string, unknown>,
    ): Promise<Transaction> {
        const entry = await this.getOrCreateEntry(account);
        if (entry.balance < amount) {
            throw new Error(
                `Insufficient balance for ${account}: has ${entry.balance}, needs ${amount}`
            );
        }
        const tx = this.createTransaction(account, amount, type, 'debit', metadata);
        entry.balance -= amount;
        entry.transactions.push(tx);
        await this.store.put(entry);
        return tx;
    }

    /**
     * Move tokens between accounts. Resolves false, leaving both balances
     * untouched, when the sender cannot cover the amount.
     */
    async transfer(
        from: string,
        to: string,
        amount: bigint,
        metadata: Record<string, unknown> = {},
    ): Promise<boolean> {
        if (amount <= 0n) return false;
        const balance = await this.getBalance(from);
        if (balance < amount) {
            this.logger.warn('Transfer rejected: insufficient balance', { from, to, amount, balance });
            return false;
        }
        await this.debit(from, amount, 'transfer', { ...metadata, to });
        await this.credit(to, amount, 'transfer', { ...metadata, from });
        this.logger.debug('Transfer settled', { from, to, amount });
        return true;
    }

    /**
     * Get current balance for an account.
     */
    async getBalance(account: string): Promise<bigint> {
        const entry = await this.store.get(accountKey(account));
        return entry ? entry.balance : 0n;
    }

    async balanceOf(account: string): Promise<bigint> {
        return this.getBalance(account);
    }

    /**
     * Get transaction history for an account.
     */
    async getTransactionHistory(account: string): Promise<Transaction[]> {
        const entry = await this.store.get(accountKey(account));
        return entry ? entry.transactions : [];
    }

    private createTransaction(
        account: string,
        amount: bigint,
        type: TransactionType,
        direction: Transaction['direction'],
        metadata: Record<string, unknown>,
    ): Transaction {
        return {
            txId: `tx-${generateId()}`,
            account: accountKey(account),
            amount,
            type,
            direction,
            timestamp: now(),
            metadata,
        };
    }

    private async getOrCreateEntry(account: string): Promise<LedgerEntry> {
        const key = accountKey(account);
        const existing = await this.store.get(key);
        if (existing) return existing;
        return { _id: key, balance: 0n, transactions: [] };
    }
}
