import type { LedgerEntry, LedgerStore } from './TokenLedger.js';

/**
 * In-process LedgerStore. Entries are cloned on the way in and out so callers
 * never hold a live reference into the store.
 */
export class MemoryLedgerStore implements LedgerStore {
    private readonly data = new Map<string, LedgerEntry>();

    async put(entry: LedgerEntry): Promise<void> {
        this.data.set(entry._id, structuredClone(entry));
    }

    async get(id: string): Promise<LedgerEntry | null> {
        const entry = this.data.get(id);
        return entry ? structuredClone(entry) : null;
    }

    async del(id: string): Promise<void> {
        this.data.delete(id);
    }

    async all(): Promise<Array<{ key: string; value: LedgerEntry }>> {
        return Array.from(this.data.entries()).map(([key, value]) => ({ key, value: structuredClone(value) }));
    }
}
