// ── Pools ───────────────────────────────────────────────────
export enum PoolKind {
    MINING = 'MINING',
    REFERRAL = 'REFERRAL',
}

export const POOL_KINDS: readonly PoolKind[] = [PoolKind.MINING, PoolKind.REFERRAL];

/** On-the-wire `uint8` used for the pool field of a signed voucher. */
export const POOL_KIND_CODE: Record<PoolKind, number> = {
    [PoolKind.MINING]: 0,
    [PoolKind.REFERRAL]: 1,
};

export function isPoolKind(value: unknown): value is PoolKind {
    return value === PoolKind.MINING || value === PoolKind.REFERRAL;
}

export enum DistributionPhase {
    BEFORE_LAUNCH = 'BEFORE_LAUNCH',
    ACCRUING = 'ACCRUING',
    MIGRATION_LOCKED = 'MIGRATION_LOCKED',
    DRAINED = 'DRAINED',
}

// ── Curves ──────────────────────────────────────────────────
export interface EmissionInterval {
    /** Smallest token units released per second */
    rate: bigint;
    /** Seconds */
    duration: number;
}

// ── Vouchers & Claims ───────────────────────────────────────
export interface VoucherDomain {
    name: string;
    version: string;
    chainId: number;
    /** Address of the ledger account that holds and pays out the allocation */
    verifyingContract: string;
}

export interface ClaimVoucher {
    receiver: string;
    pool: PoolKind;
    amount: bigint;
    /** Unix seconds; the voucher is rejected once `now` passes it */
    validUntil: number;
    nonce: bigint;
}

export interface ClaimRequest extends ClaimVoucher {
    signature: string;
}

export interface ClaimRecord {
    claimKey: string;
    receiver: string;
    claimant: string;
    pool: PoolKind;
    amount: bigint;
    validUntil: number;
    nonce: bigint;
    timestamp: number;
}

// ── Migration ───────────────────────────────────────────────
export interface MigrationState {
    active: boolean;
    lockTimestamp: number | null;
    migrationTimestamp: number | null;
    sweptAt: number | null;
}

export interface SweepResult {
    destination: string;
    amount: bigint;
    perPool: Record<PoolKind, bigint>;
    timestamp: number;
}

// ── Collaborators ───────────────────────────────────────────
export interface TokenLedgerPort {
    balanceOf(account: string): Promise<bigint>;
    transfer(from: string, to: string, amount: bigint): Promise<boolean>;
}

export interface AdminGatePort {
    isOwner(caller: string): boolean;
    isPaused(): boolean;
}

/** Returns the current time in Unix seconds. */
export type Clock = () => number;

// ── Persisted state ─────────────────────────────────────────
export interface LedgerSnapshot {
    distributed: Record<PoolKind, bigint>;
    claims: ClaimRecord[];
    migration: MigrationState;
}
