/**
 * DistributionLedger — voucher-gated payouts from two time-unlocked pools.
 *
 * Mining rewards unlock along an EmissionCurve, referral rewards along a
 * VestingCurve, both measured from the launch timestamp. Each claim is
 * checked against the voucher signature, replay history, the unlocked amount
 * and the pool cap before any bookkeeping changes. Once a migration starts
 * the clock fed to the curves is frozen, and after the grace period the owner
 * can sweep whatever was unlocked but never claimed.
 *
 * Every mutating operation holds a reentrancy guard for its whole duration,
 * reads the clock once, and either commits completely or returns an error
 * with state untouched.
 */
import { EventEmitter } from 'events';
import { getAddress, isAddress } from 'ethers';
import type winston from 'winston';
import { createLogger } from '../utils/logger.js';
import { nowSeconds } from '../utils/timestamp.js';
import { DistributionError, configError, fail, ok } from './errors.js';
import type { Result } from './errors.js';
import { MigrationLock } from './MigrationLock.js';
import type { ClaimAuthorizer } from './ClaimAuthorizer.js';
import type { EmissionCurve } from './EmissionCurve.js';
import type { VestingCurve } from './VestingCurve.js';
import { DistributionPhase, POOL_KINDS, PoolKind, isPoolKind } from '../types/index.js';
import type {
    AdminGatePort,
    ClaimRecord,
    ClaimRequest,
    ClaimVoucher,
    Clock,
    EmissionInterval,
    LedgerSnapshot,
    MigrationState,
    SweepResult,
    TokenLedgerPort,
} from '../types/index.js';

const MAX_UINT256 = (1n << 256n) - 1n;

const reentrantCall = (): DistributionError =>
    new DistributionError('REENTRANT_CALL', 'Another distribution operation is in progress');

export interface DistributionParams {
    launchTimestamp: number;
    emission: EmissionCurve;
    vesting: VestingCurve;
    miningCap: bigint;
    referralCap: bigint;
    /** Minimum seconds between starting a migration and its sweep */
    migrationGracePeriod?: number;
    /** Accept a launch timestamp that is not in the future */
    allowImmediateStart?: boolean;
}

export interface DistributionDeps {
    token: TokenLedgerPort;
    admin: AdminGatePort;
    authorizer: ClaimAuthorizer;
    clock?: Clock;
    logger?: winston.Logger;
}

/**
 * Events: `claim` (ClaimRecord), `migration` (MigrationState),
 * `sweep` (SweepResult).
 */
export class DistributionLedger extends EventEmitter {
    readonly launchTimestamp: number;
    /** Address holding the allocation; also the voucher domain's verifying contract */
    readonly account: string;

    private readonly token: TokenLedgerPort;
    private readonly admin: AdminGatePort;
    private readonly authorizer: ClaimAuthorizer;
    private readonly clock: Clock;
    private readonly logger: winston.Logger;
    private readonly emission: EmissionCurve;
    private readonly vesting: VestingCurve;
    private readonly caps: Record<PoolKind, bigint>;
    private readonly migration: MigrationLock;

    private readonly distributedByPool: Record<PoolKind, bigint> = {
        [PoolKind.MINING]: 0n,
        [PoolKind.REFERRAL]: 0n,
    };
    private readonly claims = new Map<string, ClaimRecord>();
    private entered = false;

    constructor(params: DistributionParams, deps: DistributionDeps) {
        super();
        this.token = deps.token;
        this.admin = deps.admin;
        this.authorizer = deps.authorizer;
        this.clock = deps.clock ?? nowSeconds;
        this.logger = deps.logger ?? createLogger('info', 'distribution-ledger');

        if (!Number.isSafeInteger(params.launchTimestamp) || params.launchTimestamp < 0) {
            throw configError('Launch timestamp must be a non-negative number of seconds', {
                launchTimestamp: params.launchTimestamp,
            });
        }
        const startedAt = this.clock();
        if (!params.allowImmediateStart && params.launchTimestamp <= startedAt) {
            throw configError('Launch timestamp must be in the future', {
                launchTimestamp: params.launchTimestamp,
                now: startedAt,
            });
        }
        if (params.miningCap < 0n || params.referralCap < 0n) {
            throw configError('Pool caps cannot be negative');
        }

        this.launchTimestamp = params.launchTimestamp;
        this.account = this.authorizer.verifyingContract;
        this.emission = params.emission;
        this.vesting = params.vesting;
        this.caps = {
            [PoolKind.MINING]: params.miningCap,
            [PoolKind.REFERRAL]: params.referralCap,
        };
        this.migration = new MigrationLock(params.migrationGracePeriod);

        if (this.emission.totalEmission !== params.miningCap) {
            this.logger.warn('Emission schedule total differs from the mining cap', {
                scheduleTotal: this.emission.totalEmission,
                miningCap: params.miningCap,
            });
        }
        if (this.vesting.cap !== params.referralCap) {
            this.logger.warn('Vesting cap differs from the referral cap', {
                vestingCap: this.vesting.cap,
                referralCap: params.referralCap,
            });
        }
    }

    // ── Claims ──────────────────────────────────────────────

    /**
     * Pay out a signed voucher. `caller` is whoever submits it; the tokens go
     * to the voucher's receiver, so a third party may relay the claim.
     */
    async claim(caller: string, request: ClaimRequest): Promise<Result<ClaimRecord>> {
        const at = this.clock();
        if (this.entered) {
            return this.rejected('claim', reentrantCall());
        }
        this.entered = true;
        try {
            const result = await this.executeClaim(caller, request, at);
            if (!result.ok) return this.rejected('claim', result.error);
            this.logger.info('Claim settled', {
                pool: result.value.pool,
                receiver: result.value.receiver,
                amount: result.value.amount,
                claimKey: result.value.claimKey,
            });
            this.emit('claim', result.value);
            return result;
        } finally {
            this.entered = false;
        }
    }

    private async executeClaim(caller: string, request: ClaimRequest, at: number): Promise<Result<ClaimRecord>> {
        if (this.admin.isPaused()) {
            return fail('PAUSED', 'Claims are paused');
        }

        const invalid = this.validateRequest(request);
        if (invalid) return invalid;

        const voucher: ClaimVoucher = {
            receiver: getAddress(request.receiver),
            pool: request.pool,
            amount: request.amount,
            validUntil: request.validUntil,
            nonce: request.nonce,
        };
        const claimKey = this.authorizer.claimKey(voucher);

        if (this.claims.has(claimKey)) {
            return fail('CLAIM_ALREADY_EXISTS', 'Voucher has already been claimed', { claimKey });
        }
        if (voucher.validUntil < at) {
            return fail('CLAIM_EXPIRED', `Voucher expired at ${voucher.validUntil}`, {
                validUntil: voucher.validUntil,
                now: at,
            });
        }

        const balance = await this.token.balanceOf(this.account);
        if (balance < voucher.amount) {
            return fail('INSUFFICIENT_BALANCE', 'Distributor balance cannot cover the claim', {
                balance,
                amount: voucher.amount,
            });
        }

        const auth = this.authorizer.verify(voucher, request.signature);
        if (!auth.ok) {
            return fail('INVALID_SIGNATURE', `Voucher signature rejected: ${auth.reason}`, {
                failure: auth.failure,
            });
        }

        if (at <= this.launchTimestamp) {
            return fail('DISTRIBUTION_NOT_STARTED', `Distribution starts after ${this.launchTimestamp}`, {
                launchTimestamp: this.launchTimestamp,
                now: at,
            });
        }

        const distributed = this.distributedByPool[voucher.pool];
        const claimable = this.unlockedAt(voucher.pool, at) - distributed;
        if (claimable <= 0n) {
            return fail('NO_REWARDS_AVAILABLE', `No ${voucher.pool} rewards available yet`);
        }
        if (voucher.amount > claimable) {
            return fail('EXCEEDS_CLAIMABLE_REWARDS', `Claim exceeds ${claimable} claimable ${voucher.pool} rewards`, {
                claimable,
                amount: voucher.amount,
            });
        }
        const cap = this.caps[voucher.pool];
        if (distributed + voucher.amount > cap) {
            return fail('EXCEEDS_POOL_CAP', `Claim would exceed the ${voucher.pool} pool cap`, {
                cap,
                distributed,
                amount: voucher.amount,
            });
        }

        const record: ClaimRecord = {
            claimKey,
            receiver: voucher.receiver,
            claimant: caller,
            pool: voucher.pool,
            amount: voucher.amount,
            validUntil: voucher.validUntil,
            nonce: voucher.nonce,
            timestamp: at,
        };

        // Effects before the transfer; undone if it does not go through
        this.claims.set(claimKey, record);
        this.distributedByPool[voucher.pool] = distributed + voucher.amount;

        const failure = await this.settle(voucher.receiver, voucher.amount, { claimKey });
        if (failure) {
            this.claims.delete(claimKey);
            this.distributedByPool[voucher.pool] = distributed;
            return { ok: false, error: failure };
        }
        return ok({ ...record });
    }

    private validateRequest(request: ClaimRequest): Result<never> | null {
        if (!isPoolKind(request.pool)) {
            return fail('INVALID_REQUEST', `Unknown pool: ${String(request.pool)}`);
        }
        if (!isAddress(request.receiver)) {
            return fail('INVALID_REQUEST', `Invalid receiver address: ${request.receiver}`);
        }
        if (request.amount <= 0n || request.amount > MAX_UINT256) {
            return fail('INVALID_AMOUNT', `Claim amount must be positive, got ${request.amount}`);
        }
        if (!Number.isSafeInteger(request.validUntil) || request.validUntil < 0) {
            return fail('INVALID_REQUEST', `Invalid validUntil: ${request.validUntil}`);
        }
        if (request.nonce < 0n || request.nonce > MAX_UINT256) {
            return fail('INVALID_REQUEST', `Invalid nonce: ${request.nonce}`);
        }
        return null;
    }

    // ── Migration ───────────────────────────────────────────

    /**
     * Freeze both unlock curves at the current time. The sweep opens once
     * `targetTimestamp` has passed, which must be at least the grace period away.
     */
    startMigration(caller: string, targetTimestamp: number): Result<MigrationState> {
        const at = this.clock();
        if (this.entered) {
            return this.rejected('startMigration', reentrantCall());
        }
        this.entered = true;
        try {
            if (!this.admin.isOwner(caller)) {
                return this.rejected('startMigration', new DistributionError('NOT_OWNER', `${caller} is not the owner`));
            }
            const result = this.migration.start(at, targetTimestamp);
            if (!result.ok) return this.rejected('startMigration', result.error);

            this.logger.info('Migration started', {
                lockTimestamp: result.value.lockTimestamp,
                migrationTimestamp: result.value.migrationTimestamp,
            });
            this.emit('migration', result.value);
            return result;
        } finally {
            this.entered = false;
        }
    }

    /**
     * Send every token unlocked by the frozen clock but never claimed to
     * `destination`. Effective once; later calls find nothing remaining.
     */
    async sweepRemaining(caller: string, destination: string): Promise<Result<SweepResult>> {
        const at = this.clock();
        if (this.entered) {
            return this.rejected('sweepRemaining', reentrantCall());
        }
        this.entered = true;
        try {
            const result = await this.executeSweep(caller, destination, at);
            if (!result.ok) return this.rejected('sweepRemaining', result.error);
            this.logger.info('Remaining rewards swept', {
                destination: result.value.destination,
                amount: result.value.amount,
            });
            this.emit('sweep', result.value);
            return result;
        } finally {
            this.entered = false;
        }
    }

    private async executeSweep(caller: string, destination: string, at: number): Promise<Result<SweepResult>> {
        if (!this.admin.isOwner(caller)) {
            return fail('NOT_OWNER', `${caller} is not the owner`);
        }
        if (!isAddress(destination)) {
            return fail('INVALID_REQUEST', `Invalid destination address: ${destination}`);
        }
        const sweepable = this.migration.sweepableAt(at);
        if (!sweepable.ok) return sweepable;
        const lockTimestamp = sweepable.value;

        const previous = { ...this.distributedByPool };
        const migrationBefore = this.migration.snapshot();
        const perPool: Record<PoolKind, bigint> = {
            [PoolKind.MINING]: this.unclaimedAt(PoolKind.MINING, lockTimestamp),
            [PoolKind.REFERRAL]: this.unclaimedAt(PoolKind.REFERRAL, lockTimestamp),
        };
        const amount = perPool[PoolKind.MINING] + perPool[PoolKind.REFERRAL];
        if (amount === 0n) {
            return fail('NO_REMAINING_TOKENS', 'No remaining tokens to sweep');
        }

        for (const pool of POOL_KINDS) {
            this.distributedByPool[pool] = previous[pool] + perPool[pool];
        }
        this.migration.markSwept(at);

        const target = getAddress(destination);
        const failure = await this.settle(target, amount, { sweep: true });
        if (failure) {
            for (const pool of POOL_KINDS) {
                this.distributedByPool[pool] = previous[pool];
            }
            this.migration.restore(migrationBefore);
            return { ok: false, error: failure };
        }
        return ok({ destination: target, amount, perPool, timestamp: at });
    }

    // ── Views ───────────────────────────────────────────────

    unlockedMining(at: number = this.clock()): bigint {
        return this.unlockedAt(PoolKind.MINING, at);
    }

    unlockedReferral(at: number = this.clock()): bigint {
        return this.unlockedAt(PoolKind.REFERRAL, at);
    }

    /**
     * Unlocked-but-unclaimed amount of a pool at `at`, bounded by its cap.
     */
    claimable(pool: PoolKind, at: number = this.clock()): bigint {
        return this.unclaimedAt(pool, at);
    }

    distributed(pool: PoolKind): bigint {
        return this.distributedByPool[pool];
    }

    cap(pool: PoolKind): bigint {
        return this.caps[pool];
    }

    get emissionSchedule(): EmissionInterval[] {
        return this.emission.intervals;
    }

    get vestingDuration(): number {
        return this.vesting.duration;
    }

    get migrationGracePeriod(): number {
        return this.migration.gracePeriod;
    }

    migrationState(): MigrationState {
        return this.migration.snapshot();
    }

    phase(at: number = this.clock()): DistributionPhase {
        if (this.migration.swept) return DistributionPhase.DRAINED;
        if (this.migration.active) return DistributionPhase.MIGRATION_LOCKED;
        if (at <= this.launchTimestamp) return DistributionPhase.BEFORE_LAUNCH;
        return DistributionPhase.ACCRUING;
    }

    getClaim(claimKey: string): ClaimRecord | null {
        const record = this.claims.get(claimKey);
        return record ? { ...record } : null;
    }

    claimHistory(receiver?: string): ClaimRecord[] {
        const records = Array.from(this.claims.values());
        const wanted = receiver !== undefined && isAddress(receiver) ? getAddress(receiver) : receiver;
        return records
            .filter((record) => wanted === undefined || record.receiver === wanted)
            .map((record) => ({ ...record }));
    }

    /**
     * Deep copy of all persisted state.
     */
    snapshot(): LedgerSnapshot {
        return {
            distributed: { ...this.distributedByPool },
            claims: this.claimHistory(),
            migration: this.migration.snapshot(),
        };
    }

    // ── Internals ───────────────────────────────────────────

    private unlockedAt(pool: PoolKind, at: number): bigint {
        const elapsed = this.migration.effectiveTime(at) - this.launchTimestamp;
        if (elapsed <= 0) return 0n;
        const unlocked = pool === PoolKind.MINING
            ? this.emission.unlocked(elapsed)
            : this.vesting.unlocked(elapsed);
        this.logger.debug('Unlocked amount computed', { pool, elapsed, unlocked });
        return unlocked;
    }

    /**
     * Unlocked-but-unclaimed amount of a pool at `at`, bounded by its cap.
     */
    private unclaimedAt(pool: PoolKind, at: number): bigint {
        const unlocked = this.unlockedAt(pool, at);
        const ceiling = unlocked < this.caps[pool] ? unlocked : this.caps[pool];
        const remaining = ceiling - this.distributedByPool[pool];
        return remaining > 0n ? remaining : 0n;
    }

    /**
     * Pays out of the ledger account; resolves to the failure, or null once settled.
     */
    private async settle(to: string, amount: bigint, metadata: Record<string, unknown>): Promise<DistributionError | null> {
        try {
            const transferred = await this.token.transfer(this.account, to, amount);
            if (transferred) return null;
            return new DistributionError('TRANSFER_FAILED', `Token transfer of ${amount} to ${to} was refused`, metadata);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            return new DistributionError('TRANSFER_FAILED', `Token transfer of ${amount} to ${to} failed: ${reason}`, metadata);
        }
    }

    private rejected(operation: string, error: DistributionError): Result<never> {
        this.logger.warn(`${operation} rejected: ${error.message}`, {
            code: error.code,
            category: error.category,
        });
        return { ok: false, error };
    }
}
