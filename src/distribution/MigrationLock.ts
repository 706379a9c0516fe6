/**
 * MigrationLock — one-way freeze of the unlock clock.
 *
 * Lifecycle: inactive → active (clock frozen at `lockTimestamp`, sweep
 * allowed after `migrationTimestamp`) → swept. There is no way back to
 * inactive, and starting twice is rejected.
 *
 * Access control is the caller's job; this class only guards the lifecycle.
 */
import { configError, fail, ok } from './errors.js';
import type { Result } from './errors.js';
import { DEFAULT_MIGRATION_GRACE_PERIOD } from '../config/defaults.js';
import type { MigrationState } from '../types/index.js';

export class MigrationLock {
    private state: MigrationState = {
        active: false,
        lockTimestamp: null,
        migrationTimestamp: null,
        sweptAt: null,
    };

    constructor(readonly gracePeriod: number = DEFAULT_MIGRATION_GRACE_PERIOD) {
        if (!Number.isSafeInteger(gracePeriod) || gracePeriod < 0) {
            throw configError('Migration grace period must be a non-negative number of seconds', { gracePeriod });
        }
    }

    get active(): boolean {
        return this.state.active;
    }

    get swept(): boolean {
        return this.state.sweptAt !== null;
    }

    /**
     * Freeze the clock at `now` and schedule the sweep for `targetTimestamp`.
     */
    start(now: number, targetTimestamp: number): Result<MigrationState> {
        if (this.state.active) {
            return fail('MIGRATION_ALREADY_STARTED', 'Migration has already been started', {
                lockTimestamp: this.state.lockTimestamp,
            });
        }
        const earliest = now + this.gracePeriod;
        if (!Number.isSafeInteger(targetTimestamp) || targetTimestamp < earliest) {
            return fail('MIGRATION_TOO_SOON', `Migration target must be at or after ${earliest}`, {
                targetTimestamp,
                earliest,
            });
        }

        this.state = {
            active: true,
            lockTimestamp: now,
            migrationTimestamp: targetTimestamp,
            sweptAt: null,
        };
        return ok(this.snapshot());
    }

    /**
     * The time fed to the unlock curves: `now`, or the lock time once frozen.
     */
    effectiveTime(now: number): number {
        if (this.state.active && this.state.lockTimestamp !== null) {
            return Math.min(now, this.state.lockTimestamp);
        }
        return now;
    }

    /**
     * Checks that a sweep may run at `now`; yields the frozen clock value.
     */
    sweepableAt(now: number): Result<number> {
        const { active, lockTimestamp, migrationTimestamp } = this.state;
        if (!active || lockTimestamp === null || migrationTimestamp === null) {
            return fail('MIGRATION_NOT_STARTED', 'Migration has not been started');
        }
        if (now <= migrationTimestamp) {
            return fail('MIGRATION_PENDING', `Sweep is available after ${migrationTimestamp}`, {
                migrationTimestamp,
                now,
            });
        }
        return ok(lockTimestamp);
    }

    markSwept(now: number): void {
        this.state = { ...this.state, sweptAt: now };
    }

    snapshot(): MigrationState {
        return { ...this.state };
    }

    restore(state: MigrationState): void {
        this.state = { ...state };
    }
}
