import { configError } from './errors.js';

/**
 * VestingCurve — linear unlock of the referral pool cap over a fixed duration.
 */
export class VestingCurve {
    constructor(
        readonly cap: bigint,
        readonly duration: number,
    ) {
        if (cap < 0n) {
            throw configError('Vesting cap cannot be negative');
        }
        if (!Number.isSafeInteger(duration) || duration <= 0) {
            throw configError('Vesting duration must be a positive number of seconds', { duration });
        }
    }

    unlocked(elapsed: number): bigint {
        // Clamp first so the product never overshoots the cap
        const clamped = Math.min(Math.max(0, Math.floor(elapsed)), this.duration);
        return (this.cap * BigInt(clamped)) / BigInt(this.duration);
    }
}
