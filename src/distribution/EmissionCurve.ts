/**
 * EmissionCurve — decaying emission schedule for the mining pool.
 *
 * The schedule is an ordered list of constant-rate intervals. Unlocked supply
 * is the area under the rate curve up to the elapsed time; once the last
 * interval ends the curve stays flat at the schedule total.
 */
import { configError } from './errors.js';
import type { EmissionInterval } from '../types/index.js';

export class EmissionCurve {
    private readonly schedule: readonly EmissionInterval[];
    readonly totalDuration: number;
    readonly totalEmission: bigint;

    constructor(schedule: readonly EmissionInterval[]) {
        if (schedule.length === 0) {
            throw configError('Emission schedule must have at least one interval');
        }
        schedule.forEach((interval, index) => {
            if (interval.rate < 0n) {
                throw configError(`Emission interval ${index} has a negative rate`, { index });
            }
            if (!Number.isSafeInteger(interval.duration) || interval.duration <= 0) {
                throw configError(`Emission interval ${index} needs a positive whole-second duration`, { index });
            }
        });

        this.schedule = schedule.map((interval) => ({ ...interval }));
        this.totalDuration = schedule.reduce((sum, interval) => sum + interval.duration, 0);
        this.totalEmission = schedule.reduce(
            (sum, interval) => sum + interval.rate * BigInt(interval.duration),
            0n,
        );
    }

    get intervals(): EmissionInterval[] {
        return this.schedule.map((interval) => ({ ...interval }));
    }

    /**
     * Cumulative tokens unlocked after `elapsed` seconds.
     */
    unlocked(elapsed: number): bigint {
        let remaining = Math.max(0, Math.floor(elapsed));
        let total = 0n;

        for (const interval of this.schedule) {
            if (remaining === 0) break;
            const span = Math.min(remaining, interval.duration);
            total += interval.rate * BigInt(span);
            remaining -= span;
        }

        return total;
    }

    /**
     * Emission rate in effect at `elapsed` seconds; 0 once the schedule ends.
     */
    rateAt(elapsed: number): bigint {
        if (elapsed < 0) return 0n;
        let boundary = 0;
        for (const interval of this.schedule) {
            boundary += interval.duration;
            if (elapsed < boundary) return interval.rate;
        }
        return 0n;
    }
}
