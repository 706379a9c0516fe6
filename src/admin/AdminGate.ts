/**
 * AdminGate — single-owner access control with a pause switch.
 *
 * The distribution ledger only consumes `isOwner` and `isPaused`; the
 * mutators here are the owner's own entry points.
 */
import { getAddress, isAddress } from 'ethers';
import { DistributionError, configError } from '../distribution/errors.js';
import type { AdminGatePort } from '../types/index.js';

export class AdminGate implements AdminGatePort {
    private owner: string;
    private paused = false;

    constructor(owner: string) {
        if (!isAddress(owner)) {
            throw configError(`Invalid owner address: ${owner}`);
        }
        this.owner = getAddress(owner);
    }

    get currentOwner(): string {
        return this.owner;
    }

    isOwner(caller: string): boolean {
        return isAddress(caller) && getAddress(caller) === this.owner;
    }

    isPaused(): boolean {
        return this.paused;
    }

    pause(caller: string): void {
        this.requireOwner(caller);
        this.paused = true;
    }

    unpause(caller: string): void {
        this.requireOwner(caller);
        this.paused = false;
    }

    transferOwnership(caller: string, nextOwner: string): void {
        this.requireOwner(caller);
        if (!isAddress(nextOwner)) {
            throw new DistributionError('INVALID_REQUEST', `Invalid owner address: ${nextOwner}`);
        }
        this.owner = getAddress(nextOwner);
    }

    private requireOwner(caller: string): void {
        if (!this.isOwner(caller)) {
            throw new DistributionError('NOT_OWNER', `${caller} is not the owner`);
        }
    }
}
