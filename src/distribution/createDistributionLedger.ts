import type winston from 'winston';
import { createLogger } from '../utils/logger.js';
import { ClaimAuthorizer } from './ClaimAuthorizer.js';
import { DistributionLedger } from './DistributionLedger.js';
import { EmissionCurve } from './EmissionCurve.js';
import { VestingCurve } from './VestingCurve.js';
import type { DistributorConfig } from '../config/config.js';
import type { AdminGatePort, Clock, TokenLedgerPort } from '../types/index.js';

export interface LedgerCollaborators {
    token: TokenLedgerPort;
    admin: AdminGatePort;
    clock?: Clock;
    logger?: winston.Logger;
}

export function buildCurves(config: DistributorConfig): { emission: EmissionCurve; vesting: VestingCurve } {
    return {
        emission: new EmissionCurve(config.emissionSchedule),
        vesting: new VestingCurve(config.referralCap, config.vestingDuration),
    };
}

/**
 * Wire curves, authorizer and ledger from a validated config.
 */
export function createDistributionLedger(config: DistributorConfig, collaborators: LedgerCollaborators): DistributionLedger {
    const { emission, vesting } = buildCurves(config);
    return new DistributionLedger(
        {
            launchTimestamp: config.launchTimestamp,
            emission,
            vesting,
            miningCap: config.miningCap,
            referralCap: config.referralCap,
            migrationGracePeriod: config.migrationGracePeriod,
            allowImmediateStart: config.allowImmediateStart,
        },
        {
            token: collaborators.token,
            admin: collaborators.admin,
            authorizer: new ClaimAuthorizer(config.verifier, config.domain),
            clock: collaborators.clock,
            logger: collaborators.logger ?? createLogger(config.logLevel, 'distribution-ledger'),
        },
    );
}
