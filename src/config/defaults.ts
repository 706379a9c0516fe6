/**
 * Deployment defaults. Amounts are in the token's smallest unit (18 decimals).
 */
import type { EmissionInterval } from '../types/index.js';

export const TOKEN_DECIMALS = 18;
export const ONE_TOKEN = 10n ** BigInt(TOKEN_DECIMALS);

export const DAY = 24 * 60 * 60;
export const YEAR = 365 * DAY;

/** 8 → 4 → 2 → 1 tokens per second, one year each */
export const DEFAULT_EMISSION_SCHEDULE: readonly EmissionInterval[] = [
    { rate: 8n * ONE_TOKEN, duration: YEAR },
    { rate: 4n * ONE_TOKEN, duration: YEAR },
    { rate: 2n * ONE_TOKEN, duration: YEAR },
    { rate: 1n * ONE_TOKEN, duration: YEAR },
];

// Must equal the emission schedule total
export const MINING_REWARDS_POOL = 473_040_000n * ONE_TOKEN;
export const REFERRAL_STAKING_POOL = 100_000_000n * ONE_TOKEN;

export const DEFAULT_VESTING_DURATION = 730 * DAY;
export const DEFAULT_MIGRATION_GRACE_PERIOD = 7 * DAY;

export const DEFAULT_DOMAIN_NAME = 'DistributionLedger';
export const DEFAULT_DOMAIN_VERSION = '1';
export const DEFAULT_CHAIN_ID = 1;
