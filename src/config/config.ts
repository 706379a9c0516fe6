/**
 * Distributor configuration: defaults, then an optional JSON file, then
 * environment variables, validated with zod.
 *
 * Token amounts are decimal strings in the file and bigints once parsed.
 */
import fs from 'fs';
import { isAddress } from 'ethers';
import { z } from 'zod';
import { configError } from '../distribution/errors.js';
import {
    DEFAULT_CHAIN_ID,
    DEFAULT_DOMAIN_NAME,
    DEFAULT_DOMAIN_VERSION,
    DEFAULT_EMISSION_SCHEDULE,
    DEFAULT_MIGRATION_GRACE_PERIOD,
    DEFAULT_VESTING_DURATION,
    MINING_REWARDS_POOL,
    REFERRAL_STAKING_POOL,
} from './defaults.js';

const amount = z
    .string()
    .regex(/^\d+$/, 'must be a non-negative integer string')
    .transform((value) => BigInt(value));

const address = z.string().refine((value) => isAddress(value), 'must be a valid address');

export const DistributorConfigSchema = z.object({
    launchTimestamp: z.number().int().nonnegative(),
    verifier: address,
    domain: z.object({
        name: z.string().min(1),
        version: z.string().min(1),
        chainId: z.number().int().positive(),
        verifyingContract: address,
    }),
    miningCap: amount,
    referralCap: amount,
    emissionSchedule: z
        .array(z.object({ rate: amount, duration: z.number().int().positive() }))
        .min(1),
    vestingDuration: z.number().int().positive(),
    migrationGracePeriod: z.number().int().nonnegative(),
    allowImmediateStart: z.boolean(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']),
});

export type DistributorConfigInput = z.input<typeof DistributorConfigSchema>;
export type DistributorConfig = z.output<typeof DistributorConfigSchema>;

export const DEFAULT_CONFIG: Omit<DistributorConfigInput, 'launchTimestamp' | 'verifier' | 'domain'> & {
    domain: Omit<DistributorConfigInput['domain'], 'verifyingContract'>;
} = {
    domain: {
        name: DEFAULT_DOMAIN_NAME,
        version: DEFAULT_DOMAIN_VERSION,
        chainId: DEFAULT_CHAIN_ID,
    },
    miningCap: MINING_REWARDS_POOL.toString(),
    referralCap: REFERRAL_STAKING_POOL.toString(),
    emissionSchedule: DEFAULT_EMISSION_SCHEDULE.map((interval) => ({
        rate: interval.rate.toString(),
        duration: interval.duration,
    })),
    vestingDuration: DEFAULT_VESTING_DURATION,
    migrationGracePeriod: DEFAULT_MIGRATION_GRACE_PERIOD,
    allowImmediateStart: false,
    logLevel: 'info',
};

export interface LoadConfigOptions {
    path?: string;
    env?: NodeJS.ProcessEnv;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

function readConfigFile(path: string): Record<string, unknown> {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(path, 'utf-8'));
    } catch (err) {
        throw configError(`Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!isRecord(raw)) {
        throw configError(`Config file ${path} must contain a JSON object`);
    }
    return raw;
}

function envOverrides(env: NodeJS.ProcessEnv): { top: Record<string, unknown>; domain: Record<string, unknown> } {
    const top: Record<string, unknown> = {};
    const domain: Record<string, unknown> = {};
    if (env.DISTRIBUTOR_LAUNCH_TIMESTAMP) top.launchTimestamp = Number(env.DISTRIBUTOR_LAUNCH_TIMESTAMP);
    if (env.DISTRIBUTOR_VERIFIER) top.verifier = env.DISTRIBUTOR_VERIFIER;
    if (env.LOG_LEVEL) top.logLevel = env.LOG_LEVEL;
    if (env.DISTRIBUTOR_CHAIN_ID) domain.chainId = Number(env.DISTRIBUTOR_CHAIN_ID);
    if (env.DISTRIBUTOR_ADDRESS) domain.verifyingContract = env.DISTRIBUTOR_ADDRESS;
    return { top, domain };
}

/**
 * Validate a raw configuration object. Throws `INVALID_CONFIG` listing every issue.
 */
export function parseConfig(input: unknown): DistributorConfig {
    const parsed = DistributorConfigSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw configError(`Invalid distributor config: ${issues.join('; ')}`, { issues });
    }
    return parsed.data;
}

export function loadConfig(options: LoadConfigOptions = {}): DistributorConfig {
    const file = options.path ? readConfigFile(options.path) : {};
    const fileDomain = isRecord(file.domain) ? file.domain : {};
    const env = envOverrides(options.env ?? process.env);

    return parseConfig({
        ...DEFAULT_CONFIG,
        ...file,
        ...env.top,
        domain: { ...DEFAULT_CONFIG.domain, ...fileDomain, ...env.domain },
    });
}
