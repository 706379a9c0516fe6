#!/usr/bin/env node

import { formatUnits, getAddress, parseUnits } from 'ethers';
import { loadConfig } from './config/config.js';
import type { DistributorConfig } from './config/config.js';
import { TOKEN_DECIMALS } from './config/defaults.js';
import { buildCurves } from './distribution/createDistributionLedger.js';
import { VoucherSigner } from './distribution/VoucherSigner.js';
import { isPoolKind } from './types/index.js';
import { createLogger } from './utils/logger.js';
import { nowSeconds } from './utils/timestamp.js';

const logger = createLogger(process.env.LOG_LEVEL ?? 'info', 'cli');

const tokens = (amount: bigint): string => formatUnits(amount, TOKEN_DECIMALS);

function option(args: string[], name: string): string | undefined {
    const idx = args.indexOf(name);
    return idx !== -1 ? args[idx + 1] : undefined;
}

function required(args: string[], name: string): string {
    const value = option(args, name);
    if (value === undefined) {
        throw new Error(`Missing required option ${name}`);
    }
    return value;
}

function printSchedule(config: DistributorConfig): void {
    const { emission } = buildCurves(config);
    console.log('Mining emission schedule');
    let start = 0;
    emission.intervals.forEach((interval, index) => {
        console.log(`  #${index}  t+${start}s .. t+${start + interval.duration}s  ${tokens(interval.rate)} tokens/s`);
        start += interval.duration;
    });
    console.log(`  total     ${tokens(emission.totalEmission)}`);
    console.log(`Mining cap    ${tokens(config.miningCap)}`);
    console.log(`Referral cap  ${tokens(config.referralCap)} over ${config.vestingDuration}s`);
}

function printUnlocked(config: DistributorConfig, at: number): void {
    const { emission, vesting } = buildCurves(config);
    const elapsed = Math.max(0, at - config.launchTimestamp);
    console.log(`At ${at} (launch + ${elapsed}s)`);
    console.log(`  mining    ${tokens(emission.unlocked(elapsed))}`);
    console.log(`  referral  ${tokens(vesting.unlocked(elapsed))}`);
}

async function signVoucher(config: DistributorConfig, args: string[]): Promise<void> {
    const key = option(args, '--key') ?? process.env.DISTRIBUTOR_SIGNER_KEY;
    if (!key) {
        throw new Error('Signer key required: pass --key or set DISTRIBUTOR_SIGNER_KEY');
    }
    const pool = required(args, '--pool').toUpperCase();
    if (!isPoolKind(pool)) {
        throw new Error(`Unknown pool ${pool}; expected MINING or REFERRAL`);
    }

    const signer = VoucherSigner.fromPrivateKey(key, config.domain);
    if (signer.address !== getAddress(config.verifier)) {
        logger.warn('Signer is not the configured verifier; the ledger will reject this voucher', {
            signer: signer.address,
            verifier: config.verifier,
        });
    }

    const request = await signer.issue({
        receiver: required(args, '--receiver'),
        pool,
        amount: parseUnits(required(args, '--amount'), TOKEN_DECIMALS),
        validUntil: parseInt(required(args, '--valid-until')),
        nonce: BigInt(required(args, '--nonce')),
    });
    console.log(JSON.stringify(
        { ...request, amount: request.amount.toString(), nonce: request.nonce.toString() },
        null,
        2,
    ));
}

async function main(): Promise<void> {
    const args = process.argv.slice(2);
    const command = args[0];

    if (!command || command === 'help' || command === '--help') {
        console.log(`
Emission Distributor — voucher-gated token distribution

Usage:
  distributor schedule [--config config.json]              Show emission schedule and pool caps
  distributor unlocked [--at ts] [--config config.json]    Show unlocked amounts at a time
  distributor sign-voucher --receiver addr --pool MINING|REFERRAL --amount tokens
               --valid-until ts --nonce n [--key hex] [--config config.json]
        `.trim());
        process.exit(0);
    }

    const config = loadConfig({ path: option(args, '--config') });

    if (command === 'schedule') {
        printSchedule(config);
        return;
    }

    if (command === 'unlocked') {
        const at = option(args, '--at');
        printUnlocked(config, at !== undefined ? parseInt(at) : nowSeconds());
        return;
    }

    if (command === 'sign-voucher') {
        await signVoucher(config, args);
        return;
    }

    throw new Error(`Unknown command: ${command}`);
}

main().catch((err) => {
    logger.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
});
