/**
 * Shared harness for distribution tests: a funded in-memory token ledger,
 * an owner gate, a controllable clock and a voucher signer.
 */
import { getAddress } from 'ethers';
import { AdminGate } from '../../src/admin/AdminGate.js';
import { ClaimAuthorizer } from '../../src/distribution/ClaimAuthorizer.js';
import { DistributionLedger } from '../../src/distribution/DistributionLedger.js';
import type { DistributionParams } from '../../src/distribution/DistributionLedger.js';
import { EmissionCurve } from '../../src/distribution/EmissionCurve.js';
import { VestingCurve } from '../../src/distribution/VestingCurve.js';
import { VoucherSigner } from '../../src/distribution/VoucherSigner.js';
import type { Result } from '../../src/distribution/errors.js';
import {
    DEFAULT_EMISSION_SCHEDULE,
    DEFAULT_VESTING_DURATION,
    MINING_REWARDS_POOL,
    ONE_TOKEN,
    REFERRAL_STAKING_POOL,
} from '../../src/config/defaults.js';
import { MemoryLedgerStore } from '../../src/token/MemoryLedgerStore.js';
import { TokenLedger } from '../../src/token/TokenLedger.js';
import { PoolKind } from '../../src/types/index.js';
import type { ClaimRequest, ClaimVoucher, TokenLedgerPort, VoucherDomain } from '../../src/types/index.js';
import { createLogger } from '../../src/utils/logger.js';

export const VERIFIER_KEY = '0x' + '11'.repeat(32);
export const OTHER_KEY = '0x' + '22'.repeat(32);

export const LEDGER_ADDRESS = getAddress('0x' + 'd1'.repeat(20));
export const OWNER = getAddress('0x' + 'a0'.repeat(20));
export const ALICE = getAddress('0x' + 'a1'.repeat(20));
export const BOB = getAddress('0x' + 'b2'.repeat(20));
export const TREASURY = getAddress('0x' + 'c3'.repeat(20));

export const LAUNCH = 1_900_000_000;
export const FUNDING = MINING_REWARDS_POOL + REFERRAL_STAKING_POOL;

export const DOMAIN: VoucherDomain = {
    name: 'DistributionLedger',
    version: '1',
    chainId: 31337,
    verifyingContract: LEDGER_ADDRESS,
};

export const tokens = (n: number | bigint): bigint => BigInt(n) * ONE_TOKEN;

export const quietLogger = () => createLogger('error', 'test');

export class TestClock {
    constructor(public current: number) { }

    readonly now = (): number => this.current;

    set(at: number): void {
        this.current = at;
    }

    advance(seconds: number): void {
        this.current += seconds;
    }
}

export interface Harness {
    ledger: DistributionLedger;
    token: TokenLedger;
    admin: AdminGate;
    signer: VoucherSigner;
    clock: TestClock;
}

export interface HarnessOptions {
    funding?: bigint;
    params?: Partial<DistributionParams>;
    token?: TokenLedgerPort;
}

export async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
    const clock = new TestClock(LAUNCH - 100);
    const token = new TokenLedger(new MemoryLedgerStore(), quietLogger());
    await token.fund(LEDGER_ADDRESS, options.funding ?? FUNDING);
    const admin = new AdminGate(OWNER);
    const signer = VoucherSigner.fromPrivateKey(VERIFIER_KEY, DOMAIN);

    const ledger = new DistributionLedger(
        {
            launchTimestamp: LAUNCH,
            emission: new EmissionCurve(DEFAULT_EMISSION_SCHEDULE),
            vesting: new VestingCurve(REFERRAL_STAKING_POOL, DEFAULT_VESTING_DURATION),
            miningCap: MINING_REWARDS_POOL,
            referralCap: REFERRAL_STAKING_POOL,
            ...options.params,
        },
        {
            token: options.token ?? token,
            admin,
            authorizer: new ClaimAuthorizer(signer.address, DOMAIN),
            clock: clock.now,
            logger: quietLogger(),
        },
    );

    return { ledger, token, admin, signer, clock };
}

export function voucher(overrides: Partial<ClaimVoucher> = {}): ClaimVoucher {
    return {
        receiver: ALICE,
        pool: PoolKind.MINING,
        amount: tokens(1_000),
        validUntil: LAUNCH + 30 * 24 * 60 * 60,
        nonce: 1n,
        ...overrides,
    };
}

export async function signed(signer: VoucherSigner, overrides: Partial<ClaimVoucher> = {}): Promise<ClaimRequest> {
    return signer.issue(voucher(overrides));
}

export function errorCode<T>(result: Result<T>): string | null {
    return result.ok ? null : result.error.code;
}

export function unwrap<T>(result: Result<T>): T {
    if (!result.ok) {
        throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
    }
    return result.value;
}
