/**
 * ClaimAuthorizer Tests
 *
 * 1. Accepts vouchers signed by the configured verifier
 * 2. Rejects other signers, tampered fields and foreign domains
 * 3. Reports malformed signatures separately
 * 4. Derives a stable claim key from the voucher contents
 */
import { TypedDataEncoder, Wallet } from 'ethers';
import {
    CLAIM_VOUCHER_TYPES,
    ClaimAuthorizer,
    toTypedDataDomain,
    toTypedDataValue,
} from '../../src/distribution/ClaimAuthorizer.js';
import { VoucherSigner } from '../../src/distribution/VoucherSigner.js';
import { PoolKind } from '../../src/types/index.js';
import { DOMAIN, OTHER_KEY, VERIFIER_KEY, tokens, voucher } from './fixtures.js';

describe('ClaimAuthorizer', () => {
    const verifier = new Wallet(VERIFIER_KEY);
    const signer = VoucherSigner.fromPrivateKey(VERIFIER_KEY, DOMAIN);
    const authorizer = new ClaimAuthorizer(verifier.address, DOMAIN);

    test('should accept a voucher signed by the verifier', async () => {
        const v = voucher();
        const signature = await signer.sign(v);

        const result = authorizer.verify(v, signature);
        expect(result).toEqual({ ok: true, signer: verifier.address });
    });

    test('should reject a voucher signed by another key', async () => {
        const v = voucher();
        const signature = await VoucherSigner.fromPrivateKey(OTHER_KEY, DOMAIN).sign(v);

        const result = authorizer.verify(v, signature);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.failure).toBe('UNAUTHORIZED');
    });

    test('should reject a voucher whose amount was changed after signing', async () => {
        const v = voucher({ amount: tokens(10) });
        const signature = await signer.sign(v);

        const result = authorizer.verify({ ...v, amount: tokens(10_000) }, signature);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.failure).toBe('UNAUTHORIZED');
    });

    test('should reject a voucher whose pool was changed after signing', async () => {
        const v = voucher({ pool: PoolKind.MINING });
        const signature = await signer.sign(v);

        const result = authorizer.verify({ ...v, pool: PoolKind.REFERRAL }, signature);
        expect(result.ok).toBe(false);
    });

    test('should reject a voucher signed for another chain', async () => {
        const v = voucher();
        const foreign = VoucherSigner.fromPrivateKey(VERIFIER_KEY, { ...DOMAIN, chainId: 1 });
        const signature = await foreign.sign(v);

        const result = authorizer.verify(v, signature);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.failure).toBe('UNAUTHORIZED');
    });

    test('should report malformed signatures as BAD_SIGNATURE', () => {
        const result = authorizer.verify(voucher(), '0x1234');
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.failure).toBe('BAD_SIGNATURE');
    });

    test('should derive the claim key from the EIP-712 digest', () => {
        const v = voucher();
        const expected = TypedDataEncoder.hash(toTypedDataDomain(DOMAIN), CLAIM_VOUCHER_TYPES, toTypedDataValue(v));

        expect(authorizer.claimKey(v)).toBe(expected);
        expect(authorizer.claimKey(v)).toBe(authorizer.digest(v));
    });

    test('should give distinct claim keys to vouchers that differ only by nonce', () => {
        expect(authorizer.claimKey(voucher({ nonce: 1n }))).not.toBe(authorizer.claimKey(voucher({ nonce: 2n })));
    });

    test('should reject an invalid verifier at construction', () => {
        expect(() => new ClaimAuthorizer('not-an-address', DOMAIN)).toThrow(/Invalid verifier address/);
        expect(() => new ClaimAuthorizer(verifier.address, { ...DOMAIN, verifyingContract: '0x12' }))
            .toThrow(/Invalid verifying contract address/);
    });
});
