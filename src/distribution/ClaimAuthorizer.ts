/**
 * ClaimAuthorizer — EIP-712 verification of claim vouchers.
 *
 * A voucher is authorized when the signer recovered from its typed-data
 * digest is the single verifier address configured at construction.
 * Verification has no side effects; replay bookkeeping belongs to the ledger.
 */
import { TypedDataEncoder, getAddress, isAddress, verifyTypedData } from 'ethers';
import type { TypedDataDomain, TypedDataField } from 'ethers';
import { configError } from './errors.js';
import { POOL_KIND_CODE } from '../types/index.js';
import type { ClaimVoucher, VoucherDomain } from '../types/index.js';

export const CLAIM_VOUCHER_TYPES: Record<string, TypedDataField[]> = {
    ClaimVoucher: [
        { name: 'receiver', type: 'address' },
        { name: 'pool', type: 'uint8' },
        { name: 'amount', type: 'uint256' },
        { name: 'validUntil', type: 'uint64' },
        { name: 'nonce', type: 'uint256' },
    ],
};

export type AuthFailure = 'BAD_SIGNATURE' | 'UNAUTHORIZED';

export type AuthResult =
    | { ok: true; signer: string }
    | { ok: false; failure: AuthFailure; reason: string };

export function toTypedDataDomain(domain: VoucherDomain): TypedDataDomain {
    return {
        name: domain.name,
        version: domain.version,
        chainId: domain.chainId,
        verifyingContract: domain.verifyingContract,
    };
}

export function toTypedDataValue(voucher: ClaimVoucher): Record<string, unknown> {
    return {
        receiver: voucher.receiver,
        pool: POOL_KIND_CODE[voucher.pool],
        amount: voucher.amount,
        validUntil: voucher.validUntil,
        nonce: voucher.nonce,
    };
}

export class ClaimAuthorizer {
    readonly verifier: string;
    /** Account the vouchers are bound to; the ledger pays out of it */
    readonly verifyingContract: string;
    private readonly domain: TypedDataDomain;

    constructor(verifier: string, domain: VoucherDomain) {
        if (!isAddress(verifier)) {
            throw configError(`Invalid verifier address: ${verifier}`);
        }
        if (!isAddress(domain.verifyingContract)) {
            throw configError(`Invalid verifying contract address: ${domain.verifyingContract}`);
        }
        this.verifier = getAddress(verifier);
        this.verifyingContract = getAddress(domain.verifyingContract);
        this.domain = toTypedDataDomain(domain);
    }

    /**
     * EIP-712 digest of the voucher. Used as the ledger's claim key, so two
     * encodings of the same signature cannot consume one voucher twice.
     */
    digest(voucher: ClaimVoucher): string {
        return TypedDataEncoder.hash(this.domain, CLAIM_VOUCHER_TYPES, toTypedDataValue(voucher));
    }

    claimKey(voucher: ClaimVoucher): string {
        return this.digest(voucher);
    }

    verify(voucher: ClaimVoucher, signature: string): AuthResult {
        let recovered: string;
        try {
            recovered = verifyTypedData(this.domain, CLAIM_VOUCHER_TYPES, toTypedDataValue(voucher), signature);
        } catch (err) {
            return {
                ok: false,
                failure: 'BAD_SIGNATURE',
                reason: err instanceof Error ? err.message : String(err),
            };
        }

        if (getAddress(recovered) !== this.verifier) {
            return {
                ok: false,
                failure: 'UNAUTHORIZED',
                reason: `Voucher signed by ${recovered}, expected ${this.verifier}`,
            };
        }
        return { ok: true, signer: recovered };
    }
}
