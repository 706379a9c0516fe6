import { Wallet } from 'ethers';
import { CLAIM_VOUCHER_TYPES, toTypedDataDomain, toTypedDataValue } from './ClaimAuthorizer.js';
import type { ClaimRequest, ClaimVoucher, VoucherDomain } from '../types/index.js';

/**
 * VoucherSigner — off-chain issuer of claim vouchers.
 *
 * Holds the verifier key and produces the EIP-712 signatures that
 * `ClaimAuthorizer` accepts.
 */
export class VoucherSigner {
    constructor(
        private readonly wallet: Wallet,
        private readonly domain: VoucherDomain,
    ) { }

    static fromPrivateKey(privateKey: string, domain: VoucherDomain): VoucherSigner {
        return new VoucherSigner(new Wallet(privateKey), domain);
    }

    get address(): string {
        return this.wallet.address;
    }

    async sign(voucher: ClaimVoucher): Promise<string> {
        return this.wallet.signTypedData(
            toTypedDataDomain(this.domain),
            CLAIM_VOUCHER_TYPES,
            toTypedDataValue(voucher),
        );
    }

    /**
     * Sign a voucher and bundle it with its signature, ready for `claim`.
     */
    async issue(voucher: ClaimVoucher): Promise<ClaimRequest> {
        const signature = await this.sign(voucher);
        return { ...voucher, signature };
    }
}
