/**
 * Error taxonomy for the distribution engine.
 *
 * Configuration errors are thrown from constructors. Every other failure is
 * returned to the caller as a `Result` so that a rejected operation never
 * unwinds through half-applied bookkeeping.
 */

export type ErrorCategory =
    | 'configuration'
    | 'access'
    | 'authorization'
    | 'accounting'
    | 'lifecycle';

export type DistributionErrorCode =
    | 'INVALID_CONFIG'
    | 'NOT_OWNER'
    | 'PAUSED'
    | 'REENTRANT_CALL'
    | 'INVALID_REQUEST'
    | 'INVALID_AMOUNT'
    | 'CLAIM_ALREADY_EXISTS'
    | 'CLAIM_EXPIRED'
    | 'INVALID_SIGNATURE'
    | 'INSUFFICIENT_BALANCE'
    | 'NO_REWARDS_AVAILABLE'
    | 'EXCEEDS_CLAIMABLE_REWARDS'
    | 'EXCEEDS_POOL_CAP'
    | 'TRANSFER_FAILED'
    | 'DISTRIBUTION_NOT_STARTED'
    | 'MIGRATION_ALREADY_STARTED'
    | 'MIGRATION_TOO_SOON'
    | 'MIGRATION_NOT_STARTED'
    | 'MIGRATION_PENDING'
    | 'NO_REMAINING_TOKENS';

const CATEGORY_BY_CODE: Record<DistributionErrorCode, ErrorCategory> = {
    INVALID_CONFIG: 'configuration',
    NOT_OWNER: 'access',
    PAUSED: 'access',
    REENTRANT_CALL: 'access',
    INVALID_REQUEST: 'authorization',
    INVALID_AMOUNT: 'accounting',
    CLAIM_ALREADY_EXISTS: 'authorization',
    CLAIM_EXPIRED: 'authorization',
    INVALID_SIGNATURE: 'authorization',
    INSUFFICIENT_BALANCE: 'accounting',
    NO_REWARDS_AVAILABLE: 'accounting',
    EXCEEDS_CLAIMABLE_REWARDS: 'accounting',
    EXCEEDS_POOL_CAP: 'accounting',
    TRANSFER_FAILED: 'accounting',
    DISTRIBUTION_NOT_STARTED: 'lifecycle',
    MIGRATION_ALREADY_STARTED: 'lifecycle',
    MIGRATION_TOO_SOON: 'lifecycle',
    MIGRATION_NOT_STARTED: 'lifecycle',
    MIGRATION_PENDING: 'lifecycle',
    NO_REMAINING_TOKENS: 'lifecycle',
};

export class DistributionError extends Error {
    public readonly code: DistributionErrorCode;
    public readonly category: ErrorCategory;
    public readonly detail?: Record<string, unknown>;

    constructor(code: DistributionErrorCode, message: string, detail?: Record<string, unknown>) {
        super(message);
        this.name = 'DistributionError';
        this.code = code;
        this.category = CATEGORY_BY_CODE[code];
        this.detail = detail;
    }
}

export type Result<T, E = DistributionError> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const fail = (
    code: DistributionErrorCode,
    message: string,
    detail?: Record<string, unknown>,
): Result<never> => ({ ok: false, error: new DistributionError(code, message, detail) });

export const configError = (message: string, detail?: Record<string, unknown>): DistributionError =>
    new DistributionError('INVALID_CONFIG', message, detail);
