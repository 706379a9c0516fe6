export * from './types/index.js';
export * from './distribution/errors.js';
export { EmissionCurve } from './distribution/EmissionCurve.js';
export { VestingCurve } from './distribution/VestingCurve.js';
export { ClaimAuthorizer, CLAIM_VOUCHER_TYPES } from './distribution/ClaimAuthorizer.js';
export type { AuthFailure, AuthResult } from './distribution/ClaimAuthorizer.js';
export { VoucherSigner } from './distribution/VoucherSigner.js';
export { MigrationLock } from './distribution/MigrationLock.js';
export { DistributionLedger } from './distribution/DistributionLedger.js';
export type { DistributionDeps, DistributionParams } from './distribution/DistributionLedger.js';
export { buildCurves, createDistributionLedger } from './distribution/createDistributionLedger.js';
export type { LedgerCollaborators } from './distribution/createDistributionLedger.js';
export { AdminGate } from './admin/AdminGate.js';
export { TokenLedger } from './token/TokenLedger.js';
export type { LedgerEntry, LedgerStore, Transaction, TransactionType } from './token/TokenLedger.js';
export { MemoryLedgerStore } from './token/MemoryLedgerStore.js';
export * from './config/config.js';
export * from './config/defaults.js';
export { createLogger } from './utils/logger.js';
