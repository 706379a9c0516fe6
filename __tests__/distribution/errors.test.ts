import { DistributionError, configError, fail, ok } from '../../src/distribution/errors.js';

describe('DistributionError', () => {
    test('should carry its code, category and detail', () => {
        const error = new DistributionError('EXCEEDS_POOL_CAP', 'over cap', { cap: 10n });
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('DistributionError');
        expect(error.code).toBe('EXCEEDS_POOL_CAP');
        expect(error.category).toBe('accounting');
        expect(error.detail).toEqual({ cap: 10n });
    });

    test('should classify each family of failure', () => {
        expect(configError('bad').category).toBe('configuration');
        expect(new DistributionError('CLAIM_ALREADY_EXISTS', 'x').category).toBe('authorization');
        expect(new DistributionError('MIGRATION_PENDING', 'x').category).toBe('lifecycle');
        expect(new DistributionError('PAUSED', 'x').category).toBe('access');
    });

    test('should build result values', () => {
        expect(ok(5)).toEqual({ ok: true, value: 5 });
        const failed = fail('NO_REMAINING_TOKENS', 'nothing left');
        expect(failed.ok).toBe(false);
        if (!failed.ok) expect(failed.error.code).toBe('NO_REMAINING_TOKENS');
    });
});
