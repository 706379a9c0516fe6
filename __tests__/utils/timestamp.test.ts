import { now, nowSeconds } from '../../src/utils/timestamp.js';

describe('Timestamp', () => {
    test('should return a number close to Date.now()', () => {
        const before = Date.now();
        const ts = now();
        const after = Date.now();
        expect(ts).toBeGreaterThanOrEqual(before);
        expect(ts).toBeLessThanOrEqual(after);
    });

    test('should return whole Unix seconds', () => {
        const before = Math.floor(Date.now() / 1000);
        const ts = nowSeconds();
        const after = Math.floor(Date.now() / 1000);
        expect(Number.isInteger(ts)).toBe(true);
        expect(ts).toBeGreaterThanOrEqual(before);
        expect(ts).toBeLessThanOrEqual(after);
    });
});
