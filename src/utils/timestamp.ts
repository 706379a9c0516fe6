/**
 * Returns the current Unix timestamp in milliseconds.
 * Wrapped in a function for testability (can be mocked).
 */
export const now = (): number => Date.now();

/**
 * Current Unix time in whole seconds, the unit both unlock curves run on.
 */
export const nowSeconds = (): number => Math.floor(now() / 1000);
