/**
 * Debug Assertions
 *
 * Caller contracts (collider geometry, positive mass) are only checked while
 * assertions are enabled. They default to on outside production.
 */

let assertionsEnabled = typeof process === 'undefined' || process.env.NODE_ENV !== 'production';

export function setDebugAssertions(enabled: boolean): void {
    assertionsEnabled = enabled;
}

export function debugAssertionsEnabled(): boolean {
    return assertionsEnabled;
}

/**
 * Throw if `condition` is false and assertions are enabled.
 */
export function debugAssert(condition: boolean, message: string): void {
    if (!assertionsEnabled || condition) return;
    throw new Error(`[RRectPhysics] Assertion failed: ${message}`);
}
