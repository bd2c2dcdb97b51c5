/**
 * Lookup Retry Schedule
 *
 * Fixed, strictly increasing delays between lookup attempts. Telemetry
 * propagation lag is bounded but not instantaneous, so a short list of
 * spaced attempts replaces an open-ended wait.
 */

export interface RetryPolicy {
    /** N_max: lookup attempts before giving up */
    readonly maxAttempts: number;
    /**
     * Delay before each attempt, index 0 = before the first attempt.
     * The last entry is reused when the list is shorter than maxAttempts.
     */
    readonly delaysMs: readonly number[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
    maxAttempts: 3,
    delaysMs: Object.freeze([0, 2000, 5000])
});

/**
 * FAIL-CLOSED: rejects policies that could loop without bound or go backwards.
 */
export function assertValidPolicy(policy: RetryPolicy): void {
    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
        throw new Error(`INVALID_RETRY_POLICY: maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
    }
    if (policy.delaysMs.length === 0) {
        throw new Error('INVALID_RETRY_POLICY: delay schedule is empty');
    }
    policy.delaysMs.forEach((delay, index) => {
        if (!Number.isFinite(delay) || delay < 0) {
            throw new Error(`INVALID_RETRY_POLICY: delay #${index} must be a non-negative number, got ${delay}`);
        }
        const previous = policy.delaysMs[index - 1];
        if (previous !== undefined && delay <= previous) {
            throw new Error(`INVALID_RETRY_POLICY: delays must be strictly increasing (${previous} → ${delay})`);
        }
    });
}

/**
 * Delay to wait before the given 1-based attempt.
 */
export function delayBeforeAttempt(policy: RetryPolicy, attemptNumber: number): number {
    const index = Math.min(attemptNumber - 1, policy.delaysMs.length - 1);
    return policy.delaysMs[index] ?? 0;
}

/**
 * Parse a comma-separated schedule such as "0,2000,5000".
 */
export function parseDelaySchedule(raw: string): number[] {
    return raw
        .split(',')
        .map(part => part.trim())
        .filter(part => part !== '')
        .map(part => Number(part));
}
