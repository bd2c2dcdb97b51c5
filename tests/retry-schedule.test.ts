/**
 * Lookup Retry Schedule Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    assertValidPolicy,
    DEFAULT_RETRY_POLICY,
    delayBeforeAttempt,
    parseDelaySchedule
} from '../libs/correlation/retrySchedule.js';

describe('Lookup Retry Schedule', () => {

    describe('Default Policy', () => {
        it('should allow three attempts', () => {
            assert.strictEqual(DEFAULT_RETRY_POLICY.maxAttempts, 3);
        });

        it('should not wait before the first attempt', () => {
            assert.strictEqual(delayBeforeAttempt(DEFAULT_RETRY_POLICY, 1), 0);
        });

        it('should wait 2000 then 5000 ms before later attempts', () => {
            assert.strictEqual(delayBeforeAttempt(DEFAULT_RETRY_POLICY, 2), 2000);
            assert.strictEqual(delayBeforeAttempt(DEFAULT_RETRY_POLICY, 3), 5000);
        });

        it('should pass validation', () => {
            assert.doesNotThrow(() => assertValidPolicy(DEFAULT_RETRY_POLICY));
        });
    });

    describe('delayBeforeAttempt', () => {
        it('should reuse the last delay when the schedule is shorter than maxAttempts', () => {
            const policy = { maxAttempts: 5, delaysMs: [0, 1000] };
            assert.strictEqual(delayBeforeAttempt(policy, 4), 1000);
        });
    });

    describe('assertValidPolicy', () => {
        it('should reject zero attempts', () => {
            assert.throws(() => assertValidPolicy({ maxAttempts: 0, delaysMs: [0] }), /maxAttempts must be a positive integer/);
        });

        it('should reject an empty schedule', () => {
            assert.throws(() => assertValidPolicy({ maxAttempts: 2, delaysMs: [] }), /delay schedule is empty/);
        });

        it('should reject negative delays', () => {
            assert.throws(() => assertValidPolicy({ maxAttempts: 2, delaysMs: [-1, 10] }), /non-negative/);
        });

        it('should reject a schedule that does not increase', () => {
            assert.throws(() => assertValidPolicy({ maxAttempts: 3, delaysMs: [0, 5000, 2000] }), /strictly increasing/);
        });
    });

    describe('parseDelaySchedule', () => {
        it('should parse a comma-separated list', () => {
            assert.deepStrictEqual(parseDelaySchedule('0, 2000 ,5000'), [0, 2000, 5000]);
        });

        it('should ignore empty entries', () => {
            assert.deepStrictEqual(parseDelaySchedule('0,,1000,'), [0, 1000]);
        });

        it('should surface non-numeric entries as NaN for validation to reject', () => {
            const delaysMs = parseDelaySchedule('0,soon');
            assert.throws(() => assertValidPolicy({ maxAttempts: 2, delaysMs }), /non-negative/);
        });
    });
});
