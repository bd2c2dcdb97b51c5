/**
 * Unit Tests: Query Request Validation
 *
 * @see libs/validation/schema.ts
 * @see libs/validation/zod-middleware.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { QueryRequestSchema } from '../../libs/validation/schema.js';
import { validate, ValidationViolationError } from '../../libs/validation/zod-middleware.js';

describe('QueryRequestSchema', () => {
    it('should trim the statement', () => {
        const request = validate(QueryRequestSchema, { statement: '  SELECT 1  ' }, 'test');

        assert.strictEqual(request.statement, 'SELECT 1');
    });

    it('should accept a server wait of 0s or between 5s and 50s', () => {
        for (const waitTimeout of ['0s', '5s', '50s']) {
            assert.doesNotThrow(() => validate(QueryRequestSchema, { statement: 'SELECT 1', context: { waitTimeout } }, 'test'));
        }
    });

    it('should reject a server wait outside the allowed range', () => {
        assert.throws(
            () => validate(QueryRequestSchema, { statement: 'SELECT 1', context: { waitTimeout: '3s' } }, 'test'),
            (err: unknown) => {
                assert.ok(err instanceof ValidationViolationError);
                assert.deepStrictEqual(err.issues, [{ path: 'context.waitTimeout', message: 'wait timeout must be 0s or between 5s and 50s' }]);
                return true;
            }
        );
    });

    it('should reject an unknown disposition', () => {
        assert.throws(
            () => validate(QueryRequestSchema, { statement: 'SELECT 1', context: { disposition: 'STREAM' } }, 'test'),
            ValidationViolationError
        );
    });
});
