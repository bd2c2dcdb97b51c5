/**
 * Unit Tests: Primary Execution Client
 *
 * @see libs/primary/primaryClient.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { PrimaryExecutionClient } from '../../libs/primary/primaryClient.js';
import { FakeChannel, FakeClock, FakeResultHandle } from '../helpers/fakes.js';

const REQUEST = { statement: 'SELECT 1 AS a, 2 AS b' };

describe('PrimaryExecutionClient', () => {
    it('should time submit to result handle and drain separately', async () => {
        const clock = new FakeClock(10_000);
        const handle = new FakeResultHandle({ columns: 2, batches: [2, 1] }, () => clock.advance(47));
        const channel = new FakeChannel({ identifiers: ['01ef-stmt-1'], handle, onSubmit: () => clock.advance(553) });
        const client = new PrimaryExecutionClient(channel, { now: () => clock.now() });

        const { identifier, record, error } = await client.execute(REQUEST);

        assert.strictEqual(error, null);
        assert.strictEqual(identifier, '01ef-stmt-1');
        assert.strictEqual(record.status, 'SUCCEEDED');
        assert.strictEqual(record.observedStartMs, 10_000);
        assert.strictEqual(record.observedEndMs, 10_553);
        assert.strictEqual(record.durationMs, 553);
        assert.strictEqual(record.drainCompletedAtMs, 10_647);
        assert.strictEqual(record.drainDurationMs, 647);
        assert.strictEqual(record.rowCount, 3);
        assert.strictEqual(record.columnCount, 2);
        assert.deepStrictEqual(record.timingEndpoints, { start: 'CLIENT_SUBMIT', end: 'CLIENT_RESULT_HANDLE' });
        assert.strictEqual(handle.closed, 1);
        assert.ok(Object.isFrozen(record));
    });

    it('should keep the first non-empty identifier delivered', async () => {
        const channel = new FakeChannel({ identifiers: ['', 'stmt-a', 'stmt-b'] });
        const client = new PrimaryExecutionClient(channel);

        const { identifier } = await client.execute(REQUEST);

        assert.strictEqual(identifier, 'stmt-a');
    });

    it('should pass the correlation tag to the channel', async () => {
        const channel = new FakeChannel({ identifiers: ['stmt-a'] });
        const client = new PrimaryExecutionClient(channel);

        await client.execute(REQUEST, { correlationTag: 'run-42' });

        assert.strictEqual(channel.lastOptions?.correlationTag, 'run-42');
    });

    it('should return the identifier of a statement that failed on submit', async () => {
        const clock = new FakeClock(10_000);
        const channel = new FakeChannel({
            identifiers: ['stmt-9'],
            submitError: new Error('syntax error at line 1'),
            onSubmit: () => clock.advance(120)
        });
        const client = new PrimaryExecutionClient(channel, { now: () => clock.now() });

        const { identifier, record, error } = await client.execute(REQUEST);

        assert.strictEqual(identifier, 'stmt-9');
        assert.strictEqual(error?.code, 'EXECUTION_FAILED');
        assert.strictEqual(record.status, 'FAILED');
        assert.strictEqual(record.durationMs, 120);
        assert.strictEqual(record.rowCount, null);
        assert.strictEqual(record.drainDurationMs, null);
        assert.deepStrictEqual(record.timingEndpoints, { start: 'CLIENT_SUBMIT', end: 'NONE' });
        assert.strictEqual(record.errorDetail, 'Primary execution failed during submit: syntax error at line 1');
    });

    it('should return an empty identifier when the driver never assigned one', async () => {
        const channel = new FakeChannel({ submitError: new Error('connection refused') });
        const client = new PrimaryExecutionClient(channel);

        const { identifier, record, error } = await client.execute(REQUEST);

        assert.strictEqual(identifier, '');
        assert.strictEqual(record.identifier, '');
        assert.strictEqual(error?.code, 'EXECUTION_FAILED');
    });

    it('should report rows read so far when draining fails', async () => {
        const handle = new FakeResultHandle({ columns: 4, batches: [5], failOnFetch: new Error('connection reset') });
        const channel = new FakeChannel({ identifiers: ['stmt-7'], handle });
        const client = new PrimaryExecutionClient(channel);

        const { record, error } = await client.execute(REQUEST);

        assert.strictEqual(error?.code, 'EXECUTION_FAILED');
        assert.strictEqual(record.rowCount, 0);
        assert.strictEqual(record.columnCount, 4);
        assert.strictEqual(record.timingEndpoints.end, 'CLIENT_RESULT_HANDLE');
        assert.strictEqual(handle.closed, 1);
    });

    it('should report a deadline when the caller signal aborts mid-drain', async () => {
        const controller = new AbortController();
        const handle = new FakeResultHandle({ columns: 1, batches: [1, 1] });
        const channel = new FakeChannel({ identifiers: ['stmt-5'], handle, onSubmit: () => controller.abort() });
        const client = new PrimaryExecutionClient(channel);

        const { identifier, error } = await client.execute(REQUEST, { signal: controller.signal });

        assert.strictEqual(identifier, 'stmt-5');
        assert.strictEqual(error?.code, 'DEADLINE_EXCEEDED');
        assert.strictEqual(handle.closed, 1);
    });
});
