/**
 * Unit Tests: Correlation Engine
 *
 * Lookup loop bounds, fatal short-circuit, deadline handling and the
 * side-by-side report, against an in-process primary and telemetry.
 *
 * @see libs/correlation/engine.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CorrelationEngine } from '../../libs/correlation/engine.js';
import { CorrelatorError } from '../../libs/errors/sanitizer.js';
import type { PrimaryExecution } from '../../libs/primary/primaryClient.js';
import { ValidationViolationError } from '../../libs/validation/zod-middleware.js';
import type { CorrelationEngineOptions } from '../../libs/correlation/engine.js';
import { FakeClock, primaryRecord, ScriptedTelemetry, StalledClock, StubPrimary, telemetryRecord } from '../helpers/fakes.js';

const REQUEST = { statement: 'SELECT id, name FROM sales.orders LIMIT 3' };

const FOUND_TERMINAL = { kind: 'FOUND', record: telemetryRecord(), terminal: true } as const;
const NOT_FOUND = { kind: 'NOT_FOUND' } as const;

function succeeded(): PrimaryExecution {
    return { identifier: '01ef-primary-1', record: primaryRecord(), error: null };
}

function setup(
    execution: PrimaryExecution,
    telemetry: ScriptedTelemetry,
    deadlineMs?: number,
    extra: { clock?: FakeClock; options?: CorrelationEngineOptions } = {}
) {
    const clock = extra.clock ?? new FakeClock();
    const primary = new StubPrimary(execution);
    let runs = 0;
    const engine = new CorrelationEngine(
        { primary, telemetry, clock, idFactory: () => `run-${++runs}` },
        { deadlineMs, ...extra.options }
    );
    return { engine, clock, primary };
}

function failedExecution(identifier: string, message: string): PrimaryExecution {
    return {
        identifier,
        record: primaryRecord({ identifier, status: 'FAILED', rowCount: null }),
        error: new CorrelatorError('EXECUTION_FAILED', message)
    };
}

describe('CorrelationEngine', () => {
    describe('correlate', () => {
        it('should correlate on the first attempt and compute the duration delta', async () => {
            const telemetry = new ScriptedTelemetry([FOUND_TERMINAL]);
            const { engine, clock } = setup(succeeded(), telemetry);

            const result = await engine.correlate(REQUEST);

            assert.strictEqual(result.termination, 'CORRELATED');
            assert.strictEqual(result.correlationSucceeded, true);
            assert.strictEqual(result.correlationAttempts, 1);
            assert.strictEqual(result.durationDeltaMs, 438);
            assert.strictEqual(result.rowCountAgreement, true);
            assert.strictEqual(result.columnCountAgreement, true);
            assert.deepStrictEqual(telemetry.lookups, ['01ef-primary-1']);
            assert.deepStrictEqual(clock.sleeps, []);
            assert.strictEqual(result.primaryError, undefined);
        });

        it('should stop after two attempts when the record appears on the second', async () => {
            const telemetry = new ScriptedTelemetry([NOT_FOUND, FOUND_TERMINAL]);
            const { engine, clock } = setup(succeeded(), telemetry);

            const result = await engine.correlate(REQUEST);

            assert.strictEqual(result.correlationAttempts, 2);
            assert.strictEqual(result.termination, 'CORRELATED');
            assert.deepStrictEqual(result.attemptLog.map(a => a.outcome), ['NOT_FOUND', 'FOUND']);
            assert.deepStrictEqual(clock.sleeps, [2000]);
        });

        it('should issue exactly maxAttempts lookups when the record never appears', async () => {
            const telemetry = new ScriptedTelemetry([NOT_FOUND]);
            const { engine, clock } = setup(succeeded(), telemetry);

            const result = await engine.correlate(REQUEST);

            assert.strictEqual(telemetry.lookups.length, 3);
            assert.strictEqual(result.correlationAttempts, 3);
            assert.strictEqual(result.correlationSucceeded, false);
            assert.strictEqual(result.termination, 'CORRELATION_EXHAUSTED');
            assert.strictEqual(result.telemetry, null);
            assert.strictEqual(result.durationDeltaMs, null);
            assert.strictEqual(result.rowCountAgreement, false);
            assert.deepStrictEqual(clock.sleeps, [2000, 5000]);
        });

        it('should keep the last non-terminal record when attempts run out', async () => {
            const running = telemetryRecord({ status: 'RUNNING', durationMs: null, rowCount: null });
            const telemetry = new ScriptedTelemetry([{ kind: 'FOUND', record: running, terminal: false }]);
            const { engine } = setup(succeeded(), telemetry);

            const result = await engine.correlate(REQUEST);

            assert.strictEqual(result.termination, 'CORRELATION_EXHAUSTED');
            assert.strictEqual(result.telemetry?.status, 'RUNNING');
            assert.strictEqual(result.durationDeltaMs, null);
            assert.deepStrictEqual(result.attemptLog.map(a => a.status), ['RUNNING', 'RUNNING', 'RUNNING']);
        });

        it('should retry transient errors and report the last one on exhaustion', async () => {
            const telemetry = new ScriptedTelemetry([
                new CorrelatorError('TELEMETRY_TRANSIENT', 'GET /api/2.0/sql/history/queries/x failed with status 503: unavailable', { httpStatus: 503 })
            ]);
            const { engine } = setup(succeeded(), telemetry);

            const result = await engine.correlate(REQUEST);

            assert.strictEqual(telemetry.lookups.length, 3);
            assert.strictEqual(result.termination, 'CORRELATION_EXHAUSTED');
            assert.strictEqual(result.telemetryError?.code, 'TELEMETRY_TRANSIENT');
            assert.deepStrictEqual(result.attemptLog.map(a => a.outcome), ['TRANSIENT_ERROR', 'TRANSIENT_ERROR', 'TRANSIENT_ERROR']);
        });

        it('should classify unrecognised transport errors as transient', async () => {
            const telemetry = new ScriptedTelemetry([new Error('fetch failed'), FOUND_TERMINAL]);
            const { engine } = setup(succeeded(), telemetry);

            const result = await engine.correlate(REQUEST);

            assert.strictEqual(result.termination, 'CORRELATED');
            assert.strictEqual(result.correlationAttempts, 2);
            assert.strictEqual(result.attemptLog[0]?.errorCode, 'TELEMETRY_TRANSIENT');
            assert.strictEqual(result.telemetryError, undefined);
        });

        it('should abort on a fatal error after one attempt and carry the partial result', async () => {
            const telemetry = new ScriptedTelemetry([
                new CorrelatorError('TELEMETRY_FATAL', 'GET /api/2.0/sql/history/queries/x failed with status 401: invalid credential', { httpStatus: 401 })
            ]);
            const { engine } = setup(succeeded(), telemetry);

            await assert.rejects(engine.correlate(REQUEST), (err: unknown) => {
                assert.ok(err instanceof CorrelatorError);
                assert.strictEqual(err.code, 'TELEMETRY_FATAL');
                assert.strictEqual(err.partialResult?.termination, 'TELEMETRY_UNAVAILABLE');
                assert.strictEqual(err.partialResult?.correlationAttempts, 1);
                assert.strictEqual(err.partialResult?.telemetry, null);
                assert.strictEqual(err.partialResult?.primary.identifier, '01ef-primary-1');
                return true;
            });
            assert.strictEqual(telemetry.lookups.length, 1);
        });

        it('should record each attempt outcome from its error code', async () => {
            const telemetry = new ScriptedTelemetry([
                new CorrelatorError('TELEMETRY_TRANSIENT', 'GET /api/2.0/sql/history/queries/x failed with status 503: unavailable', { httpStatus: 503 }),
                new CorrelatorError('TELEMETRY_FATAL', 'GET /api/2.0/sql/history/queries/x failed with status 400: bad request', { httpStatus: 400 })
            ]);
            const { engine } = setup(succeeded(), telemetry);

            await assert.rejects(engine.correlate(REQUEST), (err: unknown) => {
                assert.ok(err instanceof CorrelatorError);
                assert.deepStrictEqual(
                    err.partialResult?.attemptLog.map(a => [a.outcome, a.errorCode]),
                    [['TRANSIENT_ERROR', 'TELEMETRY_TRANSIENT'], ['FATAL_ERROR', 'TELEMETRY_FATAL']]
                );
                return true;
            });
            assert.strictEqual(telemetry.lookups.length, 2);
        });

        it('should end the loop without retrying when a lookup is cut short by the deadline', async () => {
            const telemetry = new ScriptedTelemetry([
                new CorrelatorError('DEADLINE_EXCEEDED', 'Telemetry call for 01ef-primary-1 aborted by caller deadline')
            ]);
            const { engine } = setup(succeeded(), telemetry);

            const result = await engine.correlate(REQUEST);

            assert.strictEqual(telemetry.lookups.length, 1);
            assert.strictEqual(result.termination, 'DEADLINE_EXCEEDED');
            assert.strictEqual(result.telemetry, null);
            assert.strictEqual(result.telemetryError?.code, 'DEADLINE_EXCEEDED');
            assert.strictEqual(result.attemptLog[0]?.outcome, 'TRANSIENT_ERROR');
        });

        it('should skip the lookup entirely when no identifier was captured', async () => {
            const telemetry = new ScriptedTelemetry([FOUND_TERMINAL]);
            const { engine } = setup({
                identifier: '',
                record: primaryRecord({ identifier: '', status: 'FAILED', rowCount: null }),
                error: new CorrelatorError('EXECUTION_FAILED', 'Primary execution failed during submit: syntax error')
            }, telemetry);

            const result = await engine.correlate(REQUEST);

            assert.strictEqual(telemetry.lookups.length, 0);
            assert.strictEqual(result.correlationAttempts, 0);
            assert.strictEqual(result.termination, 'NO_IDENTIFIER');
            assert.strictEqual(result.telemetryError, undefined);
            assert.strictEqual(result.primary.status, 'FAILED');
        });

        it('should surface the primary failure when no identifier was captured', async () => {
            const execution = failedExecution('', 'Primary execution failed during submit: syntax error');
            const telemetry = new ScriptedTelemetry([FOUND_TERMINAL]);
            const { engine } = setup(execution, telemetry);

            const result = await engine.correlate(REQUEST);

            assert.strictEqual(result.termination, 'NO_IDENTIFIER');
            assert.deepStrictEqual(result.primaryError, {
                code: 'EXECUTION_FAILED',
                message: 'Primary execution failed during submit: syntax error',
                incidentId: execution.error?.incidentId
            });
        });

        it('should look up the failure record when the primary failed after assigning an identifier', async () => {
            const failedRecord = telemetryRecord({ status: 'FAILED', rowCount: null, errorDetail: 'division by zero' });
            const telemetry = new ScriptedTelemetry([{ kind: 'FOUND', record: failedRecord, terminal: true }]);
            const { engine } = setup({
                identifier: '01ef-primary-1',
                record: primaryRecord({ status: 'FAILED' }),
                error: new CorrelatorError('EXECUTION_FAILED', 'Primary execution failed during drain: division by zero')
            }, telemetry);

            const result = await engine.correlate(REQUEST);

            assert.strictEqual(result.termination, 'CORRELATED');
            assert.strictEqual(result.telemetry?.status, 'FAILED');
            assert.strictEqual(result.telemetry?.errorDetail, 'division by zero');
        });

        it('should keep the primary failure alongside a correlated failure record', async () => {
            const execution = failedExecution('01ef-primary-1', 'Primary execution failed during drain: division by zero');
            const failedRecord = telemetryRecord({ status: 'FAILED', rowCount: null, errorDetail: 'division by zero' });
            const telemetry = new ScriptedTelemetry([{ kind: 'FOUND', record: failedRecord, terminal: true }]);
            const { engine } = setup(execution, telemetry);

            const result = await engine.correlate(REQUEST);

            assert.strictEqual(result.termination, 'CORRELATED');
            assert.strictEqual(result.telemetryError, undefined);
            assert.strictEqual(result.primaryError?.code, 'EXECUTION_FAILED');
            assert.strictEqual(result.primaryError?.message, 'Primary execution failed during drain: division by zero');
            assert.strictEqual(result.primaryError?.incidentId, execution.error?.incidentId);
        });

        it('should carry the primary failure on the partial result of a fatal lookup', async () => {
            const execution = failedExecution('01ef-primary-1', 'Primary execution failed during drain: out of memory');
            const telemetry = new ScriptedTelemetry([
                new CorrelatorError('TELEMETRY_FATAL', 'GET /api/2.0/sql/history/queries/x failed with status 403: forbidden', { httpStatus: 403 })
            ]);
            const { engine } = setup(execution, telemetry);

            await assert.rejects(engine.correlate(REQUEST), (err: unknown) => {
                assert.ok(err instanceof CorrelatorError);
                assert.strictEqual(err.partialResult?.primaryError?.code, 'EXECUTION_FAILED');
                assert.strictEqual(err.partialResult?.telemetryError?.code, 'TELEMETRY_FATAL');
                return true;
            });
        });

        it('should stop without waiting when the deadline is shorter than the next delay', async () => {
            const telemetry = new ScriptedTelemetry([NOT_FOUND]);
            const { engine, clock } = setup(succeeded(), telemetry, 1000);

            const result = await engine.correlate(REQUEST);

            assert.strictEqual(result.termination, 'DEADLINE_EXCEEDED');
            assert.strictEqual(result.correlationAttempts, 1);
            assert.strictEqual(result.telemetry, null);
            assert.deepStrictEqual(clock.sleeps, []);
        });

        it('should stop with DEADLINE_EXCEEDED when the deadline fires during a wait', async () => {
            const telemetry = new ScriptedTelemetry([NOT_FOUND]);
            const clock = new StalledClock();
            const { engine } = setup(succeeded(), telemetry, 50, {
                clock,
                options: { retryPolicy: { maxAttempts: 2, delaysMs: [0, 10] } }
            });
            // The deadline timer is unref'd; hold the event loop open until it fires
            const hold = setTimeout(() => undefined, 5_000);

            try {
                const result = await engine.correlate(REQUEST);

                assert.strictEqual(result.termination, 'DEADLINE_EXCEEDED');
                assert.strictEqual(result.correlationAttempts, 1);
                assert.strictEqual(result.telemetry, null);
                assert.deepStrictEqual(clock.sleeps, [10]);
                assert.strictEqual(telemetry.lookups.length, 1);
            } finally {
                clearTimeout(hold);
            }
        });

        it('should not look up when the primary execution ran out of time', async () => {
            const telemetry = new ScriptedTelemetry([FOUND_TERMINAL]);
            const { engine } = setup({
                identifier: '01ef-primary-1',
                record: primaryRecord({ status: 'FAILED' }),
                error: new CorrelatorError('DEADLINE_EXCEEDED', 'Primary execution aborted during drain')
            }, telemetry);

            const result = await engine.correlate(REQUEST);

            assert.strictEqual(result.termination, 'DEADLINE_EXCEEDED');
            assert.strictEqual(telemetry.lookups.length, 0);
            assert.strictEqual(result.telemetryError?.code, 'DEADLINE_EXCEEDED');
        });

        it('should compare against the drain duration when asked', async () => {
            const telemetry = new ScriptedTelemetry([FOUND_TERMINAL]);
            const { engine } = setup(succeeded(), telemetry);

            const result = await engine.correlate(REQUEST, { durationBasis: 'FULL_DRAIN' });

            assert.strictEqual(result.durationBasis, 'FULL_DRAIN');
            assert.strictEqual(result.durationDeltaMs, 485);
        });

        it('should tag the primary execution with the run id', async () => {
            const telemetry = new ScriptedTelemetry([FOUND_TERMINAL]);
            const { engine, primary } = setup(succeeded(), telemetry);

            await engine.correlate(REQUEST);

            assert.strictEqual(primary.lastTag, 'run-1');
            assert.ok(primary.lastSignal);
        });

        it('should reject an empty statement before executing', async () => {
            const telemetry = new ScriptedTelemetry([FOUND_TERMINAL]);
            const { engine, primary } = setup(succeeded(), telemetry);

            await assert.rejects(engine.correlate({ statement: '   ' }), ValidationViolationError);
            assert.strictEqual(primary.calls, 0);
        });
    });

    describe('constructor', () => {
        it('should reject a non-increasing delay schedule', () => {
            assert.throws(
                () => new CorrelationEngine(
                    { primary: new StubPrimary(succeeded()), telemetry: new ScriptedTelemetry([]) },
                    { retryPolicy: { maxAttempts: 3, delaysMs: [0, 2000, 2000] } }
                ),
                /INVALID_RETRY_POLICY/
            );
        });
    });

    describe('compareSideBySide', () => {
        it('should report the lookup and the independent run together', async () => {
            const telemetry = new ScriptedTelemetry([FOUND_TERMINAL]);
            const { engine } = setup(succeeded(), telemetry);

            const report = await engine.compareSideBySide(REQUEST);

            assert.strictEqual(telemetry.submits, 1);
            assert.strictEqual(report.lookup.mode, 'LOOKUP');
            assert.strictEqual(report.lookup.termination, 'CORRELATED');
            assert.strictEqual(report.sideBySide.mode, 'SUBMIT_AND_WAIT');
            assert.strictEqual(report.sideBySide.termination, 'INDEPENDENT_RUN');
            assert.strictEqual(report.sideBySide.correlationSucceeded, true);
            assert.strictEqual(report.sideBySide.telemetry?.source, 'SUBMIT_AND_WAIT');
            assert.strictEqual(report.sideBySide.durationDeltaMs, 438);
        });

        it('should give the independent run the remaining run budget by default', async () => {
            const telemetry = new ScriptedTelemetry([FOUND_TERMINAL]);
            const { engine } = setup(succeeded(), telemetry);

            await engine.compareSideBySide({ statement: 'SELECT 1', context: { waitTimeout: '0s' } });

            assert.strictEqual(telemetry.submitTimeoutMs, 60_000);
        });

        it('should use the configured submit budget when one is set', async () => {
            const telemetry = new ScriptedTelemetry([FOUND_TERMINAL]);
            const { engine } = setup(succeeded(), telemetry, undefined, { options: { submitTimeoutMs: 15_000 } });

            await engine.compareSideBySide(REQUEST);

            assert.strictEqual(telemetry.submitTimeoutMs, 15_000);
        });

        it('should carry the primary failure on both halves of the report', async () => {
            const execution = failedExecution('', 'Primary execution failed during submit: syntax error');
            const telemetry = new ScriptedTelemetry([FOUND_TERMINAL]);
            const { engine } = setup(execution, telemetry);

            const report = await engine.compareSideBySide(REQUEST);

            assert.strictEqual(report.lookup.termination, 'NO_IDENTIFIER');
            assert.strictEqual(report.lookup.primaryError?.code, 'EXECUTION_FAILED');
            assert.strictEqual(report.sideBySide.termination, 'INDEPENDENT_RUN');
            assert.strictEqual(report.sideBySide.primaryError?.incidentId, execution.error?.incidentId);
        });

        it('should keep the lookup result when the independent run fails', async () => {
            const telemetry = new ScriptedTelemetry([FOUND_TERMINAL], async () => {
                throw new CorrelatorError('TELEMETRY_FATAL', 'POST /api/2.0/sql/statements/ failed with status 403: forbidden', { httpStatus: 403 });
            });
            const { engine } = setup(succeeded(), telemetry);

            const report = await engine.compareSideBySide(REQUEST);

            assert.strictEqual(report.lookup.termination, 'CORRELATED');
            assert.strictEqual(report.sideBySide.telemetry, null);
            assert.strictEqual(report.sideBySide.termination, 'TELEMETRY_UNAVAILABLE');
            assert.strictEqual(report.sideBySide.telemetryError?.code, 'TELEMETRY_FATAL');
            assert.strictEqual(report.sideBySide.attemptLog[0]?.outcome, 'FATAL_ERROR');
        });

        it('should cancel the independent run when the lookup fails fatally', async () => {
            const telemetry = new ScriptedTelemetry([
                new CorrelatorError('TELEMETRY_FATAL', 'GET /api/2.0/sql/history/queries/x failed with status 403: forbidden', { httpStatus: 403 })
            ]);
            const { engine } = setup(succeeded(), telemetry);

            await assert.rejects(engine.compareSideBySide(REQUEST), CorrelatorError);
            assert.strictEqual(telemetry.submitSignal?.aborted, true);
        });
    });
});
