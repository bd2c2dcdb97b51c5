/**
 * Correlation Engine
 *
 * Ties the primary execution to its telemetry record. The lookup phase
 * starts only after the primary call has returned, because that is when the
 * captured identifier becomes readable. The telemetry read path lags the
 * primary execution, so the lookup runs on a bounded retry schedule.
 *
 * Outcomes:
 * - correlated, exhausted, no identifier, deadline → ComparisonResult
 * - TELEMETRY_FATAL → thrown CorrelatorError carrying the partial result
 */

import crypto from 'crypto';
import { compare } from '../compare/comparator.js';
import { summarize } from '../compare/reporter.js';
import { CorrelatorError, ErrorSanitizer, describeError } from '../errors/sanitizer.js';
import { isFatalCode, isRetryableCode } from '../errors/taxonomy.js';
import {
    ComparisonResult,
    CorrelationAttempt,
    CorrelationReport,
    CorrelationSummary,
    CorrelationTermination,
    DurationBasis,
    isTerminalStatus,
    PrimaryErrorSummary,
    QueryRequest,
    TelemetryExecutionRecord
} from '../model/records.js';
import type { PrimaryExecution, PrimaryExecutor } from '../primary/primaryClient.js';
import { classifyTelemetryFailure } from '../telemetry/failureClassifier.js';
import { FAILURE_CLASS_METADATA, TelemetryFailureClass } from '../telemetry/failureTypes.js';
import type { TelemetryApi } from '../telemetry/telemetryClient.js';
import { Clock, systemClock, withTimeout } from '../timing/clock.js';
import { QueryRequestSchema } from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';
import { CorrelationContext } from './context.js';
import {
    assertValidPolicy,
    DEFAULT_RETRY_POLICY,
    delayBeforeAttempt,
    RetryPolicy
} from './retrySchedule.js';

const DEFAULT_DEADLINE_MS = 60_000;

export interface CorrelationEngineDeps {
    readonly primary: PrimaryExecutor;
    readonly telemetry: TelemetryApi;
    readonly clock?: Clock;
    readonly idFactory?: () => string;
}

export interface CorrelationEngineOptions {
    readonly retryPolicy?: RetryPolicy;
    /** Default overall deadline for a run */
    readonly deadlineMs?: number;
    /** Look up the failure record when the primary failed after assigning an identifier */
    readonly lookupFailedExecutions?: boolean;
    /** Blocking budget for the independent telemetry execution; defaults to the remaining run budget */
    readonly submitTimeoutMs?: number;
}

export interface CorrelateOptions {
    readonly deadlineMs?: number;
    readonly signal?: AbortSignal;
    readonly durationBasis?: DurationBasis;
}

interface RunBudget {
    readonly signal: AbortSignal;
    readonly deadlineAtMs: number;
}

interface PollOutcome {
    readonly termination: Extract<CorrelationTermination, 'CORRELATED' | 'CORRELATION_EXHAUSTED' | 'DEADLINE_EXCEEDED'>;
    readonly record: TelemetryExecutionRecord | null;
    readonly attempts: readonly CorrelationAttempt[];
    readonly fatal?: CorrelatorError;
    readonly lastError?: CorrelatorError;
}

type IndependentOutcome =
    | { readonly ok: true; readonly record: TelemetryExecutionRecord; readonly issuedAtMs: number }
    | { readonly ok: false; readonly error: CorrelatorError; readonly issuedAtMs: number };

export class CorrelationEngine {
    private readonly primary: PrimaryExecutor;
    private readonly telemetry: TelemetryApi;
    private readonly clock: Clock;
    private readonly idFactory: () => string;
    private readonly retryPolicy: RetryPolicy;
    private readonly deadlineMs: number;
    private readonly lookupFailedExecutions: boolean;
    private readonly submitTimeoutMs?: number;

    constructor(deps: CorrelationEngineDeps, options: CorrelationEngineOptions = {}) {
        this.primary = deps.primary;
        this.telemetry = deps.telemetry;
        this.clock = deps.clock ?? systemClock;
        this.idFactory = deps.idFactory ?? (() => crypto.randomUUID());
        this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
        this.deadlineMs = options.deadlineMs ?? DEFAULT_DEADLINE_MS;
        this.lookupFailedExecutions = options.lookupFailedExecutions ?? true;
        this.submitTimeoutMs = options.submitTimeoutMs;

        assertValidPolicy(this.retryPolicy);
    }

    /**
     * Execute through the primary channel, then poll telemetry for the
     * record keyed by the captured identifier.
     */
    public async correlate(request: QueryRequest, options: CorrelateOptions = {}): Promise<ComparisonResult> {
        const validated = validate(QueryRequestSchema, request, 'CorrelationEngine:correlate');

        return CorrelationContext.run(
            { runId: this.idFactory(), mode: 'LOOKUP', warehouseId: validated.context?.warehouseId, startedAtMs: this.clock.now() },
            async () => {
                const budget = this.startBudget(options);
                const execution = await this.executePrimary(validated, budget);
                const result = await this.correlateExecution(execution, budget, options.durationBasis);

                CorrelationContext.get().logger.info(summarize(result), 'Correlation run finished');
                return result;
            }
        );
    }

    /**
     * Run the primary execution and an independent telemetry execution of
     * the same statement concurrently, then correlate the primary one.
     */
    public async compareSideBySide(request: QueryRequest, options: CorrelateOptions = {}): Promise<CorrelationReport> {
        const validated = validate(QueryRequestSchema, request, 'CorrelationEngine:compareSideBySide');

        return CorrelationContext.run(
            { runId: this.idFactory(), mode: 'SUBMIT_AND_WAIT', warehouseId: validated.context?.warehouseId, startedAtMs: this.clock.now() },
            async () => {
                const log = CorrelationContext.get().logger;
                const budget = this.startBudget(options);

                // Lets a fatal lookup stop the independent run early
                const independentController = new AbortController();
                const independentSignal = AbortSignal.any([budget.signal, independentController.signal]);

                const independent = this.runIndependent(validated, independentSignal, budget);
                const execution = await this.executePrimary(validated, budget);

                let lookup: ComparisonResult;
                try {
                    lookup = await this.correlateExecution(execution, budget, options.durationBasis);
                } catch (err) {
                    independentController.abort(err);
                    await independent;
                    throw err;
                }

                const sideBySide = this.compareIndependent(execution, await independent, options.durationBasis);
                const report: CorrelationReport = Object.freeze({ lookup, sideBySide });

                log.info({ lookup: summarize(lookup), sideBySide: summarize(sideBySide) }, 'Side-by-side run finished');
                return report;
            }
        );
    }

    private startBudget(options: CorrelateOptions): RunBudget {
        const deadlineMs = options.deadlineMs ?? this.deadlineMs;
        return {
            signal: withTimeout(deadlineMs, options.signal),
            deadlineAtMs: this.clock.now() + deadlineMs
        };
    }

    private async executePrimary(request: QueryRequest, budget: RunBudget): Promise<PrimaryExecution> {
        return this.primary.execute(request, {
            signal: budget.signal,
            correlationTag: CorrelationContext.get().runId
        });
    }

    private async correlateExecution(
        execution: PrimaryExecution,
        budget: RunBudget,
        durationBasis: DurationBasis | undefined
    ): Promise<ComparisonResult> {
        const log = CorrelationContext.get().logger;
        const { identifier, record: primary, error } = execution;
        const options = { durationBasis };
        const primaryError = error ? primaryErrorSummary(error) : undefined;

        if (error?.code === 'DEADLINE_EXCEEDED') {
            return compare(primary, null, summaryOf('DEADLINE_EXCEEDED', [], error, primaryError), options);
        }

        // Nothing to look up: not retried
        if (identifier === '') {
            log.warn({ executionError: error?.code, incidentId: error?.incidentId }, 'No identifier captured; skipping telemetry lookup');
            return compare(primary, null, summaryOf('NO_IDENTIFIER', [], undefined, primaryError), options);
        }

        if (error && !this.lookupFailedExecutions) {
            return compare(primary, null, summaryOf('TELEMETRY_UNAVAILABLE', [], error, primaryError), options);
        }

        const outcome = await this.pollTelemetry(identifier, budget);

        if (outcome.fatal) {
            const partial = compare(primary, null, summaryOf('TELEMETRY_UNAVAILABLE', outcome.attempts, outcome.fatal, primaryError), options);
            log.error({ identifier, attempts: outcome.attempts.length, incidentId: outcome.fatal.incidentId }, 'Telemetry lookup aborted by fatal error');
            throw outcome.fatal.withPartialResult(partial);
        }

        const telemetry = outcome.termination === 'DEADLINE_EXCEEDED' ? null : outcome.record;
        const succeeded = outcome.termination === 'CORRELATED';

        return compare(primary, telemetry, {
            mode: 'LOOKUP',
            attempts: outcome.attempts.length,
            succeeded,
            termination: outcome.termination,
            attemptLog: outcome.attempts,
            ...(!succeeded && outcome.lastError ? { telemetryError: errorSummary(outcome.lastError) } : {}),
            ...(primaryError ? { primaryError } : {})
        }, options);
    }

    /**
     * Bounded lookup loop. Never more than maxAttempts lookups; a fatal
     * error stops it at once without spending the remaining attempts.
     */
    private async pollTelemetry(identifier: string, budget: RunBudget): Promise<PollOutcome> {
        const log = CorrelationContext.get().logger;
        const attempts: CorrelationAttempt[] = [];
        let lastSeen: TelemetryExecutionRecord | null = null;
        let lastError: CorrelatorError | undefined;

        const deadline = (): PollOutcome => ({ termination: 'DEADLINE_EXCEEDED', record: null, attempts, lastError });

        for (let attemptNumber = 1; attemptNumber <= this.retryPolicy.maxAttempts; attemptNumber++) {
            const delayMs = delayBeforeAttempt(this.retryPolicy, attemptNumber);

            if (budget.signal.aborted || this.clock.now() + delayMs > budget.deadlineAtMs) {
                log.warn({ identifier, attemptNumber, delayMs }, 'Deadline reached before next lookup attempt');
                return deadline();
            }

            if (delayMs > 0) {
                try {
                    await this.clock.sleep(delayMs, budget.signal);
                } catch (err) {
                    log.warn({ identifier, attemptNumber, reason: describeError(err) }, 'Lookup wait cancelled');
                    return deadline();
                }
            }

            const issuedAtMs = this.clock.now();

            try {
                const result = await this.telemetry.lookupByIdentifier(identifier, { signal: budget.signal });

                if (result.kind === 'NOT_FOUND') {
                    const { attemptOutcome } = FAILURE_CLASS_METADATA.NOT_FOUND;
                    attempts.push(Object.freeze({ attemptNumber, issuedAtMs, outcome: attemptOutcome }));
                    log.info({ identifier, attemptNumber, outcome: attemptOutcome }, 'Lookup attempt');
                    continue;
                }

                attempts.push(Object.freeze({ attemptNumber, issuedAtMs, outcome: 'FOUND', status: result.record.status }));
                log.info({ identifier, attemptNumber, outcome: 'FOUND', status: result.record.status }, 'Lookup attempt');

                if (result.terminal) {
                    return { termination: 'CORRELATED', record: result.record, attempts };
                }
                // Still running on the server
                lastSeen = result.record;
            } catch (err) {
                const error = toTelemetryError(err, identifier);
                const { attemptOutcome } = FAILURE_CLASS_METADATA[failureClassOf(error)];
                attempts.push(Object.freeze({ attemptNumber, issuedAtMs, outcome: attemptOutcome, errorCode: error.code }));

                if (isRetryableCode(error.code)) {
                    log.info({ identifier, attemptNumber, outcome: attemptOutcome, httpStatus: error.httpStatus }, 'Lookup attempt');
                    lastError = error;
                    continue;
                }

                if (isFatalCode(error.code)) {
                    return { termination: 'CORRELATION_EXHAUSTED', record: null, attempts, fatal: error };
                }

                // Cut short by the run deadline rather than by the telemetry side
                return {
                    termination: error.code === 'DEADLINE_EXCEEDED' ? 'DEADLINE_EXCEEDED' : 'CORRELATION_EXHAUSTED',
                    record: null,
                    attempts,
                    lastError: error
                };
            }
        }

        log.warn({ identifier, attempts: attempts.length }, 'Lookup attempts exhausted without terminal record');
        return { termination: 'CORRELATION_EXHAUSTED', record: lastSeen, attempts, lastError };
    }

    private async runIndependent(request: QueryRequest, signal: AbortSignal, budget: RunBudget): Promise<IndependentOutcome> {
        const issuedAtMs = this.clock.now();
        const timeoutMs = this.submitTimeoutMs ?? Math.max(budget.deadlineAtMs - issuedAtMs, 0);
        try {
            const record = await this.telemetry.submitAndWait(request, { signal, timeoutMs });
            return { ok: true, record, issuedAtMs };
        } catch (err) {
            return { ok: false, error: toTelemetryError(err, 'statement-submit'), issuedAtMs };
        }
    }

    private compareIndependent(
        execution: PrimaryExecution,
        outcome: IndependentOutcome,
        durationBasis: DurationBasis | undefined
    ): ComparisonResult {
        const primaryError = execution.error ? primaryErrorSummary(execution.error) : undefined;

        if (outcome.ok) {
            const { record } = outcome;
            // Identifier spaces differ; success only needs a terminal record of its own
            const succeeded = record.identifier !== '' && isTerminalStatus(record.status);
            return compare(execution.record, record, {
                mode: 'SUBMIT_AND_WAIT',
                attempts: 1,
                succeeded,
                termination: 'INDEPENDENT_RUN',
                attemptLog: [{ attemptNumber: 1, issuedAtMs: outcome.issuedAtMs, outcome: 'FOUND', status: record.status }],
                ...(primaryError ? { primaryError } : {})
            }, { durationBasis });
        }

        const { error } = outcome;
        return compare(execution.record, null, {
            mode: 'SUBMIT_AND_WAIT',
            attempts: 1,
            succeeded: false,
            termination: error.code === 'DEADLINE_EXCEEDED' ? 'DEADLINE_EXCEEDED' : 'TELEMETRY_UNAVAILABLE',
            attemptLog: [{
                attemptNumber: 1,
                issuedAtMs: outcome.issuedAtMs,
                outcome: FAILURE_CLASS_METADATA[failureClassOf(error)].attemptOutcome,
                errorCode: error.code
            }],
            telemetryError: errorSummary(error),
            ...(primaryError ? { primaryError } : {})
        }, { durationBasis });
    }
}

function errorSummary(error: CorrelatorError): { code: string; message: string } {
    return { code: error.code, message: error.message };
}

function primaryErrorSummary(error: CorrelatorError): PrimaryErrorSummary {
    return { code: error.code, message: error.message, incidentId: error.incidentId };
}

function summaryOf(
    termination: CorrelationTermination,
    attempts: readonly CorrelationAttempt[],
    error: CorrelatorError | undefined,
    primaryError: PrimaryErrorSummary | undefined
): CorrelationSummary {
    return {
        mode: 'LOOKUP',
        attempts: attempts.length,
        succeeded: false,
        termination,
        attemptLog: attempts,
        ...(error ? { telemetryError: errorSummary(error) } : {}),
        ...(primaryError ? { primaryError } : {})
    };
}

/** Only codes that abort the run are recorded as fatal attempts. */
function failureClassOf(error: CorrelatorError): TelemetryFailureClass {
    return isFatalCode(error.code) ? 'FATAL' : 'TRANSIENT';
}

/**
 * Errors from a TelemetryApi implementation are expected to be classified
 * CorrelatorErrors; anything else is classified here by its message.
 */
function toTelemetryError(err: unknown, subject: string): CorrelatorError {
    if (err instanceof CorrelatorError) return err;

    const { failureClass } = classifyTelemetryFailure({ errorMessage: describeError(err), subject });
    return ErrorSanitizer.sanitize(err, failureClass === 'FATAL' ? 'TELEMETRY_FATAL' : 'TELEMETRY_TRANSIENT', `Telemetry:${subject}`);
}
