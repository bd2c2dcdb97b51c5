/**
 * Telemetry Client
 *
 * One client, two operations against the warehouse's REST API:
 * - submitAndWait: an independent execution of the same statement through
 *   the statement-execution endpoint, for side-by-side comparison only.
 * - lookupByIdentifier: server-recorded metadata for an identifier issued
 *   by the primary channel.
 *
 * Every call carries its own timeout, shorter than and distinct from the
 * caller's overall deadline. Failures are raised as classified
 * CorrelatorErrors; a missing record on lookup is a result, not an error.
 */

import { z, ZodType, ZodTypeDef } from 'zod';
import { CorrelatorError, describeError } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import { isTerminalStatus, QueryRequest, TelemetryExecutionRecord } from '../model/records.js';
import { Clock, systemClock, withTimeout } from '../timing/clock.js';
import {
    ApiErrorSchema,
    QueryHistoryInfoSchema,
    StatementResponse,
    StatementResponseSchema
} from '../validation/schema.js';
import { validate, ValidationViolationError } from '../validation/zod-middleware.js';
import { classifyTelemetryFailure } from './failureClassifier.js';
import { FAILURE_CLASS_METADATA } from './failureTypes.js';
import { normalizeQueryHistory, normalizeStatement } from './normalizer.js';
import { mapTelemetryState } from './statusMap.js';

export type LookupSource = 'QUERY_HISTORY' | 'STATEMENT';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface TelemetryClientConfig {
    /** Workspace hostname; a scheme may be included */
    readonly host: string;
    /** Opaque bearer credential */
    readonly token: string;
    /** Default target warehouse for submitAndWait */
    readonly warehouseId: string;
    /** Per-call timeout */
    readonly callTimeoutMs: number;
    readonly lookupSource: LookupSource;
    /** Default server-side wait for submitAndWait, e.g. '30s' */
    readonly waitTimeout: string;
    /** Interval between status polls once the server wait has elapsed */
    readonly statementPollIntervalMs?: number;
    /** Default overall blocking budget for submitAndWait, independent of the server wait */
    readonly submitTimeoutMs?: number;
}

export interface TelemetryClientDeps {
    readonly fetch?: FetchLike;
    readonly clock?: Clock;
}

export type LookupResult =
    | { readonly kind: 'NOT_FOUND' }
    | { readonly kind: 'FOUND'; readonly record: TelemetryExecutionRecord; readonly terminal: boolean };

export interface TelemetryCallOptions {
    readonly signal?: AbortSignal;
}

export interface SubmitAndWaitOptions extends TelemetryCallOptions {
    /** Overall time to block waiting for a terminal state */
    readonly timeoutMs?: number;
}

/**
 * The telemetry contract the correlation engine depends on.
 */
export interface TelemetryApi {
    submitAndWait(request: QueryRequest, options?: SubmitAndWaitOptions): Promise<TelemetryExecutionRecord>;
    lookupByIdentifier(identifier: string, options?: TelemetryCallOptions): Promise<LookupResult>;
}

type CallResult<T> = { readonly kind: 'OK'; readonly body: T } | { readonly kind: 'NOT_FOUND' };

const STATEMENTS_PATH = '/api/2.0/sql/statements/';
const QUERY_HISTORY_PATH = '/api/2.0/sql/history/queries/';
const DEFAULT_STATEMENT_POLL_INTERVAL_MS = 1000;
const DEFAULT_SUBMIT_TIMEOUT_MS = 60_000;
// Extra time beyond the server wait before the POST itself is abandoned
const SERVER_WAIT_GRACE_MS = 5000;

export class TelemetryClient implements TelemetryApi {
    private readonly baseUrl: string;
    private readonly fetchImpl: FetchLike;
    private readonly clock: Clock;

    constructor(
        private readonly config: TelemetryClientConfig,
        deps: TelemetryClientDeps = {}
    ) {
        this.baseUrl = /^https?:\/\//i.test(config.host)
            ? config.host.replace(/\/+$/, '')
            : `https://${config.host.replace(/\/+$/, '')}`;
        this.fetchImpl = deps.fetch ?? ((url, init) => fetch(url, init));
        this.clock = deps.clock ?? systemClock;
    }

    /**
     * Contract B: fetch server-recorded metadata for a previously issued identifier.
     */
    public async lookupByIdentifier(identifier: string, options: TelemetryCallOptions = {}): Promise<LookupResult> {
        const path = this.config.lookupSource === 'QUERY_HISTORY'
            ? `${QUERY_HISTORY_PATH}${encodeURIComponent(identifier)}`
            : `${STATEMENTS_PATH}${encodeURIComponent(identifier)}`;

        const record = this.config.lookupSource === 'QUERY_HISTORY'
            ? await this.call('GET', path, QueryHistoryInfoSchema, { signal: options.signal, subject: identifier })
                .then(result => result.kind === 'OK' ? normalizeQueryHistory(result.body) : null)
            : await this.call('GET', path, StatementResponseSchema, { signal: options.signal, subject: identifier })
                .then(result => result.kind === 'OK' ? normalizeStatement(result.body, 'STATEMENT') : null);

        if (!record) {
            logger.debug({ identifier, source: this.config.lookupSource }, 'Telemetry record not found');
            return { kind: 'NOT_FOUND' };
        }

        return { kind: 'FOUND', record, terminal: isTerminalStatus(record.status) };
    }

    /**
     * Contract A: execute the statement independently and block until it
     * reaches a terminal state or `timeoutMs` elapses. A non-terminal record
     * is returned when the wait runs out. The server-side wait only shapes
     * the POST; a '0s' wait returns at once and leaves the rest to polling.
     * A statement still running when the caller's deadline fires is cancelled.
     */
    public async submitAndWait(request: QueryRequest, options: SubmitAndWaitOptions = {}): Promise<TelemetryExecutionRecord> {
        const context = request.context ?? {};
        const waitTimeout = context.waitTimeout ?? this.config.waitTimeout;
        const serverWaitMs = Number.parseInt(waitTimeout, 10) * 1000;
        const timeoutMs = options.timeoutMs ?? this.config.submitTimeoutMs ?? DEFAULT_SUBMIT_TIMEOUT_MS;

        const payload = {
            statement: request.statement,
            warehouse_id: context.warehouseId ?? this.config.warehouseId,
            wait_timeout: waitTimeout,
            on_wait_timeout: 'CONTINUE',
            format: context.format ?? 'JSON_ARRAY',
            disposition: context.disposition ?? 'INLINE'
        };

        const sentAtMs = this.clock.now();
        const waitUntilMs = sentAtMs + timeoutMs;

        const submitted = await this.call('POST', STATEMENTS_PATH, StatementResponseSchema, {
            signal: options.signal,
            subject: 'statement-submit',
            body: payload,
            timeoutMs: Math.max(this.config.callTimeoutMs, serverWaitMs + SERVER_WAIT_GRACE_MS)
        });
        if (submitted.kind === 'NOT_FOUND') {
            throw new CorrelatorError('TELEMETRY_FATAL', 'Statement endpoint not found', { httpStatus: 404 });
        }

        let latest: StatementResponse = submitted.body;
        let receivedAtMs = this.clock.now();

        try {
            while (!isTerminalStatus(mapTelemetryState(latest.status.state))) {
                const remainingMs = waitUntilMs - this.clock.now();
                if (remainingMs <= 0) {
                    logger.warn({ statementId: latest.statement_id, state: latest.status.state }, 'Statement still running after wait timeout');
                    break;
                }

                await this.pause(Math.min(this.config.statementPollIntervalMs ?? DEFAULT_STATEMENT_POLL_INTERVAL_MS, remainingMs), options.signal);

                const polled = await this.call('GET', `${STATEMENTS_PATH}${encodeURIComponent(latest.statement_id)}`, StatementResponseSchema, {
                    signal: options.signal,
                    subject: latest.statement_id
                });
                if (polled.kind === 'NOT_FOUND') {
                    throw new CorrelatorError('TELEMETRY_FATAL', `Submitted statement ${latest.statement_id} disappeared`, { httpStatus: 404 });
                }
                latest = polled.body;
                receivedAtMs = this.clock.now();
            }
        } catch (err) {
            if (err instanceof CorrelatorError && err.code === 'DEADLINE_EXCEEDED') {
                await this.cancelStatement(latest.statement_id);
            }
            throw err;
        }

        const record = normalizeStatement(latest, 'SUBMIT_AND_WAIT', { sentAtMs, receivedAtMs });

        logger.info({
            statementId: record.identifier,
            status: record.status,
            durationMs: record.durationMs,
            rowCount: record.rowCount,
            columnCount: record.columnCount
        }, 'Independent telemetry execution completed');

        return record;
    }

    /**
     * Best effort: the caller's deadline has already fired, so the cancel
     * runs on its own call timeout and a failure is only logged.
     */
    private async cancelStatement(statementId: string): Promise<void> {
        try {
            await this.call('POST', `${STATEMENTS_PATH}${encodeURIComponent(statementId)}/cancel`, z.unknown(), {
                subject: statementId
            });
            logger.info({ statementId }, 'Cancel requested for statement after deadline');
        } catch (err) {
            logger.warn({ statementId, reason: describeError(err) }, 'Statement cancel failed');
        }
    }

    private async pause(ms: number, signal: AbortSignal | undefined): Promise<void> {
        try {
            await this.clock.sleep(ms, signal);
        } catch (err) {
            throw new CorrelatorError('DEADLINE_EXCEEDED', 'Deadline elapsed while waiting for statement completion', { cause: err });
        }
    }

    private async call<T>(
        method: 'GET' | 'POST',
        path: string,
        schema: ZodType<T, ZodTypeDef, unknown>,
        options: { signal?: AbortSignal; subject: string; body?: unknown; timeoutMs?: number }
    ): Promise<CallResult<T>> {
        const { signal, subject, body } = options;
        const url = `${this.baseUrl}${path}`;
        const callSignal = withTimeout(options.timeoutMs ?? this.config.callTimeoutMs, signal);

        let response: Response;
        let text: string;
        try {
            response = await this.fetchImpl(url, {
                method,
                headers: {
                    Authorization: `Bearer ${this.config.token}`,
                    'Content-Type': 'application/json'
                },
                ...(body === undefined ? {} : { body: JSON.stringify(body) }),
                signal: callSignal
            });
            text = await response.text();
        } catch (err) {
            throw this.transportError(err, signal, subject);
        }

        const parsed = parseJson(text);

        if (!response.ok) {
            const apiError = ApiErrorSchema.safeParse(parsed);
            const errorCode = apiError.success ? apiError.data.error_code : undefined;
            const errorMessage = apiError.success && apiError.data.message ? apiError.data.message : text;

            const classification = classifyTelemetryFailure({
                errorCode,
                errorMessage,
                httpStatus: response.status,
                subject
            });

            if (classification.failureClass === 'NOT_FOUND') {
                return { kind: 'NOT_FOUND' };
            }

            const code = FAILURE_CLASS_METADATA[classification.failureClass].errorCode ?? 'TELEMETRY_FATAL';
            throw new CorrelatorError(
                code,
                `${method} ${path} failed with status ${response.status}: ${classification.errorMessage ?? 'no message'}`,
                { httpStatus: response.status, apiErrorCode: errorCode }
            );
        }

        try {
            return { kind: 'OK', body: validate(schema, parsed, `Telemetry:${method} ${path}`) };
        } catch (err) {
            if (err instanceof ValidationViolationError) {
                throw new CorrelatorError('TELEMETRY_FATAL', `Malformed response from ${method} ${path}`, {
                    cause: err,
                    httpStatus: response.status,
                    apiErrorCode: 'MALFORMED_RESPONSE',
                    internalDetails: err.issues
                });
            }
            throw err;
        }
    }

    private transportError(err: unknown, outer: AbortSignal | undefined, subject: string): CorrelatorError {
        if (outer?.aborted) {
            return new CorrelatorError('DEADLINE_EXCEEDED', `Telemetry call for ${subject} aborted by caller deadline`, { cause: err });
        }

        const errorCode = err instanceof Error
            ? (systemErrorCode(err) ?? err.name)
            : undefined;
        const classification = classifyTelemetryFailure({
            errorCode,
            errorMessage: describeError(err),
            subject
        });
        const code = FAILURE_CLASS_METADATA[classification.failureClass].errorCode ?? 'TELEMETRY_TRANSIENT';

        return new CorrelatorError(code, `Telemetry call for ${subject} failed: ${describeError(err)}`, {
            cause: err,
            apiErrorCode: errorCode
        });
    }
}

function parseJson(text: string): unknown {
    if (text.trim() === '') return undefined;
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

/**
 * Node's fetch wraps socket errors: the errno code sits on `cause`.
 */
function systemErrorCode(err: Error): string | undefined {
    const { cause } = err;
    if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
        return cause.code;
    }
    if ('code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}
