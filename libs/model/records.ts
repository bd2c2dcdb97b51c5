/**
 * Shared data model for query execution and telemetry correlation.
 *
 * Records produced by the two channels stay independent; they only meet
 * inside the comparator, which reads them and never mutates them.
 */

/**
 * Execution status normalized across both channels.
 */
export type ExecutionStatus =
    | 'PENDING'
    | 'RUNNING'
    | 'SUCCEEDED'   // Terminal
    | 'FAILED'      // Terminal
    | 'CANCELLED'   // Terminal
    | 'UNKNOWN';

export const TERMINAL_STATUSES: readonly ExecutionStatus[] = ['SUCCEEDED', 'FAILED', 'CANCELLED'];

export function isTerminalStatus(status: ExecutionStatus): boolean {
    return TERMINAL_STATUSES.includes(status);
}

/**
 * Where a timestamp came from. Server-side fields measure different things
 * (compilation end, execution end, result transfer end), so every record
 * names the endpoints its duration was computed between.
 */
export type TimingEndpoint =
    | 'CLIENT_SUBMIT'
    | 'CLIENT_RESULT_HANDLE'
    | 'CLIENT_DRAIN_COMPLETE'
    | 'CLIENT_REQUEST_SENT'
    | 'CLIENT_RESPONSE_RECEIVED'
    | 'SERVER_QUERY_START'
    | 'SERVER_EXECUTION_END'
    | 'SERVER_QUERY_END'
    | 'SERVER_REPORTED_DURATION'
    | 'NONE';

export interface TimingEndpoints {
    readonly start: TimingEndpoint;
    readonly end: TimingEndpoint;
}

export type ResultDisposition = 'INLINE' | 'EXTERNAL_LINKS';
export type ResultFormat = 'JSON_ARRAY' | 'ARROW_STREAM' | 'CSV';

/**
 * Optional execution target and materialization preferences.
 */
export interface ExecutionContext {
    /** Target compute resource (SQL warehouse id) */
    readonly warehouseId?: string;
    /** Server-side wait before returning, e.g. '30s' ('0s' or 5s..50s) */
    readonly waitTimeout?: string;
    readonly disposition?: ResultDisposition;
    readonly format?: ResultFormat;
}

/**
 * Query submitted by the caller. Consumed read-only by both clients.
 */
export interface QueryRequest {
    readonly statement: string;
    readonly context?: ExecutionContext;
}

interface BaseExecutionRecord {
    /** Identifier in this channel's own identifier space ('' when never assigned) */
    readonly identifier: string;
    readonly status: ExecutionStatus;
    /** Epoch milliseconds */
    readonly observedStartMs: number | null;
    /** Epoch milliseconds */
    readonly observedEndMs: number | null;
    readonly durationMs: number | null;
    readonly timingEndpoints: TimingEndpoints;
    readonly rowCount: number | null;
    readonly columnCount: number | null;
    readonly errorDetail?: string;
}

/**
 * Record produced by the primary driver channel.
 *
 * `durationMs` is submit → result handle. Time to full drain is kept
 * separately so client-side materialization is never folded into it.
 */
export interface PrimaryExecutionRecord extends BaseExecutionRecord {
    readonly origin: 'PRIMARY';
    /** Epoch milliseconds at which the last row was read */
    readonly drainCompletedAtMs: number | null;
    /** Submit → full drain */
    readonly drainDurationMs: number | null;
}

export type TelemetrySource = 'QUERY_HISTORY' | 'STATEMENT' | 'SUBMIT_AND_WAIT';

/**
 * Record produced from the telemetry API.
 */
export interface TelemetryExecutionRecord extends BaseExecutionRecord {
    readonly origin: 'TELEMETRY';
    readonly source: TelemetrySource;
    /** Duration field as reported by the server, never used unchecked */
    readonly reportedDurationMs: number | null;
    /** |reportedDurationMs - durationMs| when both are known */
    readonly durationDiscrepancyMs: number | null;
    readonly chunkCount: number | null;
}

export type AttemptOutcome = 'NOT_FOUND' | 'FOUND' | 'TRANSIENT_ERROR' | 'FATAL_ERROR';

/**
 * One cycle of the lookup-by-identifier loop. Diagnostic only.
 */
export interface CorrelationAttempt {
    /** 1-based */
    readonly attemptNumber: number;
    readonly issuedAtMs: number;
    readonly outcome: AttemptOutcome;
    /** Server status when the record was found */
    readonly status?: ExecutionStatus;
    readonly errorCode?: string;
}

export type ComparisonMode = 'LOOKUP' | 'SUBMIT_AND_WAIT';

/**
 * Error raised by the primary execution, kept with its incident id so the
 * caller can match it to the log line.
 */
export interface PrimaryErrorSummary {
    readonly code: string;
    readonly message: string;
    readonly incidentId: string;
}

export type DurationBasis = 'RESULT_HANDLE' | 'FULL_DRAIN';

export type CorrelationTermination =
    | 'CORRELATED'
    | 'NO_IDENTIFIER'
    | 'CORRELATION_EXHAUSTED'
    | 'DEADLINE_EXCEEDED'
    | 'INDEPENDENT_RUN'
    | 'TELEMETRY_UNAVAILABLE';

/**
 * How the telemetry side was obtained. Supplied by the engine; the
 * comparator only copies it into the result.
 */
export interface CorrelationSummary {
    readonly mode: ComparisonMode;
    readonly attempts: number;
    readonly succeeded: boolean;
    readonly termination: CorrelationTermination;
    readonly attemptLog: readonly CorrelationAttempt[];
    readonly telemetryError?: {
        readonly code: string;
        readonly message: string;
    };
    readonly primaryError?: PrimaryErrorSummary;
}

export interface ComparisonResult {
    readonly mode: ComparisonMode;
    readonly primary: PrimaryExecutionRecord;
    readonly telemetry: TelemetryExecutionRecord | null;
    /** null means unavailable, never zero */
    readonly durationDeltaMs: number | null;
    readonly durationBasis: DurationBasis;
    readonly rowCountAgreement: boolean;
    readonly columnCountAgreement: boolean;
    readonly correlationAttempts: number;
    readonly correlationSucceeded: boolean;
    readonly termination: CorrelationTermination;
    readonly attemptLog: readonly CorrelationAttempt[];
    readonly telemetryError?: {
        readonly code: string;
        readonly message: string;
    };
    readonly primaryError?: PrimaryErrorSummary;
}

/**
 * Output of a side-by-side run: the lookup correlation plus the
 * comparison against an independent telemetry-side execution.
 */
export interface CorrelationReport {
    readonly lookup: ComparisonResult;
    readonly sideBySide: ComparisonResult;
}
