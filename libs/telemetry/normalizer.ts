/**
 * Telemetry Response Normalization
 *
 * Maps the telemetry API's response shapes onto one TelemetryExecutionRecord.
 * Durations are always `end - start` over named endpoints; the server's own
 * duration field is kept beside it as a cross-check and only stands in when
 * no endpoints were reported.
 */

import type {
    TelemetryExecutionRecord,
    TimingEndpoint,
    TimingEndpoints,
} from '../model/records.js';
import type { QueryHistoryInfo, StatementResponse } from '../validation/schema.js';
import { mapTelemetryState } from './statusMap.js';

// Below this an epoch value is taken to be in seconds (year 5138 in ms)
const SECONDS_EPOCH_CEILING = 100_000_000_000;

/**
 * Normalize an epoch-like value to epoch milliseconds.
 * Accepts ms or s numbers, numeric strings and ISO-8601 strings.
 */
export function toEpochMs(value: number | string | undefined | null): number | null {
    if (value === undefined || value === null) return null;

    if (typeof value === 'string') {
        const trimmed = value.trim();
        if (trimmed === '') return null;
        if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
            return toEpochMs(Number(trimmed));
        }
        const parsed = Date.parse(trimmed);
        return Number.isNaN(parsed) ? null : parsed;
    }

    if (!Number.isFinite(value) || value <= 0) return null;
    return Math.round(value < SECONDS_EPOCH_CEILING ? value * 1000 : value);
}

/**
 * Normalize a millisecond duration; strings are accepted for int64 fields.
 */
export function toDurationMs(value: number | string | undefined | null): number | null {
    if (value === undefined || value === null) return null;
    const numeric = typeof value === 'string' ? Number(value.trim()) : value;
    if (!Number.isFinite(numeric) || numeric < 0) return null;
    return Math.round(numeric);
}

interface ResolvedTiming {
    readonly startMs: number | null;
    readonly endMs: number | null;
    readonly durationMs: number | null;
    readonly endpoints: TimingEndpoints;
    readonly discrepancyMs: number | null;
}

const NO_ENDPOINTS: TimingEndpoints = { start: 'NONE', end: 'NONE' };

function resolveTiming(
    start: { readonly ms: number | null; readonly endpoint: TimingEndpoint },
    endCandidates: readonly { readonly ms: number | null; readonly endpoint: TimingEndpoint }[],
    reportedDurationMs: number | null
): ResolvedTiming {
    const end = endCandidates.find(candidate => candidate.ms !== null);

    if (start.ms !== null && end && end.ms !== null && end.ms >= start.ms) {
        const durationMs = end.ms - start.ms;
        return {
            startMs: start.ms,
            endMs: end.ms,
            durationMs,
            endpoints: { start: start.endpoint, end: end.endpoint },
            discrepancyMs: reportedDurationMs === null ? null : Math.abs(reportedDurationMs - durationMs)
        };
    }

    if (reportedDurationMs !== null) {
        return {
            startMs: start.ms,
            endMs: end?.ms ?? null,
            durationMs: reportedDurationMs,
            endpoints: { start: 'SERVER_REPORTED_DURATION', end: 'SERVER_REPORTED_DURATION' },
            discrepancyMs: null
        };
    }

    return {
        startMs: start.ms,
        endMs: end?.ms ?? null,
        durationMs: null,
        endpoints: NO_ENDPOINTS,
        discrepancyMs: null
    };
}

/**
 * Query-history lookup: server timestamps in epoch ms.
 * End endpoint preference: query end, then execution end.
 */
export function normalizeQueryHistory(info: QueryHistoryInfo): TelemetryExecutionRecord {
    const reportedDurationMs = toDurationMs(info.duration ?? info.metrics?.total_time_ms);

    const timing = resolveTiming(
        { ms: toEpochMs(info.query_start_time_ms), endpoint: 'SERVER_QUERY_START' },
        [
            { ms: toEpochMs(info.query_end_time_ms), endpoint: 'SERVER_QUERY_END' },
            { ms: toEpochMs(info.execution_end_time_ms), endpoint: 'SERVER_EXECUTION_END' }
        ],
        reportedDurationMs
    );

    const record: TelemetryExecutionRecord = {
        origin: 'TELEMETRY',
        source: 'QUERY_HISTORY',
        identifier: info.query_id,
        status: mapTelemetryState(info.status),
        observedStartMs: timing.startMs,
        observedEndMs: timing.endMs,
        durationMs: timing.durationMs,
        timingEndpoints: timing.endpoints,
        reportedDurationMs,
        durationDiscrepancyMs: timing.discrepancyMs,
        rowCount: info.rows_produced ?? info.metrics?.rows_produced_count ?? null,
        columnCount: null,
        chunkCount: null,
        ...(info.error_message ? { errorDetail: info.error_message } : {})
    };

    return Object.freeze(record);
}

export interface ClientObservedTiming {
    /** Epoch ms immediately before the request was sent */
    readonly sentAtMs: number;
    /** Epoch ms at which the terminal (or last) response was received */
    readonly receivedAtMs: number;
}

/**
 * Statement response: status and manifest, no server timestamps. Timing
 * comes from the client around the request when it observed one.
 */
export function normalizeStatement(
    response: StatementResponse,
    source: 'STATEMENT' | 'SUBMIT_AND_WAIT',
    observed?: ClientObservedTiming
): TelemetryExecutionRecord {
    const timing = observed
        ? resolveTiming(
            { ms: observed.sentAtMs, endpoint: 'CLIENT_REQUEST_SENT' },
            [{ ms: observed.receivedAtMs, endpoint: 'CLIENT_RESPONSE_RECEIVED' }],
            null
        )
        : resolveTiming({ ms: null, endpoint: 'NONE' }, [], null);

    const manifest = response.manifest;
    const errorMessage = response.status.error?.message;

    const record: TelemetryExecutionRecord = {
        origin: 'TELEMETRY',
        source,
        identifier: response.statement_id,
        status: mapTelemetryState(response.status.state),
        observedStartMs: timing.startMs,
        observedEndMs: timing.endMs,
        durationMs: timing.durationMs,
        timingEndpoints: timing.endpoints,
        reportedDurationMs: null,
        durationDiscrepancyMs: null,
        rowCount: manifest?.total_row_count ?? null,
        columnCount: manifest?.schema?.column_count ?? null,
        chunkCount: manifest?.total_chunk_count ?? null,
        ...(errorMessage ? { errorDetail: errorMessage } : {})
    };

    return Object.freeze(record);
}
