/**
 * Comparator
 *
 * Pure function over two already-collected records. No I/O, no clock:
 * the same inputs always produce an identical, frozen result.
 */

import type {
    ComparisonResult,
    CorrelationSummary,
    DurationBasis,
    PrimaryExecutionRecord,
    TelemetryExecutionRecord
} from '../model/records.js';

export interface CompareOptions {
    /** Which primary duration to compare; defaults to time to result handle */
    readonly durationBasis?: DurationBasis;
}

/**
 * Correlation summary for a lookup that found a terminal record on the first try.
 */
export const SINGLE_LOOKUP: CorrelationSummary = Object.freeze({
    mode: 'LOOKUP',
    attempts: 1,
    succeeded: true,
    termination: 'CORRELATED',
    attemptLog: Object.freeze([])
});

function primaryDuration(primary: PrimaryExecutionRecord, basis: DurationBasis): number | null {
    return basis === 'FULL_DRAIN' ? primary.drainDurationMs : primary.durationMs;
}

function countsAgree(left: number | null, right: number | null | undefined): boolean {
    // Missing on either side is reported as disagreement, never resolved
    if (left === null || right === null || right === undefined) return false;
    return left === right;
}

export function compare(
    primary: PrimaryExecutionRecord,
    telemetry: TelemetryExecutionRecord | null,
    correlation: CorrelationSummary = SINGLE_LOOKUP,
    options: CompareOptions = {}
): ComparisonResult {
    const durationBasis = options.durationBasis ?? 'RESULT_HANDLE';
    const primaryMs = primaryDuration(primary, durationBasis);
    const telemetryMs = telemetry?.durationMs ?? null;

    const result: ComparisonResult = {
        mode: correlation.mode,
        primary,
        telemetry,
        durationDeltaMs: primaryMs === null || telemetryMs === null ? null : Math.abs(primaryMs - telemetryMs),
        durationBasis,
        rowCountAgreement: countsAgree(primary.rowCount, telemetry?.rowCount),
        columnCountAgreement: countsAgree(primary.columnCount, telemetry?.columnCount),
        correlationAttempts: correlation.attempts,
        correlationSucceeded: correlation.succeeded,
        termination: correlation.termination,
        attemptLog: Object.freeze([...correlation.attemptLog]),
        ...(correlation.telemetryError ? { telemetryError: Object.freeze({ ...correlation.telemetryError }) } : {}),
        ...(correlation.primaryError ? { primaryError: Object.freeze({ ...correlation.primaryError }) } : {})
    };

    return Object.freeze(result);
}
