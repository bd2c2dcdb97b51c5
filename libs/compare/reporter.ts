import type { ComparisonResult, CorrelationReport } from '../model/records.js';

/**
 * Flat view of a comparison for structured logs and reports.
 * Field names stay clear of the run logger's bindings (runId, mode).
 */
export interface ComparisonSummary {
    readonly comparisonMode: string;
    readonly termination: string;
    readonly primaryId: string | null;
    readonly telemetryId: string | null;
    readonly primaryStatus: string;
    readonly telemetryStatus: string | null;
    readonly primaryDurationMs: number | null;
    readonly primaryDrainMs: number | null;
    readonly telemetryDurationMs: number | null;
    readonly telemetryTiming: string | null;
    readonly durationDeltaMs: number | null;
    readonly durationBasis: string;
    readonly rows: string;
    readonly columns: string;
    readonly rowCountAgreement: boolean;
    readonly columnCountAgreement: boolean;
    readonly correlationAttempts: number;
    readonly correlationSucceeded: boolean;
    readonly telemetryError: string | null;
    readonly primaryError: string | null;
}

function pair(left: number | null, right: number | null | undefined): string {
    return `${left ?? '-'}/${right ?? '-'}`;
}

export function summarize(result: ComparisonResult): ComparisonSummary {
    const { primary, telemetry } = result;

    return {
        comparisonMode: result.mode,
        termination: result.termination,
        primaryId: primary.identifier || null,
        telemetryId: telemetry?.identifier || null,
        primaryStatus: primary.status,
        telemetryStatus: telemetry?.status ?? null,
        primaryDurationMs: primary.durationMs,
        primaryDrainMs: primary.drainDurationMs,
        telemetryDurationMs: telemetry?.durationMs ?? null,
        telemetryTiming: telemetry
            ? `${telemetry.timingEndpoints.start}..${telemetry.timingEndpoints.end}`
            : null,
        durationDeltaMs: result.durationDeltaMs,
        durationBasis: result.durationBasis,
        rows: pair(primary.rowCount, telemetry?.rowCount),
        columns: pair(primary.columnCount, telemetry?.columnCount),
        rowCountAgreement: result.rowCountAgreement,
        columnCountAgreement: result.columnCountAgreement,
        correlationAttempts: result.correlationAttempts,
        correlationSucceeded: result.correlationSucceeded,
        telemetryError: result.telemetryError
            ? `${result.telemetryError.code}: ${result.telemetryError.message}`
            : null,
        primaryError: result.primaryError
            ? `${result.primaryError.code}: ${result.primaryError.message} (incident ${result.primaryError.incidentId})`
            : null
    };
}

export function summarizeReport(report: CorrelationReport): { lookup: ComparisonSummary; sideBySide: ComparisonSummary } {
    return {
        lookup: summarize(report.lookup),
        sideBySide: summarize(report.sideBySide)
    };
}
