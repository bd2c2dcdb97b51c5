import type { ExecutionStatus } from '../model/records.js';

/**
 * Telemetry state vocabulary → normalized status.
 * The query-history and statement endpoints use different words for the
 * same lifecycle; both are covered here.
 */
const STATE_MAP: Readonly<Record<string, ExecutionStatus>> = {
    QUEUED: 'PENDING',
    PENDING: 'PENDING',
    RUNNING: 'RUNNING',
    FINISHED: 'SUCCEEDED',
    SUCCEEDED: 'SUCCEEDED',
    // Statement closed after success; results were already produced
    CLOSED: 'SUCCEEDED',
    FAILED: 'FAILED',
    CANCELED: 'CANCELLED',
    CANCELLED: 'CANCELLED',
};

export function mapTelemetryState(state: string): ExecutionStatus {
    return STATE_MAP[state.trim().toUpperCase()] ?? 'UNKNOWN';
}
