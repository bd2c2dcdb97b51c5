/**
 * Telemetry Failure Types
 *
 * Deterministic classification of telemetry call failures. NOT_FOUND is an
 * expected outcome of a lookup against a lagging read path, not a fault.
 */

import type { AttemptOutcome } from '../model/records.js';
import type { CorrelatorErrorCode } from '../errors/taxonomy.js';

export type TelemetryFailureClass =
    | 'NOT_FOUND'   // Record not (yet) visible → retry on schedule
    | 'TRANSIENT'   // Timeout, throttling, 5xx, transport → retry on schedule
    | 'FATAL';      // Auth, malformed request or response, other 4xx → abort

export interface TelemetryFailureClassification {
    readonly failureClass: TelemetryFailureClass;
    readonly retryAllowed: boolean;
    /** API error code or transport code, when known */
    readonly errorCode?: string;
    /** Sanitized */
    readonly errorMessage?: string;
    readonly httpStatus?: number;
    /** ISO-8601 */
    readonly classifiedAt: string;
}

export interface FailureClassMetadata {
    readonly retryAllowed: boolean;
    /** Outcome recorded on the correlation attempt */
    readonly attemptOutcome: AttemptOutcome;
    /** Error code surfaced when the failure is raised as an error */
    readonly errorCode: CorrelatorErrorCode | null;
}

export const FAILURE_CLASS_METADATA: Record<TelemetryFailureClass, FailureClassMetadata> = {
    NOT_FOUND: {
        retryAllowed: true,
        attemptOutcome: 'NOT_FOUND',
        errorCode: null
    },
    TRANSIENT: {
        retryAllowed: true,
        attemptOutcome: 'TRANSIENT_ERROR',
        errorCode: 'TELEMETRY_TRANSIENT'
    },
    FATAL: {
        retryAllowed: false,
        attemptOutcome: 'FATAL_ERROR',
        errorCode: 'TELEMETRY_FATAL'
    }
};
