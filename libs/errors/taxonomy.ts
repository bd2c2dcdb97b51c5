/**
 * Correlator Error Taxonomy
 *
 * Every failure surfaced by the correlator carries exactly one of these
 * codes. Each code has fixed retry semantics.
 */

export type CorrelatorErrorCode =
    | 'EXECUTION_FAILED'       // Primary channel could not complete the query
    | 'TELEMETRY_TRANSIENT'    // Timeout, 5xx, throttling → retry
    | 'TELEMETRY_FATAL'        // Auth, malformed request/response, other 4xx → abort
    | 'CORRELATION_EXHAUSTED'  // Retries ran out; a result state, not a fault
    | 'DEADLINE_EXCEEDED';     // Caller-supplied overall deadline elapsed

export interface ErrorCodeMetadata {
    /** Whether the lookup loop may try again */
    readonly retryAllowed: boolean;
    /** Whether the condition aborts the correlation run */
    readonly fatal: boolean;
    readonly reason: string;
}

export const ERROR_CODE_METADATA: Record<CorrelatorErrorCode, ErrorCodeMetadata> = {
    EXECUTION_FAILED: {
        retryAllowed: false,
        fatal: true,
        reason: 'Primary execution did not complete; only a best-effort lookup of the failure record remains'
    },
    TELEMETRY_TRANSIENT: {
        retryAllowed: true,
        fatal: false,
        reason: 'Telemetry read path unavailable or lagging; expected to resolve on retry'
    },
    TELEMETRY_FATAL: {
        retryAllowed: false,
        fatal: true,
        reason: 'Credential or request problem; retrying cannot succeed'
    },
    CORRELATION_EXHAUSTED: {
        retryAllowed: false,
        fatal: false,
        reason: 'No terminal telemetry record within the retry schedule; primary-only result'
    },
    DEADLINE_EXCEEDED: {
        retryAllowed: false,
        fatal: false,
        reason: 'Overall deadline elapsed; best partial result returned'
    }
};

export function isRetryableCode(code: CorrelatorErrorCode): boolean {
    return ERROR_CODE_METADATA[code].retryAllowed;
}

export function isFatalCode(code: CorrelatorErrorCode): boolean {
    return ERROR_CODE_METADATA[code].fatal;
}
