/**
 * Telemetry Failure Classifier
 *
 * Every failed telemetry call is classified as NOT_FOUND, TRANSIENT or FATAL.
 * Classification is deterministic and logged.
 */

import { sanitizeErrorMessage } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import {
    FAILURE_CLASS_METADATA,
    TelemetryFailureClass,
    TelemetryFailureClassification
} from './failureTypes.js';

interface ErrorPattern {
    readonly patterns: readonly (string | RegExp)[];
    readonly failureClass: TelemetryFailureClass;
}

/**
 * Known error patterns mapped to failure classes.
 * Order matters: first match wins.
 */
const ERROR_PATTERNS: readonly ErrorPattern[] = [
    // Record not visible (yet)
    {
        patterns: ['RESOURCE_DOES_NOT_EXIST', 'QUERY_NOT_FOUND', 'STATEMENT_NOT_FOUND'],
        failureClass: 'NOT_FOUND'
    },
    // Credential / permission problems
    {
        patterns: ['UNAUTHENTICATED', 'PERMISSION_DENIED', 'INVALID_TOKEN', 'UNAUTHORIZED', 'FORBIDDEN'],
        failureClass: 'FATAL'
    },
    // Malformed request or response
    {
        patterns: ['INVALID_PARAMETER_VALUE', 'MALFORMED_REQUEST', 'MALFORMED_RESPONSE', 'BAD_REQUEST', 'INVALID_STATE'],
        failureClass: 'FATAL'
    },
    // Read path lagging or throttled
    {
        patterns: ['TEMPORARILY_UNAVAILABLE', 'REQUEST_LIMIT_EXCEEDED', 'RESOURCE_EXHAUSTED', 'INTERNAL_ERROR', 'DEADLINE_EXCEEDED', 'TimeoutError', /timed?\s*out/i],
        failureClass: 'TRANSIENT'
    },
    // Transport errors
    {
        patterns: ['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'UND_ERR', /fetch failed/i, /socket hang up/i],
        failureClass: 'TRANSIENT'
    }
];

export interface TelemetryClassificationContext {
    /** API error_code or transport error code */
    readonly errorCode?: string;
    readonly errorMessage?: string;
    readonly httpStatus?: number;
    /** Identifier or endpoint the call was about, for the log line */
    readonly subject: string;
}

function matchPattern(value: string): TelemetryFailureClass | undefined {
    const matched = ERROR_PATTERNS.find(pattern =>
        pattern.patterns.some(p =>
            typeof p === 'string'
                ? value.toUpperCase().includes(p.toUpperCase())
                : p.test(value)
        )
    );
    return matched?.failureClass;
}

function classifyHttpStatus(httpStatus: number): TelemetryFailureClass {
    if (httpStatus === 404) return 'NOT_FOUND';
    if (httpStatus === 408 || httpStatus === 429) return 'TRANSIENT';
    if (httpStatus >= 500) return 'TRANSIENT';
    // 400, 401, 403, 409, 422 ...
    return 'FATAL';
}

/**
 * Classify a telemetry failure.
 *
 * 1. Explicit error codes
 * 2. HTTP status
 * 3. Error message patterns
 * 4. Default: TRANSIENT (an unrecognised failure is given the retry budget)
 */
export function classifyTelemetryFailure(context: TelemetryClassificationContext): TelemetryFailureClassification {
    const { errorCode, errorMessage, httpStatus, subject } = context;

    let failureClass: TelemetryFailureClass | undefined;

    if (errorCode) {
        failureClass = matchPattern(errorCode);
    }

    if (failureClass === undefined && httpStatus !== undefined) {
        failureClass = classifyHttpStatus(httpStatus);
    }

    if (failureClass === undefined && errorMessage) {
        failureClass = matchPattern(errorMessage);
    }

    const resolvedClass: TelemetryFailureClass = failureClass ?? 'TRANSIENT';
    const { retryAllowed } = FAILURE_CLASS_METADATA[resolvedClass];

    const classification: TelemetryFailureClassification = {
        failureClass: resolvedClass,
        retryAllowed,
        errorCode,
        errorMessage: sanitizeErrorMessage(errorMessage),
        httpStatus,
        classifiedAt: new Date().toISOString()
    };

    logger.debug({
        subject,
        failureClass: resolvedClass,
        retryAllowed,
        httpStatus,
        errorCode
    }, 'Telemetry failure classified');

    return classification;
}
