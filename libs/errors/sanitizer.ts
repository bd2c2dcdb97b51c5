import { logger } from '../logging/logger.js';
import crypto from 'crypto';
import type { ComparisonResult } from '../model/records.js';
import { CorrelatorErrorCode, isFatalCode } from './taxonomy.js';

/**
 * Typed correlator failure. Carries a unique incidentId so the caller-facing
 * message can stay short while the log line holds the details.
 */
export class CorrelatorError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly httpStatus?: number;
    public readonly apiErrorCode?: string;
    public override cause?: unknown;
    /** Best partial result assembled before the run was aborted */
    public partialResult?: ComparisonResult;

    constructor(
        public readonly code: CorrelatorErrorCode,
        message: string,
        options?: { cause?: unknown; httpStatus?: number; apiErrorCode?: string; internalDetails?: unknown }
    ) {
        super(sanitizeErrorMessage(message) ?? code);
        this.name = 'CorrelatorError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.httpStatus = options?.httpStatus;
        this.apiErrorCode = options?.apiErrorCode;
        this.cause = options?.cause;

        const entry = {
            incidentId: this.incidentId,
            code,
            httpStatus: this.httpStatus,
            apiErrorCode: this.apiErrorCode,
            internalDetails: options?.internalDetails
        };

        // Transient conditions are retried locally and only matter in aggregate
        if (isFatalCode(code)) {
            logger.error(entry, this.message);
        } else {
            logger.debug(entry, this.message);
        }
    }

    public withPartialResult(result: ComparisonResult): this {
        this.partialResult = result;
        return this;
    }
}

/**
 * Strip credentials from free-form error text and bound its length.
 */
export function sanitizeErrorMessage(message: string | undefined): string | undefined {
    if (!message) return undefined;

    return message
        .replace(/bearer\s+\S+/gi, 'Bearer [REDACTED]')
        .replace(/token[=:]\s*\S+/gi, 'token=[REDACTED]')
        .replace(/password[=:]\s*\S+/gi, 'password=[REDACTED]')
        .replace(/secret[=:]\s*\S+/gi, 'secret=[REDACTED]')
        .replace(/dapi[a-f0-9]{8,}/gi, '[REDACTED]')
        .substring(0, 500);
}

/**
 * Extract a message from an unknown throwable.
 */
export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === 'string') return err;
    if (err && typeof err === 'object' && 'message' in err) {
        const { message } = err;
        if (typeof message === 'string') return message;
    }
    return String(err);
}

export const ErrorSanitizer = {
    /**
     * Wraps any error into a CorrelatorError under the given code.
     */
    sanitize: (err: unknown, code: CorrelatorErrorCode, contextLabel: string): CorrelatorError => {
        if (err instanceof CorrelatorError) return err;

        let stack: string | undefined;
        let systemCode: string | undefined;

        if (err instanceof Error) {
            stack = err.stack;
            if ('code' in err && typeof err.code === 'string') {
                systemCode = err.code;
            }
        }

        return new CorrelatorError(
            code,
            `${contextLabel}: ${describeError(err)}`,
            {
                cause: err,
                internalDetails: { context: contextLabel, systemCode, stack }
            }
        );
    }
};
