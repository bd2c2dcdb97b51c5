import { z } from 'zod';
import { assertValidPolicy, parseDelaySchedule, RetryPolicy } from '../correlation/retrySchedule.js';
import { WaitTimeoutSchema } from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';

/**
 * Correlator configuration, read from the environment.
 * Credentials and targets have no defaults; tuning values do.
 * Every violation is raised before anything connects.
 */

const PositiveIntFromEnv = (fallback: number) =>
    z.string().trim().regex(/^\d+$/).default(String(fallback)).transform(Number).pipe(z.number().int().positive());

const EnvSchema = z.object({
    WAREHOUSE_HOST: z.string().trim().min(1),
    WAREHOUSE_TOKEN: z.string().trim().min(1),
    WAREHOUSE_ID: z.string().trim().min(1),
    WAREHOUSE_HTTP_PATH: z.string().trim().startsWith('/').optional(),
    TELEMETRY_CALL_TIMEOUT_MS: PositiveIntFromEnv(10_000),
    CORRELATION_DEADLINE_MS: PositiveIntFromEnv(60_000),
    CORRELATION_MAX_ATTEMPTS: PositiveIntFromEnv(3),
    CORRELATION_DELAYS_MS: z.string().default('0,2000,5000'),
    TELEMETRY_LOOKUP_SOURCE: z.enum(['QUERY_HISTORY', 'STATEMENT']).default('QUERY_HISTORY'),
    STATEMENT_WAIT_TIMEOUT: WaitTimeoutSchema.default('30s'),
    NODE_ENV: z.string().optional(),
}).refine(
    env => !(env.NODE_ENV === 'production' && /(^|\/\/)(localhost|127\.0\.0\.1)([:/]|$)/i.test(env.WAREHOUSE_HOST)),
    { message: 'Production cannot target a localhost warehouse', path: ['WAREHOUSE_HOST'] }
);

export interface CorrelatorConfig {
    readonly host: string;
    readonly token: string;
    readonly warehouseId: string;
    readonly httpPath: string;
    readonly callTimeoutMs: number;
    readonly deadlineMs: number;
    readonly retryPolicy: RetryPolicy;
    readonly lookupSource: 'QUERY_HISTORY' | 'STATEMENT';
    readonly waitTimeout: string;
}

export function loadCorrelatorConfig(env: NodeJS.ProcessEnv = process.env): CorrelatorConfig {
    const parsed = validate(EnvSchema, env, 'CorrelatorConfig');

    const retryPolicy: RetryPolicy = {
        maxAttempts: parsed.CORRELATION_MAX_ATTEMPTS,
        delaysMs: parseDelaySchedule(parsed.CORRELATION_DELAYS_MS)
    };
    assertValidPolicy(retryPolicy);

    if (parsed.TELEMETRY_CALL_TIMEOUT_MS >= parsed.CORRELATION_DEADLINE_MS) {
        throw new Error('INVALID_CONFIG: TELEMETRY_CALL_TIMEOUT_MS must be shorter than CORRELATION_DEADLINE_MS');
    }

    return Object.freeze({
        host: parsed.WAREHOUSE_HOST.replace(/^https?:\/\//i, '').replace(/\/+$/, ''),
        token: parsed.WAREHOUSE_TOKEN,
        warehouseId: parsed.WAREHOUSE_ID,
        httpPath: parsed.WAREHOUSE_HTTP_PATH ?? `/sql/1.0/warehouses/${parsed.WAREHOUSE_ID}`,
        callTimeoutMs: parsed.TELEMETRY_CALL_TIMEOUT_MS,
        deadlineMs: parsed.CORRELATION_DEADLINE_MS,
        retryPolicy: Object.freeze(retryPolicy),
        lookupSource: parsed.TELEMETRY_LOOKUP_SOURCE,
        waitTimeout: parsed.STATEMENT_WAIT_TIMEOUT
    });
}
