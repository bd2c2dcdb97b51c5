import { z } from 'zod';

/**
 * Boundary schemas: caller requests and telemetry API responses.
 * Response schemas are permissive about extra fields; the API adds
 * fields over time and only the ones listed here are read.
 */

// --- Caller Schemas ---

// Server wait: '0s' (async) or 5s..50s
export const WaitTimeoutSchema = z.string().regex(/^\d+s$/).refine(value => {
    const seconds = Number.parseInt(value, 10);
    return seconds === 0 || (seconds >= 5 && seconds <= 50);
}, { message: 'wait timeout must be 0s or between 5s and 50s' });

export const ExecutionContextSchema = z.object({
    warehouseId: z.string().min(1).optional(),
    waitTimeout: WaitTimeoutSchema.optional(),
    disposition: z.enum(['INLINE', 'EXTERNAL_LINKS']).optional(),
    format: z.enum(['JSON_ARRAY', 'ARROW_STREAM', 'CSV']).optional(),
});

export const QueryRequestSchema = z.object({
    statement: z.string().trim().min(1),
    context: ExecutionContextSchema.optional(),
});

// --- Telemetry API Schemas ---

// Epoch values arrive as JSON numbers or, for int64 fields, as strings
const EpochLikeSchema = z.union([z.number(), z.string()]);

export const ApiErrorSchema = z.object({
    error_code: z.string().optional(),
    message: z.string().optional(),
}).passthrough();

export const QueryHistoryInfoSchema = z.object({
    query_id: z.string().min(1),
    status: z.string(),
    query_start_time_ms: EpochLikeSchema.optional(),
    query_end_time_ms: EpochLikeSchema.optional(),
    execution_end_time_ms: EpochLikeSchema.optional(),
    duration: EpochLikeSchema.optional(),
    rows_produced: z.number().int().nonnegative().optional(),
    error_message: z.string().optional(),
    warehouse_id: z.string().optional(),
    statement_type: z.string().optional(),
    client_application: z.string().optional(),
    metrics: z.object({
        total_time_ms: EpochLikeSchema.optional(),
        execution_time_ms: EpochLikeSchema.optional(),
        compilation_time_ms: EpochLikeSchema.optional(),
        result_fetch_time_ms: EpochLikeSchema.optional(),
        rows_produced_count: z.number().int().nonnegative().optional(),
    }).passthrough().optional(),
}).passthrough();

export const StatementResponseSchema = z.object({
    statement_id: z.string().min(1),
    status: z.object({
        state: z.string(),
        error: z.object({
            error_code: z.string().optional(),
            message: z.string().optional(),
        }).passthrough().optional(),
    }).passthrough(),
    manifest: z.object({
        format: z.string().optional(),
        schema: z.object({
            column_count: z.number().int().nonnegative().optional(),
        }).passthrough().optional(),
        total_chunk_count: z.number().int().nonnegative().optional(),
        total_row_count: z.number().int().nonnegative().optional(),
        truncated: z.boolean().optional(),
    }).passthrough().optional(),
}).passthrough();

export type QueryHistoryInfo = z.infer<typeof QueryHistoryInfoSchema>;
export type StatementResponse = z.infer<typeof StatementResponseSchema>;
