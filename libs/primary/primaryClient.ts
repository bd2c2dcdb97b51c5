/**
 * Primary Execution Client
 *
 * Submits a statement through the driver channel, times it and drains the
 * result set. Identifier capture and execution success are independent
 * outcomes: a failed execution still returns whatever identifier the driver
 * delivered before failing.
 */

import { createIdentifierSlot } from '../capture/identifierSlot.js';
import { CorrelatorError, describeError } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import type { PrimaryExecutionRecord, QueryRequest } from '../model/records.js';
import type { PrimaryChannel, ResultHandle } from './primaryChannel.js';

const DEFAULT_FETCH_BATCH_ROWS = 10_000;

export interface PrimaryExecution {
    /** '' when the driver never assigned one */
    readonly identifier: string;
    readonly record: PrimaryExecutionRecord;
    readonly error: CorrelatorError | null;
}

export interface PrimaryClientOptions {
    readonly fetchBatchRows?: number;
    readonly now?: () => number;
}

export interface ExecuteOptions {
    readonly signal?: AbortSignal;
    readonly correlationTag?: string;
}

/**
 * What the correlation engine needs from the primary side.
 */
export interface PrimaryExecutor {
    execute(request: QueryRequest, options?: ExecuteOptions): Promise<PrimaryExecution>;
}

type Phase = 'SUBMIT' | 'DRAIN';

export class PrimaryExecutionClient implements PrimaryExecutor {
    private readonly fetchBatchRows: number;
    private readonly now: () => number;

    constructor(
        private readonly channel: PrimaryChannel,
        options: PrimaryClientOptions = {}
    ) {
        this.fetchBatchRows = options.fetchBatchRows ?? DEFAULT_FETCH_BATCH_ROWS;
        this.now = options.now ?? Date.now;
    }

    public async execute(request: QueryRequest, options: ExecuteOptions = {}): Promise<PrimaryExecution> {
        const { signal, correlationTag } = options;
        const slot = createIdentifierSlot();

        let phase: Phase = 'SUBMIT';
        let handle: ResultHandle | null = null;
        let resultHandleAtMs: number | null = null;
        let rowCount = 0;
        let columnCount: number | null = null;

        const observedStartMs = this.now();

        try {
            handle = await this.channel.submit(request, {
                onIdentifier: slot.hook,
                signal,
                correlationTag
            });
            const handleAtMs = this.now();
            resultHandleAtMs = handleAtMs;

            phase = 'DRAIN';
            columnCount = await handle.columnCount();
            while (await handle.hasMoreRows()) {
                signal?.throwIfAborted();
                const batch = await handle.fetchBatch(this.fetchBatchRows);
                rowCount += batch.length;
            }
            const drainedAtMs = this.now();
            slot.seal();
            const identifier = slot.read();

            logger.info({
                identifier: identifier || undefined,
                rowCount,
                columnCount,
                durationMs: handleAtMs - observedStartMs,
                drainDurationMs: drainedAtMs - observedStartMs
            }, 'Primary execution completed');

            const record: PrimaryExecutionRecord = {
                origin: 'PRIMARY',
                identifier,
                status: 'SUCCEEDED',
                observedStartMs,
                observedEndMs: handleAtMs,
                durationMs: handleAtMs - observedStartMs,
                timingEndpoints: { start: 'CLIENT_SUBMIT', end: 'CLIENT_RESULT_HANDLE' },
                drainCompletedAtMs: drainedAtMs,
                drainDurationMs: drainedAtMs - observedStartMs,
                rowCount,
                columnCount
            };

            return { identifier, error: null, record: Object.freeze(record) };
        } catch (err) {
            slot.seal();
            const failedAtMs = this.now();
            const identifier = slot.read();
            const error = this.toExecutionError(err, phase, signal);

            logger.warn({
                identifier: identifier || undefined,
                phase,
                code: error.code,
                incidentId: error.incidentId
            }, 'Primary execution failed');

            const record: PrimaryExecutionRecord = {
                origin: 'PRIMARY',
                identifier,
                status: 'FAILED',
                observedStartMs,
                observedEndMs: resultHandleAtMs ?? failedAtMs,
                durationMs: (resultHandleAtMs ?? failedAtMs) - observedStartMs,
                timingEndpoints: {
                    start: 'CLIENT_SUBMIT',
                    end: resultHandleAtMs === null ? 'NONE' : 'CLIENT_RESULT_HANDLE'
                },
                drainCompletedAtMs: null,
                drainDurationMs: null,
                rowCount: phase === 'DRAIN' ? rowCount : null,
                columnCount,
                errorDetail: error.message
            };

            return { identifier, error, record: Object.freeze(record) };
        } finally {
            await this.release(handle);
        }
    }

    private toExecutionError(err: unknown, phase: Phase, signal: AbortSignal | undefined): CorrelatorError {
        if (signal?.aborted) {
            return new CorrelatorError('DEADLINE_EXCEEDED', `Primary execution aborted during ${phase.toLowerCase()}`, { cause: err });
        }
        return new CorrelatorError(
            'EXECUTION_FAILED',
            `Primary execution failed during ${phase.toLowerCase()}: ${describeError(err)}`,
            { cause: err }
        );
    }

    private async release(handle: ResultHandle | null): Promise<void> {
        if (!handle) return;
        try {
            await handle.close();
        } catch (err) {
            logger.warn({ error: describeError(err) }, 'Failed to close primary result handle');
        }
    }
}
