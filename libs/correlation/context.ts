import { AsyncLocalStorage } from 'node:async_hooks';
import type { Logger } from 'pino';
import { getRunLogger } from '../logging/logger.js';
import type { ComparisonMode } from '../model/records.js';

/**
 * Correlation run scope.
 * AsyncLocalStorage-backed so concurrent runs never see each other's ids.
 *
 * Only the engine entry points call run(); everything below them calls get().
 */
export interface CorrelationRunContext {
    readonly runId: string;
    readonly mode: ComparisonMode;
    readonly warehouseId?: string;
    readonly startedAtMs: number;
    readonly logger: Logger;
}

const storage = new AsyncLocalStorage<CorrelationRunContext>();

export class CorrelationContext {
    public static run<T>(
        context: Omit<CorrelationRunContext, 'logger'>,
        fn: () => Promise<T>
    ): Promise<T> {
        const scoped: CorrelationRunContext = Object.freeze({
            ...context,
            logger: getRunLogger(context)
        });
        return storage.run(scoped, fn);
    }

    /**
     * FAIL-CLOSED: throws if called outside run() scope.
     */
    public static get(): CorrelationRunContext {
        const ctx = storage.getStore();
        if (!ctx) {
            throw new Error('MISSING_CORRELATION_CONTEXT: No correlation run scope established');
        }
        return ctx;
    }
}
