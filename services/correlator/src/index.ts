import { z } from 'zod';
import { bootstrap } from '../../../libs/bootstrap/startup.js';
import { summarize, summarizeReport } from '../../../libs/compare/reporter.js';
import { CorrelationEngine } from '../../../libs/correlation/engine.js';
import { CorrelatorError, ErrorSanitizer } from '../../../libs/errors/sanitizer.js';
import { logger } from '../../../libs/logging/logger.js';
import { DatabricksChannel } from '../../../libs/primary/databricksChannel.js';
import { PrimaryExecutionClient } from '../../../libs/primary/primaryClient.js';
import { TelemetryClient } from '../../../libs/telemetry/telemetryClient.js';
import { validate } from '../../../libs/validation/zod-middleware.js';

const RunOptionsSchema = z.object({
    QUERY_TEXT: z.string().trim().min(1).default('SELECT 1'),
    COMPARISON_MODE: z.enum(['LOOKUP', 'SIDE_BY_SIDE']).default('LOOKUP'),
    DURATION_BASIS: z.enum(['RESULT_HANDLE', 'FULL_DRAIN']).default('RESULT_HANDLE'),
});

async function main() {
    const config = bootstrap('correlator');
    const run = validate(RunOptionsSchema, process.env, 'Correlator:RunOptions');

    const channel = new DatabricksChannel({ host: config.host, path: config.httpPath, token: config.token });
    const telemetry = new TelemetryClient({
        host: config.host,
        token: config.token,
        warehouseId: config.warehouseId,
        callTimeoutMs: config.callTimeoutMs,
        lookupSource: config.lookupSource,
        waitTimeout: config.waitTimeout
    });
    const engine = new CorrelationEngine(
        { primary: new PrimaryExecutionClient(channel), telemetry },
        { retryPolicy: config.retryPolicy, deadlineMs: config.deadlineMs }
    );

    const request = { statement: run.QUERY_TEXT, context: { warehouseId: config.warehouseId } };
    const options = { durationBasis: run.DURATION_BASIS };

    try {
        if (run.COMPARISON_MODE === 'SIDE_BY_SIDE') {
            const report = await engine.compareSideBySide(request, options);
            logger.info(summarizeReport(report), 'Comparison report');
        } else {
            const result = await engine.correlate(request, options);
            logger.info(summarize(result), 'Comparison report');
        }
    } catch (err) {
        const error = ErrorSanitizer.sanitize(err, 'TELEMETRY_FATAL', 'Correlator:run');
        if (error.partialResult) {
            logger.warn(summarize(error.partialResult), 'Partial comparison before abort');
        }
        throw error;
    } finally {
        await channel.close();
    }
}

main().catch(err => {
    const incidentId = err instanceof CorrelatorError ? err.incidentId : undefined;
    logger.fatal({ err, incidentId }, 'Correlator run failed');
    process.exit(1);
});
