import { CorrelatorConfig, loadCorrelatorConfig } from '../config/correlatorConfig.js';
import { describeError } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import { ValidationViolationError } from '../validation/zod-middleware.js';

/**
 * Fail-closed startup. Any configuration violation is logged together with
 * every issue found, then the process exits before a connection is opened.
 */
export function bootstrap(serviceName: string, env: NodeJS.ProcessEnv = process.env): CorrelatorConfig {
    logger.info({ serviceName }, 'Bootstrapping service');

    let config: CorrelatorConfig;
    try {
        config = loadCorrelatorConfig(env);
    } catch (err) {
        logger.fatal({
            serviceName,
            errors: err instanceof ValidationViolationError ? err.issues : [describeError(err)],
            remediation: 'Check environment variables. No defaults allowed for warehouse credentials.'
        }, 'Configuration Guard Violation');
        return process.exit(1);
    }

    logger.info({
        serviceName,
        host: config.host,
        warehouseId: config.warehouseId,
        lookupSource: config.lookupSource,
        deadlineMs: config.deadlineMs,
        maxAttempts: config.retryPolicy.maxAttempts
    }, 'Startup checks passed');

    return config;
}
