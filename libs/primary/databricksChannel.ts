/**
 * Primary channel over the Databricks SQL driver.
 *
 * The operation id assigned by the driver is delivered to the identifier hook
 * as soon as the statement is accepted, before the operation finishes and
 * before any rows are read.
 */

import { DBSQLClient } from '@databricks/sql';
import { logger } from '../logging/logger.js';
import type { QueryRequest } from '../model/records.js';
import type { PrimaryChannel, ResultHandle, SubmitOptions } from './primaryChannel.js';

/**
 * The slice of the driver the channel uses. `DBSQLClient` satisfies it;
 * tests supply an in-process stand-in.
 */
export interface WarehouseOperation {
    readonly id: string;
    finished(): Promise<void>;
    cancel(): Promise<unknown>;
    close(): Promise<unknown>;
    getSchema(): Promise<{ readonly columns: readonly unknown[] } | null>;
    hasMoreRows(): Promise<boolean>;
    fetchChunk(options: { maxRows: number }): Promise<readonly unknown[]>;
}

export interface WarehouseSession {
    executeStatement(statement: string, options: { runAsync: boolean }): Promise<WarehouseOperation>;
    close(): Promise<unknown>;
}

export interface WarehouseClient {
    connect(options: { host: string; path: string; token: string }): Promise<unknown>;
    openSession(): Promise<WarehouseSession>;
    close(): Promise<unknown>;
}

export interface DatabricksChannelDeps {
    readonly createClient?: () => WarehouseClient;
}

// Driver placeholder when the server returned no operation handle
const NIL_OPERATION_ID = '00000000-0000-0000-0000-000000000000';

export interface DatabricksChannelConfig {
    /** Workspace hostname, no scheme */
    readonly host: string;
    /** HTTP path of the SQL warehouse, e.g. /sql/1.0/warehouses/<id> */
    readonly path: string;
    readonly token: string;
}

export class DatabricksChannel implements PrimaryChannel {
    private client: WarehouseClient | null = null;
    private readonly createClient: () => WarehouseClient;

    constructor(private readonly config: DatabricksChannelConfig, deps: DatabricksChannelDeps = {}) {
        this.createClient = deps.createClient ?? (() => new DBSQLClient());
    }

    public async submit(request: QueryRequest, options: SubmitOptions): Promise<ResultHandle> {
        const client = await this.connect();
        const session = await client.openSession();
        const log = logger.child({ component: 'DatabricksChannel', correlationTag: options.correlationTag });

        const { signal } = options;
        let operation: WarehouseOperation | null = null;
        const cancel = () => {
            if (operation) {
                void operation.cancel().catch((err: unknown) => log.warn({ err }, 'Operation cancel failed'));
            }
        };

        try {
            signal?.throwIfAborted();
            signal?.addEventListener('abort', cancel, { once: true });

            operation = await session.executeStatement(request.statement, { runAsync: true });

            if (operation.id && operation.id !== NIL_OPERATION_ID) {
                options.onIdentifier(operation.id);
            }
            log.debug({ operationId: operation.id }, 'Statement accepted by warehouse');

            // Aborted while the statement was being accepted: the listener had nothing to cancel yet
            if (signal?.aborted) {
                await operation.cancel().catch((err: unknown) => log.warn({ err }, 'Operation cancel failed'));
                signal.throwIfAborted();
            }

            await operation.finished();

            const accepted = operation;
            return new DatabricksResultHandle(session, accepted, () => options.signal?.removeEventListener('abort', cancel));
        } catch (err) {
            options.signal?.removeEventListener('abort', cancel);
            if (operation) {
                await operation.close().catch((closeErr: unknown) => log.warn({ err: closeErr }, 'Operation close failed'));
            }
            await session.close();
            throw err;
        }
    }

    public async close(): Promise<void> {
        if (this.client) {
            await this.client.close();
            this.client = null;
        }
    }

    private async connect(): Promise<WarehouseClient> {
        if (this.client) return this.client;

        const client = this.createClient();
        await client.connect({
            host: this.config.host,
            path: this.config.path,
            token: this.config.token
        });
        this.client = client;
        logger.info({ host: this.config.host, path: this.config.path }, 'Connected to SQL warehouse');
        return client;
    }
}

class DatabricksResultHandle implements ResultHandle {
    constructor(
        private readonly session: WarehouseSession,
        private readonly operation: WarehouseOperation,
        private readonly detach: () => void
    ) { }

    public async columnCount(): Promise<number | null> {
        const schema = await this.operation.getSchema();
        return schema ? schema.columns.length : null;
    }

    public hasMoreRows(): Promise<boolean> {
        return this.operation.hasMoreRows();
    }

    public fetchBatch(maxRows: number): Promise<readonly unknown[]> {
        return this.operation.fetchChunk({ maxRows });
    }

    public async close(): Promise<void> {
        this.detach();
        try {
            await this.operation.close();
        } finally {
            await this.session.close();
        }
    }
}
