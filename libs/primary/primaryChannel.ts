/**
 * Primary channel boundary.
 *
 * The correlator consumes three things from the driver: submit a statement
 * and get a result handle, read rows from that handle, and a registration
 * point for the identifier-delivery callback. The wire protocol behind it is
 * the driver's concern.
 */

import type { IdentifierHook } from '../capture/identifierSlot.js';
import type { QueryRequest } from '../model/records.js';

export interface ResultHandle {
    /** Number of columns in the result schema, null when the driver has no schema */
    columnCount(): Promise<number | null>;
    hasMoreRows(): Promise<boolean>;
    /** Next batch of rows; may be empty while more rows are still pending */
    fetchBatch(maxRows: number): Promise<readonly unknown[]>;
    /** Releases the remote operation */
    close(): Promise<void>;
}

export interface SubmitOptions {
    /** Registered before submission; invoked at most once */
    readonly onIdentifier: IdentifierHook;
    readonly signal?: AbortSignal;
    /** Tag propagated to the driver session for tracing */
    readonly correlationTag?: string;
}

export interface PrimaryChannel {
    submit(request: QueryRequest, options: SubmitOptions): Promise<ResultHandle>;
}
