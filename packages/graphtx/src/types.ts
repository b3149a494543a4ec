/**
 * graphtx client types
 *
 * The seams between the client, its connections and its transactions.
 * Wire types live in `@graphtx/shared-types` and are re-exported here.
 *
 * @packageDocumentation
 */

import type {
  ApiResponse,
  LoginRequest,
  Operation,
  Payload,
  Request,
  TxnContext,
  Version,
} from '@graphtx/shared-types';
import type { TransportError } from './errors.js';

export type {
  StartTs,
  TxnContext,
  Mutation,
  Request,
  ResponseFormat,
  ApiResponse,
  Latency,
  Operation,
  DropOp,
  LoginRequest,
  Version,
  Payload,
  GraphApi,
  Result,
  Success,
  Failure,
  ResultError,
} from '@graphtx/shared-types';
export { TransactionState, ClientErrorCode } from '@graphtx/shared-types';

// =============================================================================
// Call Options
// =============================================================================

/**
 * Per-call options accepted by every remote operation.
 *
 * @public
 * @since 0.1.0
 */
export interface CallOptions {
  /**
   * Deadline for this call in milliseconds. Falls back to the client's
   * `defaultTimeoutMs`.
   */
  timeoutMs?: number;
  /** Cancels the call when aborted */
  signal?: AbortSignal;
}

/**
 * Options a connection receives for one call. The signal fires when the
 * deadline passes or the caller cancels.
 *
 * @public
 */
export interface ConnectionCallOptions {
  signal: AbortSignal;
  timeoutMs: number;
}

// =============================================================================
// Connection
// =============================================================================

/**
 * One backend endpoint.
 *
 * Implementations report every failure of the remote call by rejecting with a
 * {@link TransportError}. Any other rejection is treated as a bug and is not
 * converted into a failed Result.
 *
 * @public
 * @since 0.1.0
 */
export interface GraphConnection {
  /** Endpoint description for logs (must not contain secrets) */
  readonly endpoint: string;
  query(request: Request, options: ConnectionCallOptions): Promise<ApiResponse>;
  commitOrAbort(context: TxnContext, options: ConnectionCallOptions): Promise<TxnContext>;
  alter(operation: Operation, options: ConnectionCallOptions): Promise<Payload>;
  checkVersion(options: ConnectionCallOptions): Promise<Version>;
  login(request: LoginRequest, options: ConnectionCallOptions): Promise<Payload>;
  /** Releases the endpoint; called by the client when it owns the connection */
  close?(): void;
}

// =============================================================================
// Executor
// =============================================================================

/**
 * Remote operation run against one selected connection.
 * @public
 */
export type ConnectionOperation<T> = (
  connection: GraphConnection,
  options: ConnectionCallOptions
) => Promise<T>;

/**
 * The single seam through which transactions reach the server.
 *
 * `execute` picks a connection, runs `op` against it and hands any
 * {@link TransportError} to `onFailure`. It throws `ObjectDisposedError` once
 * its owner has been disposed.
 *
 * @public
 * @since 0.1.0
 */
export interface Executor {
  execute<T>(
    op: ConnectionOperation<T>,
    onFailure: (error: TransportError) => T,
    options?: CallOptions
  ): Promise<T>;
}
