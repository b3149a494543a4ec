/**
 * graphtx - Client SDK for distributed graph databases
 *
 * Optimistic transactions over CapnWeb RPC, with round-robin connection use,
 * per-call deadlines and Result-based error handling.
 *
 * ## Stability
 *
 * Exports are marked with stability annotations:
 *
 * - **stable**: No breaking changes in minor versions.
 * - **experimental**: May change in any version.
 *
 * @example
 * ```typescript
 * import { createClient } from 'graphtx';
 *
 * const client = createClient({ endpoints: ['https://alpha.example.com/rpc'] });
 *
 * const people = await client.withReadOnlyTransaction((txn) =>
 *   txn.query('query people($name: string) { people(func: eq(name, $name)) { uid name } }', {
 *     $name: 'Ada',
 *   })
 * );
 * if (people.success) {
 *   console.log(people.data.parse());
 * }
 *
 * client.dispose();
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Stable Client Exports
// =============================================================================

/**
 * @public
 * @stability stable
 */
export { GraphClient, createClient } from './client.js';

/**
 * @public
 * @stability stable
 */
export type { ClientConfig, EndpointConfig, EndpointTransport } from './config.js';
export { DEFAULT_CLIENT_CONFIG } from './config.js';

/**
 * @public
 * @stability stable
 */
export { createTransaction, createReadOnlyTransaction } from './transaction.js';
export type {
  Transaction,
  QueryTransaction,
  JsonMutation,
  TransactionOptions,
  ReadOnlyTransactionOptions,
} from './transaction.js';

/**
 * @public
 * @stability stable
 */
export { MutationBuilder, RequestBuilder } from './builders.js';
export type { MutationFields, RequestBuilderOptions } from './builders.js';
export { Response } from './response.js';

// =============================================================================
// Stable Type Exports
// =============================================================================

/**
 * Wire types and seams.
 * @public
 * @stability stable
 */
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
  CallOptions,
  ConnectionCallOptions,
  ConnectionOperation,
  GraphConnection,
  Executor,
} from './types.js';
export { TransactionState, ClientErrorCode } from './types.js';

// =============================================================================
// Errors
// =============================================================================

/**
 * @public
 * @stability stable
 */
export {
  TransportError,
  TransactionNotOKError,
  StartTsMismatchError,
  ObjectDisposedError,
  toFailure,
} from './errors.js';
export type { TransportErrorCode, ClientError } from './errors.js';

// =============================================================================
// Transport
// =============================================================================

/**
 * @public
 * @stability experimental
 * @since 0.1.0
 */
export { createHttpConnection, createWebSocketConnection } from './rpc-transport.js';
export type { HttpConnectionOptions, WebSocketConnectionOptions } from './rpc-transport.js';

/**
 * @public
 * @stability experimental
 */
export { ConnectionPool } from './executor.js';
export type { PoolStats } from './executor.js';

// =============================================================================
// Logging
// =============================================================================

/**
 * @public
 * @stability experimental
 */
export {
  createLogger,
  getLogLevelFromEnv,
  ConsoleSink,
  JsonSink,
  NoOpSink,
  MultiSink,
  LogLevel,
} from './logging.js';
export type { StructuredLogger, LogSink, LogEntry, LoggerConfig } from './logging.js';
