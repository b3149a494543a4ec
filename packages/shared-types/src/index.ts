/**
 * @graphtx/shared-types - Shared types for the graphtx client
 *
 * This package provides the canonical type definitions for:
 * - the wire protocol spoken with the graph database (requests, responses,
 *   transaction contexts, administrative operations)
 * - the client-side transaction state machine
 * - the Result pattern every fallible client operation returns
 *
 * ## Stability
 *
 * This package follows semantic versioning. Exports are marked with stability annotations:
 *
 * - **stable**: No breaking changes in minor versions. Safe for production use.
 * - **experimental**: May change in any version. Use with caution.
 *
 * @packageDocumentation
 */

// =============================================================================
// Runtime Configuration
// =============================================================================

/**
 * Runtime mode configuration.
 * @public
 * @stability stable
 */
export { setDevMode, isDevMode } from './config.js';

import { _isDevModeInternal } from './config.js';

// =============================================================================
// Branded Types
// =============================================================================

declare const StartTsBrand: unique symbol;

/**
 * Branded type for transaction start timestamps
 *
 * StartTs is a bigint branded type holding the logical timestamp the server
 * assigns to a transaction on its first successful call. `0n` means the
 * timestamp has not been assigned yet.
 * Use `createStartTs()` to create validated instances.
 *
 * @example
 * ```typescript
 * import { createStartTs, compareStartTs, serializeStartTs } from '@graphtx/shared-types';
 *
 * const ts = createStartTs(42n);
 * compareStartTs(ts, createStartTs(43n)); // -1
 * serializeStartTs(ts); // "42"
 * ```
 */
export type StartTs = bigint & { readonly [StartTsBrand]: never };

/**
 * Create a typed StartTs from a bigint.
 * @throws Error if the value is negative or not a bigint (in dev mode)
 * @public
 * @stability stable
 */
export function createStartTs(value: bigint): StartTs {
  if (_isDevModeInternal()) {
    if (typeof value !== 'bigint') {
      throw new Error('StartTs must be a bigint');
    }
    if (value < 0n) {
      throw new Error(`StartTs cannot be negative: ${value}`);
    }
  }
  return value as StartTs;
}

/**
 * The unassigned start timestamp.
 * @public
 * @stability stable
 */
export const ZERO_START_TS: StartTs = createStartTs(0n);

/**
 * Type guard for StartTs values.
 * @public
 * @stability stable
 */
export function isValidStartTs(value: unknown): value is StartTs {
  return typeof value === 'bigint' && value >= 0n;
}

/**
 * Whether the server has assigned this timestamp yet.
 * @public
 * @stability stable
 */
export function isStartTsAssigned(ts: StartTs): boolean {
  return ts !== ZERO_START_TS;
}

/**
 * Compare two start timestamps.
 * @returns negative if a < b, 0 if equal, positive if a > b
 * @public
 * @stability stable
 */
export function compareStartTs(a: StartTs, b: StartTs): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Serialize a StartTs to a string for JSON-safe output (logs, error details).
 * @public
 * @stability stable
 */
export function serializeStartTs(ts: StartTs): string {
  return String(ts);
}

/**
 * Deserialize a StartTs from its decimal string form.
 * @throws Error if the string is not an integer
 * @public
 * @stability stable
 */
export function deserializeStartTs(str: string): StartTs {
  return createStartTs(BigInt(str));
}

// =============================================================================
// Transaction State
// =============================================================================

/**
 * Client-side transaction state.
 *
 * `OK` is the only non-terminal state. `Committed` and `Aborted` are reached
 * deliberately through commit/discard; `Error` is entered only when the
 * remote call of a mutation fails.
 *
 * @public
 * @stability stable
 */
export enum TransactionState {
  OK = 'OK',
  Committed = 'Committed',
  Aborted = 'Aborted',
  Error = 'Error',
}

/**
 * @public
 * @stability stable
 */
export function isTerminalState(state: TransactionState): boolean {
  return state !== TransactionState.OK;
}

// =============================================================================
// Wire Protocol Types
// =============================================================================

/**
 * Transaction context exchanged with the server.
 *
 * The client holds one per transaction and merges every context the server
 * returns into it. The hash is replaced on each merge; keys and preds grow.
 *
 * @public
 * @stability stable
 */
export interface TxnContext {
  /** Logical start timestamp; 0 until the server assigns one */
  startTs: StartTs;
  /** Commit timestamp, filled in by the server on commit */
  commitTs?: bigint;
  /** Set immediately before the context is sent to abort the transaction */
  aborted: boolean;
  /** Conflict keys touched by the transaction */
  keys: string[];
  /** Predicates touched by the transaction */
  preds: string[];
  /** Consistency token echoed back on every call */
  hash: string;
}

/**
 * A single mutation. Payloads are opaque to the client.
 * @public
 * @stability stable
 */
export interface Mutation {
  setJson?: string;
  deleteJson?: string;
  setNquads?: string;
  delNquads?: string;
  /** Conditional upsert guard, e.g. `@if(eq(len(u), 1))` */
  cond?: string;
}

/**
 * Response encoding requested from the server.
 * @public
 * @stability stable
 */
export type ResponseFormat = 'json' | 'rdf';

/**
 * Query request. Mutations travel in the same request shape; the server
 * tells them apart by the presence of `mutations`.
 *
 * @public
 * @stability stable
 */
export interface Request {
  query: string;
  vars: Record<string, string>;
  startTs: StartTs;
  hash: string;
  readOnly: boolean;
  bestEffort: boolean;
  mutations: Mutation[];
  commitNow: boolean;
  respFormat: ResponseFormat;
}

/**
 * Server-side timing breakdown in nanoseconds.
 * @public
 * @stability stable
 */
export interface Latency {
  parsingNs: bigint;
  processingNs: bigint;
  encodingNs: bigint;
  assignTimestampNs: bigint;
  totalNs: bigint;
}

/**
 * Raw query/mutation response.
 * @public
 * @stability stable
 */
export interface ApiResponse {
  /** Encoded result payload */
  json: string;
  /** Updated transaction context; absent for some calls */
  txn?: TxnContext | null;
  latency?: Latency;
  /** Blank node name to assigned uid */
  uids: Record<string, string>;
}

/**
 * @public
 * @stability stable
 */
export type DropOp = 'NONE' | 'ALL' | 'DATA' | 'ATTR' | 'TYPE';

/**
 * Schema alteration. Passed through to the server untouched.
 * @public
 * @stability stable
 */
export interface Operation {
  schema?: string;
  dropAttr?: string;
  dropAll?: boolean;
  dropOp?: DropOp;
  dropValue?: string;
  runInBackground?: boolean;
}

/**
 * Credentials for `login`. Passed through to the server untouched.
 * @public
 * @stability stable
 */
export interface LoginRequest {
  userid?: string;
  password?: string;
  refreshToken?: string;
  namespace?: number;
}

/**
 * @public
 * @stability stable
 */
export interface Version {
  tag: string;
}

/**
 * Generic acknowledgement payload.
 * @public
 * @stability stable
 */
export interface Payload {
  data?: Uint8Array;
}

/**
 * Remote surface of a graph database endpoint.
 *
 * @public
 * @stability stable
 */
export interface GraphApi {
  query(request: Request): Promise<ApiResponse>;
  commitOrAbort(context: TxnContext): Promise<TxnContext>;
  alter(operation: Operation): Promise<Payload>;
  checkVersion(): Promise<Version>;
  login(request: LoginRequest): Promise<Payload>;
}

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Machine-readable codes carried by client failures.
 * @public
 * @stability stable
 */
export enum ClientErrorCode {
  /** The remote call itself failed (network, protocol, deadline) */
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  /** Operation attempted on a transaction that is no longer OK */
  TRANSACTION_NOT_OK = 'TRANSACTION_NOT_OK',
  /** Server returned a context from a different transaction */
  START_TS_MISMATCH = 'START_TS_MISMATCH',
  /** Operation attempted after the owner was released */
  OBJECT_DISPOSED = 'OBJECT_DISPOSED',
  /** Anything else */
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

// =============================================================================
// Standardized Result Pattern
// =============================================================================

/**
 * Standard error information for Result pattern.
 *
 * Use this for expected failures (transport errors, state violations)
 * NOT for programmer errors (those should throw).
 *
 * @public
 * @stability stable
 */
export interface ResultError {
  /** Error code for programmatic handling */
  code: string;
  /** Human-readable error message */
  message: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** Underlying error instance, when there is one */
  cause?: unknown;
}

/**
 * Successful result with data.
 * @public
 * @stability stable
 */
export interface Success<T> {
  success: true;
  data: T;
  error?: never;
}

/**
 * Failed result with error.
 *
 * A failure normally carries no data. It may carry one when the remote work
 * succeeded but the client's own bookkeeping did not, so the caller can still
 * inspect what the server sent.
 *
 * @public
 * @stability stable
 */
export interface Failure<T = never> {
  success: false;
  data?: T;
  error: ResultError;
}

/**
 * Standard Result type for operations that can fail.
 *
 * @public
 * @stability stable
 *
 * @example
 * ```typescript
 * const result = await txn.query('{ q(func: uid(0x1)) { name } }');
 * if (isSuccess(result)) {
 *   console.log(result.data.parse());
 * } else {
 *   console.error(result.error.code, result.error.message);
 * }
 * ```
 */
export type Result<T> = Success<T> | Failure<T>;

/**
 * Type guard to check if a Result is successful.
 * @public
 * @stability stable
 */
export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success === true;
}

/**
 * Type guard to check if a Result is a failure.
 * @public
 * @stability stable
 */
export function isFailure<T>(result: Result<T>): result is Failure<T> {
  return result.success === false;
}

/**
 * Create a successful Result.
 * @public
 * @stability stable
 */
export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

/**
 * Create a successful Result with no value.
 * @public
 * @stability stable
 */
export function ok(): Success<void> {
  return { success: true, data: undefined };
}

/**
 * Create a failed Result.
 *
 * @param code - Error code for programmatic handling
 * @param message - Human-readable error message
 * @param details - Optional additional error details
 *
 * @public
 * @stability stable
 *
 * @example
 * ```typescript
 * return failure('TRANSACTION_NOT_OK', 'Transaction is Committed', { state: 'Committed' });
 * ```
 */
export function failure(
  code: string,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: ResultError = { code, message };
  if (details !== undefined) error.details = details;
  return { success: false, error };
}

/**
 * Create a Failure from an Error object.
 *
 * Uses the error's own `code` when it has a string one, else the given code.
 *
 * @public
 * @stability stable
 */
export function failureFromError(
  error: unknown,
  code: string = ClientErrorCode.UNKNOWN_ERROR
): Failure {
  const message = error instanceof Error ? error.message : String(error);
  const ownCode =
    error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code
      : undefined;
  return { success: false, error: { code: ownCode ?? code, message, cause: error } };
}

/**
 * Turn a successful value into a failure that keeps the value.
 * @public
 * @stability stable
 */
export function failureWithData<T>(data: T, error: ResultError): Failure<T> {
  return { success: false, data, error };
}

/**
 * Re-type a failure so it can be returned where another Result is expected.
 * Any carried data is dropped.
 * @public
 * @stability stable
 */
export function asFailure<U>(result: Failure<unknown>): Failure<U> {
  return { success: false, error: result.error };
}

// =============================================================================
// Result Utilities
// =============================================================================

/**
 * Unwrap a Result, throwing if it's a failure.
 * @throws Error if the Result is a failure
 * @public
 * @stability stable
 */
export function unwrap<T>(result: Result<T>): T {
  if (isSuccess(result)) {
    return result.data;
  }
  throw new Error(`${result.error.code}: ${result.error.message}`);
}

/**
 * Unwrap a Result with a default value for failures.
 * @public
 * @stability stable
 */
export function unwrapOr<T>(result: Result<T>, defaultValue: T): T {
  return isSuccess(result) ? result.data : defaultValue;
}

/**
 * Map the success value of a Result.
 * @public
 * @stability stable
 */
export function mapResult<T, U>(
  result: Result<T>,
  fn: (data: T) => U
): Result<U> {
  if (isSuccess(result)) {
    return success(fn(result.data));
  }
  return asFailure<U>(result);
}

/**
 * Flat-map the success value of a Result.
 * @public
 * @stability stable
 */
export function flatMapResult<T, U>(
  result: Result<T>,
  fn: (data: T) => Result<U>
): Result<U> {
  if (isSuccess(result)) {
    return fn(result.data);
  }
  return asFailure<U>(result);
}

/**
 * Combine multiple Results into a single Result.
 *
 * If all Results are successful, returns a Success with an array of data.
 * If any Result fails, returns the first Failure.
 *
 * @public
 * @stability stable
 */
export function combineResults<T>(results: Result<T>[]): Result<T[]> {
  const data: T[] = [];
  for (const result of results) {
    if (isFailure(result)) {
      return asFailure<T[]>(result);
    }
    data.push(result.data);
  }
  return success(data);
}
