/**
 * Transactions
 *
 * One data shape serves both kinds of transaction. {@link createReadOnlyTransaction}
 * hands out a {@link QueryTransaction}, which can only query and be released;
 * {@link createTransaction} hands out a {@link Transaction}, which can also
 * mutate, commit and discard. Both share the same query path and the same
 * context merge.
 *
 * Transactions are not safe for concurrent use: issue one call at a time.
 *
 * @packageDocumentation
 */

import {
  TransactionState,
  asFailure,
  failureFromError,
  failureWithData,
  ok,
  serializeStartTs,
  success,
  type Request,
  type Result,
  type StartTs,
  type TxnContext,
} from '@graphtx/shared-types';
import { MutationBuilder, RequestBuilder } from './builders.js';
import { createTxnContext, mergeContext, snapshotContext } from './context.js';
import { ObjectDisposedError, TransactionNotOKError, toFailure } from './errors.js';
import type { StructuredLogger } from './logging.js';
import { Response } from './response.js';
import type { CallOptions, Executor } from './types.js';

// =============================================================================
// Public Interfaces
// =============================================================================

/**
 * A transaction that can only read.
 *
 * Releasing it (`dispose`/`disposeAsync`) makes later queries throw
 * {@link ObjectDisposedError}.
 *
 * @public
 * @since 0.1.0
 */
export interface QueryTransaction {
  readonly state: TransactionState;
  readonly readOnly: boolean;
  readonly bestEffort: boolean;
  /** Start timestamp; `0n` until the first successful call */
  readonly startTs: StartTs;
  readonly isDisposed: boolean;

  /** Copy of the current transaction context */
  getContext(): TxnContext;

  query(query: string, vars?: Record<string, string>, options?: CallOptions): Promise<Result<Response>>;

  /** Release without waiting. A read-write transaction still in OK is discarded in the background. */
  dispose(): void;

  /** Release, waiting for the discard of a read-write transaction still in OK. */
  disposeAsync(): Promise<void>;
}

/**
 * Shorthand mutation: JSON set and/or delete payloads.
 * @public
 */
export interface JsonMutation {
  setJson?: string;
  deleteJson?: string;
  /** Commit in the same round trip */
  commitNow?: boolean;
}

/**
 * A read-write transaction.
 *
 * @example
 * ```typescript
 * const txn = client.newTransaction();
 * try {
 *   const res = await txn.mutate({ setJson: JSON.stringify({ name: 'Ada' }) });
 *   if (!res.success) return res;
 *   return await txn.commit();
 * } finally {
 *   await txn.disposeAsync();
 * }
 * ```
 *
 * @public
 * @since 0.1.0
 */
export interface Transaction extends QueryTransaction {
  /** Whether a non-empty mutation has been sent */
  readonly hasMutated: boolean;

  mutate(request: RequestBuilder | JsonMutation, options?: CallOptions): Promise<Result<Response>>;

  /** Commit. A transaction that never mutated commits without a remote call. */
  commit(options?: CallOptions): Promise<Result<void>>;

  /**
   * Roll back. Safe to call any number of times and in any state: once the
   * transaction has left OK this is a successful no-op.
   */
  discard(options?: CallOptions): Promise<Result<void>>;
}

/**
 * @public
 */
export interface TransactionOptions {
  logger: StructuredLogger;
}

/**
 * @public
 */
export interface ReadOnlyTransactionOptions extends TransactionOptions {
  /** Let the server answer without a consensus read */
  bestEffort?: boolean;
}

// =============================================================================
// Implementation
// =============================================================================

class TransactionHandle implements Transaction {
  readonly readOnly: boolean;
  readonly bestEffort: boolean;

  private readonly executor: Executor;
  private readonly logger: StructuredLogger;
  private readonly context: TxnContext = createTxnContext();
  private _state = TransactionState.OK;
  private _hasMutated = false;
  private disposed = false;

  constructor(executor: Executor, logger: StructuredLogger, readOnly: boolean, bestEffort: boolean) {
    this.executor = executor;
    this.logger = logger;
    this.readOnly = readOnly;
    this.bestEffort = bestEffort;
  }

  get state(): TransactionState {
    return this._state;
  }

  get startTs(): StartTs {
    return this.context.startTs;
  }

  get hasMutated(): boolean {
    return this._hasMutated;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  getContext(): TxnContext {
    return snapshotContext(this.context);
  }

  // ===========================================================================
  // Query
  // ===========================================================================

  async query(
    query: string,
    vars?: Record<string, string>,
    options?: CallOptions
  ): Promise<Result<Response>> {
    this.assertNotDisposed();

    if (this._state !== TransactionState.OK) {
      return toFailure(new TransactionNotOKError(this._state));
    }

    try {
      const request: Request = {
        query,
        vars: { ...vars },
        startTs: this.context.startTs,
        hash: this.context.hash,
        readOnly: this.readOnly,
        bestEffort: this.bestEffort,
        mutations: [],
        commitNow: false,
        respFormat: 'json',
      };

      const response = await this.executor.execute<Result<Response>>(
        async (connection, callOptions) => success(new Response(await connection.query(request, callOptions))),
        (error) => toFailure(error),
        options
      );

      if (!response.success) {
        return response;
      }

      const merged = this.merge(response.data);
      if (!merged.success) {
        return asFailure<Response>(merged);
      }
      return response;
    } catch (error) {
      if (error instanceof ObjectDisposedError) {
        throw error;
      }
      return failureFromError(error);
    }
  }

  // ===========================================================================
  // Mutate / Commit / Discard
  // ===========================================================================

  async mutate(request: RequestBuilder | JsonMutation, options?: CallOptions): Promise<Result<Response>> {
    this.assertNotDisposed();
    this.assertWritable('mutate');

    if (this._state !== TransactionState.OK) {
      return toFailure(new TransactionNotOKError(this._state));
    }

    const builder = request instanceof RequestBuilder ? request : toRequestBuilder(request);
    if (builder.mutationCount === 0) {
      return success(Response.empty());
    }

    this._hasMutated = true;
    const req = builder.build(this.context.startTs, this.context.hash);

    const response = await this.executor.execute<Result<Response>>(
      async (connection, callOptions) => success(new Response(await connection.query(req, callOptions))),
      (error) => toFailure(error),
      options
    );

    if (!response.success) {
      // The caller sees the mutation's failure, not the discard's.
      try {
        await this.discard();
      } catch (error) {
        this.logger.error(
          'Discard after failed mutation threw',
          error instanceof Error ? error : new Error(String(error))
        );
      }
      this.transition(TransactionState.Error);
      this.logger.warn('Mutation failed, transaction is now in Error: {reason}', {
        reason: response.error.message,
      });
      return response;
    }

    if (req.commitNow) {
      this.transition(TransactionState.Committed);
    }

    const merged = this.merge(response.data);
    if (!merged.success) {
      return failureWithData(response.data, merged.error);
    }
    return response;
  }

  async commit(options?: CallOptions): Promise<Result<void>> {
    this.assertNotDisposed();
    this.assertWritable('commit');

    if (this._state !== TransactionState.OK) {
      return toFailure(new TransactionNotOKError(this._state));
    }

    this.transition(TransactionState.Committed);

    if (!this._hasMutated) {
      return ok();
    }

    return this.sendCommitOrAbort(options);
  }

  async discard(options?: CallOptions): Promise<Result<void>> {
    if (this._state !== TransactionState.OK) {
      return ok();
    }

    this.transition(TransactionState.Aborted);

    if (!this._hasMutated) {
      return ok();
    }

    this.context.aborted = true;

    try {
      return await this.sendCommitOrAbort(options);
    } catch (error) {
      if (error instanceof ObjectDisposedError) {
        return toFailure(error);
      }
      throw error;
    }
  }

  private sendCommitOrAbort(options?: CallOptions): Promise<Result<void>> {
    const context = snapshotContext(this.context);
    return this.executor.execute<Result<void>>(
      async (connection, callOptions) => {
        await connection.commitOrAbort(context, callOptions);
        return ok();
      },
      (error) => toFailure(error),
      options
    );
  }

  // ===========================================================================
  // Release
  // ===========================================================================

  dispose(): void {
    if (!this.beginRelease()) {
      return;
    }

    void this.discard().then(
      (result) => {
        if (!result.success) {
          this.logger.warn('Background discard failed: {reason}', { reason: result.error.message });
        }
      },
      (error: unknown) => {
        this.logger.error(
          'Background discard threw',
          error instanceof Error ? error : new Error(String(error))
        );
      }
    );
  }

  async disposeAsync(): Promise<void> {
    if (!this.beginRelease()) {
      return;
    }

    const result = await this.discard();
    if (!result.success) {
      this.logger.warn('Discard on release failed: {reason}', { reason: result.error.message });
    }
  }

  /**
   * Flip the disposed flag. Returns true when a discard is due: first release
   * of a read-write transaction still in OK.
   */
  private beginRelease(): boolean {
    if (this.disposed) {
      return false;
    }
    this.disposed = true;
    return !this.readOnly && this._state === TransactionState.OK;
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private merge(response: Response): Result<void> {
    const merged = mergeContext(this.context, response.txn);
    if (!merged.success) {
      this.logger.warn('Transaction context rejected: {reason}', {
        reason: merged.error.message,
        startTs: serializeStartTs(this.context.startTs),
      });
    }
    return merged;
  }

  private transition(next: TransactionState): void {
    this.logger.debug('Transaction {from} -> {to}', { from: this._state, to: next });
    this._state = next;
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new ObjectDisposedError(this.readOnly ? 'ReadOnlyTransaction' : 'Transaction');
    }
  }

  private assertWritable(operation: string): void {
    if (this.readOnly) {
      throw new Error(`Cannot ${operation} in a read-only transaction`);
    }
  }
}

function toRequestBuilder(mutation: JsonMutation): RequestBuilder {
  return new RequestBuilder({ commitNow: mutation.commitNow }).withMutations(
    new MutationBuilder({ setJson: mutation.setJson, deleteJson: mutation.deleteJson })
  );
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Create a read-write transaction that runs its calls through `executor`.
 * @public
 */
export function createTransaction(executor: Executor, options: TransactionOptions): Transaction {
  return new TransactionHandle(executor, options.logger, false, false);
}

/**
 * Create a read-only transaction that runs its calls through `executor`.
 * @public
 */
export function createReadOnlyTransaction(
  executor: Executor,
  options: ReadOnlyTransactionOptions
): QueryTransaction {
  return new TransactionHandle(executor, options.logger, true, options.bestEffort ?? false);
}
