/**
 * graphtx - Graph Database Client
 *
 * Entry point for applications: owns the connection pool and hands out
 * transactions that run through it.
 *
 * @packageDocumentation
 */

import { ok, success, type LoginRequest, type Operation, type Result } from '@graphtx/shared-types';
import { resolveClientConfig, type ClientConfig, type EndpointConfig } from './config.js';
import { toFailure, type TransportError } from './errors.js';
import { ConnectionPool, type PoolStats } from './executor.js';
import type { StructuredLogger } from './logging.js';
import { createHttpConnection, createWebSocketConnection } from './rpc-transport.js';
import {
  createReadOnlyTransaction,
  createTransaction,
  type QueryTransaction,
  type Transaction,
} from './transaction.js';
import type { CallOptions, ConnectionOperation, Executor, GraphConnection } from './types.js';

function connect(endpoint: EndpointConfig): GraphConnection {
  return endpoint.transport === 'ws'
    ? createWebSocketConnection({ url: endpoint.url })
    : createHttpConnection({ url: endpoint.url });
}

/**
 * Client for a graph database cluster.
 *
 * Connections are fixed for the life of the client and used round-robin by
 * every transaction it creates. The client is safe to share; the
 * transactions it hands out are not.
 *
 * @example
 * ```typescript
 * const client = createClient({ endpoints: ['https://alpha.example.com/rpc'] });
 *
 * const result = await client.withTransaction(async (txn) => {
 *   const res = await txn.mutate({ setJson: JSON.stringify({ name: 'Ada' }) });
 *   if (!res.success) return res;
 *   return txn.commit();
 * });
 *
 * client.dispose();
 * ```
 *
 * @public
 * @since 0.1.0
 */
export class GraphClient implements Executor {
  private readonly pool: ConnectionPool;
  private readonly logger: StructuredLogger;
  private readonly disposeConnections: boolean;
  private txnSeq = 0;

  constructor(config: ClientConfig) {
    const resolved = resolveClientConfig(config);
    const connections =
      resolved.source.kind === 'connections'
        ? resolved.source.connections
        : resolved.source.endpoints.map(connect);

    this.logger = resolved.logger.child({ component: 'client' });
    this.disposeConnections = resolved.disposeConnections;
    this.pool = new ConnectionPool({
      connections,
      defaultTimeoutMs: resolved.defaultTimeoutMs,
      logger: resolved.logger.child({ component: 'pool' }),
      ownerName: 'GraphClient',
    });

    this.logger.info('Client created with {count} connection(s)', { count: connections.length });
  }

  get connectionCount(): number {
    return this.pool.size;
  }

  get isDisposed(): boolean {
    return this.pool.isDisposed;
  }

  // ===========================================================================
  // Transactions
  // ===========================================================================

  /**
   * Start a read-write transaction.
   *
   * @throws ObjectDisposedError if the client has been disposed
   */
  newTransaction(): Transaction {
    this.pool.assertNotDisposed();
    return createTransaction(this, { logger: this.transactionLogger() });
  }

  /**
   * Start a read-only transaction.
   *
   * @throws ObjectDisposedError if the client has been disposed
   */
  newReadOnlyTransaction(options: { bestEffort?: boolean } = {}): QueryTransaction {
    this.pool.assertNotDisposed();
    return createReadOnlyTransaction(this, {
      logger: this.transactionLogger(),
      bestEffort: options.bestEffort,
    });
  }

  /**
   * Run `fn` in a read-write transaction that is released on every exit path.
   * A transaction `fn` did not commit is discarded before this resolves.
   */
  async withTransaction<T>(fn: (txn: Transaction) => Promise<T>): Promise<T> {
    const txn = this.newTransaction();
    try {
      return await fn(txn);
    } finally {
      await txn.disposeAsync();
    }
  }

  /**
   * Run `fn` in a read-only transaction that is released on every exit path.
   */
  async withReadOnlyTransaction<T>(
    fn: (txn: QueryTransaction) => Promise<T>,
    options: { bestEffort?: boolean } = {}
  ): Promise<T> {
    const txn = this.newReadOnlyTransaction(options);
    try {
      return await fn(txn);
    } finally {
      await txn.disposeAsync();
    }
  }

  // ===========================================================================
  // Admin Operations
  // ===========================================================================

  /** Apply a schema change or drop. */
  alter(operation: Operation, options?: CallOptions): Promise<Result<void>> {
    return this.pool.execute<Result<void>>(
      async (connection, callOptions) => {
        await connection.alter(operation, callOptions);
        return ok();
      },
      (error) => toFailure(error),
      options
    );
  }

  /** Server version tag. */
  checkVersion(options?: CallOptions): Promise<Result<string>> {
    return this.pool.execute<Result<string>>(
      async (connection, callOptions) => success((await connection.checkVersion(callOptions)).tag),
      (error) => toFailure(error),
      options
    );
  }

  login(request: LoginRequest, options?: CallOptions): Promise<Result<void>> {
    return this.pool.execute<Result<void>>(
      async (connection, callOptions) => {
        await connection.login(request, callOptions);
        return ok();
      },
      (error) => toFailure(error),
      options
    );
  }

  // ===========================================================================
  // Executor
  // ===========================================================================

  execute<T>(
    op: ConnectionOperation<T>,
    onFailure: (error: TransportError) => T,
    options?: CallOptions
  ): Promise<T> {
    return this.pool.execute(op, onFailure, options);
  }

  getStats(): PoolStats {
    return this.pool.getStats();
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Stop accepting work. Closes the connections when the client owns them.
   * Safe to call more than once.
   */
  dispose(): void {
    if (this.pool.isDisposed) {
      return;
    }
    this.pool.dispose(this.disposeConnections);
    this.logger.info('Client disposed');
  }

  private transactionLogger(): StructuredLogger {
    this.txnSeq++;
    return this.logger.child({ txn: this.txnSeq });
  }
}

/**
 * Create a graph database client.
 *
 * @public
 * @since 0.1.0
 */
export function createClient(config: ClientConfig): GraphClient {
  return new GraphClient(config);
}
