/**
 * Connection Pool / Executor
 *
 * Holds the client's fixed set of connections, picks one per call in
 * round-robin order and runs the call under a deadline. A call that fails
 * with a {@link TransportError} is handed to the caller's `onFailure` instead
 * of rejecting; every other error propagates.
 *
 * @packageDocumentation
 */

import { ObjectDisposedError, TransportError } from './errors.js';
import type { StructuredLogger } from './logging.js';
import type {
  CallOptions,
  ConnectionOperation,
  Executor,
  GraphConnection,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * @internal
 */
export interface ConnectionPoolConfig {
  connections: readonly GraphConnection[];
  defaultTimeoutMs: number;
  logger: StructuredLogger;
  /** Name used in ObjectDisposedError messages */
  ownerName?: string;
}

/**
 * Call counters.
 * @public
 */
export interface PoolStats {
  size: number;
  callsIssued: number;
  transportFailures: number;
  /** Calls issued per connection index */
  callsPerConnection: number[];
}

// =============================================================================
// Deadline Handling
// =============================================================================

/**
 * Run `op` against `connection`, rejecting with a TransportError when the
 * deadline passes or `signal` aborts. The connection sees one signal that
 * fires in both cases.
 */
function runWithDeadline<T>(
  op: ConnectionOperation<T>,
  connection: GraphConnection,
  timeoutMs: number,
  signal: AbortSignal | undefined
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      cleanup();
      controller.abort();
      reject(new TransportError('CANCELLED', 'Call cancelled by caller'));
    };

    const timer = setTimeout(() => {
      cleanup();
      controller.abort();
      reject(new TransportError('DEADLINE_EXCEEDED', `Deadline of ${timeoutMs}ms exceeded`));
    }, timeoutMs);

    const cleanup = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    signal?.addEventListener('abort', onAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = op(connection, { signal: controller.signal, timeoutMs });
    } catch (error) {
      cleanup();
      reject(error);
      return;
    }

    pending.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

// =============================================================================
// Connection Pool
// =============================================================================

/**
 * Round-robin pool over a fixed, immutable set of connections.
 *
 * The cursor is shared by every transaction of the owning client. It is
 * advanced before the call is awaited, so concurrent calls spread across the
 * connections; it always stays within `[0, size)`.
 *
 * @public
 * @since 0.1.0
 */
export class ConnectionPool implements Executor {
  private readonly connections: readonly GraphConnection[];
  private readonly defaultTimeoutMs: number;
  private readonly logger: StructuredLogger;
  private readonly ownerName: string;
  private cursor = 0;
  private disposed = false;

  private callsIssued = 0;
  private transportFailures = 0;
  private readonly callsPerConnection: number[];

  constructor(config: ConnectionPoolConfig) {
    if (config.connections.length === 0) {
      throw new Error('ConnectionPool requires at least one connection');
    }
    this.connections = Object.freeze([...config.connections]);
    this.defaultTimeoutMs = config.defaultTimeoutMs;
    this.logger = config.logger;
    this.ownerName = config.ownerName ?? 'ConnectionPool';
    this.callsPerConnection = this.connections.map(() => 0);
  }

  get size(): number {
    return this.connections.length;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Index of the connection the next call will use, advancing the cursor.
   */
  private nextIndex(): number {
    const index = this.cursor;
    this.cursor = (index + 1) % this.connections.length;
    return index;
  }

  assertNotDisposed(): void {
    if (this.disposed) {
      throw new ObjectDisposedError(this.ownerName);
    }
  }

  async execute<T>(
    op: ConnectionOperation<T>,
    onFailure: (error: TransportError) => T,
    options: CallOptions = {}
  ): Promise<T> {
    this.assertNotDisposed();

    if (options.signal?.aborted) {
      return onFailure(new TransportError('CANCELLED', 'Call cancelled before it was sent'));
    }

    const index = this.nextIndex();
    const connection = this.connections[index];
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    this.callsIssued++;
    this.callsPerConnection[index]++;
    this.logger.debug('Calling {endpoint}', { connection: index, endpoint: connection.endpoint, timeoutMs });

    try {
      return await runWithDeadline(op, connection, timeoutMs, options.signal);
    } catch (error) {
      if (error instanceof TransportError) {
        this.transportFailures++;
        this.logger.warn('Call to {endpoint} failed: {reason}', {
          connection: index,
          endpoint: connection.endpoint,
          transportCode: error.transportCode,
          reason: error.message,
        });
        return onFailure(error);
      }
      throw error;
    }
  }

  getStats(): PoolStats {
    return {
      size: this.connections.length,
      callsIssued: this.callsIssued,
      transportFailures: this.transportFailures,
      callsPerConnection: [...this.callsPerConnection],
    };
  }

  /**
   * Stops accepting calls. With `closeConnections`, every connection that has
   * a `close` is closed. Later calls are no-ops.
   */
  dispose(closeConnections: boolean): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;

    if (closeConnections) {
      for (const connection of this.connections) {
        connection.close?.();
      }
    }
    this.logger.debug('Connection pool disposed', { closedConnections: closeConnections });
  }
}
