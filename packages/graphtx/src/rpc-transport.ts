/**
 * graphtx/rpc - capnweb connections
 *
 * {@link GraphConnection} implementations that speak to a graph database
 * endpoint over CapnWeb RPC, in HTTP batch or WebSocket mode.
 *
 * Every failure of a call is reported as a {@link TransportError}, so the
 * executor can turn it into a failed Result.
 *
 * @example
 * ```typescript
 * import { GraphClient, createHttpConnection } from 'graphtx';
 *
 * const client = new GraphClient({
 *   connections: [
 *     createHttpConnection({ url: 'https://alpha-0.example.com/rpc' }),
 *     createHttpConnection({ url: 'https://alpha-1.example.com/rpc' }),
 *   ],
 *   disposeConnections: true,
 * });
 * ```
 *
 * @packageDocumentation
 */

import { newHttpBatchRpcSession, newWebSocketRpcSession, type RpcStub } from 'capnweb';

import type { GraphApi } from '@graphtx/shared-types';
import { TransportError, maskUrl } from './errors.js';
import type { ConnectionCallOptions, GraphConnection } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * @public
 * @since 0.1.0
 */
export interface HttpConnectionOptions {
  /** RPC endpoint URL */
  url: string;
}

/**
 * @public
 * @since 0.1.0
 */
export interface WebSocketConnectionOptions {
  /** RPC endpoint URL (ws:// or wss://; http(s):// is rewritten) */
  url: string;
}

// =============================================================================
// Error Mapping
// =============================================================================

/**
 * Classify a failed call.
 *
 * - already a TransportError: unchanged
 * - `AbortError`: `CANCELLED`
 * - `TypeError` (what fetch and WebSocket raise for network failures): `UNAVAILABLE`
 * - anything else, including errors thrown by the remote: `UNKNOWN`
 *
 * @internal
 */
export function toTransportError(error: unknown, url: string): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return new TransportError('CANCELLED', 'Call aborted', { url, cause: error });
  }
  if (error instanceof TypeError) {
    return new TransportError('UNAVAILABLE', `Endpoint unavailable: ${error.message}`, { url, cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError('UNKNOWN', `Remote call failed: ${message}`, { url, cause: error });
}

async function call<T>(url: string, options: ConnectionCallOptions, fn: () => Promise<T>): Promise<T> {
  if (options.signal.aborted) {
    throw new TransportError('CANCELLED', 'Call aborted before it was sent', { url });
  }
  try {
    return await fn();
  } catch (error) {
    throw toTransportError(error, url);
  }
}

// =============================================================================
// HTTP Batch Connection
// =============================================================================

/**
 * Create a connection using CapnWeb HTTP batch transport.
 *
 * A batch session ends once its request has been sent, so every call opens
 * its own session. Nothing needs closing.
 *
 * @public
 * @since 0.1.0
 */
export function createHttpConnection(options: HttpConnectionOptions): GraphConnection {
  const { url } = options;
  const session = (): RpcStub<GraphApi> => newHttpBatchRpcSession<GraphApi>(url);

  return {
    endpoint: maskUrl(url),

    query(request, callOptions) {
      return call(url, callOptions, () => session().query(request));
    },

    commitOrAbort(context, callOptions) {
      return call(url, callOptions, () => session().commitOrAbort(context));
    },

    alter(operation, callOptions) {
      return call(url, callOptions, () => session().alter(operation));
    },

    checkVersion(callOptions) {
      return call(url, callOptions, () => session().checkVersion());
    },

    login(request, callOptions) {
      return call(url, callOptions, () => session().login(request));
    },
  };
}

// =============================================================================
// WebSocket Connection
// =============================================================================

/**
 * Create a connection using CapnWeb WebSocket transport.
 *
 * One session is opened up front and shared by every call; `close()`
 * disposes it. Needs a runtime with a global `WebSocket`.
 *
 * @public
 * @since 0.1.0
 */
export function createWebSocketConnection(options: WebSocketConnectionOptions): GraphConnection {
  const url = options.url.replace(/^http/, 'ws');
  const session: RpcStub<GraphApi> = newWebSocketRpcSession<GraphApi>(url);
  let closed = false;

  const guarded = <T>(callOptions: ConnectionCallOptions, fn: () => Promise<T>): Promise<T> => {
    if (closed) {
      return Promise.reject(new TransportError('UNAVAILABLE', 'Connection closed', { url }));
    }
    return call(url, callOptions, fn);
  };

  return {
    endpoint: maskUrl(url),

    query(request, callOptions) {
      return guarded(callOptions, () => session.query(request));
    },

    commitOrAbort(context, callOptions) {
      return guarded(callOptions, () => session.commitOrAbort(context));
    },

    alter(operation, callOptions) {
      return guarded(callOptions, () => session.alter(operation));
    },

    checkVersion(callOptions) {
      return guarded(callOptions, () => session.checkVersion());
    },

    login(request, callOptions) {
      return guarded(callOptions, () => session.login(request));
    },

    close() {
      if (closed) return;
      closed = true;
      session[Symbol.dispose]();
    },
  };
}
