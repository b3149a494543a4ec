/**
 * graphtx Error Types
 *
 * Error classes for transport failures, transaction state violations, context
 * mismatches and use after release. All errors carry machine-readable codes.
 *
 * Only {@link ObjectDisposedError} is ever thrown at callers. The others reach
 * them as the `cause` of a failed Result.
 *
 * @packageDocumentation
 */

import {
  ClientErrorCode,
  serializeStartTs,
  type Failure,
  type StartTs,
  type TransactionState,
} from '@graphtx/shared-types';

// =============================================================================
// URL Masking Utility
// =============================================================================

/**
 * Masks sensitive data in a URL for safe logging and error messages.
 *
 * Removes or masks:
 * - Password in userinfo (user:password@host)
 * - Query parameters that may contain tokens (token, key, secret, password, auth, api_key)
 *
 * @param url - The URL to mask
 * @returns A masked version of the URL safe for logging
 * @internal
 */
export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);

    if (parsed.password) {
      parsed.password = '***';
    }

    const sensitiveParams = ['token', 'key', 'secret', 'password', 'auth', 'api_key', 'apikey', 'access_token'];
    for (const param of sensitiveParams) {
      if (parsed.searchParams.has(param)) {
        parsed.searchParams.set(param, '***');
      }
    }

    return parsed.toString();
  } catch {
    const match = url.match(/^(\w+:\/\/)([^/?#]+)/);
    if (match) {
      return `${match[1]}${match[2]}/***`;
    }
    return '[invalid-url]';
  }
}

// =============================================================================
// Transport Error
// =============================================================================

/**
 * Kind of transport failure.
 *
 * - `UNAVAILABLE` - the endpoint could not be reached
 * - `DEADLINE_EXCEEDED` - the per-call deadline expired
 * - `CANCELLED` - the caller's signal aborted the call
 * - `UNKNOWN` - the remote call failed for any other reason
 *
 * @public
 */
export type TransportErrorCode = 'UNAVAILABLE' | 'DEADLINE_EXCEEDED' | 'CANCELLED' | 'UNKNOWN';

/**
 * The remote call itself failed.
 *
 * This is the only error the executor converts into a failed Result. Errors
 * the server reports about the request travel inside the response instead.
 *
 * @example
 * ```typescript
 * const result = await txn.query('{ q(func: has(name)) { name } }');
 * if (!result.success && result.error.cause instanceof TransportError) {
 *   console.log(result.error.cause.transportCode, result.error.cause.retryable);
 * }
 * ```
 *
 * @public
 * @since 0.1.0
 */
export class TransportError extends Error {
  readonly code = ClientErrorCode.TRANSPORT_ERROR;

  /** What kind of transport failure this was */
  readonly transportCode: TransportErrorCode;

  /** Whether the same call may succeed if issued again */
  readonly retryable: boolean;

  /** Endpoint the call went to (masked) */
  readonly url?: string;

  constructor(transportCode: TransportErrorCode, message: string, options: { url?: string; cause?: unknown } = {}) {
    const maskedUrl = options.url ? maskUrl(options.url) : undefined;
    super(maskedUrl ? `${message} (url: ${maskedUrl})` : message, { cause: options.cause });
    this.name = 'TransportError';
    this.transportCode = transportCode;
    this.retryable = transportCode !== 'CANCELLED';
    if (maskedUrl) {
      this.url = maskedUrl;
    }
  }
}

// =============================================================================
// Transaction Errors
// =============================================================================

/**
 * An operation was attempted on a transaction that has left the OK state.
 *
 * @public
 * @since 0.1.0
 */
export class TransactionNotOKError extends Error {
  readonly code = ClientErrorCode.TRANSACTION_NOT_OK;
  readonly retryable = false;

  /** The state the transaction was in */
  readonly state: TransactionState;

  constructor(state: TransactionState) {
    super(`Transaction is not OK (state: ${state})`);
    this.name = 'TransactionNotOKError';
    this.state = state;
  }
}

/**
 * The server returned a context that belongs to another transaction.
 *
 * The transaction's bookkeeping can no longer be trusted; it should be
 * discarded.
 *
 * @public
 * @since 0.1.0
 */
export class StartTsMismatchError extends Error {
  readonly code = ClientErrorCode.START_TS_MISMATCH;
  readonly retryable = false;

  readonly localStartTs: StartTs;
  readonly remoteStartTs: StartTs;

  constructor(localStartTs: StartTs, remoteStartTs: StartTs) {
    super(
      `StartTs mismatch: transaction has ${serializeStartTs(localStartTs)}, ` +
        `server returned ${serializeStartTs(remoteStartTs)}`
    );
    this.name = 'StartTsMismatchError';
    this.localStartTs = localStartTs;
    this.remoteStartTs = remoteStartTs;
  }
}

/**
 * An operation was attempted after its owner released its resources.
 *
 * Thrown, not returned: this is a programming error at the call site.
 *
 * @public
 * @since 0.1.0
 */
export class ObjectDisposedError extends Error {
  readonly code = ClientErrorCode.OBJECT_DISPOSED;
  readonly retryable = false;

  /** Name of the released object */
  readonly objectName: string;

  constructor(objectName: string) {
    super(`Cannot access a disposed object: ${objectName}`);
    this.name = 'ObjectDisposedError';
    this.objectName = objectName;
  }
}

/**
 * Any error the client may report as a failed Result.
 * @public
 */
export type ClientError = TransportError | TransactionNotOKError | StartTsMismatchError | ObjectDisposedError;

// =============================================================================
// Result Conversion
// =============================================================================

/**
 * Build a failed Result from a client error, keeping the instance as `cause`.
 *
 * @internal
 */
export function toFailure(error: ClientError): Failure {
  const details: Record<string, unknown> = {};

  if (error instanceof TransportError) {
    details.transportCode = error.transportCode;
    details.retryable = error.retryable;
    if (error.url) details.url = error.url;
  } else if (error instanceof TransactionNotOKError) {
    details.state = error.state;
  } else if (error instanceof StartTsMismatchError) {
    details.localStartTs = serializeStartTs(error.localStartTs);
    details.remoteStartTs = serializeStartTs(error.remoteStartTs);
  } else {
    details.objectName = error.objectName;
  }

  return {
    success: false,
    error: { code: error.code, message: error.message, details, cause: error },
  };
}
