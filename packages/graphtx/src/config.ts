/**
 * Client configuration.
 *
 * @packageDocumentation
 */

import { createLogger, getLogLevelFromEnv, type LogLevel, type StructuredLogger } from './logging.js';
import type { GraphConnection } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Transport used for an endpoint.
 *
 * - `'http'` - capnweb HTTP batch, one request per call (default)
 * - `'ws'` - capnweb WebSocket, one long-lived session
 *
 * @public
 */
export type EndpointTransport = 'http' | 'ws';

/**
 * @public
 * @since 0.1.0
 */
export interface EndpointConfig {
  /** RPC endpoint URL */
  url: string;
  transport?: EndpointTransport;
}

/**
 * @public
 * @since 0.1.0
 */
export interface ClientConfig {
  /** Ready-made connections. Mutually exclusive with `endpoints`. */
  connections?: GraphConnection[];
  /** Endpoints to connect to. Mutually exclusive with `connections`. */
  endpoints?: Array<string | EndpointConfig>;
  /**
   * Close the connections when the client is disposed.
   * Defaults to true for `endpoints` (the client created them) and false for
   * `connections`.
   */
  disposeConnections?: boolean;
  /** Deadline applied to calls that do not pass their own (ms) */
  defaultTimeoutMs?: number;
  logger?: StructuredLogger;
  /** Level for the default logger; ignored when `logger` is given */
  logLevel?: LogLevel;
}

/**
 * Resolved client configuration.
 * @internal
 */
export interface ResolvedClientConfig {
  source:
    | { kind: 'connections'; connections: GraphConnection[] }
    | { kind: 'endpoints'; endpoints: EndpointConfig[] };
  disposeConnections: boolean;
  defaultTimeoutMs: number;
  logger: StructuredLogger;
}

/**
 * @public
 */
export const DEFAULT_CLIENT_CONFIG = {
  defaultTimeoutMs: 30000,
} as const;

// =============================================================================
// Resolution
// =============================================================================

function normalizeEndpoint(endpoint: string | EndpointConfig): EndpointConfig {
  const config = typeof endpoint === 'string' ? { url: endpoint } : endpoint;
  if (!config.url) {
    throw new Error('Endpoint url must not be empty');
  }
  return { url: config.url, transport: config.transport ?? 'http' };
}

/**
 * Validate a client configuration and fill in defaults.
 *
 * @throws Error when neither or both of `connections` and `endpoints` are
 * given, when the chosen one is empty, or when `defaultTimeoutMs` is not a
 * positive finite number
 */
export function resolveClientConfig(config: ClientConfig): ResolvedClientConfig {
  const hasConnections = config.connections !== undefined;
  const hasEndpoints = config.endpoints !== undefined;

  if (hasConnections === hasEndpoints) {
    throw new Error('Exactly one of connections or endpoints must be provided');
  }

  let source: ResolvedClientConfig['source'];
  if (config.connections !== undefined) {
    if (config.connections.length === 0) {
      throw new Error('connections must contain at least one connection');
    }
    source = { kind: 'connections', connections: [...config.connections] };
  } else {
    const endpoints = config.endpoints ?? [];
    if (endpoints.length === 0) {
      throw new Error('endpoints must contain at least one endpoint');
    }
    source = { kind: 'endpoints', endpoints: endpoints.map(normalizeEndpoint) };
  }

  const defaultTimeoutMs = config.defaultTimeoutMs ?? DEFAULT_CLIENT_CONFIG.defaultTimeoutMs;
  if (!Number.isFinite(defaultTimeoutMs) || defaultTimeoutMs <= 0) {
    throw new Error(`defaultTimeoutMs must be a positive number, got ${defaultTimeoutMs}`);
  }

  return {
    source,
    disposeConnections: config.disposeConnections ?? source.kind === 'endpoints',
    defaultTimeoutMs,
    logger: config.logger ?? createLogger({ level: config.logLevel ?? getLogLevelFromEnv() }),
  };
}
