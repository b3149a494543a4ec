/**
 * Response wrapper returned by queries and mutations.
 *
 * @packageDocumentation
 */

import type { ApiResponse, Latency, TxnContext } from '@graphtx/shared-types';

/**
 * @public
 * @since 0.1.0
 */
export class Response {
  readonly raw: ApiResponse;

  constructor(raw: ApiResponse) {
    this.raw = raw;
  }

  /** Response with no payload, returned for mutations that send nothing */
  static empty(): Response {
    return new Response({ json: '', uids: {} });
  }

  /** Encoded payload as sent by the server */
  get json(): string {
    return this.raw.json;
  }

  get txn(): TxnContext | undefined {
    return this.raw.txn ?? undefined;
  }

  /** Blank node name to assigned uid */
  get uids(): Readonly<Record<string, string>> {
    return this.raw.uids;
  }

  get latency(): Latency | undefined {
    return this.raw.latency;
  }

  /**
   * Decode the JSON payload. An empty payload decodes to `{}`.
   *
   * @throws SyntaxError if the payload is not JSON
   */
  parse<T = Record<string, unknown>>(): T {
    const data: T = JSON.parse(this.raw.json === '' ? '{}' : this.raw.json);
    return data;
  }
}
