/**
 * Request and mutation builders.
 *
 * @example
 * ```typescript
 * const upsert = new RequestBuilder({ commitNow: true })
 *   .withQuery('query { u as var(func: eq(email, $email)) }')
 *   .withVars({ $email: 'ada@example.com' })
 *   .withMutations(
 *     new MutationBuilder({
 *       setNquads: 'uid(u) <email> "ada@example.com" .',
 *       cond: '@if(eq(len(u), 0))',
 *     })
 *   );
 *
 * const result = await txn.mutate(upsert);
 * ```
 *
 * @packageDocumentation
 */

import type { Mutation, Request, ResponseFormat, StartTs } from '@graphtx/shared-types';

/**
 * Fields of a single mutation. Payloads are passed to the server as given.
 * @public
 */
export interface MutationFields {
  setJson?: string;
  deleteJson?: string;
  setNquads?: string;
  delNquads?: string;
  cond?: string;
}

/**
 * Builds one mutation.
 * @public
 * @since 0.1.0
 */
export class MutationBuilder {
  setJson?: string;
  deleteJson?: string;
  setNquads?: string;
  delNquads?: string;
  cond?: string;

  constructor(fields: MutationFields = {}) {
    this.setJson = fields.setJson;
    this.deleteJson = fields.deleteJson;
    this.setNquads = fields.setNquads;
    this.delNquads = fields.delNquads;
    this.cond = fields.cond;
  }

  /** Whether there is anything to send */
  get isEmpty(): boolean {
    return !this.setJson && !this.deleteJson && !this.setNquads && !this.delNquads;
  }

  build(): Mutation {
    const mutation: Mutation = {};
    if (this.setJson) mutation.setJson = this.setJson;
    if (this.deleteJson) mutation.deleteJson = this.deleteJson;
    if (this.setNquads) mutation.setNquads = this.setNquads;
    if (this.delNquads) mutation.delNquads = this.delNquads;
    if (this.cond) mutation.cond = this.cond;
    return mutation;
  }
}

/**
 * Options for {@link RequestBuilder}.
 * @public
 */
export interface RequestBuilderOptions {
  query?: string;
  vars?: Record<string, string>;
  /** Commit in the same round trip as the mutation */
  commitNow?: boolean;
  respFormat?: ResponseFormat;
}

/**
 * Builds a mutation request, optionally with a query for upserts.
 *
 * The builder never holds transaction state: the start timestamp and hash
 * are stamped in by the transaction when the request is sent.
 *
 * @public
 * @since 0.1.0
 */
export class RequestBuilder {
  query: string;
  vars: Record<string, string>;
  commitNow: boolean;
  respFormat: ResponseFormat;
  private readonly mutations: MutationBuilder[] = [];

  constructor(options: RequestBuilderOptions = {}) {
    this.query = options.query ?? '';
    this.vars = { ...options.vars };
    this.commitNow = options.commitNow ?? false;
    this.respFormat = options.respFormat ?? 'json';
  }

  /** Adds mutations; ones with no payload at all are dropped. */
  withMutations(...mutations: MutationBuilder[]): this {
    for (const mutation of mutations) {
      if (!mutation.isEmpty) {
        this.mutations.push(mutation);
      }
    }
    return this;
  }

  withQuery(query: string): this {
    this.query = query;
    return this;
  }

  withVars(vars: Record<string, string>): this {
    this.vars = { ...this.vars, ...vars };
    return this;
  }

  get mutationCount(): number {
    return this.mutations.length;
  }

  build(startTs: StartTs, hash: string): Request {
    return {
      query: this.query,
      vars: { ...this.vars },
      startTs,
      hash,
      readOnly: false,
      bestEffort: false,
      mutations: this.mutations.map((mutation) => mutation.build()),
      commitNow: this.commitNow,
      respFormat: this.respFormat,
    };
  }
}
