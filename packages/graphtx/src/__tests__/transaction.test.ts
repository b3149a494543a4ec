/**
 * Read-write transaction tests
 *
 * Drives the transaction state machine through a real ConnectionPool over
 * FakeConnection instances: query, mutate, commit, discard and release.
 */

import { describe, it, expect, vi } from 'vitest';
import { TransactionState } from '@graphtx/shared-types';
import { MutationBuilder, RequestBuilder } from '../builders.js';
import { ObjectDisposedError, TransportError } from '../errors.js';
import { ConnectionPool } from '../executor.js';
import { Response } from '../response.js';
import { createTransaction } from '../transaction.js';
import { FakeConnection, apiResponse, createTestLogger, txnContext } from './fake-connection.js';

// =============================================================================
// Test Helpers
// =============================================================================

function setup() {
  const connection = new FakeConnection();
  const { logger, sink } = createTestLogger();
  const pool = new ConnectionPool({ connections: [connection], defaultTimeoutMs: 1000, logger });
  const txn = createTransaction(pool, { logger });
  return { connection, pool, txn, sink };
}

// =============================================================================
// Query
// =============================================================================

describe('Transaction query', () => {
  it('should send the query with the current context', async () => {
    const { connection, txn } = setup();

    const result = await txn.query('query q($a: string) { q(func: eq(name, $a)) { uid } }', { $a: 'Ada' });

    expect(result.success).toBe(true);
    expect(connection.calls[0].payload).toEqual({
      query: 'query q($a: string) { q(func: eq(name, $a)) { uid } }',
      vars: { $a: 'Ada' },
      startTs: 0n,
      hash: '',
      readOnly: false,
      bestEffort: false,
      mutations: [],
      commitNow: false,
      respFormat: 'json',
    });
  });

  it('should adopt the start timestamp of the first response', async () => {
    const { connection, txn } = setup();
    connection.reply('query', { value: apiResponse('{"q":[]}', txnContext(7n, { hash: 'h1', keys: ['a'] })) });

    const result = await txn.query('{ q(func: has(name)) { uid } }');

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.parse()).toEqual({ q: [] });
    }
    expect(txn.startTs).toBe(7n);
    expect(txn.getContext().keys).toEqual(['a']);
  });

  it('should stamp later requests with the merged start timestamp and hash', async () => {
    const { connection, txn } = setup();
    connection.reply('query', { value: apiResponse('{}', txnContext(7n, { hash: 'h1' })) });

    await txn.query('{ a }');
    await txn.query('{ b }');

    expect(connection.calls[1].payload).toMatchObject({ startTs: 7n, hash: 'h1' });
  });

  it('should fail with START_TS_MISMATCH and keep the local start timestamp', async () => {
    const { connection, txn } = setup();
    connection.reply(
      'query',
      { value: apiResponse('{}', txnContext(7n)) },
      { value: apiResponse('{}', txnContext(9n)) }
    );

    await txn.query('{ a }');
    const result = await txn.query('{ b }');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('START_TS_MISMATCH');
      expect(result.error.details).toEqual({ localStartTs: '7', remoteStartTs: '9' });
    }
    expect(txn.startTs).toBe(7n);
    expect(txn.state).toBe(TransactionState.OK);
  });

  it('should return transport failures unchanged and stay OK', async () => {
    const { connection, txn } = setup();
    connection.reply('query', { error: new TransportError('UNAVAILABLE', 'down') });

    const result = await txn.query('{ a }');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('TRANSPORT_ERROR');
      expect(result.error.message).toBe('down');
      expect(result.error.details).toEqual({ transportCode: 'UNAVAILABLE', retryable: true });
      expect(result.error.cause).toBeInstanceOf(TransportError);
    }
    expect(txn.state).toBe(TransactionState.OK);
  });

  it('should report unexpected errors as UNKNOWN_ERROR', async () => {
    const { connection, txn } = setup();
    connection.reply('query', { error: new Error('boom') });

    const result = await txn.query('{ a }');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('UNKNOWN_ERROR');
      expect(result.error.message).toBe('boom');
    }
  });

  it('should surface an expired deadline as DEADLINE_EXCEEDED and stay OK', async () => {
    const { connection, txn } = setup();
    connection.reply('query', 'hang');

    const result = await txn.query('{ a }', undefined, { timeoutMs: 10 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.details).toEqual({ transportCode: 'DEADLINE_EXCEEDED', retryable: true });
    }
    expect(connection.calls[0].options.signal.aborted).toBe(true);
    expect(txn.state).toBe(TransactionState.OK);
  });

  it('should fail an already-cancelled call without a remote call', async () => {
    const { connection, txn } = setup();
    const controller = new AbortController();
    controller.abort();

    const result = await txn.query('{ a }', undefined, { signal: controller.signal });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.details).toEqual({ transportCode: 'CANCELLED', retryable: false });
    }
    expect(connection.calls).toHaveLength(0);
  });
});

// =============================================================================
// Mutate
// =============================================================================

describe('Transaction mutate', () => {
  it('should succeed without a remote call when there is nothing to send', async () => {
    const { connection, txn } = setup();

    const result = await txn.mutate({});

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.json).toBe('');
    }
    expect(txn.hasMutated).toBe(false);
    expect(connection.calls).toHaveLength(0);
  });

  it('should send JSON mutations through query', async () => {
    const { connection, txn } = setup();

    const result = await txn.mutate({ setJson: '{"name":"Ada"}' });

    expect(result.success).toBe(true);
    expect(txn.hasMutated).toBe(true);
    expect(connection.calls[0].method).toBe('query');
    expect(connection.calls[0].payload).toEqual({
      query: '',
      vars: {},
      startTs: 0n,
      hash: '',
      readOnly: false,
      bestEffort: false,
      mutations: [{ setJson: '{"name":"Ada"}' }],
      commitNow: false,
      respFormat: 'json',
    });
  });

  it('should send builder requests with the current context', async () => {
    const { connection, txn } = setup();
    connection.reply('query', { value: apiResponse('{}', txnContext(4n, { hash: 'h4' })) });
    await txn.query('{ a }');

    const request = new RequestBuilder({ query: '{ u as var(func: eq(email, "a@b")) }' }).withMutations(
      new MutationBuilder({ setNquads: 'uid(u) <email> "a@b" .', cond: '@if(eq(len(u), 0))' })
    );
    await txn.mutate(request);

    expect(connection.calls[1].payload).toMatchObject({
      query: '{ u as var(func: eq(email, "a@b")) }',
      startTs: 4n,
      hash: 'h4',
      mutations: [{ setNquads: 'uid(u) <email> "a@b" .', cond: '@if(eq(len(u), 0))' }],
    });
  });

  it('should move to Committed when committing in the same round trip', async () => {
    const { connection, txn } = setup();

    const result = await txn.mutate({ setJson: '{"name":"Ada"}', commitNow: true });

    expect(result.success).toBe(true);
    expect(txn.state).toBe(TransactionState.Committed);
    expect(await txn.discard()).toEqual({ success: true, data: undefined });
    expect(connection.callsTo('commitOrAbort')).toHaveLength(0);
  });

  it('should end in Error after a transport failure, discarding once', async () => {
    const { connection, txn } = setup();
    connection.reply('query', { error: new TransportError('UNAVAILABLE', 'down') });

    const result = await txn.mutate({ setJson: '{"name":"Ada"}' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('TRANSPORT_ERROR');
    }
    expect(txn.state).toBe(TransactionState.Error);
    const aborts = connection.callsTo('commitOrAbort');
    expect(aborts).toHaveLength(1);
    expect(aborts[0].payload).toMatchObject({ aborted: true });
  });

  it('should end in Error even when the internal discard throws', async () => {
    const { connection, txn, sink } = setup();
    connection.reply('query', { error: new TransportError('UNAVAILABLE', 'down') });
    connection.reply('commitOrAbort', { error: new Error('broken connection') });

    const result = await txn.mutate({ setJson: '{"name":"Ada"}' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('down');
    }
    expect(txn.state).toBe(TransactionState.Error);
    expect(sink.messages('error')).toEqual(['Discard after failed mutation threw']);
  });

  it('should keep a large conflict footprint from a mutation', async () => {
    const { connection, txn } = setup();
    const keys = Array.from({ length: 300_000 }, (_, i) => `k${i}`);
    connection.reply('query', { value: apiResponse('{}', txnContext(5n, { keys, hash: 'h' })) });

    const result = await txn.mutate({ setJson: '{"name":"Ada"}' });

    expect(result.success).toBe(true);
    expect(txn.getContext().keys).toHaveLength(300_000);
  });

  it('should return the response alongside a merge failure', async () => {
    const { connection, txn } = setup();
    connection.reply(
      'query',
      { value: apiResponse('{}', txnContext(7n)) },
      { value: apiResponse('{"done":true}', txnContext(9n)) }
    );
    await txn.query('{ a }');

    const result = await txn.mutate({ setJson: '{"name":"Ada"}' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('START_TS_MISMATCH');
      expect(result.data).toBeInstanceOf(Response);
      expect(result.data?.json).toBe('{"done":true}');
    }
  });
});

// =============================================================================
// Commit / Discard
// =============================================================================

describe('Transaction commit and discard', () => {
  it('should commit without a remote call when nothing was mutated', async () => {
    const { connection, txn } = setup();

    const result = await txn.commit();

    expect(result.success).toBe(true);
    expect(txn.state).toBe(TransactionState.Committed);
    expect(connection.calls).toHaveLength(0);
  });

  it('should discard without a remote call when nothing was mutated', async () => {
    const { connection, txn } = setup();

    const result = await txn.discard();

    expect(result.success).toBe(true);
    expect(txn.state).toBe(TransactionState.Aborted);
    expect(connection.calls).toHaveLength(0);
  });

  it('should send the accumulated context on commit', async () => {
    const { connection, txn } = setup();
    connection.reply('query', {
      value: apiResponse('{}', txnContext(5n, { keys: ['k1'], preds: ['name'], hash: 'h' })),
    });
    await txn.mutate({ setJson: '{"name":"Ada"}' });

    const result = await txn.commit();

    expect(result.success).toBe(true);
    expect(txn.state).toBe(TransactionState.Committed);
    expect(connection.callsTo('commitOrAbort')[0].payload).toEqual({
      startTs: 5n,
      aborted: false,
      keys: ['k1'],
      preds: ['name'],
      hash: 'h',
    });
  });

  it('should report a failed commit as a transport failure', async () => {
    const { connection, txn } = setup();
    connection.reply('commitOrAbort', { error: new TransportError('UNKNOWN', 'conflict') });
    await txn.mutate({ setJson: '{"name":"Ada"}' });

    const result = await txn.commit();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('conflict');
    }
    expect(txn.state).toBe(TransactionState.Committed);
  });

  it('should be idempotent', async () => {
    const { connection, txn } = setup();
    await txn.mutate({ setJson: '{"name":"Ada"}' });

    const first = await txn.discard();
    const stateAfterFirst = txn.state;
    const second = await txn.discard();

    expect(first.success).toBe(true);
    expect(second.success).toBe(true);
    expect(txn.state).toBe(stateAfterFirst);
    expect(connection.callsTo('commitOrAbort')).toHaveLength(1);
    expect(connection.callsTo('commitOrAbort')[0].payload).toMatchObject({ aborted: true });
  });

  it('should be idempotent after a failed mutation', async () => {
    const { connection, txn } = setup();
    connection.reply('query', { error: new TransportError('UNAVAILABLE', 'down') });
    await txn.mutate({ setJson: '{"name":"Ada"}' });

    const first = await txn.discard();
    const second = await txn.discard();

    expect(first.success).toBe(true);
    expect(second.success).toBe(true);
    expect(txn.state).toBe(TransactionState.Error);
    expect(connection.callsTo('commitOrAbort')).toHaveLength(1);
  });

  it('should report a failed abort and still end Aborted', async () => {
    const { connection, txn } = setup();
    connection.reply('commitOrAbort', { error: new TransportError('DEADLINE_EXCEEDED', 'slow') });
    await txn.mutate({ setJson: '{"name":"Ada"}' });

    const result = await txn.discard();

    expect(result.success).toBe(false);
    expect(txn.state).toBe(TransactionState.Aborted);
    expect((await txn.discard()).success).toBe(true);
  });

  it('should return OBJECT_DISPOSED from discard once the pool is gone', async () => {
    const { pool, txn } = setup();
    await txn.mutate({ setJson: '{"name":"Ada"}' });
    pool.dispose(false);

    const result = await txn.discard();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('OBJECT_DISPOSED');
      expect(result.error.details).toEqual({ objectName: 'ConnectionPool' });
    }
  });

  it('should gate every operation once the state is not OK', async () => {
    const { connection, txn } = setup();
    await txn.commit();

    const query = await txn.query('{ a }');
    const mutate = await txn.mutate({ setJson: '{"name":"Ada"}' });
    const commit = await txn.commit();

    for (const result of [query, mutate, commit]) {
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('TRANSACTION_NOT_OK');
        expect(result.error.details).toEqual({ state: 'Committed' });
      }
    }
    expect(connection.calls).toHaveLength(0);
  });
});

// =============================================================================
// Release
// =============================================================================

describe('Transaction release', () => {
  it('should throw ObjectDisposedError from query, mutate and commit after dispose', async () => {
    const { txn } = setup();
    txn.dispose();

    await expect(txn.query('{ a }')).rejects.toThrow('Cannot access a disposed object: Transaction');
    await expect(txn.mutate({ setJson: '{}' })).rejects.toBeInstanceOf(ObjectDisposedError);
    await expect(txn.commit()).rejects.toBeInstanceOf(ObjectDisposedError);
    expect((await txn.discard()).success).toBe(true);
  });

  it('should abort exactly once when dispose and disposeAsync are both called', async () => {
    const { connection, txn } = setup();
    await txn.mutate({ setJson: '{"name":"Ada"}' });

    txn.dispose();
    await txn.disposeAsync();
    txn.dispose();

    expect(txn.isDisposed).toBe(true);
    expect(txn.state).toBe(TransactionState.Aborted);
    expect(connection.callsTo('commitOrAbort')).toHaveLength(1);
  });

  it('should wait for the abort in disposeAsync', async () => {
    const { connection, txn } = setup();
    connection.reply('query', { value: apiResponse('{}', txnContext(3n)) });
    await txn.mutate({ setJson: '{"name":"Ada"}' });

    await txn.disposeAsync();

    expect(connection.callsTo('commitOrAbort')[0].payload).toMatchObject({ startTs: 3n, aborted: true });
  });

  it('should not contact the server when releasing a committed transaction', async () => {
    const { connection, txn } = setup();
    await txn.mutate({ setJson: '{"name":"Ada"}', commitNow: true });

    await txn.disposeAsync();

    expect(txn.state).toBe(TransactionState.Committed);
    expect(connection.callsTo('commitOrAbort')).toHaveLength(0);
  });

  it('should log a failed background discard', async () => {
    const { connection, txn, sink } = setup();
    connection.reply('commitOrAbort', { error: new TransportError('UNAVAILABLE', 'down') });
    await txn.mutate({ setJson: '{"name":"Ada"}' });

    txn.dispose();

    await vi.waitFor(() => {
      expect(sink.messages('warn')).toContain('Background discard failed: down');
    });
  });
});
