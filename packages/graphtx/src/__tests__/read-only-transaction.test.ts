/**
 * Read-only transaction tests
 */

import { describe, it, expect } from 'vitest';
import { TransactionState } from '@graphtx/shared-types';
import { ConnectionPool } from '../executor.js';
import { createReadOnlyTransaction } from '../transaction.js';
import { FakeConnection, apiResponse, createTestLogger, txnContext } from './fake-connection.js';

function setup(bestEffort?: boolean) {
  const connection = new FakeConnection();
  const { logger } = createTestLogger();
  const pool = new ConnectionPool({ connections: [connection], defaultTimeoutMs: 1000, logger });
  const txn = createReadOnlyTransaction(pool, { logger, bestEffort });
  return { connection, txn };
}

describe('Read-only transaction', () => {
  it('should mark queries read-only', async () => {
    const { connection, txn } = setup();

    await txn.query('{ a }');

    expect(txn.readOnly).toBe(true);
    expect(txn.bestEffort).toBe(false);
    expect(connection.calls[0].payload).toMatchObject({ readOnly: true, bestEffort: false });
  });

  it('should pass best-effort through', async () => {
    const { connection, txn } = setup(true);

    await txn.query('{ a }');

    expect(connection.calls[0].payload).toMatchObject({ readOnly: true, bestEffort: true });
  });

  it('should share the context merge with read-write transactions', async () => {
    const { connection, txn } = setup();
    connection.reply(
      'query',
      { value: apiResponse('{}', txnContext(11n, { hash: 'x' })) },
      { value: apiResponse('{}', txnContext(11n, { hash: 'y' })) }
    );

    await txn.query('{ a }');
    await txn.query('{ b }');

    expect(connection.calls[1].payload).toMatchObject({ startTs: 11n, hash: 'x' });
    expect(txn.getContext().hash).toBe('y');
  });

  it('should release without any remote call and keep its state', async () => {
    const { connection, txn } = setup();

    txn.dispose();
    await txn.disposeAsync();

    expect(txn.isDisposed).toBe(true);
    expect(txn.state).toBe(TransactionState.OK);
    expect(connection.calls).toHaveLength(0);
  });

  it('should throw after release', async () => {
    const { txn } = setup();
    await txn.disposeAsync();

    await expect(txn.query('{ a }')).rejects.toThrow('Cannot access a disposed object: ReadOnlyTransaction');
  });
});
