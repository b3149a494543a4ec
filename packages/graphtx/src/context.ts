/**
 * Transaction context bookkeeping.
 *
 * @packageDocumentation
 */

import { ZERO_START_TS, ok, type Result, type TxnContext } from '@graphtx/shared-types';
import { StartTsMismatchError, toFailure } from './errors.js';

/**
 * A context for a transaction the server has not seen yet.
 */
export function createTxnContext(): TxnContext {
  return {
    startTs: ZERO_START_TS,
    aborted: false,
    keys: [],
    preds: [],
    hash: '',
  };
}

/**
 * Copy of a context for sending, so the transaction's own state is never
 * aliased by a request in flight.
 */
export function snapshotContext(context: TxnContext): TxnContext {
  const snapshot: TxnContext = {
    startTs: context.startTs,
    aborted: context.aborted,
    keys: [...context.keys],
    preds: [...context.preds],
    hash: context.hash,
  };
  if (context.commitTs !== undefined) snapshot.commitTs = context.commitTs;
  return snapshot;
}

/**
 * Merge a context returned by the server into the transaction's own.
 *
 * The first context assigns the start timestamp. After that every context
 * must carry the same one; otherwise the merge fails and `local` is left
 * untouched. The hash is replaced (latest wins) while keys and preds are
 * appended, since they describe the whole transaction's conflict footprint.
 */
export function mergeContext(local: TxnContext, remote: TxnContext | null | undefined): Result<void> {
  if (!remote) {
    return ok();
  }

  if (local.startTs === ZERO_START_TS) {
    local.startTs = remote.startTs;
  }

  if (local.startTs !== remote.startTs) {
    return toFailure(new StartTsMismatchError(local.startTs, remote.startTs));
  }

  local.hash = remote.hash;
  for (const key of remote.keys) local.keys.push(key);
  for (const pred of remote.preds) local.preds.push(pred);

  return ok();
}
