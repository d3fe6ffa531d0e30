import { InboundCallback } from './types/inbound-callback.types';
import { RejectedCallback, Transaction, TransactionStatus } from './types/transaction.types';

export const MAX_REJECTED_CALLBACKS = 20;

export enum CallbackEffect {
  CREATED = 'CREATED',
  UPDATED = 'UPDATED',
  UNCHANGED = 'UNCHANGED',
  /** A verified callback overwrote a different terminal status. */
  CONFLICT = 'CONFLICT',
  /** An unverified callback tried to overwrite a verified terminal status. */
  DOWNGRADE_REFUSED = 'DOWNGRADE_REFUSED',
}

export interface CallbackTransition {
  effect: CallbackEffect;
  previousStatus: TransactionStatus | null;
  next: Transaction;
}

export function statusFromGateway(gatewayStatus: string | null | undefined): TransactionStatus {
  return gatewayStatus?.trim().toLowerCase() === 'success'
    ? TransactionStatus.SUCCESS
    : TransactionStatus.FAILED;
}

export function targetStatus(callback: InboundCallback): TransactionStatus {
  return callback.hashVerified
    ? statusFromGateway(callback.gatewayStatus)
    : TransactionStatus.HASH_MISMATCH;
}

const isSettled = (status: TransactionStatus): boolean =>
  status === TransactionStatus.SUCCESS || status === TransactionStatus.FAILED;

/**
 * Merges a callback into the current row (or a fresh one) and says what kind of change it was.
 * Pure: the caller owns persistence, versioning and logging.
 */
export function applyCallback(
  existing: Transaction | null,
  callback: InboundCallback,
  now: Date,
): CallbackTransition {
  const status = targetStatus(callback);

  if (!existing) {
    return {
      effect: CallbackEffect.CREATED,
      previousStatus: null,
      next: {
        ...callback,
        status,
        reviewRequired: !callback.hashVerified,
        version: 0,
        createdAt: now,
        updatedAt: now,
      },
    };
  }

  if (!callback.hashVerified && existing.hashVerified && isSettled(existing.status)) {
    return {
      effect: CallbackEffect.DOWNGRADE_REFUSED,
      previousStatus: existing.status,
      next: {
        ...existing,
        reviewRequired: true,
        rejectedCallbacks: [...(existing.rejectedCallbacks ?? []), rejectionOf(callback, now)].slice(
          -MAX_REJECTED_CALLBACKS,
        ),
        updatedAt: now,
      },
    };
  }

  const merged: Transaction = {
    ...existing,
    ...withoutAbsent(callback),
    txnid: existing.txnid,
    udfs: callback.udfs,
    // Unverified amounts never replace a stored one
    amount: callback.hashVerified
      ? (callback.amount ?? existing.amount)
      : (existing.amount ?? callback.amount),
    status,
    hash: callback.hash,
    hashVerified: callback.hashVerified,
    reviewRequired: existing.reviewRequired || !callback.hashVerified,
    createdAt: existing.createdAt,
    updatedAt: now,
  };

  if (callback.hashVerified && isSettled(existing.status) && existing.status !== status) {
    return {
      effect: CallbackEffect.CONFLICT,
      previousStatus: existing.status,
      next: { ...merged, reviewRequired: true },
    };
  }

  return {
    effect: sameState(existing, merged) ? CallbackEffect.UNCHANGED : CallbackEffect.UPDATED,
    previousStatus: existing.status,
    next: merged,
  };
}

/**
 * INITIATED -> PROCESSING once the gateway has handed out an access key. Anything past
 * INITIATED already carries newer information and is left alone.
 */
export function markProcessing(existing: Transaction, now: Date): Transaction | null {
  if (existing.status !== TransactionStatus.INITIATED) {
    return null;
  }
  return { ...existing, status: TransactionStatus.PROCESSING, updatedAt: now };
}

function rejectionOf(callback: InboundCallback, now: Date): RejectedCallback {
  return {
    receivedAt: now.toISOString(),
    gatewayStatus: callback.gatewayStatus ?? null,
    hash: callback.hash,
    rawResponse: callback.rawResponse ?? null,
  };
}

function withoutAbsent(callback: InboundCallback): Partial<InboundCallback> {
  const present: Partial<InboundCallback> = {};
  for (const [field, value] of Object.entries(callback)) {
    if (value !== undefined && value !== null) {
      Object.assign(present, { [field]: value });
    }
  }
  return present;
}

function sameState(before: Transaction, after: Transaction): boolean {
  const comparable = (transaction: Transaction) =>
    JSON.stringify({ ...transaction, updatedAt: null, version: null, createdAt: null });
  return comparable(before) === comparable(after);
}
