import { Transaction, TransactionStatus } from './types/transaction.types';

export type InsertResult = { ok: true; transaction: Transaction } | { ok: false; reason: 'duplicate' };

export type UpdateResult = { ok: true; transaction: Transaction } | { ok: false; reason: 'stale' };

/**
 * Durable home of the transaction rows, keyed by txnid.
 *
 * Writes are optimistic: `insert` stores version 1 and fails on an existing txnid, `update`
 * only lands when the stored version still equals `expectedVersion` and bumps it by one.
 * Concrete drivers live under src/storage.
 */
export abstract class TransactionStore {
  abstract findByTxnid(txnid: string): Promise<Transaction | null>;

  abstract insert(transaction: Transaction): Promise<InsertResult>;

  abstract update(transaction: Transaction, expectedVersion: number): Promise<UpdateResult>;

  /** Oldest first, `createdAt <= createdBefore`. */
  abstract findStale(
    statuses: ReadonlyArray<TransactionStatus>,
    createdBefore: Date,
    limit: number,
  ): Promise<Transaction[]>;

  /**
   * Moves the row to FAILED only if it is still open and old enough, in a single conditional
   * write. Returns false when a concurrent writer got there first.
   */
  abstract expireIfStale(
    txnid: string,
    statuses: ReadonlyArray<TransactionStatus>,
    createdBefore: Date,
    message: string,
    now: Date,
  ): Promise<boolean>;

  abstract countByStatus(): Promise<Map<TransactionStatus, number>>;
}
