import { Injectable } from '@nestjs/common';
import {
  InsertResult,
  TransactionStore,
  UpdateResult,
} from '../../transactions/transaction.store';
import { Transaction, TransactionStatus } from '../../transactions/types/transaction.types';

@Injectable()
export class MemoryTransactionStore extends TransactionStore {
  private readonly rows = new Map<string, Transaction>();

  async findByTxnid(txnid: string): Promise<Transaction | null> {
    const row = this.rows.get(txnid);
    return row ? structuredClone(row) : null;
  }

  async insert(transaction: Transaction): Promise<InsertResult> {
    if (this.rows.has(transaction.txnid)) {
      return { ok: false, reason: 'duplicate' };
    }

    const stored = { ...structuredClone(transaction), version: 1 };
    this.rows.set(stored.txnid, stored);
    return { ok: true, transaction: structuredClone(stored) };
  }

  async update(transaction: Transaction, expectedVersion: number): Promise<UpdateResult> {
    const current = this.rows.get(transaction.txnid);
    if (!current || current.version !== expectedVersion) {
      return { ok: false, reason: 'stale' };
    }

    const stored = { ...structuredClone(transaction), version: expectedVersion + 1 };
    this.rows.set(stored.txnid, stored);
    return { ok: true, transaction: structuredClone(stored) };
  }

  async findStale(
    statuses: ReadonlyArray<TransactionStatus>,
    createdBefore: Date,
    limit: number,
  ): Promise<Transaction[]> {
    return [...this.rows.values()]
      .filter(row => statuses.includes(row.status) && row.createdAt.getTime() <= createdBefore.getTime())
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, limit)
      .map(row => structuredClone(row));
  }

  async expireIfStale(
    txnid: string,
    statuses: ReadonlyArray<TransactionStatus>,
    createdBefore: Date,
    message: string,
    now: Date,
  ): Promise<boolean> {
    const current = this.rows.get(txnid);
    if (
      !current ||
      !statuses.includes(current.status) ||
      current.createdAt.getTime() > createdBefore.getTime()
    ) {
      return false;
    }

    this.rows.set(txnid, {
      ...current,
      status: TransactionStatus.FAILED,
      errorMessage: message,
      updatedAt: now,
      version: current.version + 1,
    });
    return true;
  }

  async countByStatus(): Promise<Map<TransactionStatus, number>> {
    const counts = new Map<TransactionStatus, number>();
    for (const row of this.rows.values()) {
      counts.set(row.status, (counts.get(row.status) ?? 0) + 1);
    }
    return counts;
  }
}
