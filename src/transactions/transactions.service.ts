import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { fail, Outcome, PaymentErrorKind, succeed } from '../common/payment-error';
import { TransactionStore } from './transaction.store';
import { applyCallback, CallbackEffect, CallbackTransition, markProcessing } from './transaction-state';
import { InboundCallback } from './types/inbound-callback.types';
import {
  OPEN_STATUSES,
  StatusCounts,
  Transaction,
  TransactionStatus,
} from './types/transaction.types';

const MAX_WRITE_ATTEMPTS = 3;

export type TransactionDraft = Omit<
  Transaction,
  'status' | 'hashVerified' | 'reviewRequired' | 'version' | 'createdAt' | 'updatedAt'
>;

export class ConcurrentUpdateError extends Error {
  constructor(txnid: string) {
    super(`Transaction ${txnid} kept changing underneath ${MAX_WRITE_ATTEMPTS} write attempts`);
    this.name = 'ConcurrentUpdateError';
  }
}

@Injectable()
export class TransactionsService {
  constructor(
    private readonly store: TransactionStore,
    @InjectPinoLogger(TransactionsService.name)
    private readonly logger: PinoLogger,
  ) {}

  async getTransaction(txnid: string): Promise<Transaction> {
    const transaction = await this.store.findByTxnid(txnid);

    if (!transaction) {
      throw new NotFoundException(`Transaction ${txnid} not found`);
    }

    return transaction;
  }

  async create(draft: TransactionDraft, now: Date = new Date()): Promise<Outcome<Transaction>> {
    const result = await this.store.insert({
      ...draft,
      status: TransactionStatus.INITIATED,
      hashVerified: false,
      reviewRequired: false,
      version: 0,
      createdAt: now,
      updatedAt: now,
    });

    if (!result.ok) {
      this.logger.warn({ txnid: draft.txnid }, 'Transaction id already in use');
      return fail(
        PaymentErrorKind.DUPLICATE_TRANSACTION,
        `Transaction ${draft.txnid} already exists`,
      );
    }

    this.logger.info(
      { txnid: draft.txnid, amount: draft.amount, merchantId: draft.udfs[0] },
      'Transaction initiated',
    );
    return succeed(result.transaction);
  }

  /**
   * Find-or-create by txnid, then merge. A write that loses a race against another writer is
   * re-read and re-applied.
   */
  async applyCallback(callback: InboundCallback, now: Date = new Date()): Promise<CallbackTransition> {
    for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
      const existing = await this.store.findByTxnid(callback.txnid);
      const transition = applyCallback(existing, callback, now);

      const written = existing
        ? await this.store.update(transition.next, existing.version)
        : await this.store.insert(transition.next);

      if (written.ok) {
        const applied = { ...transition, next: written.transaction };
        this.logTransition(applied, callback);
        return applied;
      }

      this.logger.debug({ txnid: callback.txnid, attempt }, 'Concurrent write detected, retrying');
    }

    throw new ConcurrentUpdateError(callback.txnid);
  }

  async markProcessing(txnid: string, now: Date = new Date()): Promise<Transaction | null> {
    return this.mutate(txnid, existing => markProcessing(existing, now));
  }

  /**
   * Keeps the row INITIATED for the sweep, only recording why the gateway refused it.
   */
  async annotateInitiationFailure(
    txnid: string,
    message: string,
    now: Date = new Date(),
  ): Promise<Transaction | null> {
    return this.mutate(txnid, existing =>
      existing.status === TransactionStatus.INITIATED
        ? { ...existing, errorMessage: message, updatedAt: now }
        : null,
    );
  }

  async findStale(createdBefore: Date, limit: number): Promise<Transaction[]> {
    return this.store.findStale(OPEN_STATUSES, createdBefore, limit);
  }

  async expireIfStale(txnid: string, createdBefore: Date, message: string, now: Date): Promise<boolean> {
    return this.store.expireIfStale(txnid, OPEN_STATUSES, createdBefore, message, now);
  }

  async getStats(): Promise<StatusCounts> {
    const counts = await this.store.countByStatus();

    const stats: StatusCounts = {
      total: 0,
      [TransactionStatus.INITIATED]: 0,
      [TransactionStatus.PROCESSING]: 0,
      [TransactionStatus.SUCCESS]: 0,
      [TransactionStatus.FAILED]: 0,
      [TransactionStatus.HASH_MISMATCH]: 0,
    };

    counts.forEach((count, status) => {
      stats[status] = count;
      stats.total += count;
    });

    return stats;
  }

  private async mutate(
    txnid: string,
    change: (existing: Transaction) => Transaction | null,
  ): Promise<Transaction | null> {
    for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
      const existing = await this.store.findByTxnid(txnid);
      const next = existing ? change(existing) : null;
      if (!existing || !next) {
        return null;
      }

      const written = await this.store.update(next, existing.version);
      if (written.ok) {
        return written.transaction;
      }
    }

    throw new ConcurrentUpdateError(txnid);
  }

  private logTransition(transition: CallbackTransition, callback: InboundCallback): void {
    const context = {
      txnid: transition.next.txnid,
      previousStatus: transition.previousStatus,
      status: transition.next.status,
      gatewayStatus: callback.gatewayStatus,
      hashVerified: callback.hashVerified,
    };

    switch (transition.effect) {
      case CallbackEffect.CONFLICT:
        this.logger.error(
          context,
          'Status conflict: verified callback overwrote a different terminal status',
        );
        break;
      case CallbackEffect.DOWNGRADE_REFUSED:
        this.logger.error(
          { ...context, rawResponse: callback.rawResponse },
          'Unverified callback ignored for a verified terminal transaction',
        );
        break;
      case CallbackEffect.UNCHANGED:
        this.logger.info(context, 'Duplicate callback, transaction unchanged');
        break;
      default:
        if (callback.hashVerified) {
          this.logger.info(context, 'Callback applied');
        } else {
          this.logger.warn(context, 'Callback failed hash verification, stored for review');
        }
    }
  }
}
