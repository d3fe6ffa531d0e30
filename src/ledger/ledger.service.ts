import { Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { MerchantsService } from '../merchants/merchants.service';
import {
  Transaction,
  TransactionStatus,
  merchantIdOf,
  orderIdOf,
} from '../transactions/types/transaction.types';
import { LedgerStore } from './ledger.store';
import { LedgerEntry, RoutingAction, RoutingResult, SettlementStatus } from './types/ledger.types';

@Injectable()
export class LedgerService {
  constructor(
    private readonly store: LedgerStore,
    private readonly merchantsService: MerchantsService,
    @InjectPinoLogger(LedgerService.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * Records a settled transaction against the merchant named in udf1. One entry per
   * (merchant, txnid); a repeated result only touches the entry when the status moved.
   */
  async routeToMerchant(transaction: Transaction, now: Date = new Date()): Promise<RoutingResult> {
    if (
      transaction.status !== TransactionStatus.SUCCESS &&
      transaction.status !== TransactionStatus.FAILED
    ) {
      return { routed: false, reason: 'NOT_SETTLED' };
    }

    const merchantId = merchantIdOf(transaction)?.trim();
    if (!merchantId) {
      this.logger.warn({ txnid: transaction.txnid }, 'Merchant id (udf1) missing, payment not routed');
      return { routed: false, reason: 'MERCHANT_MISSING' };
    }

    const merchant = await this.merchantsService.findActive(merchantId);
    if (!merchant) {
      this.logger.error({ txnid: transaction.txnid, merchantId }, 'Merchant not active, payment not routed');
      return { routed: false, reason: 'MERCHANT_INACTIVE' };
    }

    const existing = await this.store.find(merchantId, transaction.txnid);
    if (existing) {
      return this.updateExisting(existing, transaction, now);
    }

    const entry: LedgerEntry = {
      merchantId,
      txnid: transaction.txnid,
      orderId: orderIdOf(transaction) ?? '',
      amount: transaction.amount,
      status: transaction.status,
      paymentMode: transaction.paymentMode ?? null,
      bankRefNum: transaction.bankRefNum ?? null,
      gatewayTxnId: transaction.gatewayTxnId ?? null,
      settlementStatus: SettlementStatus.PENDING,
      notes: 'Routed from payment transaction',
      createdAt: now,
      updatedAt: now,
    };

    if (!(await this.store.insert(entry))) {
      // Lost the race to a concurrent delivery of the same result
      const winner = await this.store.find(merchantId, transaction.txnid);
      if (!winner) {
        throw new Error(`Ledger entry for ${merchantId}/${transaction.txnid} vanished after conflict`);
      }
      return this.updateExisting(winner, transaction, now);
    }

    this.logger.info(
      { txnid: entry.txnid, merchantId, status: entry.status, amount: entry.amount },
      'Ledger entry created',
    );

    return { routed: true, action: RoutingAction.CREATED, entry };
  }

  private async updateExisting(
    existing: LedgerEntry,
    transaction: Transaction,
    now: Date,
  ): Promise<RoutingResult> {
    if (existing.status === transaction.status) {
      this.logger.debug(
        { txnid: existing.txnid, merchantId: existing.merchantId },
        'Ledger entry already up to date',
      );
      return { routed: true, action: RoutingAction.UNCHANGED, entry: existing };
    }

    const entry: LedgerEntry = {
      ...existing,
      status: transaction.status,
      notes: 'Updated via repeated callback',
      updatedAt: now,
    };
    await this.store.update(entry);

    this.logger.warn(
      {
        txnid: entry.txnid,
        merchantId: entry.merchantId,
        previousStatus: existing.status,
        status: entry.status,
      },
      'Ledger entry status changed',
    );

    return { routed: true, action: RoutingAction.UPDATED, entry };
  }
}
