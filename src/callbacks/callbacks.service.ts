import { Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { HashService } from '../hashing/hash.service';
import { LedgerService } from '../ledger/ledger.service';
import { CallbackEffect } from '../transactions/transaction-state';
import { TransactionsService } from '../transactions/transactions.service';
import { Transaction, TransactionStatus } from '../transactions/types/transaction.types';
import {
  CallbackParams,
  parseCallbackPayload,
  rawResponseOf,
  storedAmountOf,
} from './callback-payload';
import { IngestResult, OutcomeView, RedirectOutcome } from './types/callback.types';

@Injectable()
export class CallbacksService {
  constructor(
    private readonly hashService: HashService,
    private readonly transactionsService: TransactionsService,
    private readonly ledgerService: LedgerService,
    @InjectPinoLogger(CallbacksService.name)
    private readonly logger: PinoLogger,
  ) {}

  /**
   * Verifies and persists one gateway callback. Storage and configuration faults propagate;
   * an authentication failure does not, it is stored as HASH_MISMATCH.
   */
  async ingest(params: CallbackParams, now: Date = new Date()): Promise<IngestResult> {
    const payload = parseCallbackPayload(params);

    if (!payload.txnid) {
      this.logger.warn({ fields: Object.keys(params) }, 'Callback without txnid cannot be stored');
      return { stored: false, reason: 'MISSING_TXNID' };
    }

    const verification = this.hashService.verifyGatewayReply(
      {
        status: payload.status,
        udfs: payload.udfs,
        email: payload.email,
        firstName: payload.firstName,
        productInfo: payload.productInfo,
        amount: payload.amount,
        txnid: payload.txnid,
      },
      payload.hash,
    );

    if (!verification.verified) {
      this.logger.warn(
        { txnid: payload.txnid, gatewayStatus: payload.status, received: payload.hash },
        'Callback hash mismatch',
      );
    }

    const transition = await this.transactionsService.applyCallback(
      {
        txnid: payload.txnid,
        udfs: payload.udfs,
        amount: storedAmountOf(payload),
        hash: payload.hash,
        hashVerified: verification.verified,
        gatewayStatus: payload.status,
        gatewayTxnId: payload.gatewayTxnId,
        bankRefNum: payload.bankRefNum,
        bankCode: payload.bankCode,
        bankName: payload.bankName,
        issuingBank: payload.issuingBank,
        cardType: payload.cardType,
        paymentMode: payload.paymentMode,
        paymentSource: payload.paymentSource,
        authCode: payload.authCode,
        errorMessage: payload.errorMessage,
        email: payload.email,
        firstName: payload.firstName,
        phone: payload.phone,
        productInfo: payload.productInfo,
        rawResponse: rawResponseOf(params),
      },
      now,
    );

    if (verification.verified && transition.effect !== CallbackEffect.DOWNGRADE_REFUSED) {
      await this.routeToLedger(transition.next);
    }

    return { stored: true, verification, transition };
  }

  /** Never throws: the gateway gets its acknowledgment regardless. */
  async handleWebhook(params: CallbackParams): Promise<void> {
    try {
      await this.ingest(params);
    } catch (error) {
      this.logger.error(
        { err: error, txnid: parseCallbackPayload(params).txnid },
        'Webhook processing failed, acknowledging anyway',
      );
    }
  }

  async handleRedirect(params: CallbackParams, outcome: RedirectOutcome): Promise<OutcomeView> {
    const payload = parseCallbackPayload(params);
    const view: OutcomeView = {
      outcome,
      txnid: payload.txnid,
      amount: storedAmountOf(payload),
      status: null,
      productInfo: payload.productInfo,
      firstName: payload.firstName,
      gatewayTxnId: payload.gatewayTxnId,
      bankRefNum: payload.bankRefNum,
      paymentMode: payload.paymentMode,
      errorMessage: payload.errorMessage,
      suspiciousActivity: false,
    };

    try {
      const result = await this.ingest(params);
      if (!result.stored) {
        return view;
      }

      const stored = result.transition.next;
      return {
        ...view,
        amount: stored.amount,
        status: stored.status,
        suspiciousActivity: !result.verification.verified,
      };
    } catch (error) {
      this.logger.error({ err: error, txnid: payload.txnid, outcome }, 'Redirect processing failed');
      return view;
    }
  }

  private async routeToLedger(transaction: Transaction): Promise<void> {
    if (
      transaction.status !== TransactionStatus.SUCCESS &&
      transaction.status !== TransactionStatus.FAILED
    ) {
      return;
    }

    try {
      const result = await this.ledgerService.routeToMerchant(transaction);
      if (!result.routed) {
        this.logger.warn({ txnid: transaction.txnid, reason: result.reason }, 'Payment not routed to merchant ledger');
      }
    } catch (error) {
      this.logger.error({ err: error, txnid: transaction.txnid }, 'Merchant ledger routing failed');
    }
  }
}
