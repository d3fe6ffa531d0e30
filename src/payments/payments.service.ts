import { Inject, Injectable } from '@nestjs/common';
import { randomInt } from 'crypto';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { fail, Outcome, PaymentErrorKind, PaymentFailure, succeed } from '../common/payment-error';
import { gatewayConfig, GatewayConfig } from '../config/configuration';
import { isPositiveAmount, normalizeAmount } from '../hashing/amount';
import { HashService } from '../hashing/hash.service';
import { UdfTuple } from '../hashing/types/hash.types';
import { MerchantsService } from '../merchants/merchants.service';
import { TransactionsService } from '../transactions/transactions.service';
import { InitiatePaymentDto } from './dto/initiate-payment.dto';
import { GatewayClient } from './gateway.client';
import { classifyGatewayError, errorDescriptionOf } from './gateway-error.classifier';
import { GatewayCallResult, InitiatedPayment, InitiationForm } from './types/gateway.types';

export const generateTxnid = (now: Date): string => `TXN${now.getTime()}${randomInt(1000, 10000)}`;

@Injectable()
export class PaymentsService {
  constructor(
    private readonly hashService: HashService,
    private readonly merchantsService: MerchantsService,
    private readonly transactionsService: TransactionsService,
    private readonly gatewayClient: GatewayClient,
    @Inject(gatewayConfig.KEY)
    private readonly gateway: GatewayConfig,
    @InjectPinoLogger(PaymentsService.name)
    private readonly logger: PinoLogger,
  ) {}

  async initiate(dto: InitiatePaymentDto, now: Date = new Date()): Promise<Outcome<InitiatedPayment>> {
    const merchant = await this.merchantsService.findActive(dto.merchantId);
    if (!merchant) {
      return fail(PaymentErrorKind.UNAUTHORIZED, 'Merchant not found or inactive');
    }

    const amount = normalizeAmount(dto.amount);
    if (amount === null || !isPositiveAmount(amount)) {
      return fail(PaymentErrorKind.VALIDATION_ERROR, 'amount must be a positive decimal');
    }

    const signature = this.hashService.buildRequestSignature(
      merchant.merchantId,
      dto.orderId,
      amount,
      merchant.salt,
    );
    if (!this.hashService.verify(dto.hash, signature)) {
      this.logger.warn(
        { merchantId: merchant.merchantId, orderId: dto.orderId },
        'Initiation request signature mismatch',
      );
      return fail(PaymentErrorKind.HASH_MISMATCH, 'Request signature verification failed');
    }

    const txnid = dto.txnid ?? generateTxnid(now);
    const udfs: UdfTuple = [
      merchant.merchantId,
      dto.orderId,
      dto.udf3,
      dto.udf4,
      dto.udf5,
      dto.udf6,
      dto.udf7,
      dto.udf8,
      dto.udf9,
      dto.udf10,
    ];

    const hash = this.hashService.signInitiation({
      txnid,
      amount,
      productInfo: dto.productInfo,
      firstName: dto.firstName,
      email: dto.email,
      udfs,
    });

    const created = await this.transactionsService.create(
      {
        txnid,
        udfs,
        amount,
        hash,
        productInfo: dto.productInfo,
        firstName: dto.firstName,
        email: dto.email,
        phone: dto.phone,
      },
      now,
    );
    if (!created.ok) {
      return created;
    }

    const [udf1, udf2, udf3, udf4, udf5, udf6, udf7, udf8, udf9, udf10] = udfs.map(udf => udf ?? '');
    const form: InitiationForm = {
      key: this.gateway.key,
      txnid,
      amount,
      productinfo: dto.productInfo,
      firstname: dto.firstName,
      phone: dto.phone,
      email: dto.email,
      surl: this.gateway.successUrl,
      furl: this.gateway.failureUrl,
      hash,
      udf1,
      udf2,
      udf3,
      udf4,
      udf5,
      udf6,
      udf7,
      udf8,
      udf9,
      udf10,
    };

    const result = await this.gatewayClient.initiate(form);
    const accessKey = this.accessKeyOf(result);

    if (accessKey === null) {
      const failure = this.failureOf(result);
      // Row stays INITIATED; the sweep fails it if no callback ever arrives
      await this.transactionsService.annotateInitiationFailure(txnid, failure.details ?? failure.message);
      this.logger.error(
        { txnid, merchantId: merchant.merchantId, errorType: failure.kind, details: failure.details },
        'Gateway refused payment initiation',
      );
      return { ok: false, failure };
    }

    await this.transactionsService.markProcessing(txnid);

    this.logger.info({ txnid, merchantId: merchant.merchantId, amount }, 'Payment initiated with gateway');

    return succeed({ txnid, accessKey, paymentUrl: `${this.gateway.paymentUrl}${accessKey}` });
  }

  private accessKeyOf(result: GatewayCallResult): string | null {
    if (result.kind !== 'reply') {
      return null;
    }
    const { status, data } = result.body;
    const accepted = status === 1 || status === '1';
    return accepted && typeof data === 'string' && data.trim() !== '' ? data.trim() : null;
  }

  private failureOf(result: GatewayCallResult): PaymentFailure {
    switch (result.kind) {
      case 'timeout':
        return {
          kind: PaymentErrorKind.GATEWAY_RETRY,
          message: 'Payment gateway did not respond in time. Please retry your transaction.',
          details: `Gateway timed out after ${result.timeoutMs}ms`,
        };
      case 'unreachable':
        return {
          kind: PaymentErrorKind.GATEWAY_RETRY,
          message: 'Payment gateway is unreachable. Please retry your transaction.',
          details: result.reason,
        };
      case 'reply':
        if (!errorDescriptionOf(result.body) && result.httpStatus >= 500) {
          return {
            kind: PaymentErrorKind.GATEWAY_RETRY,
            message: 'Payment gateway temporary error. Please retry your transaction.',
            details: `HTTP ${result.httpStatus}`,
          };
        }
        return classifyGatewayError(result.body);
    }
  }
}
