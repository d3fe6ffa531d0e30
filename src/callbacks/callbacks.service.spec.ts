import { Test, TestingModule } from '@nestjs/testing';
import { createHash } from 'crypto';
import { getLoggerToken } from 'nestjs-pino';
import { gatewayConfig, GatewayConfig } from '../config/configuration';
import { HashService } from '../hashing/hash.service';
import { LedgerStore } from '../ledger/ledger.store';
import { LedgerService } from '../ledger/ledger.service';
import { MerchantStore } from '../merchants/merchant.store';
import { MerchantsService } from '../merchants/merchants.service';
import { MerchantStatus } from '../merchants/types/merchant.types';
import { MemoryLedgerStore } from '../storage/memory/memory-ledger.store';
import { MemoryMerchantStore } from '../storage/memory/memory-merchant.store';
import { MemoryTransactionStore } from '../storage/memory/memory-transaction.store';
import { CallbackEffect } from '../transactions/transaction-state';
import { TransactionStore } from '../transactions/transaction.store';
import { TransactionsService } from '../transactions/transactions.service';
import { TransactionStatus } from '../transactions/types/transaction.types';
import { CallbacksService } from './callbacks.service';
import { RedirectOutcome } from './types/callback.types';

describe('CallbacksService', () => {
  let service: CallbacksService;
  let transactions: TransactionsService;
  let ledger: LedgerService;
  let ledgerStore: LedgerStore;

  const mockLogger = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };

  const config: GatewayConfig = {
    key: 'K1',
    salt: 'S1',
    initiateUrl: 'http://gateway.test/payment/initiateLink',
    paymentUrl: 'http://gateway.test/pay/',
    successUrl: 'http://merchant.test/payment/success',
    failureUrl: 'http://merchant.test/payment/failure',
    timeoutMs: 5000,
    acceptLegacyHash: true,
  };

  const replyHash = (txnid: string, status: string) =>
    createHash('sha512')
      .update(
        ['S1', status, '', '', '', '', '', '', '', '', 'ORD2', 'M123', 'j@x.com', 'John', 'Order', '100.00', txnid, 'K1'].join('|'),
      )
      .digest('hex');

  const webhook = (txnid: string, status = 'success', overrides: Record<string, string> = {}) => ({
    txnid,
    status,
    amount: '100.00',
    email: 'j@x.com',
    firstname: 'John',
    productinfo: 'Order',
    udf1: 'M123',
    udf2: 'ORD2',
    easepayid: 'E100',
    bank_ref_num: 'BR100',
    mode: 'UPI',
    hash: replyHash(txnid, status),
    ...overrides,
  });

  beforeEach(async () => {
    const loggerMocks = [CallbacksService, TransactionsService, LedgerService, MerchantsService].map(provider => ({
      provide: getLoggerToken(provider.name),
      useValue: mockLogger,
    }));

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CallbacksService,
        HashService,
        TransactionsService,
        LedgerService,
        MerchantsService,
        { provide: gatewayConfig.KEY, useValue: config },
        { provide: TransactionStore, useClass: MemoryTransactionStore },
        { provide: LedgerStore, useClass: MemoryLedgerStore },
        {
          provide: MerchantStore,
          useValue: new MemoryMerchantStore([
            { merchantId: 'M123', name: 'Demo Store', salt: 'test-merchant-salt', status: MerchantStatus.ACTIVE },
          ]),
        },
        ...loggerMocks,
      ],
    }).compile();

    service = module.get<CallbacksService>(CallbacksService);
    transactions = module.get<TransactionsService>(TransactionsService);
    ledger = module.get<LedgerService>(LedgerService);
    ledgerStore = module.get(LedgerStore);
  });

  afterEach(() => {
    jest.clearAllMocks();
    jest.restoreAllMocks();
  });

  describe('ingest', () => {
    it('should create a verified SUCCESS row for an unseen txnid', async () => {
      const result = await service.ingest(webhook('TXN2'));

      expect(result.stored && result.transition.effect).toBe(CallbackEffect.CREATED);
      const stored = await transactions.getTransaction('TXN2');
      expect(stored.status).toBe(TransactionStatus.SUCCESS);
      expect(stored.hashVerified).toBe(true);
      expect(stored.amount).toBe('100.00');
      expect(stored.gatewayTxnId).toBe('E100');
      expect(stored.paymentMode).toBe('UPI');
    });

    it('should keep a single unchanged row when the same webhook arrives twice', async () => {
      await service.ingest(webhook('TXN2'), new Date('2026-01-01T10:00:00.000Z'));
      const first = await transactions.getTransaction('TXN2');

      const second = await service.ingest(webhook('TXN2'), new Date('2026-01-01T10:01:00.000Z'));
      const again = await transactions.getTransaction('TXN2');

      expect(second.stored && second.transition.effect).toBe(CallbackEffect.UNCHANGED);
      expect({ ...again, updatedAt: first.updatedAt, version: first.version }).toEqual(first);
      expect(again.updatedAt).toEqual(new Date('2026-01-01T10:01:00.000Z'));
    });

    it('should store a garbage-hash callback as HASH_MISMATCH instead of discarding it', async () => {
      const params = webhook('TXN3', 'success', { hash: 'garbage' });

      await service.ingest(params);

      const stored = await transactions.getTransaction('TXN3');
      expect(stored.status).toBe(TransactionStatus.HASH_MISMATCH);
      expect(stored.hashVerified).toBe(false);
      expect(stored.reviewRequired).toBe(true);
      expect(stored.hash).toBe('garbage');
      expect(stored.rawResponse).toBe(JSON.stringify(params));
      expect(await ledgerStore.find('M123', 'TXN3')).toBeNull();
    });

    it('should record a forged callback against a settled payment on the row', async () => {
      await service.ingest(webhook('TXN6'));
      const forged = webhook('TXN6', 'failure', { hash: 'garbage' });

      await service.ingest(forged);

      const stored = await transactions.getTransaction('TXN6');
      expect(stored.status).toBe(TransactionStatus.SUCCESS);
      expect(stored.reviewRequired).toBe(true);
      expect(stored.rejectedCallbacks).toHaveLength(1);
      expect(stored.rejectedCallbacks?.[0]).toMatchObject({
        gatewayStatus: 'failure',
        hash: 'garbage',
        rawResponse: JSON.stringify(forged),
      });
    });

    it('should map any other gateway status to FAILED and keep the error message', async () => {
      await service.ingest(webhook('TXN5', 'failure', { error_Message: 'Bank declined' }));

      const stored = await transactions.getTransaction('TXN5');
      expect(stored.status).toBe(TransactionStatus.FAILED);
      expect(stored.errorMessage).toBe('Bank declined');
    });

    it('should route a verified result to the merchant ledger', async () => {
      await service.ingest(webhook('TXN2'));

      const entry = await ledgerStore.find('M123', 'TXN2');
      expect(entry?.status).toBe(TransactionStatus.SUCCESS);
      expect(entry?.orderId).toBe('ORD2');
      expect(entry?.gatewayTxnId).toBe('E100');
    });

    it('should still store the callback when ledger routing fails', async () => {
      jest.spyOn(ledger, 'routeToMerchant').mockRejectedValue(new Error('ledger offline'));

      const result = await service.ingest(webhook('TXN2'));

      expect(result.stored).toBe(true);
      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.objectContaining({ txnid: 'TXN2' }),
        'Merchant ledger routing failed',
      );
    });

    it('should not store a callback without txnid', async () => {
      const result = await service.ingest({ status: 'success' });

      expect(result).toEqual({ stored: false, reason: 'MISSING_TXNID' });
    });
  });

  describe('handleWebhook', () => {
    it('should swallow storage faults after logging them', async () => {
      jest.spyOn(transactions, 'applyCallback').mockRejectedValue(new Error('database unavailable'));

      await expect(service.handleWebhook(webhook('TXN2'))).resolves.toBeUndefined();
      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.objectContaining({ txnid: 'TXN2' }),
        'Webhook processing failed, acknowledging anyway',
      );
    });
  });

  describe('handleRedirect', () => {
    it('should describe a verified payment', async () => {
      const view = await service.handleRedirect(webhook('TXN2'), RedirectOutcome.SUCCESS);

      expect(view).toEqual({
        outcome: RedirectOutcome.SUCCESS,
        txnid: 'TXN2',
        amount: '100.00',
        status: TransactionStatus.SUCCESS,
        productInfo: 'Order',
        firstName: 'John',
        gatewayTxnId: 'E100',
        bankRefNum: 'BR100',
        paymentMode: 'UPI',
        errorMessage: null,
        suspiciousActivity: false,
      });
    });

    it('should flag suspicious activity when the hash does not verify', async () => {
      const view = await service.handleRedirect(webhook('TXN3', 'success', { hash: 'garbage' }), RedirectOutcome.SUCCESS);

      expect(view.suspiciousActivity).toBe(true);
      expect(view.status).toBe(TransactionStatus.HASH_MISMATCH);
    });

    it('should still render from the posted fields when storage fails', async () => {
      jest.spyOn(transactions, 'applyCallback').mockRejectedValue(new Error('database unavailable'));

      const view = await service.handleRedirect(webhook('TXN2', 'failure'), RedirectOutcome.FAILURE);

      expect(view.status).toBeNull();
      expect(view.txnid).toBe('TXN2');
    });
  });
});
