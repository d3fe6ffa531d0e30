import { Test, TestingModule } from '@nestjs/testing';
import { createHash } from 'crypto';
import { gatewayConfig, GatewayConfig } from '../config/configuration';
import { HashService, MissingGatewayCredentialsError } from './hash.service';
import { HashLayout, UdfTuple, emptyUdfs } from './types/hash.types';

const sha512 = (input: string) => createHash('sha512').update(input, 'utf8').digest('hex');

describe('HashService', () => {
  let service: HashService;

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

  const forwardFields = {
    key: 'K1',
    txnid: 'TXN1',
    amount: '100.00',
    productInfo: 'Order',
    firstName: 'John',
    email: 'j@x.com',
    salt: 'S1',
  };

  const reverseFields = {
    salt: 'S1',
    status: 'success',
    email: 'j@x.com',
    firstName: 'John',
    productInfo: 'Order',
    amount: '100.00',
    txnid: 'TXN1',
    key: 'K1',
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [HashService, { provide: gatewayConfig.KEY, useValue: { ...config } }],
    }).compile();

    service = module.get<HashService>(HashService);
  });

  describe('buildForwardDigest', () => {
    it('should hash the pipe-joined forward sequence with all UDF slots empty', () => {
      const digest = service.buildForwardDigest({ ...forwardFields, udfs: emptyUdfs() });

      expect(digest).toBe(sha512('K1|TXN1|100.00|Order|John|j@x.com|||||||||||S1'));
      expect(digest).toMatch(/^[0-9a-f]{128}$/);
    });

    it('should place every UDF in slot order between email and salt', () => {
      const udfs: UdfTuple = ['M1', 'O1', 'c', 'd', 'e', 'f', 'g', 'h', 'i', 'j'];
      const digest = service.buildForwardDigest({ ...forwardFields, udfs });

      expect(digest).toBe(sha512('K1|TXN1|100.00|Order|John|j@x.com|M1|O1|c|d|e|f|g|h|i|j|S1'));
    });

    it('should be deterministic', () => {
      expect(service.buildForwardDigest(forwardFields)).toBe(service.buildForwardDigest(forwardFields));
    });

    it('should treat omitted UDFs, undefined slots and empty strings alike', () => {
      const omitted = service.buildForwardDigest(forwardFields);
      const blanks = service.buildForwardDigest({ ...forwardFields, udfs: ['', '', '', '', '', '', '', '', '', ''] });
      const sparse = service.buildForwardDigest({ ...forwardFields, udfs: [undefined, null] });

      expect(blanks).toBe(omitted);
      expect(sparse).toBe(omitted);
    });

    it('should never render absent fields as the word null', () => {
      const digest = service.buildForwardDigest({ ...forwardFields, productInfo: null, firstName: undefined });

      expect(digest).toBe(sha512('K1|TXN1|100.00|||j@x.com|||||||||||S1'));
    });

    it('should format numeric amounts with two fraction digits', () => {
      expect(service.buildForwardDigest({ ...forwardFields, amount: 100 })).toBe(
        service.buildForwardDigest(forwardFields),
      );
    });

    it('should change when a single UDF slot flips from empty to a value', () => {
      const base = service.buildForwardDigest(forwardFields);
      const udfs = emptyUdfs();
      udfs[6] = 'x';

      expect(service.buildForwardDigest({ ...forwardFields, udfs })).not.toBe(base);
    });

    it('should change when any identifying field changes', () => {
      const base = service.buildForwardDigest(forwardFields);

      expect(service.buildForwardDigest({ ...forwardFields, txnid: 'TXN2' })).not.toBe(base);
      expect(service.buildForwardDigest({ ...forwardFields, amount: '100.01' })).not.toBe(base);
      expect(service.buildForwardDigest({ ...forwardFields, email: 'k@x.com' })).not.toBe(base);
      expect(service.buildForwardDigest({ ...forwardFields, salt: 'S2' })).not.toBe(base);
    });

    it('should blank slots six to ten under the legacy layout', () => {
      const udfs: UdfTuple = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i', 'j'];
      const digest = service.buildForwardDigest({ ...forwardFields, udfs }, HashLayout.LEGACY);

      expect(digest).toBe(sha512('K1|TXN1|100.00|Order|John|j@x.com|a|b|c|d|e||||||S1'));
    });
  });

  describe('buildReverseDigest', () => {
    it('should hash the reverse sequence starting from salt and status', () => {
      const digest = service.buildReverseDigest(reverseFields);

      expect(digest).toBe(sha512('S1|success|||||||||||j@x.com|John|Order|100.00|TXN1|K1'));
    });

    it('should emit UDFs from udf10 down to udf1', () => {
      const udfs: UdfTuple = ['M1', 'O1', undefined, undefined, undefined, undefined, undefined, undefined, undefined, 'Z'];
      const digest = service.buildReverseDigest({ ...reverseFields, udfs });

      expect(digest).toBe(sha512('S1|success|Z||||||||O1|M1|j@x.com|John|Order|100.00|TXN1|K1'));
    });

    it('should blank udf6 to udf10 under the legacy layout', () => {
      const udfs: UdfTuple = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i', 'j'];
      const digest = service.buildReverseDigest({ ...reverseFields, udfs }, HashLayout.LEGACY);

      expect(digest).toBe(sha512('S1|success||||||e|d|c|b|a|j@x.com|John|Order|100.00|TXN1|K1'));
    });
  });

  describe('verify', () => {
    it('should compare case-insensitively', () => {
      const digest = service.buildReverseDigest(reverseFields);

      expect(service.verify(digest.toUpperCase(), digest)).toBe(true);
    });

    it('should reject garbage, blanks and truncated digests', () => {
      const digest = service.buildReverseDigest(reverseFields);

      expect(service.verify('garbage', digest)).toBe(false);
      expect(service.verify('', digest)).toBe(false);
      expect(service.verify(undefined, digest)).toBe(false);
      expect(service.verify(digest.slice(0, 64), digest)).toBe(false);
    });
  });

  describe('verifyGatewayReply', () => {
    const replyFields = {
      status: 'success',
      email: 'j@x.com',
      firstName: 'John',
      productInfo: 'Order',
      amount: '100.00',
      txnid: 'TXN1',
    };

    it('should verify a reply signed with the standard layout', () => {
      const udfs: UdfTuple = ['M1', 'O1', undefined, undefined, undefined, undefined, 'g', undefined, undefined, undefined];
      const hash = service.buildReverseDigest({ ...reverseFields, udfs });

      expect(service.verifyGatewayReply({ ...replyFields, udfs }, hash)).toEqual({
        verified: true,
        layout: HashLayout.STANDARD,
        expected: hash,
      });
    });

    it('should fall back to the legacy layout when enabled', () => {
      const udfs: UdfTuple = ['M1', 'O1', undefined, undefined, undefined, undefined, 'g', undefined, undefined, undefined];
      const legacyHash = service.buildReverseDigest({ ...reverseFields, udfs }, HashLayout.LEGACY);

      const result = service.verifyGatewayReply({ ...replyFields, udfs }, legacyHash);

      expect(result.verified).toBe(true);
      expect(result.layout).toBe(HashLayout.LEGACY);
    });

    it('should refuse legacy-layout hashes when the fallback is disabled', async () => {
      const module = await Test.createTestingModule({
        providers: [HashService, { provide: gatewayConfig.KEY, useValue: { ...config, acceptLegacyHash: false } }],
      }).compile();
      const strict = module.get(HashService);
      const udfs: UdfTuple = ['M1', 'O1', undefined, undefined, undefined, undefined, 'g', undefined, undefined, undefined];
      const legacyHash = strict.buildReverseDigest({ ...reverseFields, udfs }, HashLayout.LEGACY);

      expect(strict.verifyGatewayReply({ ...replyFields, udfs }, legacyHash).verified).toBe(false);
    });

    it('should report a mismatch as a value', () => {
      const result = service.verifyGatewayReply(replyFields, 'garbage');

      expect(result.verified).toBe(false);
      expect(result.layout).toBeNull();
      expect(result.expected).toBe(service.buildReverseDigest(reverseFields));
    });

    it('should throw when credentials are not configured', async () => {
      const module = await Test.createTestingModule({
        providers: [HashService, { provide: gatewayConfig.KEY, useValue: { ...config, salt: '' } }],
      }).compile();

      expect(() => module.get(HashService).verifyGatewayReply(replyFields, 'x')).toThrow(
        MissingGatewayCredentialsError,
      );
    });
  });

  describe('buildRequestSignature', () => {
    it('should hash merchant id, order id, formatted amount and merchant salt with SHA-256', () => {
      const expected = createHash('sha256').update('M123ORD1499.00merchant-salt').digest('hex');

      expect(service.buildRequestSignature('M123', 'ORD1', 499, 'merchant-salt')).toBe(expected);
    });

    it('should not put a separator between the fields', () => {
      const piped = createHash('sha256').update('M123|ORD1|499.00|merchant-salt').digest('hex');

      expect(service.buildRequestSignature('M123', 'ORD1', '499.00', 'merchant-salt')).not.toBe(piped);
    });
  });
});
